import type { Page } from 'playwright-core';
import { logger } from '../utils/logger.js';
import { type Bounds, type ElementReference, formatRef } from './refs.js';

// ── Constants ────────────────────────────────────────────────────────────────

const MAX_TEXT_LENGTH = 100;

/**
 * Every snapshot generation stamps its elements with its own attribute
 * (`data-bridge-ref-3="12"`), so stamping a new generation never disturbs the
 * markers of the one currently committed.
 */
export const DATA_ATTR_PREFIX = 'data-bridge-ref-';

export function refSelector(generation: number, index: number): string {
  return `[${DATA_ATTR_PREFIX}${generation}="${index}"]`;
}

// ── Types ───────────────────────────────────────────────────────────────────

export interface SnapshotNode extends ElementReference {
  value?: string;
  checked?: boolean;
  disabled?: boolean;
  expanded?: boolean;
  level?: number;
  children: SnapshotNode[];
}

export interface SnapshotTree {
  generation: number;
  url: string;
  title: string;
  nodeCount: number;
  root: SnapshotNode;
}

/** Serialisable node returned from page.evaluate, in document order. */
export interface RawNode {
  index: number;
  parent: number;
  role: string;
  name: string;
  value?: string;
  checked?: boolean;
  disabled?: boolean;
  expanded?: boolean;
  level?: number;
  bounds?: Bounds;
}

export interface CaptureOptions {
  /** Generation the new markers are stamped with. */
  generation: number;
  /** Generation whose markers must survive the capture (the committed one). */
  keepGeneration: number;
  maxNodes: number;
}

// ── Capture ─────────────────────────────────────────────────────────────────

/**
 * Walk the page's DOM and collect an accessibility-oriented tree.
 *
 * A single `page.evaluate()` drops hidden subtrees, computes roles and
 * accessible names, and stamps each kept element with its index under the
 * new generation's attribute. Elements without a role are transparent: their
 * children attach to the nearest kept ancestor.
 */
export async function captureTree(page: Page, options: CaptureOptions): Promise<SnapshotTree> {
  const [url, title] = await Promise.all([
    Promise.resolve(page.url()),
    page.title().catch(() => ''),
  ]);

  // tsx/esbuild with keepNames:true wraps const declarations with __name()
  // inside the evaluate callback. Inject a global shim so the browser side
  // resolves it; a string avoids the same transform.
  await page.evaluate(
    "if(typeof __name==='undefined'){var __name=function(t,v){Object.defineProperty(t,'name',{value:v,configurable:true});return t}}",
  );

  const raw = await page.evaluate(walkDom, {
    attrPrefix: DATA_ATTR_PREFIX,
    attr: `${DATA_ATTR_PREFIX}${options.generation}`,
    keepAttr: `${DATA_ATTR_PREFIX}${options.keepGeneration}`,
    maxLen: MAX_TEXT_LENGTH,
    maxNodes: options.maxNodes,
  });

  const tree = assembleTree(raw, { generation: options.generation, url, title });

  logger.debug(
    { url, generation: tree.generation, nodeCount: tree.nodeCount },
    'Accessibility tree captured',
  );

  return tree;
}

// ── In-page walk ────────────────────────────────────────────────────────────

/** Arguments of {@link walkDom}; plain data so they cross into the page. */
export interface WalkOptions {
  attrPrefix: string;
  /** Attribute the new generation stamps. */
  attr: string;
  /** Attribute of the committed generation, left in place. */
  keepAttr: string;
  maxLen: number;
  maxNodes: number;
}

/**
 * The in-page half of a capture. Runs inside the browser through
 * `page.evaluate`, so it must not reference anything outside its own body.
 */
export function walkDom({ attrPrefix, attr, keepAttr, maxLen, maxNodes }: WalkOptions): RawNode[] {
  const truncate = (text: string): string => {
    const cleaned = text.replace(/\s+/g, ' ').trim();
    if (cleaned.length <= maxLen) return cleaned;
    return `${cleaned.slice(0, maxLen - 3)}...`;
  };

  const interactiveRoles = new Set([
    'button',
    'link',
    'textbox',
    'searchbox',
    'checkbox',
    'radio',
    'combobox',
    'listbox',
    'option',
    'slider',
    'spinbutton',
    'switch',
    'tab',
    'menuitem',
    'menuitemcheckbox',
    'menuitemradio',
    'treeitem',
  ]);

  // Kept even without a name: they carry the page's structure.
  const structuralRoles = new Set([
    'main',
    'navigation',
    'banner',
    'contentinfo',
    'complementary',
    'form',
    'list',
    'table',
    'row',
    'dialog',
    'alertdialog',
  ]);

  const textContentRoles = new Set([
    'button',
    'link',
    'tab',
    'menuitem',
    'menuitemcheckbox',
    'menuitemradio',
    'treeitem',
    'heading',
    'option',
    'alert',
    'status',
    'listitem',
    'cell',
    'columnheader',
  ]);

  const hidesSubtree = (el: Element): boolean => {
    if (el.getAttribute('aria-hidden') === 'true') return true;
    if (!(el instanceof HTMLElement)) return false;
    if (el.hidden) return true;
    if (el instanceof HTMLInputElement && el.type.toLowerCase() === 'hidden') return true;
    const style = window.getComputedStyle(el);
    return style.display === 'none' || style.visibility === 'hidden' || style.opacity === '0';
  };

  const getImplicitRole = (el: Element): string => {
    const tag = el.tagName.toLowerCase();
    switch (tag) {
      case 'a':
        return el.hasAttribute('href') ? 'link' : '';
      case 'button':
      case 'summary':
        return 'button';
      case 'input': {
        const type = el instanceof HTMLInputElement ? (el.type || 'text').toLowerCase() : 'text';
        const map: Record<string, string> = {
          button: 'button',
          checkbox: 'checkbox',
          email: 'textbox',
          image: 'button',
          number: 'spinbutton',
          password: 'textbox',
          radio: 'radio',
          range: 'slider',
          reset: 'button',
          search: 'searchbox',
          submit: 'button',
          tel: 'textbox',
          text: 'textbox',
          url: 'textbox',
        };
        return map[type] ?? 'textbox';
      }
      case 'textarea':
        return 'textbox';
      case 'select':
        return el instanceof HTMLSelectElement && el.multiple ? 'listbox' : 'combobox';
      case 'option':
        return 'option';
      case 'h1':
      case 'h2':
      case 'h3':
      case 'h4':
      case 'h5':
      case 'h6':
        return 'heading';
      case 'img':
        return el instanceof HTMLImageElement && el.alt ? 'img' : '';
      case 'dialog':
        return 'dialog';
      case 'nav':
        return 'navigation';
      case 'main':
        return 'main';
      case 'header':
        return 'banner';
      case 'footer':
        return 'contentinfo';
      case 'aside':
        return 'complementary';
      case 'form':
        return 'form';
      case 'ul':
      case 'ol':
        return 'list';
      case 'li':
        return 'listitem';
      case 'table':
        return 'table';
      case 'tr':
        return 'row';
      case 'td':
        return 'cell';
      case 'th':
        return 'columnheader';
      default:
        if (
          el.getAttribute('contenteditable') === 'true' ||
          el.getAttribute('contenteditable') === ''
        ) {
          return 'textbox';
        }
        return '';
    }
  };

  const getAccessibleName = (el: Element, role: string): string => {
    if (!(el instanceof HTMLElement)) return '';

    const labelledBy = el.getAttribute('aria-labelledby');
    if (labelledBy) {
      const parts = labelledBy
        .split(/\s+/)
        .map((id) => document.getElementById(id)?.textContent?.trim() ?? '')
        .filter(Boolean);
      if (parts.length > 0) return parts.join(' ');
    }

    const ariaLabel = el.getAttribute('aria-label');
    if (ariaLabel?.trim()) return ariaLabel.trim();

    if (
      el instanceof HTMLInputElement ||
      el instanceof HTMLTextAreaElement ||
      el instanceof HTMLSelectElement
    ) {
      if (el.id) {
        const label = document.querySelector(`label[for="${CSS.escape(el.id)}"]`);
        if (label?.textContent?.trim()) return label.textContent.trim();
      }
      const parentLabel = el.closest('label');
      const clone = parentLabel?.cloneNode(true);
      if (clone instanceof HTMLElement) {
        for (const child of clone.querySelectorAll('input,textarea,select')) {
          child.remove();
        }
        const text = clone.textContent?.trim();
        if (text) return text;
      }
    }

    if (el instanceof HTMLImageElement && el.alt) return el.alt;
    if (el instanceof HTMLInputElement && el.type === 'image' && el.alt) return el.alt;

    const titleAttr = el.getAttribute('title');
    if (titleAttr?.trim()) return titleAttr.trim();

    if (
      (el instanceof HTMLInputElement || el instanceof HTMLTextAreaElement) &&
      el.placeholder?.trim()
    ) {
      return el.placeholder.trim();
    }

    if (textContentRoles.has(role)) {
      const text = el.textContent?.trim();
      if (text) return text;
    }

    if (el instanceof HTMLInputElement) {
      const t = el.type.toLowerCase();
      if ((t === 'submit' || t === 'reset' || t === 'button') && el.value) {
        return el.value;
      }
    }

    return '';
  };

  const getElementValue = (el: Element): string | undefined => {
    if (el instanceof HTMLInputElement) {
      const type = el.type.toLowerCase();
      if (type === 'checkbox' || type === 'radio') return undefined;
      if (type === 'password') return el.value ? '••••' : '';
      return el.value;
    }
    if (el instanceof HTMLTextAreaElement) return el.value;
    if (el instanceof HTMLSelectElement) {
      const selected = el.options[el.selectedIndex];
      return selected?.textContent?.trim() ?? el.value;
    }
    if (
      el.getAttribute('contenteditable') === 'true' ||
      el.getAttribute('contenteditable') === ''
    ) {
      return el.textContent?.trim() ?? '';
    }
    return undefined;
  };

  // -- clear markers of abandoned generations ---------------------------

  for (const el of document.querySelectorAll('*')) {
    for (const name of el.getAttributeNames()) {
      if (name.startsWith(attrPrefix) && name !== keepAttr) el.removeAttribute(name);
    }
  }

  // -- walk -------------------------------------------------------------

  const nodes: RawNode[] = [];

  const rootEl = document.body ?? document.documentElement;
  rootEl.setAttribute(attr, '1');
  nodes.push({ index: 1, parent: 0, role: 'document', name: truncate(document.title) });

  const visit = (el: Element, parentIndex: number): void => {
    if (nodes.length >= maxNodes) return;
    if (hidesSubtree(el)) return;

    const explicitRole = el.getAttribute('role')?.trim().toLowerCase() ?? '';
    const role = explicitRole || getImplicitRole(el);
    let index = parentIndex;

    if (role && role !== 'none' && role !== 'presentation' && role !== 'generic') {
      const name = truncate(getAccessibleName(el, role));
      const rawValue = getElementValue(el);
      const interactive = interactiveRoles.has(role);
      const rect = el.getBoundingClientRect();
      const collapsed = rect.width === 0 && rect.height === 0;

      const keep =
        (structuralRoles.has(role) || name !== '' || rawValue !== undefined) &&
        !(interactive && collapsed && !explicitRole);

      if (keep) {
        index = nodes.length + 1;
        el.setAttribute(attr, String(index));

        const node: RawNode = { index, parent: parentIndex, role, name };
        if (rawValue !== undefined) node.value = truncate(rawValue);

        if (
          ((el instanceof HTMLButtonElement ||
            el instanceof HTMLInputElement ||
            el instanceof HTMLSelectElement ||
            el instanceof HTMLTextAreaElement) &&
            el.disabled) ||
          el.getAttribute('aria-disabled') === 'true'
        ) {
          node.disabled = true;
        }

        if (el instanceof HTMLInputElement && (el.type === 'checkbox' || el.type === 'radio')) {
          node.checked = el.checked;
        } else if (el.getAttribute('aria-checked') != null) {
          node.checked = el.getAttribute('aria-checked') === 'true';
        }

        const ariaExpanded = el.getAttribute('aria-expanded');
        if (ariaExpanded != null) node.expanded = ariaExpanded === 'true';

        if (role === 'heading') {
          const tagLevel = /^h([1-6])$/.exec(el.tagName.toLowerCase());
          const ariaLevel = Number.parseInt(el.getAttribute('aria-level') ?? '', 10);
          if (!Number.isNaN(ariaLevel)) node.level = ariaLevel;
          else if (tagLevel) node.level = Number(tagLevel[1]);
        }

        if (interactive) {
          node.bounds = {
            x: Math.round(rect.x),
            y: Math.round(rect.y),
            width: Math.round(rect.width),
            height: Math.round(rect.height),
          };
        }

        nodes.push(node);
      }
    }

    for (const child of el.children) visit(child, index);
  };

  for (const child of rootEl.children) visit(child, 1);

  return nodes;
}

// ── Tree assembly ───────────────────────────────────────────────────────────

/**
 * Turn the flat, document-ordered node list into a rooted tree. A node whose
 * parent is missing attaches to the root; an empty list yields a bare
 * document root.
 */
export function assembleTree(
  raw: readonly RawNode[],
  meta: { generation: number; url: string; title: string },
): SnapshotTree {
  const byIndex = new Map<number, SnapshotNode>();
  let root: SnapshotNode | undefined;

  for (const r of raw) {
    const node: SnapshotNode = {
      ref: formatRef(meta.generation, r.index),
      role: r.role,
      name: r.name,
      children: [],
    };
    if (r.value !== undefined) node.value = r.value;
    if (r.checked !== undefined) node.checked = r.checked;
    if (r.disabled) node.disabled = true;
    if (r.expanded !== undefined) node.expanded = r.expanded;
    if (r.level !== undefined) node.level = r.level;
    if (r.bounds) node.bounds = r.bounds;

    byIndex.set(r.index, node);

    const parent = byIndex.get(r.parent);
    if (parent) {
      parent.children.push(node);
    } else if (!root) {
      root = node;
    } else {
      root.children.push(node);
    }
  }

  if (!root) {
    root = { ref: formatRef(meta.generation, 1), role: 'document', name: meta.title, children: [] };
    byIndex.set(1, root);
  }

  return {
    generation: meta.generation,
    url: meta.url,
    title: meta.title,
    nodeCount: byIndex.size,
    root,
  };
}

/** Every node of the tree in document order. */
export function flattenTree(tree: SnapshotTree): SnapshotNode[] {
  const out: SnapshotNode[] = [];
  const stack: SnapshotNode[] = [tree.root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    out.push(node);
    for (let i = node.children.length - 1; i >= 0; i--) {
      const child = node.children[i];
      if (child) stack.push(child);
    }
  }
  return out;
}

/**
 * Render an agent-readable outline of the tree, one node per line.
 */
export function formatSnapshot(tree: SnapshotTree): string {
  const lines: string[] = [
    `Page: ${tree.title}`,
    `URL: ${tree.url}`,
    `Snapshot generation ${tree.generation} (${tree.nodeCount} nodes)`,
    '',
  ];

  const render = (node: SnapshotNode, depth: number): void => {
    let line = `${'  '.repeat(depth)}- ${node.role}`;
    if (node.name) line += ` ${JSON.stringify(node.name)}`;
    if (node.level !== undefined) line += ` [level=${node.level}]`;
    if (node.checked !== undefined) line += ` [checked=${node.checked}]`;
    if (node.disabled) line += ' [disabled]';
    if (node.expanded !== undefined) line += ` [expanded=${node.expanded}]`;
    if (node.value !== undefined) line += ` value=${JSON.stringify(node.value)}`;
    line += ` [ref=${node.ref}]`;
    lines.push(line);
    for (const child of node.children) render(child, depth + 1);
  };

  render(tree.root, 0);
  return lines.join('\n');
}
