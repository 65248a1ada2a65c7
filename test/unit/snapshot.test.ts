/**
 * Tests for snapshot assembly and rendering (src/processing/snapshot.ts).
 */

import { describe, expect, it } from 'vitest';
import {
  type RawNode,
  assembleTree,
  flattenTree,
  formatSnapshot,
  refSelector,
} from '../../src/processing/snapshot.js';

const meta = { generation: 2, url: 'https://shop.test/', title: 'Shop' };

const raw: RawNode[] = [
  { index: 1, parent: 0, role: 'document', name: 'Shop' },
  { index: 2, parent: 1, role: 'navigation', name: '' },
  { index: 3, parent: 2, role: 'link', name: 'Home', bounds: { x: 0, y: 0, width: 40, height: 20 } },
  { index: 4, parent: 1, role: 'main', name: '' },
  { index: 5, parent: 4, role: 'heading', name: 'Basket', level: 2 },
  { index: 6, parent: 4, role: 'checkbox', name: 'Gift wrap', checked: false },
  { index: 7, parent: 4, role: 'button', name: 'Pay', disabled: true },
  { index: 8, parent: 4, role: 'combobox', name: 'Size', value: 'M', expanded: false },
];

describe('assembleTree', () => {
  it('nests nodes under their parents and numbers refs by generation', () => {
    const tree = assembleTree(raw, meta);

    expect(tree.nodeCount).toBe(8);
    expect(tree.root.ref).toBe('s2e1');
    expect(tree.root.children.map((c) => c.ref)).toEqual(['s2e2', 's2e4']);
    expect(tree.root.children[0]?.children[0]).toEqual({
      ref: 's2e3',
      role: 'link',
      name: 'Home',
      bounds: { x: 0, y: 0, width: 40, height: 20 },
      children: [],
    });
  });

  it('attaches orphans to the root', () => {
    const tree = assembleTree(
      [
        { index: 1, parent: 0, role: 'document', name: 'x' },
        { index: 9, parent: 42, role: 'button', name: 'Lost' },
      ],
      meta,
    );
    expect(tree.root.children.map((c) => c.name)).toEqual(['Lost']);
  });

  it('synthesizes a document root for an empty page', () => {
    const tree = assembleTree([], meta);
    expect(tree.nodeCount).toBe(1);
    expect(tree.root).toEqual({ ref: 's2e1', role: 'document', name: 'Shop', children: [] });
  });
});

describe('flattenTree', () => {
  it('lists nodes in document order', () => {
    const refs = flattenTree(assembleTree(raw, meta)).map((n) => n.ref);
    expect(refs).toEqual(['s2e1', 's2e2', 's2e3', 's2e4', 's2e5', 's2e6', 's2e7', 's2e8']);
  });
});

describe('formatSnapshot', () => {
  it('renders one indented line per node with its state and ref', () => {
    expect(formatSnapshot(assembleTree(raw, meta))).toBe(
      [
        'Page: Shop',
        'URL: https://shop.test/',
        'Snapshot generation 2 (8 nodes)',
        '',
        '- document "Shop" [ref=s2e1]',
        '  - navigation [ref=s2e2]',
        '    - link "Home" [ref=s2e3]',
        '  - main [ref=s2e4]',
        '    - heading "Basket" [level=2] [ref=s2e5]',
        '    - checkbox "Gift wrap" [checked=false] [ref=s2e6]',
        '    - button "Pay" [disabled] [ref=s2e7]',
        '    - combobox "Size" [expanded=false] value="M" [ref=s2e8]',
      ].join('\n'),
    );
  });

  it('escapes quotes in names', () => {
    const tree = assembleTree([{ index: 1, parent: 0, role: 'document', name: 'Say "hi"' }], meta);
    expect(formatSnapshot(tree).split('\n')[4]).toBe('- document "Say \\"hi\\"" [ref=s2e1]');
  });
});

describe('refSelector', () => {
  it('targets the generation-specific marker', () => {
    expect(refSelector(3, 12)).toBe('[data-bridge-ref-3="12"]');
  });
});
