// @vitest-environment jsdom

/**
 * Tests for the in-page walk (walkDom in src/processing/snapshot.ts), run
 * against a jsdom document instead of a browser.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DATA_ATTR_PREFIX, type WalkOptions, refSelector, walkDom } from '../../src/processing/snapshot.js';

const FIXTURE = `
  <header><nav aria-label="Primary"><a href="/home">Home</a></nav></header>
  <main>
    <h1>Welcome</h1>
    <label>Search <input type="text" value="cats"></label>
    <button>Go</button>
    <div style="display:none"><button>Hidden</button></div>
    <div aria-hidden="true"><a href="/secret">Secret</a></div>
    <input type="checkbox" aria-label="Remember me" checked>
    <button disabled>Later</button>
  </main>
`;

function rect(width: number, height: number): DOMRect {
  return {
    x: 10,
    y: 20,
    width,
    height,
    top: 20,
    left: 10,
    right: 10 + width,
    bottom: 20 + height,
    toJSON: () => ({}),
  };
}

function walk(generation: number, keepGeneration: number, maxNodes = 100) {
  const options: WalkOptions = {
    attrPrefix: DATA_ATTR_PREFIX,
    attr: `${DATA_ATTR_PREFIX}${generation}`,
    keepAttr: `${DATA_ATTR_PREFIX}${keepGeneration}`,
    maxLen: 100,
    maxNodes,
  };
  return walkDom(options);
}

function marked(generation: number, index: number): string | null {
  return document.querySelector(refSelector(generation, index))?.textContent ?? null;
}

beforeEach(() => {
  document.title = 'Fixture page';
  document.body.innerHTML = FIXTURE;
  // jsdom does no layout; give every element a visible box.
  vi.spyOn(Element.prototype, 'getBoundingClientRect').mockReturnValue(rect(100, 30));
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('walkDom', () => {
  it('collects roles and names in document order', () => {
    const nodes = walk(1, 0);

    expect(nodes.map(({ index, parent, role, name }) => ({ index, parent, role, name }))).toEqual([
      { index: 1, parent: 0, role: 'document', name: 'Fixture page' },
      { index: 2, parent: 1, role: 'banner', name: '' },
      { index: 3, parent: 2, role: 'navigation', name: 'Primary' },
      { index: 4, parent: 3, role: 'link', name: 'Home' },
      { index: 5, parent: 1, role: 'main', name: '' },
      { index: 6, parent: 5, role: 'heading', name: 'Welcome' },
      { index: 7, parent: 5, role: 'textbox', name: 'Search' },
      { index: 8, parent: 5, role: 'button', name: 'Go' },
      { index: 9, parent: 5, role: 'checkbox', name: 'Remember me' },
      { index: 10, parent: 5, role: 'button', name: 'Later' },
    ]);
  });

  it('records element state', () => {
    const nodes = walk(1, 0);

    expect(nodes[5]?.level).toBe(1);
    expect(nodes[6]?.value).toBe('cats');
    expect(nodes[8]?.checked).toBe(true);
    expect(nodes[8]?.value).toBeUndefined();
    expect(nodes[9]?.disabled).toBe(true);
    expect(nodes[7]?.bounds).toEqual({ x: 10, y: 20, width: 100, height: 30 });
  });

  it('skips hidden subtrees without marking them', () => {
    const nodes = walk(1, 0);

    expect(nodes.map((n) => n.name)).not.toContain('Hidden');
    expect(nodes.map((n) => n.name)).not.toContain('Secret');
    expect(document.querySelector('div[style] button')?.hasAttribute(`${DATA_ATTR_PREFIX}1`)).toBe(false);
  });

  it('stamps each kept element with its index', () => {
    walk(1, 0);

    expect(marked(1, 8)).toBe('Go');
    expect(marked(1, 4)).toBe('Home');
    expect(document.body.getAttribute(`${DATA_ATTR_PREFIX}1`)).toBe('1');
  });

  it('keeps the committed markers through an abandoned capture', () => {
    walk(1, 0);
    // Generation 2 is captured but never committed.
    walk(2, 1);
    expect(marked(1, 8)).toBe('Go');
    expect(marked(2, 8)).toBe('Go');

    walk(3, 1);
    expect(document.querySelector(`[${DATA_ATTR_PREFIX}2]`)).toBeNull();
    expect(marked(1, 8)).toBe('Go');
    expect(marked(3, 8)).toBe('Go');

    walk(4, 3);
    expect(document.querySelector(`[${DATA_ATTR_PREFIX}1]`)).toBeNull();
    expect(marked(3, 8)).toBe('Go');
  });

  it('stops at the node cap', () => {
    const nodes = walk(1, 0, 3);
    expect(nodes.map((n) => n.role)).toEqual(['document', 'banner', 'navigation']);
  });

  it('drops collapsed controls unless their role is explicit', () => {
    vi.spyOn(Element.prototype, 'getBoundingClientRect').mockReturnValue(rect(0, 0));
    document.body.innerHTML = '<button>Go</button><div role="button">Menu</div>';

    const nodes = walk(1, 0);
    expect(nodes.map((n) => n.name)).toEqual(['Fixture page', 'Menu']);
  });
});
