// Hit testing over published layout trees

import { expect, test } from 'vitest';
import { HitTester, TextMeasurer, buildTree, createElement, reflow, type LayoutTree } from '../mod.ts';

const CSS = `
  #a { height: 50px; }
  #b { height: 50px; }
  #c { width: 20px; height: 20px; position: relative; left: 300px; }
  #h { height: 20px; visibility: hidden; }
  #hc { height: 10px; visibility: visible; }
  #n { display: none; height: 40px; }
`;

function layout(width: number): LayoutTree {
  const tree = buildTree(
    createElement('div', { id: 'root' },
      createElement('div', { id: 'a' }, 'hello'),
      createElement('div', { id: 'b' }, createElement('div', { id: 'c' })),
      createElement('div', { id: 'h' }, createElement('div', { id: 'hc' })),
      createElement('div', { id: 'n' })
    )
  );
  return reflow(tree, CSS, { width, height: 200 }, { textMeasurer: new TextMeasurer() }).tree;
}

const ids = (tester: HitTester, x: number, y: number) => tester.hitTestAll(x, y).map(e => e.id);

// ===========================================================================
// Hit testing
// ===========================================================================

test('the deepest element under the point wins; text is skipped', () => {
  const tester = new HitTester(layout(200));
  expect(ids(tester, 10, 10)).toEqual(['root', 'a']);
  expect(tester.hitTest(10, 10)?.id).toBe('a');
});

test('right and bottom edges are exclusive', () => {
  const tester = new HitTester(layout(200));
  expect(ids(tester, 0, 50)).toEqual(['root', 'b']);
  expect(ids(tester, 200, 10)).toEqual([]);
  expect(tester.hitTest(200, 10)).toBeUndefined();
});

test('descendants outside their parent are still found', () => {
  const tester = new HitTester(layout(200));
  expect(ids(tester, 310, 60)).toEqual(['root', 'b', 'c']);
});

test('hidden elements are not hit but visible descendants are', () => {
  const tester = new HitTester(layout(200));
  expect(ids(tester, 5, 105)).toEqual(['root', 'hc']);
  expect(ids(tester, 5, 115)).toEqual(['root']);
});

test('updateTree switches to a newer layout', () => {
  const tester = new HitTester(layout(200));
  expect(tester.hitTest(150, 10)?.id).toBe('a');

  tester.updateTree(layout(100));
  expect(tester.hitTest(150, 10)).toBeUndefined();
});
