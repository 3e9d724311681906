// Selector parsing, specificity and matching

import { expect, test } from 'vitest';
import {
  buildTree,
  compareSpecificity,
  createElement,
  findElementById,
  matches,
  parseNth,
  parseSelector,
  parseSelectorList,
  specificity,
  type ElementArena,
  type ElementState,
  type Selector,
} from '../mod.ts';

function selector(text: string): Selector {
  const parsed = parseSelector(text);
  if (!parsed) throw new Error(`selector did not parse: ${text}`);
  return parsed;
}

function matchIds(tree: ElementArena, text: string, ids: string[], state?: ElementState): string[] {
  const sel = selector(text);
  return ids.filter((id) => {
    const element = findElementById(tree, id);
    return element !== undefined && matches(tree, sel, element, state);
  });
}

// <div#root>
//   <section#s class="main">
//     <p#p1 class="intro lead" data-kind="note-x">text</p>
//     <div#d><p#p2></p></div>
//     <span#sp></span>
//     <p#p3></p>
//   </section>
//   <input#in disabled required>
// </div>
const tree = buildTree(
  createElement('div', { id: 'root' },
    createElement('section', { id: 's', class: 'main' },
      createElement('p', { id: 'p1', class: 'intro lead', attributes: { 'data-kind': 'note-x' } }, 'text'),
      createElement('div', { id: 'd' }, createElement('p', { id: 'p2' })),
      createElement('span', { id: 'sp' }),
      createElement('p', { id: 'p3' })
    ),
    createElement('input', { id: 'in', attributes: { disabled: '', required: '' } })
  )
);
const ALL = ['root', 's', 'p1', 'd', 'p2', 'sp', 'p3', 'in'];

// ===========================================================================
// 1. Parsing and specificity
// ===========================================================================

test('specificity counts ids, classes and tags', () => {
  expect(specificity(selector('*'))).toEqual([0, 0, 0]);
  expect(specificity(selector('p'))).toEqual([0, 0, 1]);
  expect(specificity(selector('div p.intro'))).toEqual([0, 1, 2]);
  expect(specificity(selector('#s > p:first-child'))).toEqual([1, 1, 1]);
  expect(specificity(selector('a[href]:hover'))).toEqual([0, 2, 1]);
  expect(specificity(selector('p:not(#x)'))).toEqual([1, 0, 1]);
});

test('compareSpecificity orders lexicographically', () => {
  expect(compareSpecificity([1, 0, 0], [0, 10, 10])).toBeGreaterThan(0);
  expect(compareSpecificity([0, 1, 0], [0, 0, 9])).toBeGreaterThan(0);
  expect(compareSpecificity([0, 0, 1], [0, 1, 0])).toBeLessThan(0);
  expect(compareSpecificity([0, 1, 1], [0, 1, 1])).toBe(0);
});

test('unsupported selectors do not parse', () => {
  expect(parseSelector('p::before')).toBeUndefined();
  expect(parseSelector('p:unknown')).toBeUndefined();
  expect(parseSelector('p >')).toBeUndefined();
  expect(parseSelector('')).toBeUndefined();
});

test('selector lists keep valid members and report the rest', () => {
  const result = parseSelectorList('p, a::after, .x');
  expect(result.selectors.map(s => s.text)).toEqual(['p', '.x']);
  expect(result.rejected).toEqual(['a::after']);
});

test('nth expressions parse to a and b', () => {
  expect(parseNth('odd')).toEqual({ a: 2, b: 1 });
  expect(parseNth('even')).toEqual({ a: 2, b: 0 });
  expect(parseNth('3')).toEqual({ a: 0, b: 3 });
  expect(parseNth('2n+1')).toEqual({ a: 2, b: 1 });
  expect(parseNth('-n+2')).toEqual({ a: -1, b: 2 });
});

// ===========================================================================
// 2. Combinators
// ===========================================================================

test('the child combinator matches direct children only', () => {
  expect(matchIds(tree, 'section > p', ALL)).toEqual(['p1', 'p3']);
});

test('the descendant combinator matches at any depth', () => {
  expect(matchIds(tree, 'section p', ALL)).toEqual(['p1', 'p2', 'p3']);
});

test('descendant matching backtracks past a nearer failing ancestor', () => {
  expect(matchIds(tree, '.main div > p', ALL)).toEqual(['p2']);
  expect(matchIds(tree, '#root div p', ALL)).toEqual(['p2']);
});

test('the adjacent combinator skips text nodes and tests one sibling', () => {
  expect(matchIds(tree, 'p + div', ALL)).toEqual(['d']);
  expect(matchIds(tree, 'div + p', ALL)).toEqual([]);
  expect(matchIds(tree, 'span + p', ALL)).toEqual(['p3']);
});

test('the general sibling combinator tests every earlier sibling', () => {
  expect(matchIds(tree, '.intro ~ p', ALL)).toEqual(['p3']);
  expect(matchIds(tree, 'p ~ span', ALL)).toEqual(['sp']);
});

// ===========================================================================
// 3. Simple selectors and pseudo-classes
// ===========================================================================

test('classes, ids and attributes', () => {
  expect(matchIds(tree, '.intro.lead', ALL)).toEqual(['p1']);
  expect(matchIds(tree, 'p#p3', ALL)).toEqual(['p3']);
  expect(matchIds(tree, '[data-kind]', ALL)).toEqual(['p1']);
  expect(matchIds(tree, '[data-kind|="note"]', ALL)).toEqual(['p1']);
  expect(matchIds(tree, '[data-kind^="no"]', ALL)).toEqual(['p1']);
  expect(matchIds(tree, '[data-kind$="-y"]', ALL)).toEqual([]);
  expect(matchIds(tree, '[class~="lead"]', ALL)).toEqual(['p1']);
});

test('structural pseudo-classes count element siblings only', () => {
  expect(matchIds(tree, 'p:first-child', ALL)).toEqual(['p1', 'p2']);
  expect(matchIds(tree, 'section > :last-child', ALL)).toEqual(['p3']);
  expect(matchIds(tree, 'p:only-child', ALL)).toEqual(['p2']);
  expect(matchIds(tree, 'section > :nth-child(2n)', ALL)).toEqual(['d', 'p3']);
  expect(matchIds(tree, 'p:last-of-type', ALL)).toEqual(['p2', 'p3']);
  expect(matchIds(tree, ':root', ALL)).toEqual(['root']);
  expect(matchIds(tree, 'span:empty', ALL)).toEqual(['sp']);
  expect(matchIds(tree, 'p:empty', ALL)).toEqual(['p2', 'p3']);
});

test(':not excludes its argument', () => {
  expect(matchIds(tree, 'section > p:not(.intro)', ALL)).toEqual(['p3']);
});

test('form state pseudo-classes read attributes', () => {
  expect(matchIds(tree, ':disabled', ALL)).toEqual(['in']);
  expect(matchIds(tree, 'input:required', ALL)).toEqual(['in']);
  expect(matchIds(tree, 'input:enabled', ALL)).toEqual([]);
});

test('interaction pseudo-classes read the supplied state', () => {
  const sp = findElementById(tree, 'sp');
  const state: ElementState = { focused: sp?.handle, hovered: new Set(sp ? [sp.handle] : []) };

  expect(matchIds(tree, 'span:focus', ALL)).toEqual([]);
  expect(matchIds(tree, 'span:focus', ALL, state)).toEqual(['sp']);
  expect(matchIds(tree, ':hover', ALL, state)).toEqual(['sp']);
});

test('text nodes never match', () => {
  const p1 = findElementById(tree, 'p1');
  const text = p1 ? tree.get(p1.children[0]) : undefined;
  expect(text && matches(tree, selector('*'), text)).toBe(false);
});
