// Markup parsing into element trees

import { expect, test } from 'vitest';
import { decodeEntities, elementChildren, parseMarkup, textContent } from '../mod.ts';

function tags(html: string, fragment = false): string[] {
  const { tree } = parseMarkup(html, { fragment });
  const out: string[] = [];
  const walk = (handle: number, depth: number) => {
    const element = tree.get(handle);
    out.push(`${'  '.repeat(depth)}${element.tag}`);
    element.children.forEach(child => walk(child, depth + 1));
  };
  walk(tree.root, 0);
  return out;
}

// ===========================================================================
// Document structure
// ===========================================================================

test('bare content is wrapped in html and body', () => {
  expect(tags('<!DOCTYPE html><!-- note --><p id="a">x</p>')).toEqual([
    'html',
    '  body',
    '    p',
    '      #text',
  ]);
});

test('an html element becomes the root and style text is collected', () => {
  const { tree, stylesheets } = parseMarkup(
    '<html><head><style>p { color: red; }</style></head><body><p>t</p></body></html>'
  );
  const root = tree.get(tree.root);

  expect(root.tag).toBe('html');
  expect(elementChildren(tree, root).map(e => e.tag)).toEqual(['head', 'body']);
  expect(stylesheets).toEqual(['p { color: red; }']);
});

test('a single-element fragment is its own root', () => {
  expect(tags('<section><b>x</b></section>', true)).toEqual(['section', '  b', '    #text']);
});

test('several top-level nodes in a fragment are wrapped in a div', () => {
  expect(tags('<i>a</i><b>b</b>', true)).toEqual(['div', '  i', '    #text', '  b', '    #text']);
});

test('whitespace-only text is dropped', () => {
  expect(tags('<div>\n  <span>a</span>\n</div>', true)).toEqual(['div', '  span', '    #text']);
});

// ===========================================================================
// Attributes and text
// ===========================================================================

test('tags and attribute names are lower-cased, values kept', () => {
  const { tree } = parseMarkup('<DIV ID="Main" CLASS="a b" data-Mode="Dark"></DIV>', { fragment: true });
  const root = tree.get(tree.root);

  expect(root.tag).toBe('div');
  expect(root.id).toBe('Main');
  expect(root.classList).toEqual(['a', 'b']);
  expect(root.attributes['data-mode']).toBe('Dark');
});

test('attributes without a value are empty strings', () => {
  const { tree } = parseMarkup('<input disabled />', { fragment: true });
  expect(tree.get(tree.root).attributes).toEqual({ disabled: '' });
});

test('entities decode in text and attribute values', () => {
  const { tree } = parseMarkup('<p title="a &lt; b">x&#65;&#x42;&amp;</p>', { fragment: true });
  const root = tree.get(tree.root);

  expect(root.attributes.title).toBe('a < b');
  expect(textContent(tree, root)).toBe('xAB&');
});

test('decodeEntities leaves unknown references alone', () => {
  expect(decodeEntities('&unknown; &quot;q&quot; &nbsp;')).toBe('&unknown; "q" \u00A0');
});
