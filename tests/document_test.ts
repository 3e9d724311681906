// Document: id registry, queries and interaction state

import { expect, test } from 'vitest';
import { DiagnosticSink, Document, buildTree, createElement } from '../mod.ts';

function createDocument(diagnostics?: DiagnosticSink): Document {
  const tree = buildTree(
    createElement('div', { id: 'app' },
      createElement('header', { id: 'top', class: 'bar' }, 'Title'),
      createElement('main', { id: 'content' },
        createElement('button', { id: 'ok', class: 'btn primary' }, 'OK'),
        createElement('button', { id: 'cancel', class: 'btn' }, 'Cancel')
      ),
      createElement('footer', { id: 'top', class: 'bar' })
    )
  );
  return new Document(tree, { diagnostics });
}

// ===========================================================================
// Registry
// ===========================================================================

test('the first element with an id wins and duplicates are reported', () => {
  const sink = new DiagnosticSink();
  const doc = createDocument(sink);

  expect(doc.getElementById('top')?.tag).toBe('header');
  expect(doc.elementCount).toBe(5);
  expect(sink.items).toEqual([
    {
      kind: 'unresolved-reference',
      message: 'Duplicate id "top"; only the first element is registered',
      line: undefined,
      column: undefined,
    },
  ]);
});

test('element lists exclude text nodes and keep document order', () => {
  const doc = createDocument();

  expect(doc.getAllElements().map(e => e.tag)).toEqual(['div', 'header', 'main', 'button', 'button', 'footer']);
  expect(doc.getElementsByTag('BUTTON').map(e => e.id)).toEqual(['ok', 'cancel']);
  expect(doc.getElementsByClass('bar').map(e => e.tag)).toEqual(['header', 'footer']);
  expect(doc.childElements(doc.root).map(e => e.tag)).toEqual(['header', 'main', 'footer']);
});

test('selector queries', () => {
  const doc = createDocument();

  expect(doc.querySelectorAll('main > .btn').map(e => e.id)).toEqual(['ok', 'cancel']);
  expect(doc.querySelectorAll('footer, .primary').map(e => e.id)).toEqual(['ok', 'top']);
  expect(doc.querySelector('.btn:last-child')?.id).toBe('cancel');
  expect(doc.querySelector('p::after')).toBeUndefined();
});

// ===========================================================================
// Interaction state
// ===========================================================================

test('focus by id or element, and blur', () => {
  const doc = createDocument();

  expect(doc.focus('ok')).toBe(true);
  expect(doc.focusedElement?.id).toBe('ok');
  expect(doc.querySelector(':focus')?.id).toBe('ok');
  expect(doc.focus('missing')).toBe(false);
  expect(doc.focusedElement?.id).toBe('ok');

  doc.blur();
  expect(doc.focusedElement).toBeUndefined();
});

test('text nodes cannot take focus', () => {
  const doc = createDocument();
  const header = doc.getElementById('top');
  const text = header ? doc.tree.childrenOf(header)[0] : undefined;
  expect(text && doc.focus(text)).toBe(false);
});

test('hover and active include ancestors', () => {
  const doc = createDocument();
  doc.setHovered(doc.getElementById('cancel'));

  expect(doc.querySelectorAll(':hover').map(e => e.id)).toEqual(['app', 'content', 'cancel']);

  doc.setActive(doc.getElementById('content'));
  expect(doc.querySelectorAll(':active').map(e => e.id)).toEqual(['app', 'content']);

  doc.setHovered(undefined);
  expect(doc.querySelectorAll(':hover')).toEqual([]);
});

test('state is a snapshot', () => {
  const doc = createDocument();
  doc.setHovered(doc.root);
  const snapshot = doc.state;
  doc.setHovered(undefined);

  expect(snapshot.hovered?.has(doc.root.handle)).toBe(true);
});
