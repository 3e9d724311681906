// Reflow: end-to-end runs, diagnostics, reentrancy and the debug dump

import { afterEach, expect, test } from 'vitest';
import {
  Document,
  Reflow,
  ReflowError,
  StyleboxConfig,
  Stylesheet,
  TextMeasurer,
  buildTree,
  createElement,
  dumpLayoutTree,
  formatBounds,
  parseMarkup,
  reflow,
  type ComputedStyle,
} from '../mod.ts';

const VIEWPORT = { width: 300, height: 200 };

afterEach(() => {
  StyleboxConfig.reset();
});

// ===========================================================================
// 1. Runs
// ===========================================================================

test('markup and its style elements reflow together', () => {
  const { tree, stylesheets } = parseMarkup(
    '<style>#x { height: 30px; }</style><div id="x" style="width: 50px">hi</div>'
  );
  const result = reflow(tree, stylesheets.join('\n'), VIEWPORT, { textMeasurer: new TextMeasurer() });
  const doc = new Document(tree);
  const x = doc.getElementById('x');
  const node = x ? result.tree.get(x.handle) : undefined;

  expect(node?.box.border).toEqual({ x: 8, y: 8, width: 50, height: 30 });
  expect(result.tree.root.element.tag).toBe('html');
  expect(result.diagnostics).toEqual([]);
});

test('the viewport defaults to the configuration', () => {
  StyleboxConfig.init({ overrides: { 'viewport.width': 640 } });
  const tree = buildTree(createElement('div', { id: 'root' }));
  const result = reflow(tree, '');
  expect(result.tree.root.box.border.width).toBe(640);
});

test('published trees are frozen', () => {
  const result = reflow(buildTree(createElement('div', {})), '', VIEWPORT);
  expect(Object.isFrozen(result.tree.root)).toBe(true);
  expect(Object.isFrozen(result.tree.root.box.border)).toBe(true);
});

test('a Reflow keeps its latest tree and counts runs', () => {
  const runner = new Reflow(buildTree(createElement('div', { id: 'root' })));
  expect(runner.current).toBeUndefined();

  const first = runner.run('#root { height: 10px; }', { viewport: VIEWPORT });
  const second = runner.run('#root { height: 20px; }', { viewport: VIEWPORT });

  expect(runner.count).toBe(2);
  expect(runner.current).toBe(second.tree);
  expect(first.tree.root.box.border.height).toBe(10);
  expect(second.tree.root.box.border.height).toBe(20);
});

// ===========================================================================
// 2. Diagnostics
// ===========================================================================

test('diagnostics list document, stylesheet and run problems in that order', () => {
  const tree = buildTree(
    createElement('div', {}, createElement('p', { id: 'dup' }), createElement('p', { id: 'dup' }))
  );
  const sheet = Stylesheet.fromString('p { margin: 1px 2px 3px 4px 5px; }');
  const fromSheet = reflow(tree, sheet, VIEWPORT);
  const fromText = reflow(tree, 'p { colour: red; } }', VIEWPORT);

  expect(fromSheet.diagnostics.map(d => d.message)).toEqual([
    'Duplicate id "dup"; only the first element is registered',
    'Invalid value "1px 2px 3px 4px 5px" for property "margin" ignored',
  ]);
  expect(fromText.diagnostics.map(d => d.message)).toEqual([
    'Duplicate id "dup"; only the first element is registered',
    'Unknown property "colour" ignored',
    'Unexpected "}" with no open block at line 1, column 20',
  ]);
  expect(fromText.diagnostics[2].kind).toBe('parse-error');
});

test('a structural error keeps the rules before it', () => {
  const tree = buildTree(createElement('div', { id: 'root' }));
  const result = reflow(tree, '#root { height: 12px; }\n#root { height: 40px;', VIEWPORT);
  expect(result.tree.root.box.border.height).toBe(12);
});

// ===========================================================================
// 3. Reentrancy and failure
// ===========================================================================

test('a reflow started during a reflow is rejected', () => {
  const runner = new Reflow(buildTree(createElement('div', {}, 'text')));
  let nested: unknown;

  class NestingMeasurer extends TextMeasurer {
    measureWidth(text: string, style: ComputedStyle): number {
      if (nested === undefined) {
        try {
          runner.run('', { viewport: VIEWPORT });
        } catch (error) {
          nested = error;
        }
      }
      return super.measureWidth(text, style);
    }
  }

  runner.run('', { viewport: VIEWPORT, textMeasurer: new NestingMeasurer() });

  expect(nested).toBeInstanceOf(ReflowError);
  expect(nested instanceof ReflowError && nested.message).toBe('Reflow already in progress for this document');
  expect(runner.isRunning).toBe(false);
  expect(runner.count).toBe(1);
});

test('a failed run leaves the previous tree published', () => {
  class FailingMeasurer extends TextMeasurer {
    measureWidth(): number {
      throw new Error('measure failed');
    }
  }

  const runner = new Reflow(buildTree(createElement('div', {}, 'text')));
  const first = runner.run('', { viewport: VIEWPORT, textMeasurer: new TextMeasurer() });

  expect(() => runner.run('', { viewport: VIEWPORT, textMeasurer: new FailingMeasurer() })).toThrow('measure failed');
  expect(runner.current).toBe(first.tree);
  expect(runner.count).toBe(1);
  expect(runner.isRunning).toBe(false);
});

// ===========================================================================
// 4. Debug dump
// ===========================================================================

test('dumpLayoutTree prints one indented line per node', () => {
  const tree = buildTree(
    createElement('div', { id: 'main', class: 'card' }, createElement('p', {}, 'hi'))
  );
  const result = reflow(tree, '#main { padding: 4px; } p { margin: 0; }', { width: 100, height: 50 }, {
    textMeasurer: new TextMeasurer(),
  });

  expect(dumpLayoutTree(result.tree)).toBe([
    'div#main.card 0,0 100x27.2 [block]',
    '  p 4,4 92x19.2 [block]',
    '    "hi" 4,4 16x19.2',
  ].join('\n'));
  expect(dumpLayoutTree(result.tree, { content: true }).split('\n')[0]).toBe(
    'div#main.card 0,0 100x27.2 content=4,4 92x19.2 [block]'
  );
});

test('formatBounds rounds to two decimals', () => {
  expect(formatBounds({ x: 1 / 3, y: 0, width: 10.006, height: 2 })).toBe('0.33,0 10.01x2');
});
