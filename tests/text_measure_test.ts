// Text metrics and wrapping

import { expect, test } from 'vitest';
import { TextMeasurer, collapseWhitespace, glyphUnits } from '../mod.ts';

const style = { fontSize: 10, lineHeight: 'normal' as const };
const measurer = new TextMeasurer();

test('glyph units count wide glyphs twice and skip combining marks', () => {
  expect(glyphUnits('abc')).toBe(3);
  expect(glyphUnits('漢字')).toBe(4);
  expect(glyphUnits('é')).toBe(1);
  expect(glyphUnits('a\tb')).toBe(2);
});

test('whitespace collapses to single spaces', () => {
  expect(collapseWhitespace('  a \n\t b  ')).toBe('a b');
});

test('width is glyphs times font size times char width', () => {
  expect(measurer.measureWidth('hello', style)).toBe(25);
  expect(new TextMeasurer({ charWidth: 0.6 }).measureWidth('ab', style)).toBeCloseTo(12);
});

test('line height follows the style', () => {
  expect(measurer.lineHeight(style)).toBe(12);
  expect(measurer.lineHeight({ fontSize: 10, lineHeight: 20 })).toBe(20);
  expect(measurer.lineHeight({ fontSize: 10, lineHeight: { factor: 1.5 } })).toBe(15);
  expect(new TextMeasurer({ lineHeight: 2 }).lineHeight(style)).toBe(20);
});

test('intrinsic widths', () => {
  expect(measurer.minContentWidth('a bbb cc', style)).toBe(15);
  expect(measurer.maxContentWidth('a  bbb cc', style)).toBe(40);
});

test('greedy wrapping', () => {
  expect(measurer.wrap('aa bb cc', style, 20)).toEqual(['aa', 'bb', 'cc']);
  expect(measurer.wrap('aa bb cc', style, 30)).toEqual(['aa bb', 'cc']);
  expect(measurer.wrap('averylongword x', style, 20)).toEqual(['averylongword', 'x']);
  expect(measurer.wrap('   ', style, 20)).toEqual([]);
});

test('measure reports the widest line and total height', () => {
  expect(measurer.measure('aa bbbb c', style, 35)).toEqual({ width: 35, height: 24, lines: ['aa bbbb', 'c'] });
  expect(measurer.measure('one line', style)).toEqual({ width: 40, height: 12, lines: ['one line'] });
});
