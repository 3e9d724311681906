// Value parsing, colors and the property registry

import { expect, test } from 'vitest';
import {
  BLACK,
  TRANSPARENT,
  getProperty,
  globalKeyword,
  isKnownProperty,
  isPercentage,
  isValidValue,
  nonNegative,
  packRGBA,
  parseColor,
  parseDimension,
  parseLength,
  parseLengthPercentage,
  parseMaxSize,
  percent,
  propertyKey,
  propertyName,
  resolveLength,
  rgbaToCss,
  splitTopLevel,
  splitValue,
  unpackRGBA,
  type ResolveContext,
} from '../mod.ts';

const ctx: ResolveContext = { fontSize: 10, rootFontSize: 16, color: BLACK };

// ===========================================================================
// 1. Lengths and percentages
// ===========================================================================

test('lengths convert to px', () => {
  expect(parseLength('7', ctx)).toBe(7);
  expect(parseLength('7px', ctx)).toBe(7);
  expect(parseLength('12pt', ctx)).toBe(16);
  expect(parseLength('2em', ctx)).toBe(20);
  expect(parseLength('1.5rem', ctx)).toBe(24);
  expect(parseLength('-3PX', ctx)).toBe(-3);
  expect(parseLength('5vw', ctx)).toBeUndefined();
  expect(parseLength('px', ctx)).toBeUndefined();
});

test('dimensions split number and unit', () => {
  expect(parseDimension(' .5EM ')).toEqual({ value: 0.5, unit: 'em' });
  expect(parseDimension('1e2px')).toEqual({ value: 100, unit: 'px' });
  expect(parseDimension('1..2')).toBeUndefined();
});

test('percentages stay unresolved until a base is known', () => {
  const width = parseLengthPercentage('50%', ctx);
  expect(width).toEqual(percent(50));
  expect(isPercentage(width)).toBe(true);
  expect(isPercentage(50)).toBe(false);
  expect(resolveLength(percent(25), 200)).toBe(50);
  expect(resolveLength(30, 200)).toBe(30);
  expect(parseMaxSize('None', ctx)).toBe('none');
});

test('nonNegative rejects negative lengths and percentages', () => {
  expect(nonNegative(-1)).toBeUndefined();
  expect(nonNegative(percent(-5))).toBeUndefined();
  expect(nonNegative(0)).toBe(0);
  expect(nonNegative(undefined)).toBeUndefined();
});

test('value splitting keeps groups and strings whole', () => {
  expect(splitValue('  a  rgb(1, 2, 3) "x y" ')).toEqual(['a', 'rgb(1, 2, 3)', '"x y"']);
  expect(splitTopLevel('a;b(c;d);"e;f"', ';')).toEqual(['a', 'b(c;d)', '"e;f"']);
});

// ===========================================================================
// 2. Colors
// ===========================================================================

test('hex colors in every length', () => {
  expect(parseColor('#f00')).toBe(packRGBA(255, 0, 0));
  expect(parseColor('#0f08')).toBe(packRGBA(0, 255, 0, 0x88));
  expect(parseColor('#102030')).toBe(packRGBA(16, 32, 48));
  expect(parseColor('#0000ff80')).toBe(packRGBA(0, 0, 255, 128));
  expect(parseColor('#12')).toBeUndefined();
  expect(parseColor('#ggg')).toBeUndefined();
});

test('rgb() and rgba() functions', () => {
  expect(parseColor('rgb(10, 20, 30)')).toBe(packRGBA(10, 20, 30));
  expect(parseColor('rgba(0,0,0,0.5)')).toBe(packRGBA(0, 0, 0, 128));
  expect(parseColor('rgb(100%, 0%, 0%)')).toBe(packRGBA(255, 0, 0));
  expect(parseColor('rgb(300 -4 0 / 50%)')).toBe(packRGBA(255, 0, 0, 128));
  expect(parseColor('rgb(1, 2)')).toBeUndefined();
});

test('named colors ignore case', () => {
  expect(parseColor('RED')).toBe(packRGBA(255, 0, 0));
  expect(parseColor('transparent')).toBe(TRANSPARENT);
  expect(parseColor('notacolor')).toBeUndefined();
});

test('packed colors unpack and format', () => {
  expect(unpackRGBA(packRGBA(1, 2, 3, 4))).toEqual({ r: 1, g: 2, b: 3, a: 4 });
  expect(rgbaToCss(packRGBA(1, 2, 3))).toBe('rgb(1,2,3)');
  expect(rgbaToCss(packRGBA(0, 0, 0, 128))).toBe('rgba(0,0,0,0.50)');
  expect(BLACK).toBe(packRGBA(0, 0, 0));
});

// ===========================================================================
// 3. Property registry
// ===========================================================================

test('names map to keys and back', () => {
  expect(propertyKey('Margin-Top')).toBe('marginTop');
  expect(propertyKey('margin')).toBeUndefined();
  expect(propertyName('flexBasis')).toBe('flex-basis');
  expect(isKnownProperty('border')).toBe(true);
  expect(isKnownProperty('colour')).toBe(false);
});

test('inheritance flags', () => {
  expect(getProperty('color').inherited).toBe(true);
  expect(getProperty('fontSize').inherited).toBe(true);
  expect(getProperty('width').inherited).toBe(false);
  expect(getProperty('opacity').inherited).toBe(false);
});

test('value validation per property', () => {
  expect(isValidValue('flex-basis', 'content')).toBe(true);
  expect(isValidValue('font-weight', '1001')).toBe(false);
  expect(isValidValue('padding-left', '-1px')).toBe(false);
  expect(isValidValue('margin-left', '-1px')).toBe(true);
  expect(isValidValue('min-width', '-1px')).toBe(false);
  expect(isValidValue('color', 'inherit')).toBe(true);
  expect(isValidValue('display', '123')).toBe(false);
  expect(isValidValue('border-top-width', 'thick')).toBe(true);
});

test('typed parsing of font and line values', () => {
  expect(getProperty('lineHeight').parse('1.5', ctx)).toEqual({ factor: 1.5 });
  expect(getProperty('lineHeight').parse('150%', ctx)).toBe(15);
  expect(getProperty('lineHeight').parse('18px', ctx)).toBe(18);
  expect(getProperty('fontSize').parse('larger', ctx)).toBe(12);
  expect(getProperty('fontSize').parse('x-large', ctx)).toBe(24);
  expect(getProperty('fontSize').parse('200%', ctx)).toBe(20);
  expect(getProperty('fontWeight').parse('bold', ctx)).toBe(700);
  expect(getProperty('opacity').parse('150%', ctx)).toBe(1);
  expect(getProperty('display').parse('inline-flex', ctx)).toBe('inline-flex');
  expect(getProperty('display').parse('table-cell', ctx)).toBe('block');
});

test('global keywords are recognized in any case', () => {
  expect(globalKeyword(' Inherit ')).toBe('inherit');
  expect(globalKeyword('revert')).toBeUndefined();
});
