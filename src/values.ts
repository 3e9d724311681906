// Typed value parsing for stylebox properties

/** Percentage kept unresolved until layout knows the containing block */
export interface Percentage {
  readonly percent: number;
}

export type LengthPercentage = number | Percentage;
export type LengthPercentageAuto = LengthPercentage | 'auto';
export type MaxSize = LengthPercentage | 'none';

/**
 * Font sizes that `em` and `rem` resolve against while a declaration is typed.
 * `fontSize` is the element's own computed font size (its parent's while
 * font-size itself is being resolved).
 */
export interface ValueContext {
  fontSize: number;
  rootFontSize: number;
}

export interface Dimension {
  value: number;
  unit: string;
}

const DIMENSION_PATTERN = /^([+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?)([a-z%]*)$/i;

export function isPercentage(value: unknown): value is Percentage {
  return typeof value === 'object' && value !== null && 'percent' in value;
}

export function percent(value: number): Percentage {
  return Object.freeze({ percent: value });
}

export function parseDimension(text: string): Dimension | undefined {
  const match = text.trim().match(DIMENSION_PATTERN);
  if (!match) return undefined;
  const value = Number(match[1]);
  if (!Number.isFinite(value)) return undefined;
  return { value, unit: match[2].toLowerCase() };
}

export function parseNumber(text: string): number | undefined {
  const dim = parseDimension(text);
  return dim && dim.unit === '' ? dim.value : undefined;
}

/**
 * Absolute length in px. Unitless numbers are taken as px.
 */
export function parseLength(text: string, ctx: ValueContext): number | undefined {
  const dim = parseDimension(text);
  if (!dim) return undefined;
  switch (dim.unit) {
    case '':
    case 'px':
      return dim.value;
    case 'pt':
      return dim.value * 4 / 3;
    case 'em':
      return dim.value * ctx.fontSize;
    case 'rem':
      return dim.value * ctx.rootFontSize;
    default:
      return undefined;
  }
}

export function parseLengthPercentage(text: string, ctx: ValueContext): LengthPercentage | undefined {
  const dim = parseDimension(text);
  if (dim?.unit === '%') {
    return percent(dim.value);
  }
  return parseLength(text, ctx);
}

export function parseLengthPercentageAuto(text: string, ctx: ValueContext): LengthPercentageAuto | undefined {
  if (text.trim().toLowerCase() === 'auto') return 'auto';
  return parseLengthPercentage(text, ctx);
}

export function parseMaxSize(text: string, ctx: ValueContext): MaxSize | undefined {
  if (text.trim().toLowerCase() === 'none') return 'none';
  return parseLengthPercentage(text, ctx);
}

export function nonNegative(value: LengthPercentage | undefined): LengthPercentage | undefined {
  if (value === undefined) return undefined;
  const amount = typeof value === 'number' ? value : value.percent;
  return amount < 0 ? undefined : value;
}

/**
 * Keyword parser over a fixed set of lowercase keywords
 */
export function keywordParser<K extends string>(keywords: readonly K[]): (text: string) => K | undefined {
  return (text: string) => {
    const lower = text.trim().toLowerCase();
    return keywords.find((keyword) => keyword === lower);
  };
}

/**
 * Resolve a length-percentage against a base, e.g. a percentage width against
 * the containing block width.
 */
export function resolveLength(value: LengthPercentage, base: number): number {
  return typeof value === 'number' ? value : value.percent * base / 100;
}

/**
 * Split a value into whitespace separated tokens, keeping parenthesized groups
 * and quoted strings whole.
 */
export function splitValue(text: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let depth = 0;
  let quote: string | undefined;

  for (const ch of text.trim()) {
    if (quote) {
      current += ch;
      if (ch === quote) quote = undefined;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      current += ch;
    } else if (ch === '(') {
      depth++;
      current += ch;
    } else if (ch === ')') {
      depth = Math.max(0, depth - 1);
      current += ch;
    } else if (/\s/.test(ch) && depth === 0) {
      if (current) tokens.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  if (current) tokens.push(current);
  return tokens;
}

/**
 * Split on a separator at the top level (outside parentheses and strings).
 */
export function splitTopLevel(text: string, separator: string): string[] {
  const parts: string[] = [];
  let current = '';
  let depth = 0;
  let quote: string | undefined;

  for (const ch of text) {
    if (quote) {
      current += ch;
      if (ch === quote) quote = undefined;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '(' || ch === '[') {
      depth++;
    } else if (ch === ')' || ch === ']') {
      depth = Math.max(0, depth - 1);
    } else if (ch === separator && depth === 0) {
      parts.push(current);
      current = '';
      continue;
    }
    current += ch;
  }
  parts.push(current);
  return parts;
}
