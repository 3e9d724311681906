// Stylesheet parsing for stylebox
// Turns stylesheet text into ordered rules. Only structural damage (an
// unterminated block, a stray closing brace) is an error; everything else is
// skipped with a diagnostic.

import { DiagnosticSink, ERROR_MESSAGES, StyleParseError } from './errors.ts';
import { getLogger } from './logging.ts';
import { expandShorthand, isKnownProperty, isValidValue } from './properties.ts';
import { parseSelectorList, type Selector } from './selector.ts';
import { splitTopLevel } from './values.ts';

const logger = getLogger('Stylesheet');

export type Origin = 'user-agent' | 'author' | 'inline';

export const ORIGIN_RANK: Readonly<Record<Origin, number>> = Object.freeze({
  'user-agent': 0,
  'author': 1,
  'inline': 2,
});

export interface Declaration {
  readonly property: string;
  readonly value: string;
  readonly important: boolean;
}

export interface StyleRule {
  readonly selector: Selector;
  readonly declarations: readonly Declaration[];
  readonly origin: Origin;
  /** Source position; members of one selector list share it */
  readonly order: number;
  readonly line?: number;
}

export interface ParseOptions {
  origin?: Origin;
  /** First order index to assign; lets several sheets share one sequence */
  startOrder?: number;
  diagnostics?: DiagnosticSink;
}

interface Location {
  line: number;
  column: number;
}

class SourceMap {
  private _lineStarts: number[] = [0];

  constructor(text: string) {
    for (let i = 0; i < text.length; i++) {
      if (text[i] === '\n') this._lineStarts.push(i + 1);
    }
  }

  locate(offset: number): Location {
    let low = 0;
    let high = this._lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this._lineStarts[mid] <= offset) low = mid;
      else high = mid - 1;
    }
    return { line: low + 1, column: offset - this._lineStarts[low] + 1 };
  }
}

/**
 * Blank out comments, keeping newlines so offsets still map to lines.
 */
function stripComments(text: string, sink: DiagnosticSink, map: SourceMap): string {
  let result = '';
  let i = 0;
  while (i < text.length) {
    const start = text.indexOf('/*', i);
    if (start < 0) {
      result += text.slice(i);
      break;
    }
    result += text.slice(i, start);
    const end = text.indexOf('*/', start + 2);
    const stop = end < 0 ? text.length : end + 2;
    result += text.slice(start, stop).replace(/[^\n]/g, ' ');
    if (end < 0) {
      const { line, column } = map.locate(start);
      sink.report({ kind: 'parse-error', message: ERROR_MESSAGES.unterminatedComment(), line, column });
    }
    i = stop;
  }
  return result;
}

/** Index of the brace closing the block opened at `open`, or -1 */
function findBlockEnd(text: string, open: number): number {
  let depth = 0;
  let quote: string | undefined;
  for (let i = open; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === '\\') i++;
      else if (ch === quote) quote = undefined;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}' && --depth === 0) {
      return i;
    }
  }
  return -1;
}

function parseDeclarationsAt(
  text: string,
  offset: number,
  sink: DiagnosticSink,
  map?: SourceMap
): Declaration[] {
  const declarations: Declaration[] = [];
  let cursor = offset;

  for (const part of splitTopLevel(text, ';')) {
    const partOffset = cursor;
    cursor += part.length + 1;

    const trimmed = part.trim();
    if (trimmed === '') continue;

    const where = map ? map.locate(partOffset + part.indexOf(trimmed)) : undefined;
    const colon = trimmed.indexOf(':');
    if (colon <= 0 || trimmed.includes('{') || trimmed.includes('}')) {
      sink.warn(ERROR_MESSAGES.malformedDeclaration(trimmed), where?.line, where?.column);
      continue;
    }

    const property = trimmed.slice(0, colon).trim().toLowerCase();
    let value = trimmed.slice(colon + 1).trim();
    let important = false;
    const importantMatch = value.match(/\s*!\s*important\s*$/i);
    if (importantMatch) {
      important = true;
      value = value.slice(0, value.length - importantMatch[0].length).trim();
    }

    if (value === '') {
      sink.warn(ERROR_MESSAGES.invalidValue(property, value), where?.line, where?.column);
      continue;
    }

    const longhands = expandShorthand(property, value);
    if (longhands === undefined) {
      if (!isKnownProperty(property)) {
        sink.warn(ERROR_MESSAGES.unknownProperty(property), where?.line, where?.column);
      } else if (!isValidValue(property, value)) {
        sink.warn(ERROR_MESSAGES.invalidValue(property, value), where?.line, where?.column);
      } else {
        declarations.push(Object.freeze({ property, value, important }));
      }
      continue;
    }

    if (longhands.length === 0) {
      sink.warn(ERROR_MESSAGES.invalidValue(property, value), where?.line, where?.column);
      continue;
    }
    for (const [longhand, longhandValue] of longhands) {
      declarations.push(Object.freeze({ property: longhand, value: longhandValue, important }));
    }
  }

  return declarations;
}

/**
 * Parse a declaration list such as an inline `style` attribute.
 * Shorthands are expanded; invalid entries are dropped with a warning.
 */
export function parseDeclarations(text: string, diagnostics?: DiagnosticSink): Declaration[] {
  return parseDeclarationsAt(text, 0, diagnostics ?? new DiagnosticSink());
}

function parseInto(text: string, options: ParseOptions, rules: StyleRule[]): number {
  const sink = options.diagnostics ?? new DiagnosticSink();
  const origin = options.origin ?? 'author';
  const map = new SourceMap(text);
  const source = stripComments(text, sink, map);

  let order = options.startOrder ?? 0;
  let preludeStart = 0;
  let quote: string | undefined;

  for (let i = 0; i < source.length; i++) {
    const ch = source[i];

    if (quote) {
      if (ch === '\\') i++;
      else if (ch === quote) quote = undefined;
      continue;
    }

    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '}') {
      const { line, column } = map.locate(i);
      throw new StyleParseError(ERROR_MESSAGES.unexpectedCloseBrace(), line, column);
    } else if (ch === ';') {
      const prelude = source.slice(preludeStart, i).trim();
      const where = map.locate(preludeStart + source.slice(preludeStart, i).indexOf(prelude));
      if (prelude.startsWith('@')) {
        sink.warn(ERROR_MESSAGES.skippedAtRule(atRuleName(prelude)), where.line, where.column);
      } else if (prelude !== '') {
        sink.warn(ERROR_MESSAGES.malformedDeclaration(prelude), where.line, where.column);
      }
      preludeStart = i + 1;
    } else if (ch === '{') {
      const end = findBlockEnd(source, i);
      if (end < 0) {
        const { line, column } = map.locate(i);
        throw new StyleParseError(ERROR_MESSAGES.unterminatedBlock(), line, column);
      }

      const rawPrelude = source.slice(preludeStart, i);
      const prelude = rawPrelude.trim();
      const where = map.locate(preludeStart + Math.max(0, rawPrelude.indexOf(prelude)));

      if (prelude.startsWith('@')) {
        sink.warn(ERROR_MESSAGES.skippedAtRule(atRuleName(prelude)), where.line, where.column);
      } else if (prelude === '') {
        sink.warn(ERROR_MESSAGES.missingSelector(), where.line, where.column);
      } else {
        const { selectors, rejected } = parseSelectorList(prelude);
        for (const member of rejected) {
          sink.warn(ERROR_MESSAGES.unsupportedSelector(member), where.line, where.column);
        }
        if (selectors.length > 0) {
          const declarations = Object.freeze(parseDeclarationsAt(source.slice(i + 1, end), i + 1, sink, map));
          for (const selector of selectors) {
            rules.push(Object.freeze({ selector, declarations, origin, order, line: where.line }));
          }
          order++;
        }
      }

      i = end;
      preludeStart = end + 1;
    }
  }

  const trailing = source.slice(preludeStart).trim();
  if (trailing !== '') {
    const where = map.locate(preludeStart + source.slice(preludeStart).indexOf(trailing));
    sink.warn(ERROR_MESSAGES.malformedDeclaration(trailing), where.line, where.column);
  }

  return order;
}

function atRuleName(prelude: string): string {
  return prelude.slice(1).split(/[\s({;]/, 1)[0].toLowerCase();
}

/**
 * Parse stylesheet text into rules in source order.
 * Throws StyleParseError on an unterminated block or an unmatched `}`.
 */
export function parseStylesheet(text: string, options: ParseOptions = {}): StyleRule[] {
  const rules: StyleRule[] = [];
  parseInto(text, options, rules);
  logger.debug('Parsed stylesheet', { rules: rules.length, origin: options.origin ?? 'author' });
  return rules;
}

/**
 * Like parseStylesheet, but a structural error is recorded as a diagnostic
 * and the rules parsed before it are kept.
 */
export function parseStylesheetLenient(text: string, options: ParseOptions = {}): StyleRule[] {
  const rules: StyleRule[] = [];
  try {
    parseInto(text, options, rules);
  } catch (error) {
    if (!(error instanceof StyleParseError)) throw error;
    (options.diagnostics ?? new DiagnosticSink()).report(error.toDiagnostic());
  }
  return rules;
}

export interface AddOptions {
  /** Keep rules before a structural error instead of throwing */
  lenient?: boolean;
}

/**
 * Ordered rule collection built from one or more stylesheet texts.
 * Order indexes keep increasing across texts so later sheets win ties.
 */
export class Stylesheet {
  private _rules: StyleRule[] = [];
  private _nextOrder = 0;
  private _diagnostics: DiagnosticSink;

  constructor(diagnostics: DiagnosticSink = new DiagnosticSink()) {
    this._diagnostics = diagnostics;
  }

  /**
   * Add rules from stylesheet text
   */
  addFromString(css: string, options: AddOptions = {}): StyleRule[] {
    const added: StyleRule[] = [];
    const parseOptions: ParseOptions = {
      origin: 'author',
      startOrder: this._nextOrder,
      diagnostics: this._diagnostics,
    };
    try {
      this._nextOrder = parseInto(css, parseOptions, added);
    } catch (error) {
      if (!options.lenient || !(error instanceof StyleParseError)) throw error;
      this._diagnostics.report(error.toDiagnostic());
      this._nextOrder = added.reduce((next, rule) => Math.max(next, rule.order + 1), this._nextOrder);
    }
    this._rules.push(...added);
    return added;
  }

  /**
   * Add one rule from a selector and a declaration list
   */
  addRule(selector: string, declarations: string): StyleRule[] {
    return this.addFromString(`${selector} { ${declarations} }`);
  }

  get rules(): readonly StyleRule[] {
    return this._rules;
  }

  get diagnostics(): DiagnosticSink {
    return this._diagnostics;
  }

  get length(): number {
    return this._rules.length;
  }

  clear(): void {
    this._rules = [];
    this._nextOrder = 0;
  }

  /**
   * Create a stylesheet from text
   */
  static fromString(css: string, options: AddOptions = {}): Stylesheet {
    const sheet = new Stylesheet();
    sheet.addFromString(css, options);
    return sheet;
  }
}
