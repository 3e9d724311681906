// Error and diagnostic types for stylesheet parsing and reflow

import { getLogger } from './logging.ts';

const logger = getLogger('diagnostics');

/**
 * Structural stylesheet error (unterminated block, stray closing brace).
 * Recoverable: the rest of the document still styles and lays out.
 */
export class StyleParseError extends Error {
  constructor(
    message: string,
    public line?: number,
    public column?: number
  ) {
    const location = line !== undefined
      ? column !== undefined
        ? ` at line ${line}, column ${column}`
        : ` at line ${line}`
      : '';
    super(`${message}${location}`);
    this.name = 'StyleParseError';
  }

  toDiagnostic(): Diagnostic {
    return {
      kind: 'parse-error',
      message: this.message,
      line: this.line,
      column: this.column,
    };
  }
}

/** Thrown when a reflow is started while another reflow of the same document is running. */
export class ReflowError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReflowError';
  }
}

export type DiagnosticKind = 'parse-error' | 'unresolved-reference';

/**
 * A non-fatal problem found while styling. `unresolved-reference` covers
 * duplicate ids, unknown properties, invalid values and unsupported selectors.
 */
export interface Diagnostic {
  kind: DiagnosticKind;
  message: string;
  line?: number;
  column?: number;
}

export type UnresolvedReferenceWarning = Diagnostic & { kind: 'unresolved-reference' };

/**
 * Collects diagnostics and mirrors each one to the log at WARN.
 */
export class DiagnosticSink {
  private _items: Diagnostic[] = [];

  report(diagnostic: Diagnostic): void {
    this._items.push(diagnostic);
    logger.warn(diagnostic.message, {
      kind: diagnostic.kind,
      ...(diagnostic.line !== undefined ? { line: diagnostic.line, column: diagnostic.column } : {}),
    });
  }

  warn(message: string, line?: number, column?: number): void {
    this.report({ kind: 'unresolved-reference', message, line, column });
  }

  get items(): readonly Diagnostic[] {
    return this._items;
  }

  get length(): number {
    return this._items.length;
  }

  clear(): void {
    this._items = [];
  }
}

export function formatDiagnostic(diagnostic: Diagnostic, source?: string): string {
  const parts: string[] = [];

  if (source) {
    parts.push(source);
  }

  if (diagnostic.line !== undefined) {
    parts.push(String(diagnostic.line));
    if (diagnostic.column !== undefined) {
      parts.push(String(diagnostic.column));
    }
  }

  const location = parts.length > 0 ? `${parts.join(':')}: ` : '';
  return `${location}${diagnostic.message}`;
}

export const ERROR_MESSAGES = {
  unterminatedBlock: () =>
    'Unterminated block: missing "}"',

  unexpectedCloseBrace: () =>
    'Unexpected "}" with no open block',

  unterminatedComment: () =>
    'Unterminated comment',

  missingSelector: () =>
    'Rule has a block but no selector',

  unsupportedSelector: (selector: string) =>
    `Unsupported selector "${selector}" skipped`,

  skippedAtRule: (name: string) =>
    `At-rule "@${name}" is not supported and was skipped`,

  unknownProperty: (name: string) =>
    `Unknown property "${name}" ignored`,

  invalidValue: (name: string, value: string) =>
    `Invalid value "${value}" for property "${name}" ignored`,

  malformedDeclaration: (text: string) =>
    `Malformed declaration "${text}" ignored`,

  duplicateId: (id: string) =>
    `Duplicate id "${id}"; only the first element is registered`,

  reentrantReflow: () =>
    'Reflow already in progress for this document',
};
