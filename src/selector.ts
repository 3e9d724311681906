// Selector parsing and matching for stylebox

import { elementChildren, getAttribute, hasClass } from './element.ts';
import { isTextNode, type Element, type ElementState, type ElementTree } from './types.ts';
import { splitTopLevel } from './values.ts';

export type Combinator = 'descendant' | 'child' | 'adjacent' | 'sibling';

export type AttributeOperator = '=' | '~=' | '|=' | '^=' | '$=' | '*=';

export interface AttributeSelector {
  name: string;
  operator?: AttributeOperator;
  value?: string;
}

export type StructuralPseudo =
  | 'first-child' | 'last-child' | 'only-child' | 'empty' | 'root'
  | 'first-of-type' | 'last-of-type' | 'only-of-type';

export type AttributePseudo = 'disabled' | 'enabled' | 'checked' | 'required' | 'optional';

export type StatePseudo = 'hover' | 'focus' | 'active';

export type PseudoClass =
  | { kind: StructuralPseudo | AttributePseudo | StatePseudo }
  | { kind: 'nth-child' | 'nth-last-child' | 'nth-of-type' | 'nth-last-of-type'; a: number; b: number }
  | { kind: 'not'; selector: CompoundSelector };

export interface CompoundSelector {
  tag?: string;
  id?: string;
  classes: string[];
  attributes: AttributeSelector[];
  pseudoClasses: PseudoClass[];
}

/** [ids, classes + attributes + pseudo-classes, tags] */
export type Specificity = readonly [number, number, number];

/**
 * A complex selector. `combinators[i]` joins `compounds[i]` to `compounds[i + 1]`;
 * the last compound is the subject.
 */
export interface Selector {
  readonly text: string;
  readonly compounds: readonly CompoundSelector[];
  readonly combinators: readonly Combinator[];
  readonly specificity: Specificity;
}

const SIMPLE_PSEUDOS: ReadonlySet<string> = new Set([
  'first-child', 'last-child', 'only-child', 'empty', 'root',
  'first-of-type', 'last-of-type', 'only-of-type',
  'disabled', 'enabled', 'checked', 'required', 'optional',
  'hover', 'focus', 'active',
]);

function isSimplePseudo(name: string): name is StructuralPseudo | AttributePseudo | StatePseudo {
  return SIMPLE_PSEUDOS.has(name);
}

const NTH_PSEUDOS = ['nth-child', 'nth-last-child', 'nth-of-type', 'nth-last-of-type'] as const;

const IDENT = /^-?[_a-zA-Z\u00A0-\uFFFF][-_a-zA-Z0-9\u00A0-\uFFFF]*/;

class SelectorScanner {
  private _pos = 0;

  constructor(private readonly _text: string) {}

  get done(): boolean {
    return this._pos >= this._text.length;
  }

  peek(): string {
    return this._text[this._pos] ?? '';
  }

  next(): string {
    return this._text[this._pos++] ?? '';
  }

  skipWhitespace(): boolean {
    const start = this._pos;
    while (!this.done && /\s/.test(this.peek())) this._pos++;
    return this._pos > start;
  }

  ident(): string | undefined {
    const match = this._text.slice(this._pos).match(IDENT);
    if (!match) return undefined;
    this._pos += match[0].length;
    return match[0];
  }

  /** Read up to the matching close paren; the open paren is already consumed */
  parenthesized(): string | undefined {
    let depth = 1;
    const start = this._pos;
    while (!this.done) {
      const ch = this.next();
      if (ch === '(') depth++;
      else if (ch === ')' && --depth === 0) {
        return this._text.slice(start, this._pos - 1);
      }
    }
    return undefined;
  }

  until(ch: string): string | undefined {
    const end = this._text.indexOf(ch, this._pos);
    if (end < 0) return undefined;
    const text = this._text.slice(this._pos, end);
    this._pos = end + 1;
    return text;
  }
}

/**
 * Parse `an+b`, `odd`, `even` or an integer.
 */
export function parseNth(text: string): { a: number; b: number } | undefined {
  const expr = text.replace(/\s+/g, '').toLowerCase();
  if (expr === 'odd') return { a: 2, b: 1 };
  if (expr === 'even') return { a: 2, b: 0 };
  if (/^[+-]?\d+$/.test(expr)) return { a: 0, b: parseInt(expr, 10) };

  const match = expr.match(/^([+-]?\d*)n([+-]\d+)?$/);
  if (!match) return undefined;
  const coefficient = match[1];
  const a = coefficient === '' || coefficient === '+' ? 1 : coefficient === '-' ? -1 : parseInt(coefficient, 10);
  const b = match[2] ? parseInt(match[2], 10) : 0;
  return { a, b };
}

function emptyCompound(): CompoundSelector {
  return { classes: [], attributes: [], pseudoClasses: [] };
}

function parseAttribute(body: string): AttributeSelector | undefined {
  const match = body.trim().match(/^([-_a-zA-Z0-9]+)\s*(?:([~|^$*]?=)\s*(.+?))?\s*$/);
  if (!match) return undefined;
  const name = match[1].toLowerCase();
  const operator = match[2];
  if (operator === undefined) return { name };

  let value = match[3];
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    value = value.slice(1, -1);
  }
  switch (operator) {
    case '=':
    case '~=':
    case '|=':
    case '^=':
    case '$=':
    case '*=':
      return { name, operator, value };
    default:
      return undefined;
  }
}

function parsePseudo(scanner: SelectorScanner): PseudoClass | undefined {
  if (scanner.peek() === ':') {
    // Pseudo-elements are not supported
    return undefined;
  }
  const name = scanner.ident()?.toLowerCase();
  if (!name) return undefined;

  if (scanner.peek() !== '(') {
    return isSimplePseudo(name) ? { kind: name } : undefined;
  }

  scanner.next();
  const arg = scanner.parenthesized();
  if (arg === undefined) return undefined;

  const nthKind = NTH_PSEUDOS.find((kind) => kind === name);
  if (nthKind) {
    const nth = parseNth(arg);
    return nth ? { kind: nthKind, ...nth } : undefined;
  }
  if (name === 'not') {
    const innerScanner = new SelectorScanner(arg.trim());
    const inner = parseCompound(innerScanner);
    return inner && innerScanner.done ? { kind: 'not', selector: inner } : undefined;
  }
  return undefined;
}

function parseCompound(scanner: SelectorScanner): CompoundSelector | undefined {
  const compound = emptyCompound();
  let consumed = false;

  if (scanner.peek() === '*') {
    scanner.next();
    consumed = true;
  } else {
    const tag = scanner.ident();
    if (tag) {
      compound.tag = tag.toLowerCase();
      consumed = true;
    }
  }

  while (!scanner.done) {
    const ch = scanner.peek();
    if ('#.[:'.includes(ch)) consumed = true;
    if (ch === '#') {
      scanner.next();
      const id = scanner.ident();
      if (!id || compound.id !== undefined) return undefined;
      compound.id = id;
    } else if (ch === '.') {
      scanner.next();
      const cls = scanner.ident();
      if (!cls) return undefined;
      compound.classes.push(cls);
    } else if (ch === '[') {
      scanner.next();
      const body = scanner.until(']');
      const attr = body !== undefined ? parseAttribute(body) : undefined;
      if (!attr) return undefined;
      compound.attributes.push(attr);
    } else if (ch === ':') {
      scanner.next();
      const pseudo = parsePseudo(scanner);
      if (!pseudo) return undefined;
      compound.pseudoClasses.push(pseudo);
    } else {
      break;
    }
  }

  return consumed ? compound : undefined;
}

function compoundSpecificity(compound: CompoundSelector): [number, number, number] {
  let ids = compound.id !== undefined ? 1 : 0;
  let classes = compound.classes.length + compound.attributes.length;
  let tags = compound.tag !== undefined ? 1 : 0;

  for (const pseudo of compound.pseudoClasses) {
    if (pseudo.kind === 'not') {
      const [i, c, t] = compoundSpecificity(pseudo.selector);
      ids += i;
      classes += c;
      tags += t;
    } else {
      classes++;
    }
  }
  return [ids, classes, tags];
}

/**
 * Parse a single complex selector. Returns undefined if any part is
 * unsupported or malformed.
 */
export function parseSelector(text: string): Selector | undefined {
  const source = text.trim();
  if (source === '') return undefined;

  const scanner = new SelectorScanner(source);
  const compounds: CompoundSelector[] = [];
  const combinators: Combinator[] = [];

  while (!scanner.done) {
    const compound = parseCompound(scanner);
    if (!compound) return undefined;
    compounds.push(compound);

    const sawSpace = scanner.skipWhitespace();
    if (scanner.done) break;

    const ch = scanner.peek();
    let combinator: Combinator;
    if (ch === '>' || ch === '+' || ch === '~') {
      scanner.next();
      scanner.skipWhitespace();
      combinator = ch === '>' ? 'child' : ch === '+' ? 'adjacent' : 'sibling';
    } else if (sawSpace) {
      combinator = 'descendant';
    } else {
      return undefined;
    }
    if (scanner.done) return undefined;
    combinators.push(combinator);
  }

  if (compounds.length === 0) return undefined;

  const total: [number, number, number] = [0, 0, 0];
  for (const compound of compounds) {
    const [i, c, t] = compoundSpecificity(compound);
    total[0] += i;
    total[1] += c;
    total[2] += t;
  }

  return Object.freeze({
    text: source,
    compounds,
    combinators,
    specificity: Object.freeze(total),
  });
}

export interface SelectorListResult {
  selectors: Selector[];
  /** Members that failed to parse, as written */
  rejected: string[];
}

/**
 * Parse a comma separated selector list. Each member is parsed on its own.
 */
export function parseSelectorList(text: string): SelectorListResult {
  const result: SelectorListResult = { selectors: [], rejected: [] };
  for (const member of splitTopLevel(text, ',')) {
    const trimmed = member.trim();
    const selector = parseSelector(trimmed);
    if (selector) {
      result.selectors.push(selector);
    } else {
      result.rejected.push(trimmed);
    }
  }
  return result;
}

export function specificity(selector: Selector): Specificity {
  return selector.specificity;
}

/**
 * Lexicographic comparison; positive when `a` is more specific.
 */
export function compareSpecificity(a: Specificity, b: Specificity): number {
  for (let i = 0; i < 3; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return 0;
}

// Matching

function previousElementSibling(tree: ElementTree, element: Element): Element | undefined {
  const parent = tree.parentOf(element);
  if (!parent) return undefined;
  let previous: Element | undefined;
  for (const handle of parent.children) {
    if (handle === element.handle) return previous;
    const sibling = tree.get(handle);
    if (!isTextNode(sibling)) previous = sibling;
  }
  return undefined;
}

function siblingsOf(tree: ElementTree, element: Element): Element[] {
  const parent = tree.parentOf(element);
  return parent ? elementChildren(tree, parent) : [element];
}

function nthMatches(a: number, b: number, position: number): boolean {
  if (a === 0) return position === b;
  const n = (position - b) / a;
  return Number.isInteger(n) && n >= 0;
}

function matchesAttribute(element: Element, attr: AttributeSelector): boolean {
  const actual = getAttribute(element, attr.name);
  if (actual === undefined) return false;
  if (attr.operator === undefined || attr.value === undefined) return true;

  const expected = attr.value;
  switch (attr.operator) {
    case '=':
      return actual === expected;
    case '~=':
      return actual.split(/\s+/).includes(expected);
    case '|=':
      return actual === expected || actual.startsWith(`${expected}-`);
    case '^=':
      return expected !== '' && actual.startsWith(expected);
    case '$=':
      return expected !== '' && actual.endsWith(expected);
    case '*=':
      return expected !== '' && actual.includes(expected);
  }
}

const FORM_CONTROLS: ReadonlySet<string> = new Set(['button', 'input', 'select', 'textarea', 'option', 'fieldset']);

function matchesPseudo(tree: ElementTree, element: Element, pseudo: PseudoClass, state?: ElementState): boolean {
  switch (pseudo.kind) {
    case 'root':
      return element.handle === tree.root;
    case 'empty':
      return element.children.every((handle) => {
        const child = tree.get(handle);
        return isTextNode(child) && (child.text ?? '') === '';
      });
    case 'first-child':
      return siblingsOf(tree, element)[0]?.handle === element.handle;
    case 'last-child': {
      const siblings = siblingsOf(tree, element);
      return siblings[siblings.length - 1]?.handle === element.handle;
    }
    case 'only-child':
      return siblingsOf(tree, element).length === 1;
    case 'first-of-type':
    case 'last-of-type':
    case 'only-of-type': {
      const sameType = siblingsOf(tree, element).filter((sibling) => sibling.tag === element.tag);
      if (pseudo.kind === 'only-of-type') return sameType.length === 1;
      const target = pseudo.kind === 'first-of-type' ? sameType[0] : sameType[sameType.length - 1];
      return target?.handle === element.handle;
    }
    case 'nth-child':
    case 'nth-last-child':
    case 'nth-of-type':
    case 'nth-last-of-type': {
      let siblings = siblingsOf(tree, element);
      if (pseudo.kind === 'nth-of-type' || pseudo.kind === 'nth-last-of-type') {
        siblings = siblings.filter((sibling) => sibling.tag === element.tag);
      }
      const index = siblings.findIndex((sibling) => sibling.handle === element.handle);
      const fromEnd = pseudo.kind === 'nth-last-child' || pseudo.kind === 'nth-last-of-type';
      const position = fromEnd ? siblings.length - index : index + 1;
      return nthMatches(pseudo.a, pseudo.b, position);
    }
    case 'not':
      return !matchesCompound(tree, element, pseudo.selector, state);
    case 'disabled':
      return FORM_CONTROLS.has(element.tag) && getAttribute(element, 'disabled') !== undefined;
    case 'enabled':
      return FORM_CONTROLS.has(element.tag) && getAttribute(element, 'disabled') === undefined;
    case 'checked':
      return getAttribute(element, 'checked') !== undefined || getAttribute(element, 'selected') !== undefined;
    case 'required':
      return getAttribute(element, 'required') !== undefined;
    case 'optional':
      return FORM_CONTROLS.has(element.tag) && getAttribute(element, 'required') === undefined;
    case 'hover':
      return state?.hovered?.has(element.handle) ?? false;
    case 'active':
      return state?.active?.has(element.handle) ?? false;
    case 'focus':
      return state?.focused === element.handle;
  }
}

function matchesCompound(
  tree: ElementTree,
  element: Element,
  compound: CompoundSelector,
  state?: ElementState
): boolean {
  if (isTextNode(element)) return false;
  if (compound.tag !== undefined && compound.tag !== element.tag) return false;
  if (compound.id !== undefined && compound.id !== element.id) return false;
  for (const cls of compound.classes) {
    if (!hasClass(element, cls)) return false;
  }
  for (const attr of compound.attributes) {
    if (!matchesAttribute(element, attr)) return false;
  }
  for (const pseudo of compound.pseudoClasses) {
    if (!matchesPseudo(tree, element, pseudo, state)) return false;
  }
  return true;
}

function matchesFrom(
  tree: ElementTree,
  selector: Selector,
  index: number,
  element: Element,
  state?: ElementState
): boolean {
  if (!matchesCompound(tree, element, selector.compounds[index], state)) return false;
  if (index === 0) return true;

  switch (selector.combinators[index - 1]) {
    case 'child': {
      const parent = tree.parentOf(element);
      return parent !== undefined && matchesFrom(tree, selector, index - 1, parent, state);
    }
    case 'descendant': {
      for (let ancestor = tree.parentOf(element); ancestor; ancestor = tree.parentOf(ancestor)) {
        if (matchesFrom(tree, selector, index - 1, ancestor, state)) return true;
      }
      return false;
    }
    case 'adjacent': {
      const previous = previousElementSibling(tree, element);
      return previous !== undefined && matchesFrom(tree, selector, index - 1, previous, state);
    }
    case 'sibling': {
      for (let sibling = previousElementSibling(tree, element); sibling; sibling = previousElementSibling(tree, sibling)) {
        if (matchesFrom(tree, selector, index - 1, sibling, state)) return true;
      }
      return false;
    }
  }
}

/**
 * Whether `selector` matches `element`. Matching starts at the rightmost
 * compound and walks outward; descendant and sibling combinators backtrack.
 */
export function matches(
  tree: ElementTree,
  selector: Selector,
  element: Element,
  state?: ElementState
): boolean {
  return matchesFrom(tree, selector, selector.compounds.length - 1, element, state);
}
