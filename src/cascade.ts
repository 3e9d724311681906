// Cascade resolution: matched declarations in, one frozen ComputedStyle out

import { BLACK } from './color.ts';
import type { DiagnosticSink } from './errors.ts';
import { getLogger } from './logging.ts';
import { traverseElements } from './element.ts';
import {
  DEFAULT_FONT_SIZE,
  INITIAL_VALUES,
  STYLE_KEYS,
  extensionProperties,
  getProperty,
  globalKeyword,
  propertyKey,
  type ComputedStyle,
  type ResolveContext,
  type StyleKey,
  type StyleValues,
} from './properties.ts';
import { compareSpecificity, matches, type Specificity } from './selector.ts';
import { ORIGIN_RANK, parseDeclarations, type Declaration, type StyleRule } from './stylesheet.ts';
import { isTextNode, type Element, type ElementHandle, type ElementState, type ElementTree } from './types.ts';
import { USER_AGENT_RULES } from './user-agent.ts';

const logger = getLogger('Cascade');

const INLINE_SPECIFICITY: Specificity = Object.freeze([Number.MAX_SAFE_INTEGER, 0, 0] as const);

export interface CascadeOptions {
  /** Author rules */
  rules?: readonly StyleRule[];
  /** Include the user-agent defaults (default true) */
  userAgent?: boolean;
  /** Font size of the root element when nothing sets one */
  rootFontSize?: number;
  /** Interaction state for :hover, :focus and :active */
  state?: ElementState;
  diagnostics?: DiagnosticSink;
  /** Prebuilt index over UA + author rules; built on demand otherwise */
  index?: RuleIndex;
}

/**
 * Buckets rules by the most selective part of their subject compound so
 * that only plausible candidates are matched against each element.
 */
export class RuleIndex {
  private _byId = new Map<string, StyleRule[]>();
  private _byClass = new Map<string, StyleRule[]>();
  private _byTag = new Map<string, StyleRule[]>();
  private _universal: StyleRule[] = [];
  private _size = 0;

  constructor(rules: Iterable<StyleRule> = []) {
    for (const rule of rules) {
      this.add(rule);
    }
  }

  add(rule: StyleRule): void {
    const compounds = rule.selector.compounds;
    const subject = compounds[compounds.length - 1];
    if (subject.id !== undefined) {
      this._push(this._byId, subject.id, rule);
    } else if (subject.classes.length > 0) {
      this._push(this._byClass, subject.classes[0], rule);
    } else if (subject.tag !== undefined) {
      this._push(this._byTag, subject.tag, rule);
    } else {
      this._universal.push(rule);
    }
    this._size++;
  }

  get size(): number {
    return this._size;
  }

  candidates(element: Element): StyleRule[] {
    const result = [...this._universal];
    if (element.id !== undefined) {
      result.push(...(this._byId.get(element.id) ?? []));
    }
    for (const cls of new Set(element.classList)) {
      result.push(...(this._byClass.get(cls) ?? []));
    }
    result.push(...(this._byTag.get(element.tag) ?? []));
    return result;
  }

  private _push(map: Map<string, StyleRule[]>, key: string, rule: StyleRule): void {
    const bucket = map.get(key);
    if (bucket) {
      bucket.push(rule);
    } else {
      map.set(key, [rule]);
    }
  }
}

export function buildRuleIndex(rules: readonly StyleRule[], userAgent = true): RuleIndex {
  return new RuleIndex(userAgent ? [...USER_AGENT_RULES, ...rules] : rules);
}

interface Candidate {
  declaration: Declaration;
  rank: number;
  specificity: Specificity;
  order: number;
  position: number;
}

function compareCandidates(a: Candidate, b: Candidate): number {
  return (Number(b.declaration.important) - Number(a.declaration.important)) ||
    (b.rank - a.rank) ||
    compareSpecificity(b.specificity, a.specificity) ||
    (b.order - a.order) ||
    (b.position - a.position);
}

function collectCandidates(
  tree: ElementTree,
  element: Element,
  index: RuleIndex,
  options: CascadeOptions
): Map<string, Candidate[]> {
  const byProperty = new Map<string, Candidate[]>();
  const add = (declaration: Declaration, rank: number, specificity: Specificity, order: number, position: number) => {
    const candidate: Candidate = { declaration, rank, specificity, order, position };
    const list = byProperty.get(declaration.property);
    if (list) list.push(candidate);
    else byProperty.set(declaration.property, [candidate]);
  };

  if (isTextNode(element)) return byProperty;

  for (const rule of index.candidates(element)) {
    if (!matches(tree, rule.selector, element, options.state)) continue;
    const rank = ORIGIN_RANK[rule.origin];
    rule.declarations.forEach((declaration, position) => {
      add(declaration, rank, rule.selector.specificity, rule.order, position);
    });
  }

  if (element.style) {
    const inline = parseDeclarations(element.style, options.diagnostics);
    inline.forEach((declaration, position) => {
      add(declaration, ORIGIN_RANK.inline, INLINE_SPECIFICITY, 0, position);
    });
  }

  for (const list of byProperty.values()) {
    list.sort(compareCandidates);
  }
  return byProperty;
}

function resolveValue<K extends StyleKey>(
  key: K,
  candidates: readonly Candidate[] | undefined,
  parent: Readonly<StyleValues> | undefined,
  ctx: ResolveContext
): StyleValues[K] {
  const property = getProperty(key);
  const inheritValue = (): StyleValues[K] => (parent ? parent[key] : property.initial(ctx));

  for (const candidate of candidates ?? []) {
    const keyword = globalKeyword(candidate.declaration.value);
    switch (keyword) {
      case 'inherit':
        return inheritValue();
      case 'initial':
        return property.initial(ctx);
      case 'unset':
        return property.inherited ? inheritValue() : property.initial(ctx);
    }

    const value = property.parse(candidate.declaration.value, ctx);
    if (value !== undefined) return value;

    logger.debug(`Declaration dropped: ${property.name}: ${candidate.declaration.value}`);
  }

  return property.inherited ? inheritValue() : property.initial(ctx);
}

function resolveInto<K extends StyleKey>(
  values: StyleValues,
  key: K,
  byProperty: ReadonlyMap<string, Candidate[]>,
  parent: Readonly<StyleValues> | undefined,
  ctx: ResolveContext
): void {
  values[key] = resolveValue(key, byProperty.get(getProperty(key).name), parent, ctx);
}

function resolveExtensions(
  byProperty: ReadonlyMap<string, Candidate[]>,
  parent: ComputedStyle | undefined
): Record<string, string> {
  const result: Record<string, string> = {};

  for (const extension of extensionProperties()) {
    const inherited = parent?.extensions[extension.name];
    const winner = byProperty.get(extension.name)?.[0];
    let value: string | undefined;

    switch (winner ? globalKeyword(winner.declaration.value) : undefined) {
      case 'inherit':
        value = inherited ?? extension.initial;
        break;
      case 'initial':
        value = extension.initial;
        break;
      case 'unset':
        value = extension.inherited ? inherited ?? extension.initial : extension.initial;
        break;
      default:
        value = winner?.declaration.value ??
          (extension.inherited ? inherited ?? extension.initial : extension.initial);
    }

    if (value !== undefined) {
      result[extension.name] = value;
    }
  }

  return result;
}

/**
 * Compute the style of one element given its parent's computed style.
 * Pure: the same tree, element, parent style and rules give a deep-equal result.
 */
export function computeStyle(
  tree: ElementTree,
  element: Element,
  parentStyle: ComputedStyle | undefined,
  options: CascadeOptions = {}
): ComputedStyle {
  const index = options.index ?? buildRuleIndex(options.rules ?? [], options.userAgent ?? true);
  const byProperty = collectCandidates(tree, element, index, options);
  const rootFontSize = options.rootFontSize ?? DEFAULT_FONT_SIZE;

  const values: StyleValues = { ...INITIAL_VALUES };

  // font-size and color first: em units and currentcolor depend on them
  let ctx: ResolveContext = {
    fontSize: parentStyle?.fontSize ?? rootFontSize,
    rootFontSize,
    color: parentStyle?.color ?? BLACK,
  };
  resolveInto(values, 'fontSize', byProperty, parentStyle, ctx);
  ctx = { ...ctx, fontSize: values.fontSize };
  resolveInto(values, 'color', byProperty, parentStyle, ctx);
  ctx = { ...ctx, color: values.color };

  for (const key of STYLE_KEYS) {
    if (key === 'fontSize' || key === 'color') continue;
    resolveInto(values, key, byProperty, parentStyle, ctx);
  }

  if (logger.isTraceEnabled()) {
    const winners = [...byProperty.keys()].filter((name) => propertyKey(name) !== undefined);
    logger.trace(`Computed style for <${element.tag}> #${element.handle}`, { declared: winners });
  }

  return Object.freeze({ ...values, extensions: Object.freeze(resolveExtensions(byProperty, parentStyle)) });
}

/**
 * Resolve every element in document order, parents before children.
 */
export function resolveStyles(
  tree: ElementTree,
  rules: readonly StyleRule[],
  options: Omit<CascadeOptions, 'rules'> = {}
): Map<ElementHandle, ComputedStyle> {
  const startTime = performance.now();
  const styles = new Map<ElementHandle, ComputedStyle>();
  const index = options.index ?? buildRuleIndex(rules, options.userAgent ?? true);
  const rootOptions: CascadeOptions = { ...options, index };
  let descendantOptions: CascadeOptions = rootOptions;

  traverseElements(tree, (element) => {
    const parentStyle = element.parent !== undefined ? styles.get(element.parent) : undefined;
    const isRoot = element.handle === tree.root;
    const style = computeStyle(tree, element, parentStyle, isRoot ? rootOptions : descendantOptions);
    if (isRoot) {
      descendantOptions = { ...rootOptions, rootFontSize: style.fontSize };
    }
    styles.set(element.handle, style);
  });

  logger.debug('Resolved styles', {
    elements: styles.size,
    rules: index.size,
    ms: Math.round((performance.now() - startTime) * 100) / 100,
  });
  return styles;
}
