// Property registry for stylebox
// The recognized property set is closed: each entry has a typed parser, an
// initial value and an inherited flag. Opaque extension properties can be
// registered on top and surface as strings in ComputedStyle.extensions.

import { BLACK, TRANSPARENT, parseColor } from './color.ts';
import {
  keywordParser,
  nonNegative,
  parseLength,
  parseLengthPercentage,
  parseLengthPercentageAuto,
  parseMaxSize,
  parseNumber,
  parseDimension,
  splitValue,
  type LengthPercentage,
  type LengthPercentageAuto,
  type MaxSize,
  type ValueContext,
} from './values.ts';

export const DISPLAY_VALUES = ['block', 'inline-block', 'inline', 'flex', 'inline-flex', 'none'] as const;
export type Display = typeof DISPLAY_VALUES[number];

export const BORDER_STYLES = [
  'none', 'hidden', 'solid', 'dashed', 'dotted', 'double', 'inset', 'outset', 'groove', 'ridge',
] as const;
export type BorderStyle = typeof BORDER_STYLES[number];

export type BoxSizing = 'content-box' | 'border-box';
export type PositionScheme = 'static' | 'relative';
export type FontStyle = 'normal' | 'italic' | 'oblique';
export type TextAlign = 'left' | 'right' | 'center' | 'justify';
export type Visibility = 'visible' | 'hidden';
export type FlexDirection = 'row' | 'row-reverse' | 'column' | 'column-reverse';
export type FlexWrap = 'nowrap' | 'wrap' | 'wrap-reverse';
export type JustifyContent =
  | 'flex-start' | 'flex-end' | 'center' | 'space-between' | 'space-around' | 'space-evenly';
export type AlignItems = 'stretch' | 'flex-start' | 'flex-end' | 'center';
export type AlignSelf = 'auto' | AlignItems;

/** `factor` is a unitless multiplier that inherits as a multiplier */
export type LineHeight = 'normal' | { readonly factor: number } | number;

export interface StyleValues {
  display: Display;
  width: LengthPercentageAuto;
  height: LengthPercentageAuto;
  minWidth: LengthPercentage;
  minHeight: LengthPercentage;
  maxWidth: MaxSize;
  maxHeight: MaxSize;
  marginTop: LengthPercentageAuto;
  marginRight: LengthPercentageAuto;
  marginBottom: LengthPercentageAuto;
  marginLeft: LengthPercentageAuto;
  paddingTop: LengthPercentage;
  paddingRight: LengthPercentage;
  paddingBottom: LengthPercentage;
  paddingLeft: LengthPercentage;
  borderTopWidth: number;
  borderRightWidth: number;
  borderBottomWidth: number;
  borderLeftWidth: number;
  borderTopStyle: BorderStyle;
  borderRightStyle: BorderStyle;
  borderBottomStyle: BorderStyle;
  borderLeftStyle: BorderStyle;
  borderTopColor: number;
  borderRightColor: number;
  borderBottomColor: number;
  borderLeftColor: number;
  boxSizing: BoxSizing;
  position: PositionScheme;
  top: LengthPercentageAuto;
  right: LengthPercentageAuto;
  bottom: LengthPercentageAuto;
  left: LengthPercentageAuto;
  color: number;
  backgroundColor: number;
  fontFamily: string;
  fontSize: number;
  fontWeight: number;
  fontStyle: FontStyle;
  lineHeight: LineHeight;
  textAlign: TextAlign;
  visibility: Visibility;
  cursor: string;
  opacity: number;
  flexDirection: FlexDirection;
  flexWrap: FlexWrap;
  flexGrow: number;
  flexShrink: number;
  flexBasis: LengthPercentageAuto;
  justifyContent: JustifyContent;
  alignItems: AlignItems;
  alignSelf: AlignSelf;
  rowGap: number;
  columnGap: number;
}

export type StyleKey = keyof StyleValues;

/**
 * Fully resolved style of one element. Frozen.
 */
export type ComputedStyle = Readonly<StyleValues> & {
  readonly extensions: Readonly<Record<string, string>>;
};

/** Context a declaration is typed in; `color` backs `currentcolor` */
export interface ResolveContext extends ValueContext {
  color: number;
}

export interface PropertyDefinition<K extends StyleKey> {
  readonly name: string;
  readonly key: K;
  readonly inherited: boolean;
  readonly initial: (ctx: ResolveContext) => StyleValues[K];
  readonly parse: (raw: string, ctx: ResolveContext) => StyleValues[K] | undefined;
}

type PropertyTable = { readonly [K in StyleKey]: PropertyDefinition<K> };

export const DEFAULT_FONT_SIZE = 16;

export const INITIAL_VALUES: Readonly<StyleValues> = Object.freeze({
  display: 'inline',
  width: 'auto',
  height: 'auto',
  minWidth: 0,
  minHeight: 0,
  maxWidth: 'none',
  maxHeight: 'none',
  marginTop: 0,
  marginRight: 0,
  marginBottom: 0,
  marginLeft: 0,
  paddingTop: 0,
  paddingRight: 0,
  paddingBottom: 0,
  paddingLeft: 0,
  borderTopWidth: 0,
  borderRightWidth: 0,
  borderBottomWidth: 0,
  borderLeftWidth: 0,
  borderTopStyle: 'none',
  borderRightStyle: 'none',
  borderBottomStyle: 'none',
  borderLeftStyle: 'none',
  borderTopColor: BLACK,
  borderRightColor: BLACK,
  borderBottomColor: BLACK,
  borderLeftColor: BLACK,
  boxSizing: 'content-box',
  position: 'static',
  top: 'auto',
  right: 'auto',
  bottom: 'auto',
  left: 'auto',
  color: BLACK,
  backgroundColor: TRANSPARENT,
  fontFamily: 'sans-serif',
  fontSize: DEFAULT_FONT_SIZE,
  fontWeight: 400,
  fontStyle: 'normal',
  lineHeight: 'normal',
  textAlign: 'left',
  visibility: 'visible',
  cursor: 'auto',
  opacity: 1,
  flexDirection: 'row',
  flexWrap: 'nowrap',
  flexGrow: 0,
  flexShrink: 1,
  flexBasis: 'auto',
  justifyContent: 'flex-start',
  alignItems: 'stretch',
  alignSelf: 'auto',
  rowGap: 0,
  columnGap: 0,
});

// Value parsers

const BORDER_WIDTH_KEYWORDS: Readonly<Record<string, number>> = { thin: 1, medium: 3, thick: 5 };

const FONT_SIZE_KEYWORDS: Readonly<Record<string, number>> = {
  'xx-small': 9,
  'x-small': 10,
  'small': 13,
  'medium': 16,
  'large': 18,
  'x-large': 24,
  'xx-large': 32,
};

const IDENTIFIER = /^-?[a-z_][a-z0-9_-]*$/;

function parseDisplay(raw: string): Display | undefined {
  const lower = raw.trim().toLowerCase();
  const known = DISPLAY_VALUES.find((value) => value === lower);
  if (known) return known;
  // Unsupported display types lay out as block
  return IDENTIFIER.test(lower) ? 'block' : undefined;
}

function parseBorderWidth(raw: string, ctx: ResolveContext): number | undefined {
  const lower = raw.trim().toLowerCase();
  if (Object.hasOwn(BORDER_WIDTH_KEYWORDS, lower)) {
    return BORDER_WIDTH_KEYWORDS[lower];
  }
  const px = parseLength(lower, ctx);
  return px !== undefined && px >= 0 ? px : undefined;
}

function parseColorValue(raw: string, ctx: ResolveContext): number | undefined {
  if (raw.trim().toLowerCase() === 'currentcolor') return ctx.color;
  return parseColor(raw);
}

function parseFontSize(raw: string, ctx: ResolveContext): number | undefined {
  const lower = raw.trim().toLowerCase();
  if (Object.hasOwn(FONT_SIZE_KEYWORDS, lower)) return FONT_SIZE_KEYWORDS[lower];
  if (lower === 'larger') return ctx.fontSize * 1.2;
  if (lower === 'smaller') return ctx.fontSize / 1.2;
  const dim = parseDimension(lower);
  if (dim?.unit === '%') {
    return dim.value >= 0 ? dim.value * ctx.fontSize / 100 : undefined;
  }
  const px = parseLength(lower, ctx);
  return px !== undefined && px >= 0 ? px : undefined;
}

function parseFontWeight(raw: string): number | undefined {
  const lower = raw.trim().toLowerCase();
  if (lower === 'normal') return 400;
  if (lower === 'bold') return 700;
  const value = parseNumber(lower);
  return value !== undefined && value >= 1 && value <= 1000 ? value : undefined;
}

function parseLineHeight(raw: string, ctx: ResolveContext): LineHeight | undefined {
  const lower = raw.trim().toLowerCase();
  if (lower === 'normal') return 'normal';
  const dim = parseDimension(lower);
  if (!dim || dim.value < 0) return undefined;
  if (dim.unit === '') return Object.freeze({ factor: dim.value });
  if (dim.unit === '%') return dim.value * ctx.fontSize / 100;
  return parseLength(lower, ctx);
}

function parseFontFamily(raw: string): string | undefined {
  const trimmed = raw.trim();
  return trimmed === '' ? undefined : trimmed;
}

function parseCursor(raw: string): string | undefined {
  const lower = raw.trim().toLowerCase();
  return IDENTIFIER.test(lower) ? lower : undefined;
}

function parseOpacity(raw: string): number | undefined {
  const dim = parseDimension(raw);
  if (!dim) return undefined;
  if (dim.unit === '%') return Math.min(1, Math.max(0, dim.value / 100));
  return dim.unit === '' ? Math.min(1, Math.max(0, dim.value)) : undefined;
}

function parseFactor(raw: string): number | undefined {
  const value = parseNumber(raw);
  return value !== undefined && value >= 0 ? value : undefined;
}

function parseGap(raw: string, ctx: ResolveContext): number | undefined {
  const lower = raw.trim().toLowerCase();
  if (lower === 'normal') return 0;
  const px = parseLength(lower, ctx);
  return px !== undefined && px >= 0 ? px : undefined;
}

const parseBorderStyle = keywordParser(BORDER_STYLES);
const parseBoxSizing = keywordParser<BoxSizing>(['content-box', 'border-box']);
const parsePosition = keywordParser<PositionScheme>(['static', 'relative']);
const parseFontStyle = keywordParser<FontStyle>(['normal', 'italic', 'oblique']);
const parseTextAlign = keywordParser<TextAlign>(['left', 'right', 'center', 'justify']);
const parseVisibility = keywordParser<Visibility>(['visible', 'hidden']);
const parseFlexDirection = keywordParser<FlexDirection>(['row', 'row-reverse', 'column', 'column-reverse']);
const parseFlexWrap = keywordParser<FlexWrap>(['nowrap', 'wrap', 'wrap-reverse']);
const parseJustifyContent = keywordParser<JustifyContent>([
  'flex-start', 'flex-end', 'center', 'space-between', 'space-around', 'space-evenly',
]);
const parseAlignItems = keywordParser<AlignItems>(['stretch', 'flex-start', 'flex-end', 'center']);
const parseAlignSelf = keywordParser<AlignSelf>(['auto', 'stretch', 'flex-start', 'flex-end', 'center']);

function parsePadding(raw: string, ctx: ResolveContext): LengthPercentage | undefined {
  return nonNegative(parseLengthPercentage(raw, ctx));
}

function parseMinSize(raw: string, ctx: ResolveContext): LengthPercentage | undefined {
  return nonNegative(parseLengthPercentage(raw, ctx));
}

function define<K extends StyleKey>(
  key: K,
  name: string,
  inherited: boolean,
  parse: (raw: string, ctx: ResolveContext) => StyleValues[K] | undefined,
  initial?: (ctx: ResolveContext) => StyleValues[K]
): PropertyDefinition<K> {
  return Object.freeze({
    name,
    key,
    inherited,
    parse,
    initial: initial ?? (() => INITIAL_VALUES[key]),
  });
}

const currentColor = (ctx: ResolveContext): number => ctx.color;

const PROPERTIES: PropertyTable = Object.freeze({
  display: define('display', 'display', false, parseDisplay),
  width: define('width', 'width', false, parseLengthPercentageAuto),
  height: define('height', 'height', false, parseLengthPercentageAuto),
  minWidth: define('minWidth', 'min-width', false, parseMinSize),
  minHeight: define('minHeight', 'min-height', false, parseMinSize),
  maxWidth: define('maxWidth', 'max-width', false, parseMaxSize),
  maxHeight: define('maxHeight', 'max-height', false, parseMaxSize),
  marginTop: define('marginTop', 'margin-top', false, parseLengthPercentageAuto),
  marginRight: define('marginRight', 'margin-right', false, parseLengthPercentageAuto),
  marginBottom: define('marginBottom', 'margin-bottom', false, parseLengthPercentageAuto),
  marginLeft: define('marginLeft', 'margin-left', false, parseLengthPercentageAuto),
  paddingTop: define('paddingTop', 'padding-top', false, parsePadding),
  paddingRight: define('paddingRight', 'padding-right', false, parsePadding),
  paddingBottom: define('paddingBottom', 'padding-bottom', false, parsePadding),
  paddingLeft: define('paddingLeft', 'padding-left', false, parsePadding),
  borderTopWidth: define('borderTopWidth', 'border-top-width', false, parseBorderWidth),
  borderRightWidth: define('borderRightWidth', 'border-right-width', false, parseBorderWidth),
  borderBottomWidth: define('borderBottomWidth', 'border-bottom-width', false, parseBorderWidth),
  borderLeftWidth: define('borderLeftWidth', 'border-left-width', false, parseBorderWidth),
  borderTopStyle: define('borderTopStyle', 'border-top-style', false, parseBorderStyle),
  borderRightStyle: define('borderRightStyle', 'border-right-style', false, parseBorderStyle),
  borderBottomStyle: define('borderBottomStyle', 'border-bottom-style', false, parseBorderStyle),
  borderLeftStyle: define('borderLeftStyle', 'border-left-style', false, parseBorderStyle),
  borderTopColor: define('borderTopColor', 'border-top-color', false, parseColorValue, currentColor),
  borderRightColor: define('borderRightColor', 'border-right-color', false, parseColorValue, currentColor),
  borderBottomColor: define('borderBottomColor', 'border-bottom-color', false, parseColorValue, currentColor),
  borderLeftColor: define('borderLeftColor', 'border-left-color', false, parseColorValue, currentColor),
  boxSizing: define('boxSizing', 'box-sizing', false, parseBoxSizing),
  position: define('position', 'position', false, parsePosition),
  top: define('top', 'top', false, parseLengthPercentageAuto),
  right: define('right', 'right', false, parseLengthPercentageAuto),
  bottom: define('bottom', 'bottom', false, parseLengthPercentageAuto),
  left: define('left', 'left', false, parseLengthPercentageAuto),
  color: define('color', 'color', true, parseColorValue),
  backgroundColor: define('backgroundColor', 'background-color', false, parseColorValue),
  fontFamily: define('fontFamily', 'font-family', true, parseFontFamily),
  fontSize: define('fontSize', 'font-size', true, parseFontSize, (ctx) => ctx.rootFontSize),
  fontWeight: define('fontWeight', 'font-weight', true, parseFontWeight),
  fontStyle: define('fontStyle', 'font-style', true, parseFontStyle),
  lineHeight: define('lineHeight', 'line-height', true, parseLineHeight),
  textAlign: define('textAlign', 'text-align', true, parseTextAlign),
  visibility: define('visibility', 'visibility', true, parseVisibility),
  cursor: define('cursor', 'cursor', true, parseCursor),
  opacity: define('opacity', 'opacity', false, parseOpacity),
  flexDirection: define('flexDirection', 'flex-direction', false, parseFlexDirection),
  flexWrap: define('flexWrap', 'flex-wrap', false, parseFlexWrap),
  flexGrow: define('flexGrow', 'flex-grow', false, parseFactor),
  flexShrink: define('flexShrink', 'flex-shrink', false, parseFactor),
  flexBasis: define('flexBasis', 'flex-basis', false, (raw, ctx) => {
    const lower = raw.trim().toLowerCase();
    return lower === 'content' ? 'auto' : parseLengthPercentageAuto(lower, ctx);
  }),
  justifyContent: define('justifyContent', 'justify-content', false, parseJustifyContent),
  alignItems: define('alignItems', 'align-items', false, parseAlignItems),
  alignSelf: define('alignSelf', 'align-self', false, parseAlignSelf),
  rowGap: define('rowGap', 'row-gap', false, parseGap),
  columnGap: define('columnGap', 'column-gap', false, parseGap),
});

export function isStyleKey(key: string): key is StyleKey {
  return Object.hasOwn(PROPERTIES, key);
}

/** Every recognized property key, in registry order */
export const STYLE_KEYS: readonly StyleKey[] = Object.freeze(Object.keys(PROPERTIES).filter(isStyleKey));

const KEY_BY_NAME: ReadonlyMap<string, StyleKey> = new Map(
  STYLE_KEYS.map((key) => [PROPERTIES[key].name, key] as const)
);

export function getProperty<K extends StyleKey>(key: K): PropertyDefinition<K> {
  return PROPERTIES[key];
}

/** Map a CSS property name (`margin-top`) to its registry key (`marginTop`) */
export function propertyKey(name: string): StyleKey | undefined {
  return KEY_BY_NAME.get(name.toLowerCase());
}

export function propertyName(key: StyleKey): string {
  return PROPERTIES[key].name;
}

// Global keywords

export type GlobalKeyword = 'inherit' | 'initial' | 'unset';

export function globalKeyword(raw: string): GlobalKeyword | undefined {
  const lower = raw.trim().toLowerCase();
  return lower === 'inherit' || lower === 'initial' || lower === 'unset' ? lower : undefined;
}

// Extension properties

export interface ExtensionProperty {
  name: string;
  inherited?: boolean;
  initial?: string;
}

export interface RegisteredExtension {
  readonly name: string;
  readonly inherited: boolean;
  readonly initial?: string;
}

const extensions = new Map<string, RegisteredExtension>();

/**
 * Register an opaque property. Its declarations pass through the cascade
 * untyped and surface in ComputedStyle.extensions. Register before the first
 * reflow that should see it.
 */
export function registerProperty(definition: ExtensionProperty): RegisteredExtension {
  const name = definition.name.trim().toLowerCase();
  if (name === '' || KEY_BY_NAME.has(name) || isShorthand(name)) {
    throw new Error(`Cannot register property "${definition.name}": name is reserved or empty`);
  }
  const registered: RegisteredExtension = Object.freeze({
    name,
    inherited: definition.inherited ?? false,
    initial: definition.initial,
  });
  extensions.set(name, registered);
  return registered;
}

export function unregisterProperty(name: string): boolean {
  return extensions.delete(name.toLowerCase());
}

export function getExtensionProperty(name: string): RegisteredExtension | undefined {
  return extensions.get(name.toLowerCase());
}

export function extensionProperties(): RegisteredExtension[] {
  return [...extensions.values()];
}

// Validation

const VALIDATION_CONTEXT: ResolveContext = Object.freeze({
  fontSize: DEFAULT_FONT_SIZE,
  rootFontSize: DEFAULT_FONT_SIZE,
  color: BLACK,
});

/**
 * Whether `raw` is an acceptable value for a longhand or extension property.
 * Context-dependent units (em, rem, currentcolor) validate against defaults.
 */
export function isValidValue(name: string, raw: string): boolean {
  if (globalKeyword(raw)) return true;
  const key = propertyKey(name);
  if (key) {
    return PROPERTIES[key].parse(raw, VALIDATION_CONTEXT) !== undefined;
  }
  return extensions.has(name.toLowerCase());
}

export function isKnownProperty(name: string): boolean {
  const lower = name.toLowerCase();
  return KEY_BY_NAME.has(lower) || isShorthand(lower) || extensions.has(lower);
}

// Shorthand expansion

export type Longhand = readonly [name: string, value: string];

const SIDES = ['top', 'right', 'bottom', 'left'] as const;

function fourSides(tokens: readonly string[]): [string, string, string, string] | undefined {
  switch (tokens.length) {
    case 1: return [tokens[0], tokens[0], tokens[0], tokens[0]];
    case 2: return [tokens[0], tokens[1], tokens[0], tokens[1]];
    case 3: return [tokens[0], tokens[1], tokens[2], tokens[1]];
    case 4: return [tokens[0], tokens[1], tokens[2], tokens[3]];
    default: return undefined;
  }
}

function boxShorthand(nameFor: (side: string) => string, value: string): Longhand[] {
  const sides = fourSides(splitValue(value));
  if (!sides) return [];
  const longhands = SIDES.map((side, i): Longhand => [nameFor(side), sides[i]]);
  return longhands.every(([name, v]) => isValidValue(name, v)) ? longhands : [];
}

interface BorderParts {
  width?: string;
  style?: string;
  color?: string;
}

function parseBorderParts(value: string): BorderParts | undefined {
  const parts: BorderParts = {};
  for (const token of splitValue(value)) {
    if (parts.width === undefined && parseBorderWidth(token, VALIDATION_CONTEXT) !== undefined) {
      parts.width = token;
    } else if (parts.style === undefined && parseBorderStyle(token) !== undefined) {
      parts.style = token;
    } else if (parts.color === undefined && parseColorValue(token, VALIDATION_CONTEXT) !== undefined) {
      parts.color = token;
    } else {
      return undefined;
    }
  }
  return parts;
}

function borderSide(side: string, parts: BorderParts): Longhand[] {
  return [
    [`border-${side}-width`, parts.width ?? 'initial'],
    [`border-${side}-style`, parts.style ?? 'initial'],
    [`border-${side}-color`, parts.color ?? 'initial'],
  ];
}

function flexShorthand(value: string): Longhand[] {
  const lower = value.trim().toLowerCase();
  if (lower === 'none') {
    return [['flex-grow', '0'], ['flex-shrink', '0'], ['flex-basis', 'auto']];
  }
  if (lower === 'auto') {
    return [['flex-grow', '1'], ['flex-shrink', '1'], ['flex-basis', 'auto']];
  }

  const numbers: string[] = [];
  let basis: string | undefined;
  for (const token of splitValue(lower)) {
    if (basis === undefined && numbers.length < 2 && parseFactor(token) !== undefined) {
      numbers.push(token);
    } else if (basis === undefined && parseLengthPercentageAuto(token, VALIDATION_CONTEXT) !== undefined) {
      basis = token;
    } else {
      return [];
    }
  }
  if (numbers.length === 0 && basis === undefined) return [];

  return [
    ['flex-grow', numbers[0] ?? '1'],
    ['flex-shrink', numbers[1] ?? '1'],
    ['flex-basis', basis ?? (numbers.length > 0 ? '0%' : 'auto')],
  ];
}

function fontShorthand(value: string): Longhand[] {
  const tokens = splitValue(value);
  let style: string | undefined;
  let weight: string | undefined;
  let index = 0;

  for (; index < tokens.length; index++) {
    const token = tokens[index].toLowerCase();
    if (token === 'normal' || token === 'small-caps') continue;
    if (style === undefined && parseFontStyle(token) !== undefined) {
      style = token;
    } else if (weight === undefined && parseFontWeight(token) !== undefined && index + 2 < tokens.length) {
      weight = token;
    } else {
      break;
    }
  }

  const sizeToken = tokens[index];
  const family = tokens.slice(index + 1).join(' ');
  if (sizeToken === undefined || family === '') return [];

  const [size, lineHeight] = sizeToken.split('/');
  if (parseFontSize(size, VALIDATION_CONTEXT) === undefined) return [];
  if (lineHeight !== undefined && parseLineHeight(lineHeight, VALIDATION_CONTEXT) === undefined) return [];

  return [
    ['font-style', style ?? 'normal'],
    ['font-weight', weight ?? 'normal'],
    ['font-size', size],
    ['line-height', lineHeight ?? 'normal'],
    ['font-family', family],
  ];
}

function backgroundShorthand(value: string): Longhand[] {
  const tokens = splitValue(value);
  if (tokens.length === 1 && tokens[0].toLowerCase() === 'none') {
    return [['background-color', 'initial']];
  }
  const color = tokens.find((token) => parseColorValue(token, VALIDATION_CONTEXT) !== undefined);
  return color ? [['background-color', color]] : [];
}

function gapShorthand(value: string): Longhand[] {
  const tokens = splitValue(value);
  if (tokens.length < 1 || tokens.length > 2) return [];
  const row = tokens[0];
  const column = tokens[1] ?? tokens[0];
  if (parseGap(row, VALIDATION_CONTEXT) === undefined || parseGap(column, VALIDATION_CONTEXT) === undefined) {
    return [];
  }
  return [['row-gap', row], ['column-gap', column]];
}

const SHORTHANDS: Readonly<Record<string, (value: string) => Longhand[]>> = Object.freeze({
  'margin': (value: string) => boxShorthand((side) => `margin-${side}`, value),
  'padding': (value: string) => boxShorthand((side) => `padding-${side}`, value),
  'border-width': (value: string) => boxShorthand((side) => `border-${side}-width`, value),
  'border-style': (value: string) => boxShorthand((side) => `border-${side}-style`, value),
  'border-color': (value: string) => boxShorthand((side) => `border-${side}-color`, value),
  'border': (value: string) => {
    const parts = parseBorderParts(value);
    return parts ? SIDES.flatMap((side) => borderSide(side, parts)) : [];
  },
  'border-top': (value: string) => sideShorthand('top', value),
  'border-right': (value: string) => sideShorthand('right', value),
  'border-bottom': (value: string) => sideShorthand('bottom', value),
  'border-left': (value: string) => sideShorthand('left', value),
  'flex': flexShorthand,
  'flex-flow': (value: string) => {
    const longhands: Longhand[] = [];
    for (const token of splitValue(value)) {
      if (parseFlexDirection(token)) longhands.push(['flex-direction', token]);
      else if (parseFlexWrap(token)) longhands.push(['flex-wrap', token]);
      else return [];
    }
    return longhands;
  },
  'gap': gapShorthand,
  'font': fontShorthand,
  'background': backgroundShorthand,
});

function sideShorthand(side: string, value: string): Longhand[] {
  const parts = parseBorderParts(value);
  return parts ? borderSide(side, parts) : [];
}

export function isShorthand(name: string): boolean {
  return Object.hasOwn(SHORTHANDS, name.toLowerCase());
}

/**
 * Expand a shorthand into longhand declarations.
 * Returns undefined when `name` is not a shorthand, and an empty list when
 * the value is invalid for it. Global keywords apply to every longhand.
 */
export function expandShorthand(name: string, value: string): Longhand[] | undefined {
  const lower = name.toLowerCase();
  if (!Object.hasOwn(SHORTHANDS, lower)) return undefined;

  const keyword = globalKeyword(value);
  if (keyword) {
    const template = SHORTHANDS[lower](SHORTHAND_PROBES[lower] ?? '0');
    return template.map(([longhand]): Longhand => [longhand, keyword]);
  }
  return SHORTHANDS[lower](value);
}

// A value each shorthand accepts, used to enumerate its longhands
const SHORTHAND_PROBES: Readonly<Record<string, string>> = {
  'border': 'solid',
  'border-top': 'solid',
  'border-right': 'solid',
  'border-bottom': 'solid',
  'border-left': 'solid',
  'border-style': 'solid',
  'border-color': 'black',
  'flex': '1',
  'flex-flow': 'row nowrap',
  'font': '16px serif',
  'background': 'black',
};
