// Core element and geometry types for stylebox

export interface Position {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface Bounds extends Position, Size {}

/** Index of an element inside its {@link ElementTree} arena. */
export type ElementHandle = number;

/** Tag used for text nodes. Selectors never match it. */
export const TEXT_TAG = '#text';

/**
 * A node of the element tree.
 *
 * Nodes live in an arena owned by the tree; `children` and `parent` are
 * handles into that arena, so the parent link is a plain index and never an
 * owning reference.
 */
export interface Element {
  readonly handle: ElementHandle;
  readonly tag: string;
  readonly id?: string;
  readonly classList: readonly string[];
  readonly attributes: Readonly<Record<string, string>>;
  /** Inline style text (the `style` attribute) */
  readonly style?: string;
  /** Text content, text nodes only */
  readonly text?: string;
  readonly children: readonly ElementHandle[];
  readonly parent?: ElementHandle;
}

/**
 * Read access to an element tree. The cascade and layout only ever
 * see a tree through this interface.
 */
export interface ElementTree {
  readonly root: ElementHandle;
  readonly size: number;
  get(handle: ElementHandle): Element;
  parentOf(element: Element): Element | undefined;
  childrenOf(element: Element): Element[];
}

/** Interaction state for :hover, :focus and :active. Supplied by the caller. */
export interface ElementState {
  hovered?: ReadonlySet<ElementHandle>;
  focused?: ElementHandle;
  active?: ReadonlySet<ElementHandle>;
}

export function isTextNode(element: Element): boolean {
  return element.tag === TEXT_TAG;
}
