// Element creation and tree traversal functions

import { TEXT_TAG, isTextNode } from './types.ts';
import type { Element, ElementHandle, ElementTree } from './types.ts';

export interface ElementProps {
  id?: string;
  class?: string;           // Space-separated class names (input format)
  classList?: string[];
  style?: string;           // Inline declarations, e.g. "width: 10px; color: red"
  attributes?: Record<string, string>;
}

/**
 * Declarative description of an element subtree, produced by
 * {@link createElement} and materialized by {@link buildTree}.
 */
export interface ElementSpec {
  tag: string;
  props: ElementProps;
  children: Array<ElementSpec | string>;
}

interface MutableElement {
  handle: ElementHandle;
  tag: string;
  id?: string;
  classList: string[];
  attributes: Record<string, string>;
  style?: string;
  text?: string;
  children: ElementHandle[];
  parent?: ElementHandle;
}

/**
 * Parse class string into a classList array, merging with any explicit list
 */
export function normalizeClassList(props: ElementProps): string[] {
  const fromString = props.class ? props.class.trim().split(/\s+/).filter(Boolean) : [];
  if (props.classList && props.classList.length > 0) {
    return [...new Set([...props.classList, ...fromString])];
  }
  return [...new Set(fromString)];
}

/**
 * Arena of element nodes. The parser (or a builder) appends nodes while
 * constructing; afterwards the arena is consumed read-only through
 * the {@link ElementTree} interface.
 */
export class ElementArena implements ElementTree {
  private _nodes: MutableElement[] = [];
  private _root: ElementHandle = -1;

  get root(): ElementHandle {
    if (this._root < 0) {
      throw new Error('Element tree has no root');
    }
    return this._root;
  }

  get size(): number {
    return this._nodes.length;
  }

  /**
   * Create a detached element and return its handle. The first element
   * created becomes the root unless {@link setRoot} says otherwise.
   */
  createElement(tag: string, props: ElementProps = {}): ElementHandle {
    const handle = this._nodes.length;
    const attributes: Record<string, string> = { ...props.attributes };
    const classList = normalizeClassList({ ...props, class: props.class ?? attributes.class });
    const id = props.id ?? attributes.id;
    const style = props.style ?? attributes.style;

    if (id !== undefined) attributes.id = id;
    if (classList.length > 0) attributes.class = classList.join(' ');
    if (style !== undefined) attributes.style = style;

    this._nodes.push({
      handle,
      tag: tag.toLowerCase(),
      id: id || undefined,
      classList,
      attributes,
      style,
      children: [],
    });
    if (this._root < 0) this._root = handle;
    return handle;
  }

  createText(text: string): ElementHandle {
    const handle = this._nodes.length;
    this._nodes.push({
      handle,
      tag: TEXT_TAG,
      classList: [],
      attributes: {},
      text,
      children: [],
    });
    if (this._root < 0) this._root = handle;
    return handle;
  }

  appendChild(parent: ElementHandle, child: ElementHandle): void {
    const parentNode = this._node(parent);
    const childNode = this._node(child);
    if (childNode.parent !== undefined) {
      throw new Error(`Element ${child} already has a parent`);
    }
    if (isTextNode(parentNode)) {
      throw new Error('Text nodes cannot have children');
    }
    childNode.parent = parent;
    parentNode.children.push(child);
  }

  setRoot(handle: ElementHandle): void {
    this._node(handle);
    this._root = handle;
  }

  get(handle: ElementHandle): Element {
    return this._node(handle);
  }

  parentOf(element: Element): Element | undefined {
    return element.parent === undefined ? undefined : this._nodes[element.parent];
  }

  childrenOf(element: Element): Element[] {
    return element.children.map(handle => this._nodes[handle]);
  }

  private _node(handle: ElementHandle): MutableElement {
    const node = this._nodes[handle];
    if (!node) {
      throw new RangeError(`Unknown element handle: ${handle}`);
    }
    return node;
  }
}

// Builder mirroring the familiar createElement(type, props, ...children) shape
export function createElement(
  tag: string,
  props: ElementProps = {},
  ...children: Array<ElementSpec | string>
): ElementSpec {
  return { tag, props, children };
}

/**
 * Materialize an element description into a fresh arena
 */
export function buildTree(spec: ElementSpec): ElementArena {
  const arena = new ElementArena();
  const build = (node: ElementSpec): ElementHandle => {
    const handle = arena.createElement(node.tag, node.props);
    for (const child of node.children) {
      const childHandle = typeof child === 'string' ? arena.createText(child) : build(child);
      arena.appendChild(handle, childHandle);
    }
    return handle;
  };
  arena.setRoot(build(spec));
  return arena;
}

/**
 * Check if an element has a specific class
 */
export function hasClass(element: Element, className: string): boolean {
  return element.classList.includes(className);
}

export function getAttribute(element: Element, name: string): string | undefined {
  return element.attributes[name];
}

/**
 * Children of an element that are elements (text nodes excluded).
 * Structural selectors count siblings through this.
 */
export function elementChildren(tree: ElementTree, element: Element): Element[] {
  return tree.childrenOf(element).filter(child => !isTextNode(child));
}

export function findElementById(tree: ElementTree, id: string): Element | undefined {
  let found: Element | undefined;
  traverseElements(tree, element => {
    if (!found && element.id === id) found = element;
  });
  return found;
}

/**
 * Pre-order (document order) traversal. Uses an explicit stack so deep
 * trees do not grow the call stack.
 */
export function traverseElements(
  tree: ElementTree,
  callback: (element: Element, depth: number) => void,
  start: ElementHandle = tree.root
): void {
  const stack: Array<[ElementHandle, number]> = [[start, 0]];
  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;
    const [handle, depth] = entry;
    const element = tree.get(handle);
    callback(element, depth);
    for (let i = element.children.length - 1; i >= 0; i--) {
      stack.push([element.children[i], depth + 1]);
    }
  }
}

/**
 * Concatenated text of all descendant text nodes
 */
export function textContent(tree: ElementTree, element: Element): string {
  let text = '';
  traverseElements(tree, node => {
    if (node.text !== undefined) text += node.text;
  }, element.handle);
  return text;
}
