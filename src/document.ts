// Document class for managing runtime information about an element tree

import { elementChildren, traverseElements } from './element.ts';
import { DiagnosticSink, ERROR_MESSAGES } from './errors.ts';
import { getLogger } from './logging.ts';
import { matches, parseSelectorList } from './selector.ts';
import { isTextNode, type Element, type ElementHandle, type ElementState, type ElementTree } from './types.ts';

const logger = getLogger('Document');

export interface DocumentOptions {
  /** Receives duplicate-id warnings; a private sink is used otherwise */
  diagnostics?: DiagnosticSink;
}

/**
 * Owns one element tree. Keeps an id registry (first element with an id
 * wins) and the interaction state that :hover, :focus and :active read.
 */
export class Document {
  private _tree: ElementTree;
  private _elementRegistry: Map<string, Element> = new Map();
  private _diagnostics: DiagnosticSink;
  private _focused?: ElementHandle;
  private _hovered = new Set<ElementHandle>();
  private _active = new Set<ElementHandle>();

  constructor(tree: ElementTree, options: DocumentOptions = {}) {
    this._tree = tree;
    this._diagnostics = options.diagnostics ?? new DiagnosticSink();
    this._initialize();
  }

  get tree(): ElementTree {
    return this._tree;
  }

  get root(): Element {
    return this._tree.get(this._tree.root);
  }

  get diagnostics(): DiagnosticSink {
    return this._diagnostics;
  }

  // Element registry

  get elementCount(): number {
    return this._elementRegistry.size;
  }

  getElementById(id: string): Element | undefined {
    return this._elementRegistry.get(id);
  }

  getAllElements(): Element[] {
    const elements: Element[] = [];
    traverseElements(this._tree, (element) => {
      if (!isTextNode(element)) elements.push(element);
    });
    return elements;
  }

  getElementsByTag(tag: string): Element[] {
    const lower = tag.toLowerCase();
    return this.getAllElements().filter(el => el.tag === lower);
  }

  getElementsByClass(className: string): Element[] {
    return this.getAllElements().filter(el => el.classList.includes(className));
  }

  /**
   * Elements matching a selector list, in document order. Unsupported
   * selectors match nothing.
   */
  querySelectorAll(selectors: string): Element[] {
    const { selectors: parsed } = parseSelectorList(selectors);
    if (parsed.length === 0) return [];
    const state = this.state;
    return this.getAllElements().filter(el => parsed.some(selector => matches(this._tree, selector, el, state)));
  }

  querySelector(selectors: string): Element | undefined {
    return this.querySelectorAll(selectors)[0];
  }

  /** Element children of an element (text nodes excluded) */
  childElements(element: Element): Element[] {
    return elementChildren(this._tree, element);
  }

  // Interaction state

  get focusedElement(): Element | undefined {
    return this._focused === undefined ? undefined : this._tree.get(this._focused);
  }

  focus(elementOrId: Element | string): boolean {
    const element = typeof elementOrId === 'string' ? this.getElementById(elementOrId) : elementOrId;
    if (!element || isTextNode(element)) {
      return false;
    }
    this._focused = element.handle;
    return true;
  }

  blur(): void {
    this._focused = undefined;
  }

  /**
   * Mark an element as hovered. Its ancestors are hovered too.
   */
  setHovered(element: Element | undefined): void {
    this._hovered = this._withAncestors(element);
  }

  setActive(element: Element | undefined): void {
    this._active = this._withAncestors(element);
  }

  get state(): ElementState {
    return {
      hovered: new Set(this._hovered),
      focused: this._focused,
      active: new Set(this._active),
    };
  }

  private _withAncestors(element: Element | undefined): Set<ElementHandle> {
    const handles = new Set<ElementHandle>();
    let current = element;
    while (current) {
      handles.add(current.handle);
      current = this._tree.parentOf(current);
    }
    return handles;
  }

  private _initialize(): void {
    this._elementRegistry.clear();
    traverseElements(this._tree, (element) => {
      if (element.id === undefined) return;
      if (this._elementRegistry.has(element.id)) {
        this._diagnostics.warn(ERROR_MESSAGES.duplicateId(element.id));
        return;
      }
      this._elementRegistry.set(element.id, element);
    });
    logger.debug('Document initialized', { elements: this._tree.size, ids: this._elementRegistry.size });
  }
}
