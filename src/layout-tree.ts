// Published result of a reflow: one (element, style, box) triple per node

import { traverseElements } from './element.ts';
import type { ComputedStyle } from './properties.ts';
import type { Box } from './sizing.ts';
import type { Element, ElementHandle, ElementTree } from './types.ts';

export interface LayoutNode {
  readonly element: Element;
  readonly style: ComputedStyle;
  readonly box: Box;
  /** Wrapped lines, text nodes only */
  readonly lines?: readonly string[];
  readonly depth: number;
}

function freezeBox(box: Box): Box {
  return Object.freeze({
    margin: Object.freeze({ ...box.margin }),
    border: Object.freeze({ ...box.border }),
    padding: Object.freeze({ ...box.padding }),
    content: Object.freeze({ ...box.content }),
    edges: Object.freeze({
      margin: Object.freeze({ ...box.edges.margin }),
      border: Object.freeze({ ...box.edges.border }),
      padding: Object.freeze({ ...box.edges.padding }),
    }),
  });
}

/**
 * Frozen, document-ordered view of a styled and laid-out tree.
 * Nodes without a box (detached from the root) are not part of it.
 */
export class LayoutTree {
  private _nodes: readonly LayoutNode[];
  private _byHandle: ReadonlyMap<ElementHandle, LayoutNode>;
  private _elements: ElementTree;

  constructor(
    elements: ElementTree,
    styles: ReadonlyMap<ElementHandle, ComputedStyle>,
    boxes: ReadonlyMap<ElementHandle, Box>,
    textLines: ReadonlyMap<ElementHandle, readonly string[]> = new Map()
  ) {
    const nodes: LayoutNode[] = [];
    const byHandle = new Map<ElementHandle, LayoutNode>();

    traverseElements(elements, (element, depth) => {
      const style = styles.get(element.handle);
      const box = boxes.get(element.handle);
      if (!style || !box) return;
      const lines = textLines.get(element.handle);
      const node: LayoutNode = Object.freeze({
        element,
        style,
        box: freezeBox(box),
        depth,
        ...(lines ? { lines: Object.freeze([...lines]) } : {}),
      });
      nodes.push(node);
      byHandle.set(element.handle, node);
    });

    this._elements = elements;
    this._nodes = Object.freeze(nodes);
    this._byHandle = byHandle;
    Object.freeze(this);
  }

  get elements(): ElementTree {
    return this._elements;
  }

  get root(): LayoutNode {
    return this._nodes[0];
  }

  get size(): number {
    return this._nodes.length;
  }

  get(handle: ElementHandle): LayoutNode | undefined {
    return this._byHandle.get(handle);
  }

  /** Children of a node, in document order */
  childrenOf(node: LayoutNode): LayoutNode[] {
    const children: LayoutNode[] = [];
    for (const handle of node.element.children) {
      const child = this._byHandle.get(handle);
      if (child) children.push(child);
    }
    return children;
  }

  *nodes(): Generator<LayoutNode> {
    yield* this._nodes;
  }

  forEach(callback: (node: LayoutNode, index: number) => void): void {
    this._nodes.forEach(callback);
  }
}
