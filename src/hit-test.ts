// Hit testing for finding elements at document coordinates

import { getLogger } from './logging.ts';
import { pointInBounds } from './geometry.ts';
import type { LayoutNode, LayoutTree } from './layout-tree.ts';
import { isTextNode, type Element } from './types.ts';

const logger = getLogger('hit-test');

/**
 * Point queries over a published {@link LayoutTree}. A node is hit when its
 * border box contains the point; later siblings paint over earlier ones.
 */
export class HitTester {
  private _tree: LayoutTree;

  constructor(tree: LayoutTree) {
    this._tree = tree;
  }

  /**
   * Update the tree after a reflow
   */
  updateTree(tree: LayoutTree): void {
    this._tree = tree;
  }

  /**
   * Deepest element whose border box contains the point
   */
  hitTest(x: number, y: number): Element | undefined {
    const path = this.hitTestAll(x, y);
    const hit = path[path.length - 1];

    if (logger.isTraceEnabled()) {
      logger.trace('Hit test', { point: `${x},${y}`, tag: hit?.tag, id: hit?.id, depth: path.length });
    }
    return hit;
  }

  /**
   * Every element on the path from the root to the hit element
   */
  hitTestAll(x: number, y: number): Element[] {
    const path: Element[] = [];
    const root = this._tree.root;
    if (root) {
      this._hitTestNode(root, x, y, path);
    }
    return path;
  }

  private _hitTestNode(node: LayoutNode, x: number, y: number, path: Element[]): boolean {
    const element = node.element;
    if (isTextNode(element) || node.style.display === 'none') return false;

    // Descendants may overflow their parent, so search them first
    const children = this._tree.childrenOf(node);
    for (let i = children.length - 1; i >= 0; i--) {
      const childPath: Element[] = [];
      if (this._hitTestNode(children[i], x, y, childPath)) {
        if (node.style.visibility !== 'hidden') path.push(element);
        path.push(...childPath);
        return true;
      }
    }

    if (node.style.visibility !== 'hidden' && pointInBounds(x, y, node.box.border)) {
      path.push(element);
      return true;
    }
    return false;
  }
}
