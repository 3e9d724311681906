// Text dump of a layout tree for diagnostics

import type { LayoutNode, LayoutTree } from './layout-tree.ts';
import { isTextNode } from './types.ts';
import type { Bounds } from './types.ts';

export interface DumpOptions {
  /** Include content rects as well as border rects */
  content?: boolean;
  /** Max characters of text shown per text node */
  textLimit?: number;
  indent?: string;
}

function num(value: number): string {
  return String(Math.round(value * 100) / 100);
}

export function formatBounds(bounds: Bounds): string {
  return `${num(bounds.x)},${num(bounds.y)} ${num(bounds.width)}x${num(bounds.height)}`;
}

/**
 * Selector-like label: tag, #id and .classes
 */
export function describeNode(node: LayoutNode, textLimit: number = 20): string {
  const element = node.element;
  if (isTextNode(element)) {
    const text = (node.lines ?? []).join(' ');
    const shown = text.length > textLimit ? `${text.slice(0, textLimit)}...` : text;
    return `"${shown}"`;
  }
  const id = element.id !== undefined ? `#${element.id}` : '';
  const classes = element.classList.map(cls => `.${cls}`).join('');
  return `${element.tag}${id}${classes}`;
}

/**
 * One line per node in document order, indented by depth:
 * `div#main.card 8,8 400x120 [block]`
 */
export function dumpLayoutTree(tree: LayoutTree, options: DumpOptions = {}): string {
  const indent = options.indent ?? '  ';
  const lines: string[] = [];

  tree.forEach((node) => {
    const parts = [
      indent.repeat(node.depth) + describeNode(node, options.textLimit),
      formatBounds(node.box.border),
    ];
    if (options.content) {
      parts.push(`content=${formatBounds(node.box.content)}`);
    }
    if (!isTextNode(node.element)) {
      parts.push(`[${node.style.display}]`);
    }
    lines.push(parts.join(' '));
  });

  return lines.join('\n');
}
