// Box model: edge resolution and nested rect construction

import type { ComputedStyle } from './properties.ts';
import type { Bounds } from './types.ts';
import { resolveLength, type LengthPercentage, type LengthPercentageAuto } from './values.ts';

export interface BoxDimensions {
  top: number;
  right: number;
  bottom: number;
  left: number;
  horizontal: number; // left + right
  vertical: number;   // top + bottom
}

export interface BoxEdges {
  margin: BoxDimensions;
  border: BoxDimensions;
  padding: BoxDimensions;
}

/** Which margins were `auto`; they resolve to 0 unless the layout mode distributes space */
export interface AutoMargins {
  top: boolean;
  right: boolean;
  bottom: boolean;
  left: boolean;
}

/**
 * Geometry of one element. Each rect contains the next:
 * margin ⊇ border ⊇ padding ⊇ content, separated by the resolved edges.
 */
export interface Box {
  readonly margin: Bounds;
  readonly border: Bounds;
  readonly padding: Bounds;
  readonly content: Bounds;
  readonly edges: BoxEdges;
}

export function boxDimensions(top: number, right: number, bottom: number, left: number): BoxDimensions {
  return { top, right, bottom, left, horizontal: left + right, vertical: top + bottom };
}

export const ZERO_DIMENSIONS: BoxDimensions = Object.freeze(boxDimensions(0, 0, 0, 0));

export const ZERO_EDGES: BoxEdges = Object.freeze({
  margin: ZERO_DIMENSIONS,
  border: ZERO_DIMENSIONS,
  padding: ZERO_DIMENSIONS,
});

function marginValue(value: LengthPercentageAuto, base: number): number {
  return value === 'auto' ? 0 : resolveLength(value, base);
}

function paddingValue(value: LengthPercentage, base: number): number {
  return Math.max(0, resolveLength(value, base));
}

function outset(bounds: Bounds, dims: BoxDimensions): Bounds {
  return {
    x: bounds.x - dims.left,
    y: bounds.y - dims.top,
    width: bounds.width + dims.horizontal,
    height: bounds.height + dims.vertical,
  };
}

export class SizingModel {
  /**
   * Resolve margins, borders and padding. Percentages resolve against the
   * containing block width on every side; auto margins come back as 0.
   */
  resolveEdges(style: ComputedStyle, containingWidth: number): { edges: BoxEdges; autoMargins: AutoMargins } {
    const margin = boxDimensions(
      marginValue(style.marginTop, containingWidth),
      marginValue(style.marginRight, containingWidth),
      marginValue(style.marginBottom, containingWidth),
      marginValue(style.marginLeft, containingWidth)
    );
    const border = boxDimensions(
      style.borderTopWidth,
      style.borderRightWidth,
      style.borderBottomWidth,
      style.borderLeftWidth
    );
    const padding = boxDimensions(
      paddingValue(style.paddingTop, containingWidth),
      paddingValue(style.paddingRight, containingWidth),
      paddingValue(style.paddingBottom, containingWidth),
      paddingValue(style.paddingLeft, containingWidth)
    );

    return {
      edges: { margin, border, padding },
      autoMargins: {
        top: style.marginTop === 'auto',
        right: style.marginRight === 'auto',
        bottom: style.marginBottom === 'auto',
        left: style.marginLeft === 'auto',
      },
    };
  }

  /** Padding plus border on the horizontal axis */
  horizontalChrome(edges: BoxEdges): number {
    return edges.padding.horizontal + edges.border.horizontal;
  }

  verticalChrome(edges: BoxEdges): number {
    return edges.padding.vertical + edges.border.vertical;
  }

  /**
   * Convert a specified width (as box-sizing reads it) to a content width
   */
  contentWidthFromSpecified(specified: number, style: ComputedStyle, edges: BoxEdges): number {
    const content = style.boxSizing === 'border-box' ? specified - this.horizontalChrome(edges) : specified;
    return Math.max(0, content);
  }

  contentHeightFromSpecified(specified: number, style: ComputedStyle, edges: BoxEdges): number {
    const content = style.boxSizing === 'border-box' ? specified - this.verticalChrome(edges) : specified;
    return Math.max(0, content);
  }

  /** Margin-box width for a given content width */
  outerWidth(contentWidth: number, edges: BoxEdges): number {
    return contentWidth + this.horizontalChrome(edges) + edges.margin.horizontal;
  }

  outerHeight(contentHeight: number, edges: BoxEdges): number {
    return contentHeight + this.verticalChrome(edges) + edges.margin.vertical;
  }

  /**
   * Build a box from the top-left of its margin box and its content size.
   */
  buildBox(x: number, y: number, contentWidth: number, contentHeight: number, edges: BoxEdges): Box {
    const content: Bounds = {
      x: x + edges.margin.left + edges.border.left + edges.padding.left,
      y: y + edges.margin.top + edges.border.top + edges.padding.top,
      width: Math.max(0, contentWidth),
      height: Math.max(0, contentHeight),
    };
    const padding = outset(content, edges.padding);
    const border = outset(padding, edges.border);
    const margin = outset(border, edges.margin);
    return { margin, border, padding, content, edges };
  }

  translateBox(box: Box, dx: number, dy: number): Box {
    if (dx === 0 && dy === 0) return box;
    const shift = (bounds: Bounds): Bounds => ({ ...bounds, x: bounds.x + dx, y: bounds.y + dy });
    return {
      margin: shift(box.margin),
      border: shift(box.border),
      padding: shift(box.padding),
      content: shift(box.content),
      edges: box.edges,
    };
  }

  /** Zero-size box used for display: none subtrees */
  emptyBox(x: number, y: number): Box {
    return this.buildBox(x, y, 0, 0, ZERO_EDGES);
  }
}

export const globalSizingModel = new SizingModel();
