// Geometry utilities for bounds and points
// Shared by hit testing, layout checks and the debug dump

import type { Bounds, Position } from './types.ts';

export type Point = Position;
export type { Bounds, Position };

/**
 * Check if a point is within bounds (right and bottom edges exclusive)
 */
export function pointInBounds(x: number, y: number, bounds: Bounds): boolean {
  return x >= bounds.x && x < bounds.x + bounds.width &&
         y >= bounds.y && y < bounds.y + bounds.height;
}

/**
 * Check that `inner` lies entirely inside `outer`. A small tolerance absorbs
 * floating point drift from fractional layouts.
 */
export function containsBounds(outer: Bounds, inner: Bounds, epsilon: number = 1e-6): boolean {
  return inner.x >= outer.x - epsilon &&
         inner.y >= outer.y - epsilon &&
         inner.x + inner.width <= outer.x + outer.width + epsilon &&
         inner.y + inner.height <= outer.y + outer.height + epsilon;
}

export function translateBounds(bounds: Bounds, dx: number, dy: number): Bounds {
  return { ...bounds, x: bounds.x + dx, y: bounds.y + dy };
}

/**
 * Shrink bounds by per-side insets; size never goes negative
 */
export function insetBounds(bounds: Bounds, top: number, right: number, bottom: number, left: number): Bounds {
  return {
    x: bounds.x + left,
    y: bounds.y + top,
    width: Math.max(0, bounds.width - left - right),
    height: Math.max(0, bounds.height - top - bottom),
  };
}

/**
 * Clip bounds to a rectangle (intersection of two bounds)
 */
export function clipBounds(bounds: Bounds, clipRect: Bounds): Bounds {
  const x1 = Math.max(bounds.x, clipRect.x);
  const y1 = Math.max(bounds.y, clipRect.y);
  const x2 = Math.min(bounds.x + bounds.width, clipRect.x + clipRect.width);
  const y2 = Math.min(bounds.y + bounds.height, clipRect.y + clipRect.height);

  return {
    x: x1,
    y: y1,
    width: Math.max(0, x2 - x1),
    height: Math.max(0, y2 - y1),
  };
}

/**
 * Check if two bounds intersect
 */
export function boundsIntersect(a: Bounds, b: Bounds): boolean {
  return a.x < b.x + b.width &&
         a.x + a.width > b.x &&
         a.y < b.y + b.height &&
         a.y + a.height > b.y;
}
