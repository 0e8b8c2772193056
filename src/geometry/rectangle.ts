/**
 * Rectangle utility functions
 * Rectangles are axis-aligned (no rotation)
 * Position (x, y) represents the bottom-left corner
 */

import { Rectangle } from '../types/geometry';

/**
 * Creates a new rectangle
 */
export function createRectangle(x: number, y: number, width: number, height: number): Rectangle {
  return { x, y, width, height };
}

/**
 * Checks if two rectangles share interior area.
 * Rectangles that only touch along an edge do NOT overlap - adjacent panels
 * and a panel butting against a keep-out zone are both legal.
 */
export function rectanglesOverlap(rect1: Rectangle, rect2: Rectangle): boolean {
  return !(
    rect1.x + rect1.width <= rect2.x ||
    rect2.x + rect2.width <= rect1.x ||
    rect1.y + rect1.height <= rect2.y ||
    rect2.y + rect2.height <= rect1.y
  );
}

/**
 * Returns the intersection of two rectangles (or null if they don't overlap)
 */
export function rectangleIntersection(rect1: Rectangle, rect2: Rectangle): Rectangle | null {
  const x = Math.max(rect1.x, rect2.x);
  const y = Math.max(rect1.y, rect2.y);
  const right = Math.min(rect1.x + rect1.width, rect2.x + rect2.width);
  const top = Math.min(rect1.y + rect1.height, rect2.y + rect2.height);

  if (right <= x || top <= y) {
    return null;
  }

  return {
    x,
    y,
    width: right - x,
    height: top - y
  };
}

/**
 * Checks if `inner` lies entirely within `outer` (edges may coincide)
 */
export function rectangleContains(outer: Rectangle, inner: Rectangle, tolerance = 0): boolean {
  return (
    inner.x >= outer.x - tolerance &&
    inner.y >= outer.y - tolerance &&
    inner.x + inner.width <= outer.x + outer.width + tolerance &&
    inner.y + inner.height <= outer.y + outer.height + tolerance
  );
}

/**
 * Checks whether two open 1D spans [start, end] overlap
 */
export function spansOverlapX(start1: number, end1: number, start2: number, end2: number): boolean {
  return !(end1 <= start2 || start1 >= end2);
}
