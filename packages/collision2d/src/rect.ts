/**
 * Axis-aligned rectangle helpers.
 *
 * Every comparison is inclusive: rectangles that share an edge or a corner
 * intersect, and a point on the border is contained. Room exits rely on
 * "touching counts".
 */

import type { Rect, Vector2 } from "./types.js";

/**
 * Create a new Rect.
 */
export const rect = (x: number, y: number, width: number, height: number): Rect => ({
  x,
  y,
  width,
  height,
});

/** Right edge (x + width) */
export const rectRight = (r: Rect): number => r.x + r.width;

/** Bottom edge (y + height) */
export const rectBottom = (r: Rect): number => r.y + r.height;

/** Center point */
export const rectCenter = (r: Rect): Vector2 => ({
  x: r.x + r.width / 2,
  y: r.y + r.height / 2,
});

/**
 * Inclusive overlap test.
 */
export const rectsIntersect = (a: Rect, b: Rect): boolean =>
  a.x <= rectRight(b) && b.x <= rectRight(a) && a.y <= rectBottom(b) && b.y <= rectBottom(a);

/**
 * Inclusive point containment.
 */
export const rectContainsPoint = (r: Rect, p: Vector2): boolean =>
  p.x >= r.x && p.x <= rectRight(r) && p.y >= r.y && p.y <= rectBottom(r);

/**
 * Smallest rectangle covering both inputs.
 */
export const unionRects = (a: Rect, b: Rect): Rect => {
  const x = Math.min(a.x, b.x);
  const y = Math.min(a.y, b.y);
  return {
    x,
    y,
    width: Math.max(rectRight(a), rectRight(b)) - x,
    height: Math.max(rectBottom(a), rectBottom(b)) - y,
  };
};

/**
 * Bounding box of a point list, or null for an empty list.
 */
export const rectFromPoints = (points: readonly Vector2[]): Rect | null => {
  if (points.length === 0) {
    return null;
  }

  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const p of points) {
    minX = Math.min(minX, p.x);
    minY = Math.min(minY, p.y);
    maxX = Math.max(maxX, p.x);
    maxY = Math.max(maxY, p.y);
  }

  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
};

/**
 * Move a rectangle by a vector.
 */
export const translateRect = (r: Rect, by: Vector2): Rect => ({
  x: r.x + by.x,
  y: r.y + by.y,
  width: r.width,
  height: r.height,
});
