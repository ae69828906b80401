/**
 * Line-segment tests for polyline geometry.
 *
 * A polyline's bounding box says little about where its line actually
 * runs (a diagonal wall covers its whole box), so polylines are tested
 * segment by segment against the other shape.
 *
 * @module segment
 */

import { add, clamp, distanceSquared, dot, sub } from "./math.js";
import { rectContainsPoint, rectFromPoints, translateRect } from "./rect.js";
import { getBounds, shapeOrigin } from "./shapes.js";
import type { Rect, Shape, Vector2 } from "./types.js";
import { assertNever } from "./utils.js";

/**
 * Inclusive segment vs axis-aligned rectangle test (Liang-Barsky clipping).
 */
export function segmentIntersectsRect(start: Vector2, end: Vector2, rect: Rect): boolean {
  if (rectContainsPoint(rect, start) || rectContainsPoint(rect, end)) {
    return true;
  }

  const dx = end.x - start.x;
  const dy = end.y - start.y;
  const edges: Array<[number, number]> = [
    [-dx, start.x - rect.x],
    [dx, rect.x + rect.width - start.x],
    [-dy, start.y - rect.y],
    [dy, rect.y + rect.height - start.y],
  ];

  let tEnter = 0;
  let tExit = 1;
  for (const [p, q] of edges) {
    if (p === 0) {
      // Parallel to this edge: reject when outside it
      if (q < 0) return false;
      continue;
    }
    const t = q / p;
    if (p < 0) {
      tEnter = Math.max(tEnter, t);
    } else {
      tExit = Math.min(tExit, t);
    }
    if (tEnter > tExit) return false;
  }
  return true;
}

/**
 * Closest point on segment [start, end] to `point`.
 */
export function closestPointOnSegment(start: Vector2, end: Vector2, point: Vector2): Vector2 {
  const d = sub(end, start);
  const lengthSq = dot(d, d);
  if (lengthSq === 0) {
    return start;
  }
  const t = clamp(dot(sub(point, start), d) / lengthSq, 0, 1);
  return { x: start.x + d.x * t, y: start.y + d.y * t };
}

/**
 * Inclusive segment vs circle test.
 */
export function segmentIntersectsCircle(
  start: Vector2,
  end: Vector2,
  center: Vector2,
  radius: number,
): boolean {
  const closest = closestPointOnSegment(start, end, center);
  return distanceSquared(closest, center) <= radius * radius;
}

/**
 * World-space bounds of a polyline, or null when it has no points.
 */
export function polylineBounds(points: readonly Vector2[], anchor: Vector2): Rect | null {
  const local = rectFromPoints(points);
  return local ? translateRect(local, anchor) : null;
}

/**
 * Test a polyline (points relative to `anchor`) against a raw world rectangle.
 */
export function polylineIntersectsRect(
  points: readonly Vector2[],
  anchor: Vector2,
  rect: Rect,
): boolean {
  return someSegment(points, anchor, (start, end) => segmentIntersectsRect(start, end, rect));
}

/**
 * Test a polyline (points relative to `anchor`) against an anchored shape.
 *
 * A one-point polyline is a point test; an empty polyline never intersects.
 */
export function polylineIntersectsShape(
  points: readonly Vector2[],
  anchor: Vector2,
  shape: Shape,
  shapeAnchor: Vector2,
): boolean {
  switch (shape.kind) {
    case "rectangle":
      return polylineIntersectsRect(points, anchor, getBounds(shape, shapeAnchor));
    case "circle": {
      const center = shapeOrigin(shape, shapeAnchor);
      return someSegment(points, anchor, (start, end) =>
        segmentIntersectsCircle(start, end, center, shape.radius),
      );
    }
    default:
      return assertNever(shape, "shape");
  }
}

/**
 * Run `test` over consecutive world-space segments. A single point is
 * passed as a zero-length segment.
 */
function someSegment(
  points: readonly Vector2[],
  anchor: Vector2,
  test: (start: Vector2, end: Vector2) => boolean,
): boolean {
  const [first, ...rest] = points;
  if (first === undefined) {
    return false;
  }

  let previous = add(anchor, first);
  if (rest.length === 0) {
    return test(previous, previous);
  }
  for (const point of rest) {
    const current = add(anchor, point);
    if (test(previous, current)) {
      return true;
    }
    previous = current;
  }
  return false;
}
