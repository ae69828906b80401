/**
 * Collision shapes and their intersection math.
 *
 * Shapes carry no world position. Every query takes the anchor of each
 * shape (usually its owner's world position); the effective corner or
 * center is `anchor + offset`.
 *
 * @module shapes
 */

import { add, clamp, distanceSquared, vec2Zero } from "./math.js";
import { rectContainsPoint, rectsIntersect } from "./rect.js";
import type {
  CircleShape,
  Color,
  DebugRenderer,
  Rect,
  RectangleShape,
  Shape,
  Vector2,
} from "./types.js";
import { assertNever } from "./utils.js";

// =============================================================================
// Construction
// =============================================================================

/**
 * Create a rectangle shape.
 *
 * @throws Error if width or height is negative, fractional or not finite
 */
export function createRectangle(
  width: number,
  height: number,
  offset: Vector2 = vec2Zero,
): RectangleShape {
  if (!Number.isInteger(width) || width < 0) {
    throw new Error(`[Shape] Rectangle width must be a non-negative integer. Got: ${width}`);
  }
  if (!Number.isInteger(height) || height < 0) {
    throw new Error(`[Shape] Rectangle height must be a non-negative integer. Got: ${height}`);
  }
  return { kind: "rectangle", width, height, offset };
}

/**
 * Create a circle shape.
 *
 * @throws Error if radius is negative or not finite
 */
export function createCircle(radius: number, offset: Vector2 = vec2Zero): CircleShape {
  if (!Number.isFinite(radius) || radius < 0) {
    throw new Error(`[Shape] Circle radius must be a non-negative finite number. Got: ${radius}`);
  }
  return { kind: "circle", radius, offset };
}

/**
 * Move a shape relative to its owner. The offset is the only mutable part of a shape.
 */
export function setShapeOffset(shape: Shape, offset: Vector2): void {
  shape.offset = offset;
}

// =============================================================================
// Geometry
// =============================================================================

/**
 * World-space corner (rectangle) or center (circle) of a shape.
 */
export const shapeOrigin = (shape: Shape, anchor: Vector2): Vector2 => add(anchor, shape.offset);

/**
 * Pixel rectangle occupied by a rectangle shape: the corner is truncated
 * to whole pixels, the size is kept as declared.
 */
function rectangleWorldRect(shape: RectangleShape, anchor: Vector2): Rect {
  const corner = shapeOrigin(shape, anchor);
  return {
    x: Math.trunc(corner.x),
    y: Math.trunc(corner.y),
    width: shape.width,
    height: shape.height,
  };
}

/**
 * Tight axis-aligned bounds in world space.
 *
 * Circles are bounded by whole pixels: floor of the top-left extent and
 * ceiling of the bottom-right extent.
 */
export function getBounds(shape: Shape, anchor: Vector2): Rect {
  switch (shape.kind) {
    case "rectangle":
      return rectangleWorldRect(shape, anchor);
    case "circle": {
      const center = shapeOrigin(shape, anchor);
      const left = Math.floor(center.x - shape.radius);
      const top = Math.floor(center.y - shape.radius);
      return {
        x: left,
        y: top,
        width: Math.ceil(center.x + shape.radius) - left,
        height: Math.ceil(center.y + shape.radius) - top,
      };
    }
    default:
      return assertNever(shape, "shape");
  }
}

/**
 * Closest-point test between a circle and an axis-aligned rectangle.
 * Inclusive: a circle touching an edge intersects.
 */
export function circleIntersectsRect(center: Vector2, radius: number, rect: Rect): boolean {
  const closest = {
    x: clamp(center.x, rect.x, rect.x + rect.width),
    y: clamp(center.y, rect.y, rect.y + rect.height),
  };
  return distanceSquared(center, closest) <= radius * radius;
}

function circlesIntersect(a: Vector2, ra: number, b: Vector2, rb: number): boolean {
  const combined = ra + rb;
  return distanceSquared(a, b) <= combined * combined;
}

// =============================================================================
// Queries
// =============================================================================

/**
 * Test two anchored shapes for overlap.
 *
 * Symmetric: `intersects(a, pa, b, pb) === intersects(b, pb, a, pa)`.
 */
export function intersects(
  shape: Shape,
  anchor: Vector2,
  other: Shape,
  otherAnchor: Vector2,
): boolean {
  switch (shape.kind) {
    case "rectangle":
      return intersectsRectangle(other, otherAnchor, rectangleWorldRect(shape, anchor));
    case "circle":
      switch (other.kind) {
        case "rectangle":
          return circleIntersectsRect(
            shapeOrigin(shape, anchor),
            shape.radius,
            rectangleWorldRect(other, otherAnchor),
          );
        case "circle":
          return circlesIntersect(
            shapeOrigin(shape, anchor),
            shape.radius,
            shapeOrigin(other, otherAnchor),
            other.radius,
          );
        default:
          return assertNever(other, "shape");
      }
    default:
      return assertNever(shape, "shape");
  }
}

/**
 * Test an anchored shape against a raw world rectangle.
 * Skips the pairwise dispatch; most map geometry arrives as rectangles.
 */
export function intersectsRectangle(shape: Shape, anchor: Vector2, rect: Rect): boolean {
  switch (shape.kind) {
    case "rectangle":
      return rectsIntersect(rectangleWorldRect(shape, anchor), rect);
    case "circle":
      return circleIntersectsRect(shapeOrigin(shape, anchor), shape.radius, rect);
    default:
      return assertNever(shape, "shape");
  }
}

/**
 * Inclusive point containment.
 */
export function containsPoint(shape: Shape, anchor: Vector2, point: Vector2): boolean {
  switch (shape.kind) {
    case "rectangle":
      return rectContainsPoint(rectangleWorldRect(shape, anchor), point);
    case "circle":
      return distanceSquared(shapeOrigin(shape, anchor), point) <= shape.radius * shape.radius;
    default:
      return assertNever(shape, "shape");
  }
}

/**
 * Hand the shape's outline to a debug renderer.
 */
export function drawShape(
  shape: Shape,
  renderer: DebugRenderer,
  anchor: Vector2,
  color: Color,
): void {
  switch (shape.kind) {
    case "rectangle":
      renderer.drawRectangle(rectangleWorldRect(shape, anchor), color);
      return;
    case "circle":
      renderer.drawCircle(shapeOrigin(shape, anchor), shape.radius, color);
      return;
    default:
      assertNever(shape, "shape");
  }
}
