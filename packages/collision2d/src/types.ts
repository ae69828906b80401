/**
 * Core types for @roomkit/collision2d
 *
 * Uses screen/map coordinates (0,0 at top-left, positive Y is down).
 * This matches the tile maps the collision queries run against.
 */

/**
 * 2D vector for positions, offsets and sizes.
 * Immutable by convention - all operations return new vectors.
 */
export interface Vector2 {
  readonly x: number;
  readonly y: number;
}

/**
 * Axis-aligned rectangle in world space.
 * `(x, y)` is the top-left corner.
 */
export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

/** Debug color as 0xRRGGBB */
export type Color = number;

/**
 * Axis-aligned rectangle collision shape.
 * Sizes are whole pixels; the corner sits at `anchor + offset`.
 */
export interface RectangleShape {
  readonly kind: "rectangle";
  readonly width: number;
  readonly height: number;
  /** Position of the top-left corner relative to the owner's anchor */
  offset: Vector2;
}

/**
 * Circle collision shape. The center sits at `anchor + offset`.
 */
export interface CircleShape {
  readonly kind: "circle";
  readonly radius: number;
  /** Position of the center relative to the owner's anchor */
  offset: Vector2;
}

/**
 * Closed set of collision primitives.
 * Adding a variant here makes every dispatching `switch` fail to compile
 * until it handles the new kind.
 */
export type Shape = RectangleShape | CircleShape;

export type ShapeKind = Shape["kind"];

/**
 * Drawing seam for collision debug outlines.
 *
 * Implemented by @roomkit/renderer; collision code only hands it
 * world-space coordinates.
 */
export interface DebugRenderer {
  drawRectangle(rect: Rect, color: Color, thickness?: number): void;
  drawCircle(center: Vector2, radius: number, color: Color, segments?: number): void;
  drawLine(start: Vector2, end: Vector2, color: Color, thickness?: number): void;
}

/**
 * Anything the QuadTree can index by its own bounds and position.
 */
export interface SpatialObject {
  readonly bounds: Rect;
  readonly position: Vector2;
}
