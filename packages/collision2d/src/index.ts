/**
 * @roomkit/collision2d
 *
 * Stateless 2D collision primitives for frame-stepped games.
 * Shapes carry no world position: every query takes the anchor of each
 * shape, so the same geometry can be tested at any number of positions
 * without rebuilding it.
 */

// Core types
export type {
  Vector2,
  Rect,
  Color,
  RectangleShape,
  CircleShape,
  Shape,
  ShapeKind,
  DebugRenderer,
  SpatialObject,
} from "./types.js";

// Math utilities
export {
  vec2,
  vec2Zero,
  add,
  sub,
  scale,
  dot,
  lengthSquared,
  magnitude,
  normalize,
  distanceSquared,
  distance,
  clamp,
} from "./math.js";

// Rectangles
export {
  rect,
  rectRight,
  rectBottom,
  rectCenter,
  rectsIntersect,
  rectContainsPoint,
  unionRects,
  rectFromPoints,
  translateRect,
} from "./rect.js";

// Shapes
export {
  createRectangle,
  createCircle,
  setShapeOffset,
  shapeOrigin,
  getBounds,
  circleIntersectsRect,
  intersects,
  intersectsRectangle,
  containsPoint,
  drawShape,
} from "./shapes.js";

// Polyline segments
export {
  segmentIntersectsRect,
  segmentIntersectsCircle,
  closestPointOnSegment,
  polylineBounds,
  polylineIntersectsRect,
  polylineIntersectsShape,
} from "./segment.js";

// Collision component
export {
  CollisionComponent,
  DEFAULT_COLLISION_DRAW_COLOR,
  checkCollision,
} from "./collision-component.js";
export type { Collidable, CollisionDrawOptions } from "./collision-component.js";

// Spatial index
export { QuadTree, DEFAULT_MAX_OBJECTS_PER_NODE, DEFAULT_MAX_DEPTH } from "./quadtree.js";
export type { QuadTreeOptions } from "./quadtree.js";

// Helpers
export { getOrSet, assertNever } from "./utils.js";
