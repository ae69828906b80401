import {
  drawShape,
  getBounds,
  intersects,
  polylineBounds,
  polylineIntersectsShape,
  rect,
  type Color,
  type DebugRenderer,
  type Rect,
  type Shape,
  type Vector2,
} from "@roomkit/collision2d";

/**
 * Open chain of segments. Points are relative to the object's anchor.
 */
export interface PolylineCollider {
  readonly kind: "polyline";
  readonly points: readonly Vector2[];
}

/** What a declared object collides as */
export type ResolvedCollider = Shape | PolylineCollider;

export function colliderBounds(collider: ResolvedCollider, anchor: Vector2): Rect {
  if (collider.kind === "polyline") {
    return polylineBounds(collider.points, anchor) ?? rect(anchor.x, anchor.y, 0, 0);
  }
  return getBounds(collider, anchor);
}

export function colliderIntersectsShape(
  collider: ResolvedCollider,
  anchor: Vector2,
  shape: Shape,
  shapeAnchor: Vector2,
): boolean {
  if (collider.kind === "polyline") {
    return polylineIntersectsShape(collider.points, anchor, shape, shapeAnchor);
  }
  return intersects(collider, anchor, shape, shapeAnchor);
}

export function drawCollider(
  collider: ResolvedCollider,
  renderer: DebugRenderer,
  anchor: Vector2,
  color: Color,
): void {
  if (collider.kind !== "polyline") {
    drawShape(collider, renderer, anchor, color);
    return;
  }

  const [first, ...rest] = collider.points;
  if (first === undefined) return;

  let previous = { x: anchor.x + first.x, y: anchor.y + first.y };
  for (const point of rest) {
    const next = { x: anchor.x + point.x, y: anchor.y + point.y };
    renderer.drawLine(previous, next, color);
    previous = next;
  }
}
