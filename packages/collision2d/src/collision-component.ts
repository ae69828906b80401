/**
 * CollisionComponent - binds one shape to a movable entity.
 *
 * The component never stores a position. Callers pass the entity's world
 * position into every query, so the same component works for predicted,
 * interpolated or hypothetical positions ("would I collide if I moved here?").
 *
 * @module collision-component
 */

import {
  containsPoint,
  createCircle,
  createRectangle,
  drawShape,
  getBounds,
  intersects,
  intersectsRectangle,
} from "./shapes.js";
import { vec2Zero } from "./math.js";
import type { Color, DebugRenderer, Rect, Shape, Vector2 } from "./types.js";

/** Default debug outline color (red-500) */
export const DEFAULT_COLLISION_DRAW_COLOR: Color = 0xef4444;

/**
 * Debug drawing options for a component.
 */
export interface CollisionDrawOptions {
  /** Draw the outline in `draw()`. Default: false */
  enableDraw?: boolean;
  /** Outline color. Default: DEFAULT_COLLISION_DRAW_COLOR */
  drawColor?: Color;
}

/**
 * An entity that may opt into collision.
 * `collision` is null for entities that never collide.
 */
export interface Collidable {
  readonly collision: CollisionComponent | null;
}

/**
 * Collision shape attached to an entity for its whole lifetime.
 *
 * @example
 * ```typescript
 * const player = { collision: CollisionComponent.rectangle(24, 32, vec2(4, 0)) };
 * if (player.collision.intersects(playerPos, door.collision, doorPos)) {
 *   openDoor();
 * }
 * ```
 */
export class CollisionComponent {
  readonly shape: Shape;
  enableDraw: boolean;
  drawColor: Color;

  constructor(shape: Shape, options: CollisionDrawOptions = {}) {
    this.shape = shape;
    this.enableDraw = options.enableDraw ?? false;
    this.drawColor = options.drawColor ?? DEFAULT_COLLISION_DRAW_COLOR;
  }

  /**
   * Component with a rectangle shape.
   */
  static rectangle(
    width: number,
    height: number,
    offset: Vector2 = vec2Zero,
    options?: CollisionDrawOptions,
  ): CollisionComponent {
    return new CollisionComponent(createRectangle(width, height, offset), options);
  }

  /**
   * Component with a circle shape.
   */
  static circle(
    radius: number,
    offset: Vector2 = vec2Zero,
    options?: CollisionDrawOptions,
  ): CollisionComponent {
    return new CollisionComponent(createCircle(radius, offset), options);
  }

  intersects(position: Vector2, other: CollisionComponent, otherPosition: Vector2): boolean {
    return intersects(this.shape, position, other.shape, otherPosition);
  }

  /**
   * Test against a bare shape that no entity owns (e.g. resolved map geometry).
   */
  intersectsShape(position: Vector2, shape: Shape, shapePosition: Vector2): boolean {
    return intersects(this.shape, position, shape, shapePosition);
  }

  getBounds(position: Vector2): Rect {
    return getBounds(this.shape, position);
  }

  intersectsRectangle(position: Vector2, rect: Rect): boolean {
    return intersectsRectangle(this.shape, position, rect);
  }

  containsPoint(position: Vector2, point: Vector2): boolean {
    return containsPoint(this.shape, position, point);
  }

  /**
   * Draw the outline if `enableDraw` is set.
   */
  draw(renderer: DebugRenderer, position: Vector2): void {
    if (this.enableDraw) {
      drawShape(this.shape, renderer, position, this.drawColor);
    }
  }
}

/**
 * Entity-vs-entity test. Entities without a component never collide.
 */
export function checkCollision(
  a: Collidable,
  positionA: Vector2,
  b: Collidable,
  positionB: Vector2,
): boolean {
  if (!a.collision || !b.collision) {
    return false;
  }
  return a.collision.intersects(positionA, b.collision, positionB);
}
