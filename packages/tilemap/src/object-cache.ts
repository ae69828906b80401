import { createCircle, createRectangle, getOrSet, rectFromPoints, vec2 } from "@roomkit/collision2d";
import { DEFAULT_CIRCLE_TOLERANCE, POINT_RADIUS } from "./constants.js";
import type { ResolvedCollider } from "./colliders.js";
import type { DeclarativeObject } from "./types.js";

export interface ObjectShapeCacheOptions {
  /** Max |width - height| for an ellipse to collide as a circle. Default: 1 */
  circleTolerance?: number;
}

/** Declared sizes as usable float dimensions */
function dimension(value: number): number {
  return Number.isFinite(value) ? Math.max(0, value) : 0;
}

/** Declared sizes as whole-pixel rectangle dimensions */
function pixels(value: number): number {
  return Math.trunc(dimension(value));
}

/**
 * Memoizes the collider each declared object resolves to.
 *
 * Keyed by `(scope, object id)`. `TilemapCollision` scopes entries as
 * `<map>/<layer>`, or `<map>/tile:<gid>` for collision objects attached to a
 * tile. Entries live until invalidated; the cache never notices edits to the
 * map on its own.
 */
export class ObjectShapeCache {
  private readonly scopes = new Map<string, Map<number, ResolvedCollider>>();
  private readonly reportedKinds = new Set<string>();
  private readonly circleTolerance: number;

  constructor(options: ObjectShapeCacheOptions = {}) {
    this.circleTolerance = options.circleTolerance ?? DEFAULT_CIRCLE_TOLERANCE;
    if (!(this.circleTolerance >= 0)) {
      throw new Error(
        `[ObjectShapeCache] circleTolerance must be non-negative. Got: ${this.circleTolerance}`,
      );
    }
  }

  /**
   * Collider for an object, built on first use and reused afterwards.
   */
  resolve(scope: string, object: DeclarativeObject): ResolvedCollider {
    const entries = getOrSet(this.scopes, scope, () => new Map<number, ResolvedCollider>());
    return getOrSet(entries, object.id, () => this.build(object));
  }

  /**
   * Drop one object's collider. Returns whether anything was cached.
   */
  invalidate(scope: string, objectId: number): boolean {
    const entries = this.scopes.get(scope);
    if (!entries) {
      return false;
    }
    const removed = entries.delete(objectId);
    if (entries.size === 0) {
      this.scopes.delete(scope);
    }
    return removed;
  }

  /**
   * Drop every collider of a scope, or everything when no scope is given.
   */
  invalidateAll(scope?: string): void {
    if (scope === undefined) {
      this.scopes.clear();
    } else {
      this.scopes.delete(scope);
    }
  }

  /** Number of cached colliders across all scopes */
  get size(): number {
    let total = 0;
    for (const entries of this.scopes.values()) {
      total += entries.size;
    }
    return total;
  }

  private build(object: DeclarativeObject): ResolvedCollider {
    const width = dimension(object.width);
    const height = dimension(object.height);

    switch (object.kind) {
      case "rectangle":
      case "tile":
      case "text":
        return createRectangle(pixels(width), pixels(height));

      case "ellipse":
        if (Math.abs(width - height) <= this.circleTolerance) {
          return createCircle((width + height) / 4, vec2(width / 2, height / 2));
        }
        return createRectangle(pixels(width), pixels(height));

      case "point":
        return createCircle(POINT_RADIUS);

      case "polygon": {
        const box = rectFromPoints(object.points);
        if (!box) {
          return createRectangle(pixels(width), pixels(height));
        }
        return createRectangle(pixels(box.width), pixels(box.height), vec2(box.x, box.y));
      }

      case "polyline":
        return { kind: "polyline", points: object.points };

      default:
        if (!this.reportedKinds.has(object.kind)) {
          this.reportedKinds.add(object.kind);
          console.warn(
            `[ObjectShapeCache] Unknown object kind "${object.kind}", colliding as its bounding rectangle`,
          );
        }
        return createRectangle(pixels(width), pixels(height));
    }
  }
}
