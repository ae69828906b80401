import {
  QuadTree,
  add,
  rectsIntersect,
  scale,
  translateRect,
  unionRects,
  vec2,
  vec2Zero,
  type Collidable,
  type CollisionComponent,
  type Rect,
  type Vector2,
} from "@roomkit/collision2d";
import { colliderBounds, colliderIntersectsShape, type ResolvedCollider } from "./colliders.js";
import { mapScope, tileScope } from "./constants.js";
import { ObjectShapeCache } from "./object-cache.js";
import { getMapBounds, getObjectLayer, getTileGid } from "./tilemap.js";
import type { DeclarativeObject, ObjectLayer, TileObjectHit, Tilemap } from "./types.js";

/** Options for {@link TilemapCollision.indexLayer} */
export interface IndexLayerOptions {
  maxObjectsPerNode?: number;
  maxDepth?: number;
}

export interface TilemapCollisionOptions {
  /**
   * Share a cache between several query objects. Entries are scoped by map
   * name, so maps sharing a cache need distinct names. Default: a fresh cache
   */
  cache?: ObjectShapeCache;
}

interface IndexedObject {
  readonly object: DeclarativeObject;
  /** Position in the layer's declaration order */
  readonly order: number;
}

interface LayerIndex {
  readonly tree: QuadTree<IndexedObject>;
  readonly options: IndexLayerOptions;
}

const INDEX_SLACK = 2;

/** Grow a rectangle by `by` pixels on every side */
function inflate(r: Rect, by: number): Rect {
  return { x: r.x - by, y: r.y - by, width: r.width + by * 2, height: r.height + by * 2 };
}

/**
 * Collision queries of entities against a tile map's declared objects.
 *
 * Every query runs in declaration order: exact name filter first, then a
 * bounding-box reject, then the exact collider test. Layers registered with
 * `indexLayer` are pre-filtered through a QuadTree; results still come back
 * in declaration order.
 *
 * @example
 * ```typescript
 * const collision = new TilemapCollision(map);
 * const door = collision.getFirstCollidingObject(player, player.position, "Exits", "Exit_North");
 * ```
 */
export class TilemapCollision {
  readonly tilemap: Tilemap;
  readonly cache: ObjectShapeCache;
  private readonly indexes = new Map<string, LayerIndex>();

  constructor(tilemap: Tilemap, options: TilemapCollisionOptions = {}) {
    this.tilemap = tilemap;
    this.cache = options.cache ?? new ObjectShapeCache();
  }

  // ===========================================================================
  // Object layers
  // ===========================================================================

  /**
   * First object of a layer touching the entity, or null.
   * Entities without a collision component never collide.
   */
  getFirstCollidingObject(
    entity: Collidable,
    position: Vector2,
    layerName: string,
    nameFilter?: string,
    tilemapOffset: Vector2 = vec2Zero,
  ): DeclarativeObject | null {
    return this.collectObjects(entity, position, layerName, nameFilter, tilemapOffset, true)[0] ?? null;
  }

  /**
   * Every object of a layer touching the entity, in declaration order.
   */
  getAllCollidingObjects(
    entity: Collidable,
    position: Vector2,
    layerName: string,
    nameFilter?: string,
    tilemapOffset: Vector2 = vec2Zero,
  ): DeclarativeObject[] {
    return this.collectObjects(entity, position, layerName, nameFilter, tilemapOffset, false);
  }

  /** Whether any object of the layer touches the entity */
  checkObjectCollision(
    entity: Collidable,
    position: Vector2,
    layerName: string,
    tilemapOffset: Vector2 = vec2Zero,
  ): boolean {
    return this.getFirstCollidingObject(entity, position, layerName, undefined, tilemapOffset) !== null;
  }

  /** World-space anchor of a layer object */
  objectAnchor(layer: ObjectLayer, object: DeclarativeObject, tilemapOffset: Vector2 = vec2Zero): Vector2 {
    return add(add(tilemapOffset, layer.offset), object.position);
  }

  /**
   * Cached collider of an object. `scope` is the layer name, or
   * `tileScope(gid)` for objects attached to a tile.
   */
  resolveCollider(scope: string, object: DeclarativeObject): ResolvedCollider {
    return this.cache.resolve(mapScope(this.tilemap.name, scope), object);
  }

  // ===========================================================================
  // Per-tile collision objects
  // ===========================================================================

  /**
   * Collision objects attached to tiles under the entity, across every
   * visible tile layer. Only tiles the entity's bounds touch are examined.
   */
  getCollidingTileObjects(
    entity: Collidable,
    position: Vector2,
    tilemapOffset: Vector2 = vec2Zero,
  ): TileObjectHit[] {
    return this.collectTileHits(entity.collision, position, tilemapOffset, false);
  }

  /** Whether any tile collision object touches the entity */
  checkTileCollision(entity: Collidable, position: Vector2, tilemapOffset: Vector2 = vec2Zero): boolean {
    return this.collectTileHits(entity.collision, position, tilemapOffset, true).length > 0;
  }

  // ===========================================================================
  // Spatial index and cache
  // ===========================================================================

  /**
   * Build a QuadTree over a layer's objects. Later queries on the layer
   * only run the narrow phase on objects near the entity.
   * Returns false when the layer does not exist. Invalidating an object of
   * an indexed layer rebuilds its index with the same options.
   */
  indexLayer(layerName: string, options: IndexLayerOptions = {}): boolean {
    const layer = getObjectLayer(this.tilemap, layerName);
    if (!layer) {
      this.indexes.delete(layerName);
      return false;
    }
    this.indexes.set(layerName, { tree: this.buildIndex(layer, options), options });
    return true;
  }

  isLayerIndexed(layerName: string): boolean {
    return this.indexes.has(layerName);
  }

  /** Drop the spatial index of one layer, or of all layers */
  clearIndex(layerName?: string): void {
    if (layerName === undefined) {
      this.indexes.clear();
    } else {
      this.indexes.delete(layerName);
    }
  }

  /**
   * Forget the cached collider of one object after its geometry changed.
   * An indexed layer is re-indexed so both query paths see the change.
   */
  invalidate(scope: string, objectId: number): boolean {
    const removed = this.cache.invalidate(mapScope(this.tilemap.name, scope), objectId);
    this.reindex(scope);
    return removed;
  }

  /** Forget this map's cached colliders of a scope, or all of them */
  invalidateAll(scope?: string): void {
    if (scope !== undefined) {
      this.cache.invalidateAll(mapScope(this.tilemap.name, scope));
      this.reindex(scope);
      return;
    }

    for (const layer of this.tilemap.objectLayers) {
      this.cache.invalidateAll(mapScope(this.tilemap.name, layer.name));
    }
    for (const gid of this.tilemap.tileCollisions.keys()) {
      this.cache.invalidateAll(mapScope(this.tilemap.name, tileScope(gid)));
    }
    for (const layerName of [...this.indexes.keys()]) {
      this.reindex(layerName);
    }
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private buildIndex(layer: ObjectLayer, options: IndexLayerOptions): QuadTree<IndexedObject> {
    const entries = layer.objects.map((object, order) => ({
      item: { object, order },
      bounds: colliderBounds(this.resolveCollider(layer.name, object), this.objectAnchor(layer, object)),
    }));

    // Objects may sit outside the tile grid
    let treeBounds = getMapBounds(this.tilemap);
    for (const entry of entries) {
      treeBounds = unionRects(treeBounds, entry.bounds);
    }

    const tree = new QuadTree<IndexedObject>(treeBounds, options);
    for (const entry of entries) {
      tree.insert(entry.item, entry.bounds);
    }
    return tree;
  }

  private reindex(layerName: string): void {
    const index = this.indexes.get(layerName);
    if (index) {
      this.indexLayer(layerName, index.options);
    }
  }

  private collectObjects(
    entity: Collidable,
    position: Vector2,
    layerName: string,
    nameFilter: string | undefined,
    tilemapOffset: Vector2,
    firstOnly: boolean,
  ): DeclarativeObject[] {
    const component = entity.collision;
    if (!component) {
      return [];
    }
    const layer = getObjectLayer(this.tilemap, layerName);
    if (!layer) {
      return [];
    }

    const entityBounds = component.getBounds(position);
    const hits: DeclarativeObject[] = [];

    for (const object of this.candidates(layer, entityBounds, tilemapOffset)) {
      if (nameFilter !== undefined && object.name !== nameFilter) continue;

      const anchor = this.objectAnchor(layer, object, tilemapOffset);
      const collider = this.resolveCollider(layer.name, object);
      if (!rectsIntersect(colliderBounds(collider, anchor), entityBounds)) continue;
      if (!colliderIntersectsShape(collider, anchor, component.shape, position)) continue;

      hits.push(object);
      if (firstOnly) break;
    }

    return hits;
  }

  private candidates(
    layer: ObjectLayer,
    entityBounds: Rect,
    tilemapOffset: Vector2,
  ): readonly DeclarativeObject[] {
    const tree = this.indexes.get(layer.name)?.tree;
    if (!tree) {
      return layer.objects;
    }

    // The index is built without the tilemap offset, so whole-pixel rounding
    // of collider bounds can shift them by up to two pixels either way.
    const search = inflate(translateRect(entityBounds, scale(tilemapOffset, -1)), INDEX_SLACK);

    const found: IndexedObject[] = [];
    tree.query(search, found);

    return [...new Set(found)].sort((a, b) => a.order - b.order).map((entry) => entry.object);
  }

  private collectTileHits(
    component: CollisionComponent | null,
    position: Vector2,
    tilemapOffset: Vector2,
    firstOnly: boolean,
  ): TileObjectHit[] {
    if (!component) {
      return [];
    }

    const { tileWidth, tileHeight } = this.tilemap;
    const entityBounds = component.getBounds(position);
    const hits: TileObjectHit[] = [];

    for (const layer of this.tilemap.tileLayers) {
      if (!layer.visible) continue;

      const origin = add(tilemapOffset, layer.offset);
      // Inclusive range: a tile whose edge the entity only touches still counts
      const firstX = Math.max(0, Math.ceil((entityBounds.x - origin.x) / tileWidth) - 1);
      const firstY = Math.max(0, Math.ceil((entityBounds.y - origin.y) / tileHeight) - 1);
      const lastX = Math.min(
        layer.width - 1,
        Math.floor((entityBounds.x + entityBounds.width - origin.x) / tileWidth),
      );
      const lastY = Math.min(
        layer.height - 1,
        Math.floor((entityBounds.y + entityBounds.height - origin.y) / tileHeight),
      );

      for (let tileY = firstY; tileY <= lastY; tileY++) {
        for (let tileX = firstX; tileX <= lastX; tileX++) {
          const gid = getTileGid(layer, tileX, tileY);
          if (gid === 0) continue;

          const objects = this.tilemap.tileCollisions.get(gid);
          if (!objects) continue;

          const tileOrigin = add(origin, vec2(tileX * tileWidth, tileY * tileHeight));
          const scope = tileScope(gid);

          for (const object of objects) {
            const anchor = add(tileOrigin, object.position);
            const collider = this.resolveCollider(scope, object);
            if (!rectsIntersect(colliderBounds(collider, anchor), entityBounds)) continue;
            if (!colliderIntersectsShape(collider, anchor, component.shape, position)) continue;

            hits.push({ object, layerName: layer.name, gid, tile: { x: tileX, y: tileY } });
            if (firstOnly) return hits;
          }
        }
      }
    }

    return hits;
  }
}
