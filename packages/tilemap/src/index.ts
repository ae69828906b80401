/**
 * @roomkit/tilemap
 *
 * Collision queries against editor-declared tile maps: object layers,
 * solid tile layers and collision objects attached to individual tiles.
 */

// Types
export type {
  DeclarativeObjectKind,
  DeclarativeObject,
  PropertyValue,
  Properties,
  ObjectLayer,
  TileLayer,
  Tilemap,
  TileCoordinates,
  TileObjectHit,
} from "./types.js";

// Constants
export {
  DEFAULT_CIRCLE_TOLERANCE,
  POINT_RADIUS,
  TILE_SCOPE_PREFIX,
  mapScope,
  tileScope,
} from "./constants.js";

// Map lookups
export {
  getObjectLayer,
  getTileLayer,
  getCollisionObjects,
  getTileGid,
  getTileCollisionObjects,
  worldToTileCoordinates,
  getMapBounds,
} from "./tilemap.js";

// Colliders
export type { PolylineCollider, ResolvedCollider } from "./colliders.js";
export { colliderBounds, colliderIntersectsShape, drawCollider } from "./colliders.js";
export { ObjectShapeCache, type ObjectShapeCacheOptions } from "./object-cache.js";

// Queries
export {
  TilemapCollision,
  type IndexLayerOptions,
  type TilemapCollisionOptions,
} from "./queries.js";
export { getCollisionRectangles, hasCollisionAtTile, checkTileLayerCollision } from "./tile-layers.js";

// Debug drawing
export {
  drawObjectLayerAsCollision,
  drawTileLayerAsCollision,
  drawTileCollisionObjects,
} from "./debug.js";
