import { add, vec2, vec2Zero, type Color, type DebugRenderer, type Vector2 } from "@roomkit/collision2d";
import { COLLISION_COLORS } from "@roomkit/renderer";
import { drawCollider } from "./colliders.js";
import { tileScope } from "./constants.js";
import type { TilemapCollision } from "./queries.js";
import { getCollisionRectangles } from "./tile-layers.js";
import { getObjectLayer, getTileGid } from "./tilemap.js";

/**
 * Outline the collider of every object in an object layer.
 */
export function drawObjectLayerAsCollision(
  collision: TilemapCollision,
  renderer: DebugRenderer,
  layerName: string,
  tilemapOffset: Vector2 = vec2Zero,
  color: Color = COLLISION_COLORS.objectLayer,
): void {
  const layer = getObjectLayer(collision.tilemap, layerName);
  if (!layer) return;

  for (const object of layer.objects) {
    const collider = collision.resolveCollider(layer.name, object);
    drawCollider(collider, renderer, collision.objectAnchor(layer, object, tilemapOffset), color);
  }
}

/**
 * Outline every solid cell of a tile layer.
 */
export function drawTileLayerAsCollision(
  collision: TilemapCollision,
  renderer: DebugRenderer,
  layerName: string,
  tilemapOffset: Vector2 = vec2Zero,
  color: Color = COLLISION_COLORS.tileLayer,
): void {
  for (const tileRect of getCollisionRectangles(collision.tilemap, layerName, tilemapOffset)) {
    renderer.drawRectangle(tileRect, color);
  }
}

/**
 * Outline the collision objects attached to every placed tile.
 */
export function drawTileCollisionObjects(
  collision: TilemapCollision,
  renderer: DebugRenderer,
  tilemapOffset: Vector2 = vec2Zero,
  color: Color = COLLISION_COLORS.tileObject,
): void {
  const { tilemap } = collision;

  for (const layer of tilemap.tileLayers) {
    if (!layer.visible) continue;
    const origin = add(tilemapOffset, layer.offset);

    for (let y = 0; y < layer.height; y++) {
      for (let x = 0; x < layer.width; x++) {
        const gid = getTileGid(layer, x, y);
        const objects = gid === 0 ? undefined : tilemap.tileCollisions.get(gid);
        if (!objects) continue;

        const tileOrigin = add(origin, vec2(x * tilemap.tileWidth, y * tilemap.tileHeight));
        for (const object of objects) {
          const collider = collision.resolveCollider(tileScope(gid), object);
          drawCollider(collider, renderer, add(tileOrigin, object.position), color);
        }
      }
    }
  }
}
