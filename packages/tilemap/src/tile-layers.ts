import { rect, vec2Zero, type Collidable, type Rect, type Vector2 } from "@roomkit/collision2d";
import { getTileGid, getTileLayer } from "./tilemap.js";
import type { Tilemap } from "./types.js";

/**
 * One world-space rectangle per occupied cell of a tile layer.
 * Any non-empty tile is solid. Hidden or unknown layers have none.
 */
export function getCollisionRectangles(
  tilemap: Tilemap,
  layerName: string,
  tilemapOffset: Vector2 = vec2Zero,
): Rect[] {
  const layer = getTileLayer(tilemap, layerName);
  if (!layer || !layer.visible) {
    return [];
  }

  const originX = tilemapOffset.x + layer.offset.x;
  const originY = tilemapOffset.y + layer.offset.y;
  const rects: Rect[] = [];

  for (let y = 0; y < layer.height; y++) {
    for (let x = 0; x < layer.width; x++) {
      if (getTileGid(layer, x, y) === 0) continue;

      rects.push(
        rect(
          Math.trunc(originX + x * tilemap.tileWidth),
          Math.trunc(originY + y * tilemap.tileHeight),
          tilemap.tileWidth,
          tilemap.tileHeight,
        ),
      );
    }
  }

  return rects;
}

/** Whether a cell of a visible tile layer holds a tile */
export function hasCollisionAtTile(
  tilemap: Tilemap,
  tileX: number,
  tileY: number,
  layerName: string,
): boolean {
  const layer = getTileLayer(tilemap, layerName);
  if (!layer || !layer.visible) {
    return false;
  }
  return getTileGid(layer, tileX, tileY) !== 0;
}

/**
 * Whether the entity touches any solid cell of a tile layer.
 */
export function checkTileLayerCollision(
  entity: Collidable,
  position: Vector2,
  tilemap: Tilemap,
  layerName: string,
  tilemapOffset: Vector2 = vec2Zero,
): boolean {
  const component = entity.collision;
  if (!component) {
    return false;
  }
  return getCollisionRectangles(tilemap, layerName, tilemapOffset).some((tileRect) =>
    component.intersectsRectangle(position, tileRect),
  );
}
