import { rect, vec2Zero, type Rect, type Vector2 } from "@roomkit/collision2d";
import type {
  DeclarativeObject,
  ObjectLayer,
  TileCoordinates,
  TileLayer,
  Tilemap,
} from "./types.js";

export function getObjectLayer(tilemap: Tilemap, name: string): ObjectLayer | null {
  return tilemap.objectLayers.find((layer) => layer.name === name) ?? null;
}

export function getTileLayer(tilemap: Tilemap, name: string): TileLayer | null {
  return tilemap.tileLayers.find((layer) => layer.name === name) ?? null;
}

/**
 * Objects of one layer, or of every object layer in layer order when no
 * name is given. An unknown layer yields an empty list.
 */
export function getCollisionObjects(tilemap: Tilemap, layerName?: string): DeclarativeObject[] {
  if (layerName === undefined || layerName === "") {
    return tilemap.objectLayers.flatMap((layer) => layer.objects);
  }
  return [...(getObjectLayer(tilemap, layerName)?.objects ?? [])];
}

/** Global tile id at a cell, 0 outside the layer */
export function getTileGid(layer: TileLayer, tileX: number, tileY: number): number {
  if (tileX < 0 || tileX >= layer.width || tileY < 0 || tileY >= layer.height) {
    return 0;
  }
  return layer.tiles[tileY * layer.width + tileX] ?? 0;
}

/**
 * Collision objects declared for the tiles at a cell, across every visible
 * tile layer (or only the named one).
 */
export function getTileCollisionObjects(
  tilemap: Tilemap,
  tileX: number,
  tileY: number,
  layerName?: string,
): DeclarativeObject[] {
  const objects: DeclarativeObject[] = [];
  for (const layer of tilemap.tileLayers) {
    if (layerName !== undefined ? layer.name !== layerName : !layer.visible) continue;

    const gid = getTileGid(layer, tileX, tileY);
    if (gid === 0) continue;

    objects.push(...(tilemap.tileCollisions.get(gid) ?? []));
  }
  return objects;
}

/**
 * Tile cell under a world position, or null outside the map.
 */
export function worldToTileCoordinates(
  tilemap: Tilemap,
  position: Vector2,
  tilemapOffset: Vector2 = vec2Zero,
): TileCoordinates | null {
  const x = Math.floor((position.x - tilemapOffset.x) / tilemap.tileWidth);
  const y = Math.floor((position.y - tilemapOffset.y) / tilemap.tileHeight);

  if (x < 0 || x >= tilemap.width || y < 0 || y >= tilemap.height) {
    return null;
  }
  return { x, y };
}

/** World-space rectangle covered by the tile grid */
export function getMapBounds(tilemap: Tilemap, tilemapOffset: Vector2 = vec2Zero): Rect {
  return rect(
    tilemapOffset.x,
    tilemapOffset.y,
    tilemap.width * tilemap.tileWidth,
    tilemap.height * tilemap.tileHeight,
  );
}
