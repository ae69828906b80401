/**
 * Builders for small in-memory maps used by the tests.
 */

import { vec2, vec2Zero } from "@roomkit/collision2d";
import type { DeclarativeObject, ObjectLayer, TileLayer, Tilemap } from "./types.js";

/**
 * Create a declared object. Defaults to an unnamed rectangle at the origin.
 */
export function createTestObject(
  id: number,
  overrides: Partial<Omit<DeclarativeObject, "id">> = {},
): DeclarativeObject {
  return {
    id,
    name: overrides.name ?? "",
    type: overrides.type ?? "",
    kind: overrides.kind ?? "rectangle",
    position: overrides.position ?? vec2Zero,
    width: overrides.width ?? 0,
    height: overrides.height ?? 0,
    rotation: overrides.rotation ?? 0,
    points: overrides.points ?? [],
    properties: overrides.properties ?? {},
    ...(overrides.text !== undefined ? { text: overrides.text } : {}),
    ...(overrides.gid !== undefined ? { gid: overrides.gid } : {}),
  };
}

/**
 * Rectangle object from an `(x, y, width, height)` box.
 */
export function createRectObject(
  id: number,
  name: string,
  x: number,
  y: number,
  width: number,
  height: number,
  properties: DeclarativeObject["properties"] = {},
): DeclarativeObject {
  return createTestObject(id, { name, position: vec2(x, y), width, height, properties });
}

export function createObjectLayer(
  name: string,
  objects: readonly DeclarativeObject[],
  overrides: Partial<Omit<ObjectLayer, "name" | "objects">> = {},
): ObjectLayer {
  return {
    name,
    objects,
    visible: overrides.visible ?? true,
    opacity: overrides.opacity ?? 1,
    offset: overrides.offset ?? vec2Zero,
    properties: overrides.properties ?? {},
  };
}

/**
 * Tile layer from rows of global tile ids.
 */
export function createTileLayer(
  name: string,
  rows: readonly (readonly number[])[],
  overrides: Partial<Pick<TileLayer, "visible" | "offset">> = {},
): TileLayer {
  return {
    name,
    width: rows[0]?.length ?? 0,
    height: rows.length,
    tiles: rows.flat(),
    visible: overrides.visible ?? true,
    offset: overrides.offset ?? vec2Zero,
  };
}

/**
 * Create a map. Defaults to an empty 20x15 grid of 32px tiles.
 */
export function createTestMap(overrides: Partial<Tilemap> = {}): Tilemap {
  return {
    name: overrides.name ?? "test-map",
    width: overrides.width ?? 20,
    height: overrides.height ?? 15,
    tileWidth: overrides.tileWidth ?? 32,
    tileHeight: overrides.tileHeight ?? 32,
    tileLayers: overrides.tileLayers ?? [],
    objectLayers: overrides.objectLayers ?? [],
    tileCollisions: overrides.tileCollisions ?? new Map(),
    properties: overrides.properties ?? {},
  };
}
