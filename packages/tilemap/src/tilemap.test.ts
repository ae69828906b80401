import { describe, expect, it } from "vitest";
import { rect, vec2 } from "@roomkit/collision2d";
import {
  getCollisionObjects,
  getMapBounds,
  getObjectLayer,
  getTileCollisionObjects,
  getTileGid,
  getTileLayer,
  worldToTileCoordinates,
} from "./tilemap.js";
import {
  createObjectLayer,
  createRectObject,
  createTestMap,
  createTestObject,
  createTileLayer,
} from "./test-utils.js";

const walls = createObjectLayer("Collision", [
  createRectObject(1, "wall-a", 0, 0, 32, 32),
  createRectObject(2, "wall-b", 64, 0, 32, 32),
]);
const exits = createObjectLayer("Exits", [createRectObject(1, "Exit_North", 320, 0, 64, 32)]);

const ground = createTileLayer("Ground", [
  [1, 0, 0],
  [0, 7, 0],
]);
const decor = createTileLayer("Decor", [[0, 0, 9]], { visible: false });

const crate = createTestObject(1, { position: vec2(4, 4), width: 24, height: 24 });
const torch = createTestObject(1, { kind: "point", position: vec2(16, 16) });

const map = createTestMap({
  width: 3,
  height: 2,
  objectLayers: [walls, exits],
  tileLayers: [ground, decor],
  tileCollisions: new Map([
    [7, [crate]],
    [9, [torch]],
  ]),
});

describe("layer lookups", () => {
  it("finds layers by name", () => {
    expect(getObjectLayer(map, "Exits")).toBe(exits);
    expect(getTileLayer(map, "Ground")).toBe(ground);
  });

  it("returns null for unknown layers", () => {
    expect(getObjectLayer(map, "Ground")).toBeNull();
    expect(getTileLayer(map, "Exits")).toBeNull();
  });
});

describe("getCollisionObjects", () => {
  it("lists one layer's objects", () => {
    expect(getCollisionObjects(map, "Exits").map((o) => o.name)).toEqual(["Exit_North"]);
  });

  it("lists every layer's objects in layer order without a name", () => {
    expect(getCollisionObjects(map).map((o) => o.name)).toEqual(["wall-a", "wall-b", "Exit_North"]);
  });

  it("returns nothing for an unknown layer", () => {
    expect(getCollisionObjects(map, "Nope")).toEqual([]);
  });
});

describe("tile lookups", () => {
  it("reads row-major gids", () => {
    expect(getTileGid(ground, 0, 0)).toBe(1);
    expect(getTileGid(ground, 1, 1)).toBe(7);
    expect(getTileGid(ground, 2, 1)).toBe(0);
  });

  it("reads 0 outside the layer", () => {
    expect(getTileGid(ground, 3, 0)).toBe(0);
    expect(getTileGid(ground, -1, 0)).toBe(0);
  });

  it("gathers tile collision objects from visible layers", () => {
    expect(getTileCollisionObjects(map, 1, 1)).toEqual([crate]);
    expect(getTileCollisionObjects(map, 2, 0)).toEqual([]);
  });

  it("reads a named layer even when hidden", () => {
    expect(getTileCollisionObjects(map, 2, 0, "Decor")).toEqual([torch]);
  });
});

describe("worldToTileCoordinates", () => {
  it("converts world positions to cells", () => {
    expect(worldToTileCoordinates(map, vec2(40, 63))).toEqual({ x: 1, y: 1 });
  });

  it("applies the tilemap offset", () => {
    expect(worldToTileCoordinates(map, vec2(132, 100), vec2(100, 100))).toEqual({ x: 1, y: 0 });
  });

  it("returns null outside the grid", () => {
    expect(worldToTileCoordinates(map, vec2(-0.5, 10))).toBeNull();
    expect(worldToTileCoordinates(map, vec2(96, 10))).toBeNull();
    expect(worldToTileCoordinates(map, vec2(10, 64))).toBeNull();
  });
});

describe("getMapBounds", () => {
  it("covers the tile grid at the offset", () => {
    expect(getMapBounds(map)).toEqual(rect(0, 0, 96, 64));
    expect(getMapBounds(map, vec2(10, -5))).toEqual(rect(10, -5, 96, 64));
  });
});
