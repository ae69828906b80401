import { describe, expect, it } from "vitest";
import { CollisionComponent, rect, vec2, type Collidable } from "@roomkit/collision2d";
import { checkTileLayerCollision, getCollisionRectangles, hasCollisionAtTile } from "./tile-layers.js";
import { createTestMap, createTileLayer } from "./test-utils.js";

const map = createTestMap({
  width: 3,
  height: 2,
  tileWidth: 16,
  tileHeight: 16,
  tileLayers: [
    createTileLayer("Solid", [
      [0, 1, 0],
      [2, 0, 0],
    ]),
    createTileLayer("Hidden", [[1, 1, 1]], { visible: false }),
  ],
});

describe("getCollisionRectangles", () => {
  it("emits one rectangle per non-empty cell, row by row", () => {
    expect(getCollisionRectangles(map, "Solid")).toEqual([rect(16, 0, 16, 16), rect(0, 16, 16, 16)]);
  });

  it("truncates the offset to whole pixels", () => {
    expect(getCollisionRectangles(map, "Solid", vec2(5.5, 0))).toEqual([
      rect(21, 0, 16, 16),
      rect(5, 16, 16, 16),
    ]);
  });

  it("ignores hidden and unknown layers", () => {
    expect(getCollisionRectangles(map, "Hidden")).toEqual([]);
    expect(getCollisionRectangles(map, "Nope")).toEqual([]);
  });
});

describe("hasCollisionAtTile", () => {
  it("reports occupied cells", () => {
    expect(hasCollisionAtTile(map, 1, 0, "Solid")).toBe(true);
    expect(hasCollisionAtTile(map, 0, 0, "Solid")).toBe(false);
  });

  it("reports nothing outside the layer or on hidden layers", () => {
    expect(hasCollisionAtTile(map, 5, 5, "Solid")).toBe(false);
    expect(hasCollisionAtTile(map, 0, 0, "Hidden")).toBe(false);
  });
});

describe("checkTileLayerCollision", () => {
  const small: Collidable = { collision: CollisionComponent.rectangle(4, 4) };

  it("hits a solid cell the entity touches", () => {
    expect(checkTileLayerCollision(small, vec2(32, 0), map, "Solid")).toBe(true);
  });

  it("misses empty cells", () => {
    expect(checkTileLayerCollision(small, vec2(40, 20), map, "Solid")).toBe(false);
  });

  it("applies the tilemap offset", () => {
    expect(checkTileLayerCollision(small, vec2(32, 0), map, "Solid", vec2(100, 0))).toBe(false);
  });

  it("never hits for an entity without a component", () => {
    expect(checkTileLayerCollision({ collision: null }, vec2(16, 0), map, "Solid")).toBe(false);
  });
});
