import { describe, expect, it, vi } from "vitest";
import { rect, vec2, type DebugRenderer } from "@roomkit/collision2d";
import { COLLISION_COLORS } from "@roomkit/renderer";
import {
  drawObjectLayerAsCollision,
  drawTileCollisionObjects,
  drawTileLayerAsCollision,
} from "./debug.js";
import { TilemapCollision } from "./queries.js";
import {
  createObjectLayer,
  createRectObject,
  createTestMap,
  createTestObject,
  createTileLayer,
} from "./test-utils.js";

function recordingRenderer(): DebugRenderer {
  return {
    drawRectangle: vi.fn(),
    drawCircle: vi.fn(),
    drawLine: vi.fn(),
  };
}

const wall = createRectObject(1, "wall", 10, 10, 20, 20);
const rail = createTestObject(2, {
  kind: "polyline",
  position: vec2(50, 50),
  points: [vec2(0, 0), vec2(10, 0), vec2(10, 10)],
});
const lamp = createTestObject(1, { kind: "ellipse", position: vec2(8, 8), width: 16, height: 16 });

const collision = new TilemapCollision(
  createTestMap({
    width: 2,
    height: 1,
    objectLayers: [createObjectLayer("Collision", [wall, rail])],
    tileLayers: [createTileLayer("Ground", [[0, 3]])],
    tileCollisions: new Map([[3, [lamp]]]),
  }),
);

describe("debug drawing", () => {
  it("outlines object layer colliders", () => {
    const renderer = recordingRenderer();
    drawObjectLayerAsCollision(collision, renderer, "Collision", vec2(100, 0), 0xff0000);

    expect(renderer.drawRectangle).toHaveBeenCalledWith(rect(110, 10, 20, 20), 0xff0000);
    expect(vi.mocked(renderer.drawLine).mock.calls).toEqual([
      [{ x: 150, y: 50 }, { x: 160, y: 50 }, 0xff0000],
      [{ x: 160, y: 50 }, { x: 160, y: 60 }, 0xff0000],
    ]);
  });

  it("draws nothing for an unknown layer", () => {
    const renderer = recordingRenderer();
    drawObjectLayerAsCollision(collision, renderer, "Nope");
    expect(renderer.drawRectangle).not.toHaveBeenCalled();
  });

  it("outlines solid tiles in the tile layer color by default", () => {
    const renderer = recordingRenderer();
    drawTileLayerAsCollision(collision, renderer, "Ground");
    expect(vi.mocked(renderer.drawRectangle).mock.calls).toEqual([
      [rect(32, 0, 32, 32), COLLISION_COLORS.tileLayer],
    ]);
  });

  it("outlines collision objects attached to placed tiles", () => {
    const renderer = recordingRenderer();
    drawTileCollisionObjects(collision, renderer);
    // Tile (1, 0) starts at x = 32; the lamp circle is centered 16 px into it
    expect(renderer.drawCircle).toHaveBeenCalledWith({ x: 48, y: 16 }, 8, COLLISION_COLORS.tileObject);
  });
});
