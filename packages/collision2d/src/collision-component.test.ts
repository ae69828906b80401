import { describe, expect, it, vi } from "vitest";
import {
  CollisionComponent,
  DEFAULT_COLLISION_DRAW_COLOR,
  checkCollision,
  type Collidable,
} from "./collision-component.js";
import { createRectangle } from "./shapes.js";
import { vec2 } from "./math.js";
import { rect } from "./rect.js";
import type { DebugRenderer } from "./types.js";

function recordingRenderer(): DebugRenderer {
  return {
    drawRectangle: vi.fn(),
    drawCircle: vi.fn(),
    drawLine: vi.fn(),
  };
}

describe("CollisionComponent", () => {
  describe("creation", () => {
    it("defaults to no debug drawing in red", () => {
      const component = new CollisionComponent(createRectangle(16, 16));
      expect(component.enableDraw).toBe(false);
      expect(component.drawColor).toBe(DEFAULT_COLLISION_DRAW_COLOR);
    });

    it("builds rectangle and circle components", () => {
      const box = CollisionComponent.rectangle(24, 32, vec2(4, 0));
      expect(box.shape).toEqual({ kind: "rectangle", width: 24, height: 32, offset: { x: 4, y: 0 } });

      const ball = CollisionComponent.circle(8, vec2(8, 8), { enableDraw: true, drawColor: 0x00ff00 });
      expect(ball.shape).toEqual({ kind: "circle", radius: 8, offset: { x: 8, y: 8 } });
      expect(ball.enableDraw).toBe(true);
      expect(ball.drawColor).toBe(0x00ff00);
    });

    it("fails fast on invalid geometry", () => {
      expect(() => CollisionComponent.circle(-1)).toThrow("[Shape]");
    });
  });

  describe("queries relative to the entity position", () => {
    const player = CollisionComponent.rectangle(32, 32);

    it("intersects another component", () => {
      const door = CollisionComponent.rectangle(64, 32);
      expect(player.intersects(vec2(340, 10), door, vec2(320, 0))).toBe(true);
      expect(player.intersects(vec2(1000, 1000), door, vec2(320, 0))).toBe(false);
    });

    it("intersects a bare shape", () => {
      expect(player.intersectsShape(vec2(0, 0), createRectangle(5, 5), vec2(32, 32))).toBe(true);
    });

    it("reports bounds", () => {
      expect(player.getBounds(vec2(5, 6))).toEqual(rect(5, 6, 32, 32));
    });

    it("tests raw rectangles and points", () => {
      expect(player.intersectsRectangle(vec2(0, 0), rect(32, 0, 10, 10))).toBe(true);
      expect(player.containsPoint(vec2(0, 0), vec2(16, 16))).toBe(true);
      expect(player.containsPoint(vec2(0, 0), vec2(33, 16))).toBe(false);
    });
  });

  describe("draw", () => {
    it("draws nothing unless enabled", () => {
      const renderer = recordingRenderer();
      CollisionComponent.rectangle(4, 4).draw(renderer, vec2(0, 0));
      expect(renderer.drawRectangle).not.toHaveBeenCalled();
    });

    it("draws with its own color when enabled", () => {
      const renderer = recordingRenderer();
      const component = CollisionComponent.rectangle(4, 4, vec2(1, 1), {
        enableDraw: true,
        drawColor: 0x123456,
      });
      component.draw(renderer, vec2(10, 10));
      expect(renderer.drawRectangle).toHaveBeenCalledWith(rect(11, 11, 4, 4), 0x123456);
    });
  });
});

describe("checkCollision", () => {
  const a: Collidable = { collision: CollisionComponent.circle(5) };
  const b: Collidable = { collision: CollisionComponent.circle(5) };
  const ghost: Collidable = { collision: null };

  it("tests entities with components", () => {
    expect(checkCollision(a, vec2(0, 0), b, vec2(10, 0))).toBe(true);
    expect(checkCollision(a, vec2(0, 0), b, vec2(11, 0))).toBe(false);
  });

  it("returns false when either entity has no component", () => {
    expect(checkCollision(ghost, vec2(0, 0), b, vec2(0, 0))).toBe(false);
    expect(checkCollision(a, vec2(0, 0), ghost, vec2(0, 0))).toBe(false);
  });
});
