import { describe, expect, it, vi } from "vitest";
import { CollisionComponent, rect, vec2 } from "@roomkit/collision2d";
import { CollisionDebugDraw } from "./debug-draw.js";
import { COLLISION_COLORS, DEFAULT_CIRCLE_SEGMENTS, type PrimitiveSink } from "./types.js";

function recordingSink() {
  return {
    fillRect: vi.fn<Parameters<PrimitiveSink["fillRect"]>, void>(),
    strokeLine: vi.fn<Parameters<PrimitiveSink["strokeLine"]>, void>(),
  };
}

describe("CollisionDebugDraw", () => {
  describe("creation", () => {
    it("rejects a non-positive thickness", () => {
      expect(() => new CollisionDebugDraw(recordingSink(), { lineThickness: 0 })).toThrow(
        "[CollisionDebugDraw] lineThickness must be positive. Got: 0",
      );
    });

    it("rejects too few circle segments", () => {
      expect(() => new CollisionDebugDraw(recordingSink(), { circleSegments: 2 })).toThrow(
        "[CollisionDebugDraw] circleSegments must be an integer >= 3. Got: 2",
      );
    });
  });

  describe("drawRectangle", () => {
    it("outlines a rectangle with four edge strips", () => {
      const sink = recordingSink();
      new CollisionDebugDraw(sink).drawRectangle(rect(10, 20, 30, 40), 0xff0000);

      expect(sink.fillRect.mock.calls).toEqual([
        [10, 20, 30, 1, 0xff0000],
        [10, 59, 30, 1, 0xff0000],
        [10, 20, 1, 40, 0xff0000],
        [39, 20, 1, 40, 0xff0000],
      ]);
    });

    it("uses the per-call thickness", () => {
      const sink = recordingSink();
      new CollisionDebugDraw(sink).drawRectangle(rect(0, 0, 10, 10), 0, 2);

      expect(sink.fillRect.mock.calls[1]).toEqual([0, 8, 10, 2, 0]);
      expect(sink.fillRect.mock.calls[3]).toEqual([8, 0, 2, 10, 0]);
    });
  });

  describe("drawCircle", () => {
    it("draws the default number of chords", () => {
      const sink = recordingSink();
      new CollisionDebugDraw(sink).drawCircle(vec2(0, 0), 5, 0x00ff00);
      expect(sink.strokeLine).toHaveBeenCalledTimes(DEFAULT_CIRCLE_SEGMENTS);
    });

    it("walks the circle and closes on its start point", () => {
      const sink = recordingSink();
      new CollisionDebugDraw(sink).drawCircle(vec2(100, 50), 10, 0x00ff00, 4);

      const calls = sink.strokeLine.mock.calls;
      expect(calls).toHaveLength(4);

      const [x1, y1, x2, y2, color, thickness] = calls[0] ?? [];
      expect(x1).toBe(110);
      expect(y1).toBe(50);
      expect(x2).toBeCloseTo(100);
      expect(y2).toBeCloseTo(60);
      expect(color).toBe(0x00ff00);
      expect(thickness).toBe(1);

      const last = calls[3] ?? [];
      expect(last[0]).toBeCloseTo(100);
      expect(last[1]).toBeCloseTo(40);
      expect(last[2]).toBe(110);
      expect(last[3]).toBe(50);
    });

    it("never draws fewer than three chords", () => {
      const sink = recordingSink();
      new CollisionDebugDraw(sink).drawCircle(vec2(0, 0), 5, 0, 1);
      expect(sink.strokeLine).toHaveBeenCalledTimes(3);
    });
  });

  describe("drawLine", () => {
    it("delegates to the sink", () => {
      const sink = recordingSink();
      const draw = new CollisionDebugDraw(sink, { lineThickness: 2 });

      draw.drawLine(vec2(1, 2), vec2(3, 4), 0x123456);
      draw.drawLine(vec2(1, 2), vec2(3, 4), 0x123456, 5);

      expect(sink.strokeLine.mock.calls).toEqual([
        [1, 2, 3, 4, 0x123456, 2],
        [1, 2, 3, 4, 0x123456, 5],
      ]);
    });
  });

  it("renders an enabled collision component in the component color by default", () => {
    const sink = recordingSink();
    const component = CollisionComponent.rectangle(8, 8, vec2(0, 0), { enableDraw: true });

    component.draw(new CollisionDebugDraw(sink), vec2(4, 4));

    expect(sink.fillRect.mock.calls[0]).toEqual([4, 4, 8, 1, COLLISION_COLORS.component]);
    expect(sink.fillRect).toHaveBeenCalledTimes(4);
  });
});
