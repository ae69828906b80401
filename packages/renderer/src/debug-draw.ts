import type { Color, DebugRenderer, Rect, Vector2 } from "@roomkit/collision2d";
import {
  DEFAULT_CIRCLE_SEGMENTS,
  DEFAULT_LINE_THICKNESS,
  type DebugDrawOptions,
  type PrimitiveSink,
} from "./types.js";

/** Fewest chords that still close a circle outline */
const MIN_CIRCLE_SEGMENTS = 3;

/**
 * Debug renderer context for collision outlines.
 *
 * Created once by the caller and passed into every draw call; holds no
 * global state. Rectangles become four filled strips along the edges,
 * circles a closed run of chords, lines go straight to the sink.
 */
export class CollisionDebugDraw implements DebugRenderer {
  private readonly lineThickness: number;
  private readonly circleSegments: number;

  constructor(
    private readonly sink: PrimitiveSink,
    options: DebugDrawOptions = {},
  ) {
    this.lineThickness = options.lineThickness ?? DEFAULT_LINE_THICKNESS;
    this.circleSegments = options.circleSegments ?? DEFAULT_CIRCLE_SEGMENTS;

    if (!(this.lineThickness > 0)) {
      throw new Error(`[CollisionDebugDraw] lineThickness must be positive. Got: ${this.lineThickness}`);
    }
    if (!Number.isInteger(this.circleSegments) || this.circleSegments < MIN_CIRCLE_SEGMENTS) {
      throw new Error(
        `[CollisionDebugDraw] circleSegments must be an integer >= ${MIN_CIRCLE_SEGMENTS}. Got: ${this.circleSegments}`,
      );
    }
  }

  drawRectangle(rect: Rect, color: Color, thickness = this.lineThickness): void {
    const { x, y, width, height } = rect;
    this.sink.fillRect(x, y, width, thickness, color);
    this.sink.fillRect(x, y + height - thickness, width, thickness, color);
    this.sink.fillRect(x, y, thickness, height, color);
    this.sink.fillRect(x + width - thickness, y, thickness, height, color);
  }

  drawCircle(center: Vector2, radius: number, color: Color, segments = this.circleSegments): void {
    const count = Math.max(MIN_CIRCLE_SEGMENTS, Math.floor(segments));
    const step = (Math.PI * 2) / count;

    let prevX = center.x + radius;
    let prevY = center.y;
    for (let i = 1; i <= count; i++) {
      // Last chord ends exactly on the start point
      const nextX = i === count ? center.x + radius : center.x + Math.cos(step * i) * radius;
      const nextY = i === count ? center.y : center.y + Math.sin(step * i) * radius;
      this.sink.strokeLine(prevX, prevY, nextX, nextY, color, this.lineThickness);
      prevX = nextX;
      prevY = nextY;
    }
  }

  drawLine(start: Vector2, end: Vector2, color: Color, thickness = this.lineThickness): void {
    this.sink.strokeLine(start.x, start.y, end.x, end.y, color, thickness);
  }
}
