import { DEFAULT_COLLISION_DRAW_COLOR, type Color } from "@roomkit/collision2d";

/**
 * Lowest-level drawing surface the debug renderer writes to.
 *
 * Anything that can fill an axis-aligned box and stroke a line qualifies:
 * a canvas 2D context wrapper, a sprite batch, or a recorder in tests.
 */
export interface PrimitiveSink {
  fillRect(x: number, y: number, width: number, height: number, color: Color): void;
  strokeLine(x1: number, y1: number, x2: number, y2: number, color: Color, thickness: number): void;
}

/** Options for a {@link CollisionDebugDraw} */
export interface DebugDrawOptions {
  /** Outline thickness in pixels when a call does not give one */
  lineThickness?: number;
  /** Chords used to approximate a circle when a call does not give a count */
  circleSegments?: number;
}

/** Default outline thickness */
export const DEFAULT_LINE_THICKNESS = 1;

/** Default number of chords per circle outline */
export const DEFAULT_CIRCLE_SEGMENTS = 32;

/** Colors for collision debug visualization */
export const COLLISION_COLORS = {
  component: DEFAULT_COLLISION_DRAW_COLOR, // red-500
  objectLayer: 0x22c55e, // green-500
  tileLayer: 0x3b82f6, // blue-500
  tileObject: 0xeab308, // yellow-500
} as const;
