/**
 * @roomkit/renderer
 *
 * Debug drawing for collision shapes, decoupled from any graphics library.
 */

// Types
export type { PrimitiveSink, DebugDrawOptions } from "./types.js";
export { COLLISION_COLORS, DEFAULT_CIRCLE_SEGMENTS, DEFAULT_LINE_THICKNESS } from "./types.js";

// Debug renderer
export { CollisionDebugDraw } from "./debug-draw.js";
