/**
 * Vector math utilities for 2D collision.
 *
 * All functions are pure - they return new values without mutating inputs.
 */

import type { Vector2 } from "./types.js";

// =============================================================================
// Vector Construction
// =============================================================================

/**
 * Create a new Vector2.
 */
export const vec2 = (x: number, y: number): Vector2 => ({ x, y });

/** Zero vector (0, 0) */
export const vec2Zero: Vector2 = { x: 0, y: 0 };

// =============================================================================
// Vector Operations
// =============================================================================

/**
 * Add two vectors.
 */
export const add = (a: Vector2, b: Vector2): Vector2 => ({
  x: a.x + b.x,
  y: a.y + b.y,
});

/**
 * Subtract vector b from vector a.
 */
export const sub = (a: Vector2, b: Vector2): Vector2 => ({
  x: a.x - b.x,
  y: a.y - b.y,
});

/**
 * Scale a vector by a scalar.
 */
export const scale = (v: Vector2, s: number): Vector2 => ({
  x: v.x * s,
  y: v.y * s,
});

/**
 * Dot product of two vectors.
 */
export const dot = (a: Vector2, b: Vector2): number => a.x * b.x + a.y * b.y;

/**
 * Squared magnitude. Prefer this over `magnitude` for comparisons.
 */
export const lengthSquared = (v: Vector2): number => v.x * v.x + v.y * v.y;

/**
 * Magnitude (length) of a vector.
 */
export const magnitude = (v: Vector2): number => Math.sqrt(lengthSquared(v));

/**
 * Normalize a vector to unit length.
 * Returns zero vector if input has zero length.
 */
export const normalize = (v: Vector2): Vector2 => {
  const mag = magnitude(v);
  return mag > 0 ? scale(v, 1 / mag) : vec2Zero;
};

/**
 * Squared distance between two points.
 */
export const distanceSquared = (a: Vector2, b: Vector2): number => {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return dx * dx + dy * dy;
};

/**
 * Distance between two points.
 */
export const distance = (a: Vector2, b: Vector2): number => Math.sqrt(distanceSquared(a, b));

// =============================================================================
// Scalars
// =============================================================================

/**
 * Clamp a value into [min, max].
 */
export const clamp = (value: number, min: number, max: number): number =>
  Math.max(min, Math.min(max, value));
