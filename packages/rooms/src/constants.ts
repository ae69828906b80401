/**
 * Default configuration constants for room management
 */

import type { SpatialConfig } from "./types.js";

/**
 * Seconds after a transition during which exits are ignored.
 * Keeps an actor spawned on an exit from bouncing straight back.
 */
export const DEFAULT_EXIT_COOLDOWN_SECONDS = 0.5;

/** Object layers searched for exits, in priority order */
export const EXIT_LAYER_NAMES = ["Exits", "Triggers"] as const;

/** Objects whose name starts with this (any case) are exits */
export const EXIT_NAME_PREFIX = "exit";

/** Value of the `type` property that marks any object as an exit */
export const EXIT_OBJECT_TYPE = "exit";

/** Entrance used when an exit does not name one */
export const DEFAULT_ENTRANCE_EXIT = "default";

/** Actors slower than this (squared, pixels per second) cannot leave a room */
export const MIN_EXIT_SPEED_SQUARED = 0.1;

/**
 * Minimum cosine between the actor's velocity and the direction to the exit.
 * 0.5 allows heading within 60 degrees of the exit.
 */
export const EXIT_DIRECTION_THRESHOLD = 0.5;

/**
 * Spatial configuration used for maps that declare none.
 * Overridden per map by the `QuadTreeEnabled`, `MaxExitsPerNode`,
 * `MaxQuadTreeDepth` and `ExitDetectionRadius` map properties.
 */
export const DEFAULT_SPATIAL_CONFIG: Readonly<SpatialConfig> = {
  quadTreeEnabled: true,
  maxExitsPerNode: 8,
  maxDepth: 6,
  exitDetectionRadius: 32,
};
