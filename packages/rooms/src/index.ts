/**
 * @roomkit/rooms
 *
 * Exit detection and room transitions on top of @roomkit/tilemap.
 */

// Types
export type {
  SpatialConfig,
  Actor,
  RoomTransition,
  RoomTransitionListener,
  RoomManagerState,
} from "./types.js";

// Constants
export {
  DEFAULT_EXIT_COOLDOWN_SECONDS,
  DEFAULT_ENTRANCE_EXIT,
  DEFAULT_SPATIAL_CONFIG,
  EXIT_DIRECTION_THRESHOLD,
  EXIT_LAYER_NAMES,
  EXIT_NAME_PREFIX,
  EXIT_OBJECT_TYPE,
  MIN_EXIT_SPEED_SQUARED,
} from "./constants.js";

// Room manager
export { RoomManager, isExitTrigger, type RoomManagerOptions } from "./room-manager.js";
export { isValidSpatialConfig, readSpatialConfig } from "./spatial-config.js";
