import type { Collidable, Vector2 } from "@roomkit/collision2d";
import type { DeclarativeObject } from "@roomkit/tilemap";

/**
 * How exits of one map are found.
 */
export interface SpatialConfig {
  /** Pre-filter exits through a QuadTree; otherwise scan the exit layers */
  quadTreeEnabled: boolean;
  maxExitsPerNode: number;
  maxDepth: number;
  /** Exits whose center lies farther than this from the actor are skipped */
  exitDetectionRadius: number;
}

/**
 * Anything that can walk through an exit.
 * `position` is the anchor of its collision component.
 */
export interface Actor extends Collidable {
  readonly position: Vector2;
  /** Pixels per second */
  readonly velocity: Vector2;
}

/** Request to move to another room */
export interface RoomTransition {
  readonly targetRoom: string;
  /** Exit of the target room to spawn at */
  readonly entranceExit: string;
  readonly exit: DeclarativeObject;
}

export type RoomTransitionListener = (transition: RoomTransition) => void;

/** What {@link RoomManager.saveState} persists */
export interface RoomManagerState {
  currentMapName: string | null;
  tilemapOffset: Vector2;
  exitCooldown: number;
  mapConfigs: Map<string, SpatialConfig>;
}
