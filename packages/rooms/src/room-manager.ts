import { Emitter } from "@socket.io/component-emitter";
import superjson from "superjson";
import {
  QuadTree,
  add,
  dot,
  getOrSet,
  lengthSquared,
  normalize,
  rect,
  rectCenter,
  sub,
  vec2,
  vec2Zero,
  type Rect,
  type SpatialObject,
  type Vector2,
} from "@roomkit/collision2d";
import {
  TilemapCollision,
  getMapBounds,
  getObjectLayer,
  type DeclarativeObject,
  type Tilemap,
} from "@roomkit/tilemap";
import {
  DEFAULT_ENTRANCE_EXIT,
  DEFAULT_EXIT_COOLDOWN_SECONDS,
  EXIT_DIRECTION_THRESHOLD,
  EXIT_LAYER_NAMES,
  EXIT_NAME_PREFIX,
  EXIT_OBJECT_TYPE,
  MIN_EXIT_SPEED_SQUARED,
} from "./constants.js";
import { isValidSpatialConfig, readSpatialConfig } from "./spatial-config.js";
import type {
  Actor,
  RoomManagerState,
  RoomTransition,
  RoomTransitionListener,
  SpatialConfig,
} from "./types.js";

type RoomManagerEvents = {
  transition: RoomTransitionListener;
};

/** An exit as stored in the exit QuadTree */
interface ExitEntry extends SpatialObject {
  readonly exit: DeclarativeObject;
  readonly layerName: string;
  /** Layer priority first, then declaration order */
  readonly order: number;
}

/** Everything known about the map the actor is in */
interface ActiveMap {
  readonly tilemap: Tilemap;
  readonly collision: TilemapCollision;
  readonly config: SpatialConfig;
  readonly exitTree: QuadTree<ExitEntry> | null;
}

export interface RoomManagerOptions {
  /** Seconds exits stay disabled after a transition. Default: 0.5 */
  exitCooldownSeconds?: number;
}

/**
 * Whether a declared object leads to another room: its name starts with
 * "Exit" (any case) or its `type` property is "exit".
 */
export function isExitTrigger(object: DeclarativeObject): boolean {
  if (object.name.toLowerCase().startsWith(EXIT_NAME_PREFIX)) {
    return true;
  }
  const type = object.properties["type"];
  return type !== undefined && String(type).toLowerCase() === EXIT_OBJECT_TYPE;
}

const hasExitName = (object: DeclarativeObject): boolean =>
  object.name.toLowerCase().startsWith(EXIT_NAME_PREFIX);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isVector(value: unknown): value is Vector2 {
  return isRecord(value) && typeof value["x"] === "number" && typeof value["y"] === "number";
}

/**
 * Detects actors walking into exits and turns them into room transitions.
 *
 * Exits are objects named `Exit*` in the `Exits` and `Triggers` layers.
 * An actor leaves through an exit when it overlaps it, moves toward it and
 * the cooldown from the previous transition has run out.
 *
 * @example
 * ```typescript
 * const rooms = new RoomManager();
 * rooms.onRoomTransition(({ targetRoom, entranceExit }) => loadRoom(targetRoom, entranceExit));
 * rooms.setCurrentMap("town", townMap);
 *
 * // every frame
 * rooms.update(deltaSeconds);
 * const exit = rooms.checkExitCollisions(player);
 * if (exit) rooms.triggerExitTransition(exit);
 * ```
 */
export class RoomManager {
  private readonly events = new Emitter<RoomManagerEvents, RoomManagerEvents>();
  private readonly exitCooldownSeconds: number;
  private mapConfigs = new Map<string, SpatialConfig>();
  private readonly exits = new Map<string, DeclarativeObject>();
  private active: ActiveMap | null = null;
  private currentMapName: string | null = null;
  private tilemapOffset: Vector2 = vec2Zero;
  private exitCooldown = 0;

  constructor(options: RoomManagerOptions = {}) {
    this.exitCooldownSeconds = options.exitCooldownSeconds ?? DEFAULT_EXIT_COOLDOWN_SECONDS;
    if (!(this.exitCooldownSeconds >= 0)) {
      throw new Error(
        `[RoomManager] exitCooldownSeconds must be non-negative. Got: ${this.exitCooldownSeconds}`,
      );
    }
  }

  /** Name of the current map, null before the first `setCurrentMap` */
  get mapName(): string | null {
    return this.currentMapName;
  }

  /** Seconds until exits work again */
  get cooldownRemaining(): number {
    return this.exitCooldown;
  }

  /**
   * Make a map current: read its spatial configuration, index its exits
   * and cache them by name.
   */
  setCurrentMap(mapName: string, tilemap: Tilemap, tilemapOffset: Vector2 = vec2Zero): void {
    const config = this.getSpatialConfig(mapName, tilemap);
    const entries = this.collectExits(tilemap, tilemapOffset);

    let exitTree: QuadTree<ExitEntry> | null = null;
    if (config.quadTreeEnabled) {
      exitTree = QuadTree.ofSpatialObjects<ExitEntry>(getMapBounds(tilemap, tilemapOffset), {
        maxObjectsPerNode: config.maxExitsPerNode,
        maxDepth: config.maxDepth,
      });
      for (const entry of entries) {
        exitTree.insertObject(entry);
      }
    }

    this.exits.clear();
    for (const entry of entries) {
      if (entry.exit.name !== "") {
        this.exits.set(entry.exit.name, entry.exit);
      }
    }

    this.currentMapName = mapName;
    this.tilemapOffset = tilemapOffset;
    this.active = {
      tilemap,
      // Fresh cache: layer names and object ids repeat across maps
      collision: new TilemapCollision(tilemap),
      config,
      exitTree,
    };

    console.log(
      `[RoomManager] Entered map "${mapName}" (${this.exits.size} exits, quadtree ${
        config.quadTreeEnabled ? "enabled" : "disabled"
      })`,
    );
  }

  /**
   * Spatial configuration of a map, read from its properties on first use.
   */
  getSpatialConfig(mapName: string, tilemap: Tilemap): SpatialConfig {
    return getOrSet(this.mapConfigs, mapName, () => readSpatialConfig(mapName, tilemap.properties));
  }

  /** Advance the exit cooldown */
  update(deltaSeconds: number): void {
    if (this.exitCooldown > 0) {
      this.exitCooldown = Math.max(0, this.exitCooldown - deltaSeconds);
    }
  }

  /**
   * The exit the actor is walking through, or null.
   *
   * Returns null during the cooldown, for actors without a collision
   * component, and for actors standing still or moving away from the exit.
   */
  checkExitCollisions(actor: Actor): DeclarativeObject | null {
    const active = this.active;
    const component = actor.collision;
    if (!active || !component || this.exitCooldown > 0) {
      return null;
    }

    const actorCenter = rectCenter(component.getBounds(actor.position));
    const exit = active.exitTree
      ? this.findExitNearby(active, active.exitTree, actor, actorCenter)
      : this.findExitByScan(active, actor);

    if (!exit) {
      return null;
    }
    return this.isMovingToward(active, actor, actorCenter, exit) ? exit : null;
  }

  getExitByName(exitName: string): DeclarativeObject | null {
    return this.exits.get(exitName) ?? null;
  }

  /** World-space center of a named exit, where arriving actors spawn */
  getExitSpawnPosition(exitName: string): Vector2 | null {
    const exit = this.getExitByName(exitName);
    if (!exit || !this.active) {
      return null;
    }
    return rectCenter(this.exitWorldRect(this.active.tilemap, exit, this.tilemapOffset));
  }

  /**
   * Request a transition through an exit.
   *
   * The exit must declare a `targetRoom` property; `entranceExit` defaults
   * to "default". Returns false when nothing was triggered.
   */
  triggerExitTransition(exit: DeclarativeObject): boolean {
    const targetRoom = exit.properties["targetRoom"];
    if (targetRoom === undefined || this.exitCooldown > 0) {
      return false;
    }

    const transition: RoomTransition = {
      targetRoom: String(targetRoom),
      entranceExit: String(exit.properties["entranceExit"] ?? DEFAULT_ENTRANCE_EXIT),
      exit,
    };

    this.exitCooldown = this.exitCooldownSeconds;
    console.log(
      `[RoomManager] Transition via "${exit.name}" to "${transition.targetRoom}" (entrance "${transition.entranceExit}")`,
    );
    this.events.emit("transition", transition);
    return true;
  }

  /**
   * Listen for room transitions. Returns a function that removes the listener.
   */
  onRoomTransition(listener: RoomTransitionListener): () => void {
    this.events.on("transition", listener);
    return () => {
      this.events.off("transition", listener);
    };
  }

  isExitTrigger(object: DeclarativeObject): boolean {
    return isExitTrigger(object);
  }

  /**
   * Serialize the current map name, tilemap offset, cooldown and the
   * per-map configuration cache.
   */
  saveState(): string {
    const state: RoomManagerState = {
      currentMapName: this.currentMapName,
      tilemapOffset: this.tilemapOffset,
      exitCooldown: this.exitCooldown,
      mapConfigs: new Map(this.mapConfigs),
    };
    return superjson.stringify(state);
  }

  /**
   * Restore state written by `saveState`. Fields that fail validation are
   * skipped. Exits are not rebuilt: call `setCurrentMap` with the restored
   * map afterwards.
   */
  loadState(serialized: string): void {
    const state: unknown = superjson.parse(serialized);
    if (!isRecord(state)) {
      throw new Error(`[RoomManager] Saved state must be an object. Got: ${typeof state}`);
    }

    const { currentMapName, tilemapOffset, exitCooldown, mapConfigs } = state;

    if (currentMapName === null || typeof currentMapName === "string") {
      this.currentMapName = currentMapName;
    } else {
      console.warn("[RoomManager] Ignoring saved currentMapName: not a string");
    }

    if (isVector(tilemapOffset)) {
      this.tilemapOffset = vec2(tilemapOffset.x, tilemapOffset.y);
    } else {
      console.warn("[RoomManager] Ignoring saved tilemapOffset: not a vector");
    }

    if (typeof exitCooldown === "number" && exitCooldown >= 0) {
      this.exitCooldown = exitCooldown;
    } else {
      console.warn("[RoomManager] Ignoring saved exitCooldown: not a non-negative number");
    }

    if (mapConfigs instanceof Map) {
      const restored = new Map<string, SpatialConfig>();
      for (const [name, config] of mapConfigs) {
        if (typeof name === "string" && isValidSpatialConfig(config)) {
          restored.set(name, config);
        } else {
          console.warn(`[RoomManager] Ignoring saved spatial config for ${JSON.stringify(name)}: invalid`);
        }
      }
      this.mapConfigs = restored;
    } else {
      console.warn("[RoomManager] Ignoring saved mapConfigs: not a map");
    }
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private exitWorldRect(tilemap: Tilemap, exit: DeclarativeObject, tilemapOffset: Vector2): Rect {
    const layerOffset =
      EXIT_LAYER_NAMES.map((name) => getObjectLayer(tilemap, name)).find((layer) =>
        layer?.objects.includes(exit),
      )?.offset ?? vec2Zero;
    const corner = add(add(tilemapOffset, layerOffset), exit.position);
    return rect(corner.x, corner.y, exit.width, exit.height);
  }

  private collectExits(tilemap: Tilemap, tilemapOffset: Vector2): ExitEntry[] {
    const entries: ExitEntry[] = [];
    for (const layerName of EXIT_LAYER_NAMES) {
      const layer = getObjectLayer(tilemap, layerName);
      if (!layer) continue;

      for (const exit of layer.objects) {
        if (!hasExitName(exit)) continue;

        const corner = add(add(tilemapOffset, layer.offset), exit.position);
        const bounds = rect(Math.trunc(corner.x), Math.trunc(corner.y), exit.width, exit.height);
        entries.push({
          exit,
          layerName,
          order: entries.length,
          bounds,
          position: rectCenter(rect(corner.x, corner.y, exit.width, exit.height)),
        });
      }
    }
    return entries;
  }

  private findExitNearby(
    active: ActiveMap,
    exitTree: QuadTree<ExitEntry>,
    actor: Actor,
    actorCenter: Vector2,
  ): DeclarativeObject | null {
    const nearby: ExitEntry[] = [];
    exitTree.queryCircle(actorCenter, active.config.exitDetectionRadius, nearby);

    for (const entry of [...new Set(nearby)].sort((a, b) => a.order - b.order)) {
      const hit = active.collision.getFirstCollidingObject(
        actor,
        actor.position,
        entry.layerName,
        entry.exit.name,
        this.tilemapOffset,
      );
      if (hit) {
        return hit;
      }
    }
    return null;
  }

  private findExitByScan(active: ActiveMap, actor: Actor): DeclarativeObject | null {
    const [exitsLayer, triggersLayer] = EXIT_LAYER_NAMES;

    const exit = active.collision.getFirstCollidingObject(
      actor,
      actor.position,
      exitsLayer,
      undefined,
      this.tilemapOffset,
    );
    if (exit) {
      return exit;
    }

    return (
      active.collision
        .getAllCollidingObjects(actor, actor.position, triggersLayer, undefined, this.tilemapOffset)
        .find(hasExitName) ?? null
    );
  }

  private isMovingToward(
    active: ActiveMap,
    actor: Actor,
    actorCenter: Vector2,
    exit: DeclarativeObject,
  ): boolean {
    if (lengthSquared(actor.velocity) < MIN_EXIT_SPEED_SQUARED) {
      return false;
    }
    const exitCenter = rectCenter(this.exitWorldRect(active.tilemap, exit, this.tilemapOffset));
    const heading = dot(normalize(actor.velocity), normalize(sub(exitCenter, actorCenter)));
    return heading > EXIT_DIRECTION_THRESHOLD;
  }
}
