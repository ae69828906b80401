/**
 * Core types for @roomkit/tilemap
 *
 * Maps arrive already parsed from an editor export; this package only reads
 * them. Positions are map-local pixels with Y pointing down.
 */

import type { Vector2 } from "@roomkit/collision2d";

/** Object kinds an editor can declare */
export type DeclarativeObjectKind =
  | "rectangle"
  | "ellipse"
  | "point"
  | "polygon"
  | "polyline"
  | "tile"
  | "text";

/** Custom property value attached to a map, layer or object */
export type PropertyValue = string | number | boolean;

export type Properties = Readonly<Record<string, PropertyValue>>;

/**
 * A single object placed in an object layer or attached to a tile.
 *
 * `kind` is kept as a string: exports from newer editor versions may carry
 * kinds this package does not know, and those still need a collider.
 */
export interface DeclarativeObject {
  /** Unique within its layer (or within its tile's collision list) */
  readonly id: number;
  readonly name: string;
  readonly type: string;
  readonly kind: DeclarativeObjectKind | (string & Record<never, never>);
  /** Top-left corner, relative to the layer (or tile) origin */
  readonly position: Vector2;
  readonly width: number;
  readonly height: number;
  /** Degrees, clockwise. Collision ignores it. */
  readonly rotation: number;
  /** Polygon/polyline vertices relative to `position` */
  readonly points: readonly Vector2[];
  readonly text?: string;
  readonly gid?: number;
  readonly properties: Properties;
}

export interface ObjectLayer {
  readonly name: string;
  readonly visible: boolean;
  readonly opacity: number;
  readonly offset: Vector2;
  /** Declaration order is query order */
  readonly objects: readonly DeclarativeObject[];
  readonly properties: Properties;
}

export interface TileLayer {
  readonly name: string;
  readonly visible: boolean;
  /** Width in tiles */
  readonly width: number;
  /** Height in tiles */
  readonly height: number;
  readonly offset: Vector2;
  /** Row-major global tile ids; 0 is an empty cell */
  readonly tiles: readonly number[];
}

export interface Tilemap {
  readonly name: string;
  /** Width in tiles */
  readonly width: number;
  /** Height in tiles */
  readonly height: number;
  /** Tile size in pixels */
  readonly tileWidth: number;
  readonly tileHeight: number;
  readonly tileLayers: readonly TileLayer[];
  readonly objectLayers: readonly ObjectLayer[];
  /** Collision objects declared per tile, keyed by global tile id */
  readonly tileCollisions: ReadonlyMap<number, readonly DeclarativeObject[]>;
  readonly properties: Properties;
}

/** Integer tile coordinates */
export interface TileCoordinates {
  readonly x: number;
  readonly y: number;
}

/** A per-tile collision object found under an entity */
export interface TileObjectHit {
  readonly object: DeclarativeObject;
  readonly layerName: string;
  readonly gid: number;
  readonly tile: TileCoordinates;
}
