/**
 * Ellipses whose width and height differ by at most this many pixels
 * collide as circles.
 */
export const DEFAULT_CIRCLE_TOLERANCE = 1;

/** Radius given to point objects so they can still be hit */
export const POINT_RADIUS = 1;

/** Cache scope prefix for collision objects attached to tiles */
export const TILE_SCOPE_PREFIX = "tile:";

/** Cache scope of the collision objects declared for a global tile id */
export function tileScope(gid: number): string {
  return `${TILE_SCOPE_PREFIX}${gid}`;
}

/** Cache scope of a layer or tile scope within one map */
export function mapScope(mapName: string, scope: string): string {
  return `${mapName}/${scope}`;
}
