import type { Properties, PropertyValue } from "@roomkit/tilemap";
import { DEFAULT_SPATIAL_CONFIG } from "./constants.js";
import type { SpatialConfig } from "./types.js";

function readBoolean(value: PropertyValue): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (normalized === "true") return true;
    if (normalized === "false") return false;
  }
  return undefined;
}

function readNumber(value: PropertyValue): number | undefined {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Read one property, keeping `fallback` when it is missing or invalid.
 */
function readProperty<T>(
  mapName: string,
  properties: Properties,
  key: string,
  parse: (value: PropertyValue) => T | undefined,
  fallback: T,
): T {
  const raw = properties[key];
  if (raw === undefined) {
    return fallback;
  }
  const parsed = parse(raw);
  if (parsed === undefined) {
    console.warn(
      `[RoomManager] Ignoring map property ${key}=${JSON.stringify(raw)} on "${mapName}", using ${String(fallback)}`,
    );
    return fallback;
  }
  return parsed;
}

const positiveInteger = (value: PropertyValue): number | undefined => {
  const n = readNumber(value);
  return n !== undefined && Number.isInteger(n) && n >= 1 ? n : undefined;
};

const nonNegativeInteger = (value: PropertyValue): number | undefined => {
  const n = readNumber(value);
  return n !== undefined && Number.isInteger(n) && n >= 0 ? n : undefined;
};

const nonNegativeNumber = (value: PropertyValue): number | undefined => {
  const n = readNumber(value);
  return n !== undefined && n >= 0 ? n : undefined;
};

/**
 * Spatial configuration declared by a map's custom properties, merged over
 * {@link DEFAULT_SPATIAL_CONFIG}.
 */
export function readSpatialConfig(mapName: string, properties: Properties): SpatialConfig {
  return {
    quadTreeEnabled: readProperty(
      mapName,
      properties,
      "QuadTreeEnabled",
      readBoolean,
      DEFAULT_SPATIAL_CONFIG.quadTreeEnabled,
    ),
    maxExitsPerNode: readProperty(
      mapName,
      properties,
      "MaxExitsPerNode",
      positiveInteger,
      DEFAULT_SPATIAL_CONFIG.maxExitsPerNode,
    ),
    maxDepth: readProperty(
      mapName,
      properties,
      "MaxQuadTreeDepth",
      nonNegativeInteger,
      DEFAULT_SPATIAL_CONFIG.maxDepth,
    ),
    exitDetectionRadius: readProperty(
      mapName,
      properties,
      "ExitDetectionRadius",
      nonNegativeNumber,
      DEFAULT_SPATIAL_CONFIG.exitDetectionRadius,
    ),
  };
}

/**
 * Whether a restored value is a complete spatial configuration within the
 * ranges `readSpatialConfig` accepts.
 */
export function isValidSpatialConfig(value: unknown): value is SpatialConfig {
  if (
    typeof value !== "object" ||
    value === null ||
    !("quadTreeEnabled" in value) ||
    !("maxExitsPerNode" in value) ||
    !("maxDepth" in value) ||
    !("exitDetectionRadius" in value)
  ) {
    return false;
  }
  const { quadTreeEnabled, maxExitsPerNode, maxDepth, exitDetectionRadius } = value;
  return (
    typeof quadTreeEnabled === "boolean" &&
    typeof maxExitsPerNode === "number" &&
    positiveInteger(maxExitsPerNode) !== undefined &&
    typeof maxDepth === "number" &&
    nonNegativeInteger(maxDepth) !== undefined &&
    typeof exitDetectionRadius === "number" &&
    nonNegativeNumber(exitDetectionRadius) !== undefined
  );
}
