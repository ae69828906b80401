import { afterEach, describe, expect, it, vi } from "vitest";
import { isValidSpatialConfig, readSpatialConfig } from "./spatial-config.js";
import { DEFAULT_SPATIAL_CONFIG } from "./constants.js";

describe("readSpatialConfig", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("uses the defaults for a map without properties", () => {
    expect(readSpatialConfig("town", {})).toEqual(DEFAULT_SPATIAL_CONFIG);
  });

  it("reads typed properties", () => {
    expect(
      readSpatialConfig("town", {
        QuadTreeEnabled: false,
        MaxExitsPerNode: 4,
        MaxQuadTreeDepth: 3,
        ExitDetectionRadius: 48.5,
      }),
    ).toEqual({ quadTreeEnabled: false, maxExitsPerNode: 4, maxDepth: 3, exitDetectionRadius: 48.5 });
  });

  it("reads string-typed properties", () => {
    expect(
      readSpatialConfig("town", {
        QuadTreeEnabled: "False",
        MaxExitsPerNode: "2",
        MaxQuadTreeDepth: "0",
        ExitDetectionRadius: " 16 ",
      }),
    ).toEqual({ quadTreeEnabled: false, maxExitsPerNode: 2, maxDepth: 0, exitDetectionRadius: 16 });
  });

  it("keeps the default for invalid values and reports them", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const config = readSpatialConfig("cave", { MaxExitsPerNode: 0, QuadTreeEnabled: "yes" });

    expect(config.maxExitsPerNode).toBe(8);
    expect(config.quadTreeEnabled).toBe(true);
    expect(warn).toHaveBeenCalledWith(
      '[RoomManager] Ignoring map property MaxExitsPerNode=0 on "cave", using 8',
    );
    expect(warn).toHaveBeenCalledWith(
      '[RoomManager] Ignoring map property QuadTreeEnabled="yes" on "cave", using true',
    );
  });

  it("rejects fractional node capacities and depths", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const config = readSpatialConfig("cave", { MaxExitsPerNode: 2.5, MaxQuadTreeDepth: -1 });
    expect(config.maxExitsPerNode).toBe(8);
    expect(config.maxDepth).toBe(6);
  });
});

describe("isValidSpatialConfig", () => {
  it("accepts the defaults", () => {
    expect(isValidSpatialConfig({ ...DEFAULT_SPATIAL_CONFIG })).toBe(true);
  });

  it("applies the map property ranges", () => {
    expect(isValidSpatialConfig({ ...DEFAULT_SPATIAL_CONFIG, maxExitsPerNode: 0 })).toBe(false);
    expect(isValidSpatialConfig({ ...DEFAULT_SPATIAL_CONFIG, maxDepth: 1.5 })).toBe(false);
    expect(isValidSpatialConfig({ ...DEFAULT_SPATIAL_CONFIG, exitDetectionRadius: -1 })).toBe(false);
  });

  it("rejects missing or mistyped fields", () => {
    expect(isValidSpatialConfig(null)).toBe(false);
    expect(isValidSpatialConfig({ quadTreeEnabled: true })).toBe(false);
    expect(isValidSpatialConfig({ ...DEFAULT_SPATIAL_CONFIG, maxDepth: "3" })).toBe(false);
  });
});
