/**
 * QuadTree - generic spatial partition over axis-aligned bounds.
 *
 * Each node holds up to `maxObjectsPerNode` items. On overflow it splits
 * its bounds into four equal quadrants and pushes every item into each
 * child its bounds touch, so an item straddling a split line lives in
 * several children. Queries never miss such items, but may report them
 * more than once; callers that care about multiplicity deduplicate.
 *
 * Built once per map load. Items outside the root bounds are dropped.
 *
 * @module quadtree
 */

import { distanceSquared } from "./math.js";
import { rectsIntersect } from "./rect.js";
import type { Rect, SpatialObject, Vector2 } from "./types.js";

/** Default items per node before it subdivides */
export const DEFAULT_MAX_OBJECTS_PER_NODE = 8;

/** Default maximum subdivision depth (root is depth 0) */
export const DEFAULT_MAX_DEPTH = 6;

/**
 * Configuration for a QuadTree.
 */
export interface QuadTreeOptions<T> {
  /**
   * Items a leaf holds before subdividing.
   * Advisory at max depth, where nodes accept any number of items.
   * Default: 8
   */
  maxObjectsPerNode?: number;

  /**
   * Deepest level a node may subdivide to.
   * Default: 6
   */
  maxDepth?: number;

  /**
   * Position accessor used by `queryCircle` when the caller passes none.
   */
  getPosition?: (item: T) => Vector2;
}

interface QuadTreeItem<T> {
  readonly item: T;
  readonly bounds: Rect;
}

/**
 * Spatial index node. The root is the tree.
 *
 * @typeParam T - Payload type stored in the tree
 *
 * @example
 * ```typescript
 * const tree = new QuadTree<string>(rect(0, 0, 1024, 768));
 * tree.insert("door", rect(320, 0, 64, 32));
 *
 * const hits: string[] = [];
 * tree.query(rect(300, 0, 32, 32), hits); // ["door"]
 * ```
 */
export class QuadTree<T> {
  readonly bounds: Rect;
  readonly depth: number;
  private readonly maxObjectsPerNode: number;
  private readonly maxDepth: number;
  private readonly getPosition: ((item: T) => Vector2) | undefined;
  private items: QuadTreeItem<T>[] = [];
  private children: QuadTree<T>[] | null = null;

  constructor(bounds: Rect, options: QuadTreeOptions<T> = {}, depth = 0) {
    const maxObjectsPerNode = options.maxObjectsPerNode ?? DEFAULT_MAX_OBJECTS_PER_NODE;
    const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;

    if (!Number.isInteger(maxObjectsPerNode) || maxObjectsPerNode < 1) {
      throw new Error(
        `[QuadTree] maxObjectsPerNode must be a positive integer. Got: ${maxObjectsPerNode}`,
      );
    }
    if (!Number.isInteger(maxDepth) || maxDepth < 0) {
      throw new Error(`[QuadTree] maxDepth must be a non-negative integer. Got: ${maxDepth}`);
    }

    this.bounds = bounds;
    this.depth = depth;
    this.maxObjectsPerNode = maxObjectsPerNode;
    this.maxDepth = maxDepth;
    this.getPosition = options.getPosition;
  }

  /**
   * Tree over items that carry their own bounds and position.
   * `queryCircle` defaults to each item's `position`.
   */
  static ofSpatialObjects<T extends SpatialObject>(
    bounds: Rect,
    options: Omit<QuadTreeOptions<T>, "getPosition"> = {},
  ): QuadTree<T> {
    return new QuadTree<T>(bounds, { ...options, getPosition: (item) => item.position });
  }

  /** True until this node subdivides */
  get isLeaf(): boolean {
    return this.children === null;
  }

  /**
   * Total stored entries in this subtree. Items straddling a split line
   * count once per child holding them.
   */
  get count(): number {
    let total = this.items.length;
    for (const child of this.children ?? []) {
      total += child.count;
    }
    return total;
  }

  /**
   * Insert an item with explicit bounds.
   * Items whose bounds miss this node are silently ignored.
   */
  insert(item: T, bounds: Rect): void {
    if (!rectsIntersect(this.bounds, bounds)) {
      return;
    }

    if (this.children === null && this.items.length < this.maxObjectsPerNode) {
      this.items.push({ item, bounds });
      return;
    }

    if (this.children === null && this.depth < this.maxDepth) {
      this.subdivide();
    }

    if (this.children !== null) {
      for (const child of this.children) {
        child.insert(item, bounds);
      }
    } else {
      // Max depth: capacity is advisory
      this.items.push({ item, bounds });
    }
  }

  /**
   * Insert an item using its own bounds.
   */
  insertObject(item: T & SpatialObject): void {
    this.insert(item, item.bounds);
  }

  /**
   * Append every item whose bounds touch `searchBounds`.
   * Straddling items may be appended more than once.
   */
  query(searchBounds: Rect, results: T[]): void {
    if (!rectsIntersect(this.bounds, searchBounds)) {
      return;
    }

    for (const entry of this.items) {
      if (rectsIntersect(entry.bounds, searchBounds)) {
        results.push(entry.item);
      }
    }

    for (const child of this.children ?? []) {
      child.query(searchBounds, results);
    }
  }

  /**
   * Append every item whose position lies within `radius` of `center`.
   *
   * Broad phase queries the bounding square; narrow phase compares squared
   * distances to each candidate's position.
   *
   * @throws Error if no position accessor was given here or in the options
   */
  queryCircle(
    center: Vector2,
    radius: number,
    results: T[],
    getPosition: ((item: T) => Vector2) | undefined = this.getPosition,
  ): void {
    if (!getPosition) {
      throw new Error(
        "[QuadTree] queryCircle needs a position accessor (pass one or set options.getPosition)",
      );
    }

    const extent = Math.ceil(radius);
    const candidates: T[] = [];
    this.query(
      { x: center.x - extent, y: center.y - extent, width: extent * 2, height: extent * 2 },
      candidates,
    );

    const radiusSquared = radius * radius;
    for (const candidate of candidates) {
      if (distanceSquared(center, getPosition(candidate)) <= radiusSquared) {
        results.push(candidate);
      }
    }
  }

  /**
   * Drop all items and children, returning this node to an empty leaf.
   */
  clear(): void {
    this.items = [];
    for (const child of this.children ?? []) {
      child.clear();
    }
    this.children = null;
  }

  /**
   * Split into four equal quadrants and move held items down.
   */
  private subdivide(): void {
    const { x, y } = this.bounds;
    const halfWidth = this.bounds.width / 2;
    const halfHeight = this.bounds.height / 2;
    const options: QuadTreeOptions<T> = {
      maxObjectsPerNode: this.maxObjectsPerNode,
      maxDepth: this.maxDepth,
      getPosition: this.getPosition,
    };
    const childDepth = this.depth + 1;

    const children = [
      // Top-left
      new QuadTree<T>({ x, y, width: halfWidth, height: halfHeight }, options, childDepth),
      // Top-right
      new QuadTree<T>(
        { x: x + halfWidth, y, width: halfWidth, height: halfHeight },
        options,
        childDepth,
      ),
      // Bottom-left
      new QuadTree<T>(
        { x, y: y + halfHeight, width: halfWidth, height: halfHeight },
        options,
        childDepth,
      ),
      // Bottom-right
      new QuadTree<T>(
        { x: x + halfWidth, y: y + halfHeight, width: halfWidth, height: halfHeight },
        options,
        childDepth,
      ),
    ];

    const existing = this.items;
    this.items = [];
    this.children = children;

    for (const entry of existing) {
      for (const child of children) {
        child.insert(entry.item, entry.bounds);
      }
    }
  }
}
