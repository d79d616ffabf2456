/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { Axis, Vec3 } from '@luxray/data';
import { BoundingBoxUtils, type BoundingBox, type Ray } from '@luxray/geometry';

/**
 * Anything with an id and a precomputed box, e.g. a compiled shape
 */
export interface BoundedItem {
  id: number;
  bounds: BoundingBox;
}

export interface BVHNode {
  bounds: BoundingBox;
  ids: number[];
  left?: BVHNode;
  right?: BVHNode;
  isLeaf: boolean;
}

export interface BVHOptions {
  maxItemsPerLeaf?: number;
}

interface Entry {
  id: number;
  bounds: BoundingBox;
  center: Vec3;
}

/**
 * Bounding volume hierarchy over item boxes. Items with an infinite side
 * (planes) cannot be enclosed and are returned for every ray.
 */
export class BVH {
  private root: BVHNode | null = null;
  private unbounded: number[] = [];
  private readonly maxItemsPerLeaf: number;

  constructor(options: BVHOptions = {}) {
    this.maxItemsPerLeaf = options.maxItemsPerLeaf ?? 8;
  }

  static fromItems(items: readonly BoundedItem[], options?: BVHOptions): BVH {
    const bvh = new BVH(options);
    bvh.build(items);
    return bvh;
  }

  /**
   * Build the tree from items
   */
  build(items: readonly BoundedItem[]): void {
    const entries: Entry[] = [];
    this.unbounded = [];

    for (const item of items) {
      if (BoundingBoxUtils.isBounded(item.bounds)) {
        entries.push({ id: item.id, bounds: item.bounds, center: BoundingBoxUtils.center(item.bounds) });
      } else {
        this.unbounded.push(item.id);
      }
    }

    this.root = entries.length === 0 ? null : this.buildNode(entries);
  }

  get nodeCount(): number {
    return this.root ? this.countNodes(this.root) : 0;
  }

  /**
   * Ids of items whose boxes the ray may cross, ascending
   */
  getCandidates(ray: Ray): number[] {
    const result = [...this.unbounded];
    if (this.root) {
      this.traverseRay(this.root, ray, result);
    }
    return result.sort((a, b) => a - b);
  }

  /**
   * Build a BVH node recursively
   */
  private buildNode(entries: Entry[]): BVHNode {
    const bounds = entries.reduce((box, entry) => BoundingBoxUtils.union(box, entry.bounds), BoundingBoxUtils.empty());

    // Leaf node if few enough items
    if (entries.length <= this.maxItemsPerLeaf) {
      return {
        bounds,
        ids: entries.map((entry) => entry.id),
        isLeaf: true,
      };
    }

    // Split at the median along the longest axis
    const axis = this.getLongestAxis(bounds);
    const sorted = [...entries].sort((a, b) => a.center[axis] - b.center[axis]);

    const mid = Math.floor(sorted.length / 2);
    return {
      bounds,
      ids: [],
      left: this.buildNode(sorted.slice(0, mid)),
      right: this.buildNode(sorted.slice(mid)),
      isLeaf: false,
    };
  }

  /**
   * Traverse BVH and collect items whose boxes the ray crosses
   */
  private traverseRay(node: BVHNode, ray: Ray, result: number[]): void {
    if (!BoundingBoxUtils.intersectsRay(node.bounds, ray)) {
      return;
    }

    if (node.isLeaf) {
      for (const id of node.ids) {
        result.push(id);
      }
      return;
    }

    if (node.left) {
      this.traverseRay(node.left, ray, result);
    }
    if (node.right) {
      this.traverseRay(node.right, ray, result);
    }
  }

  private countNodes(node: BVHNode): number {
    let count = 1;
    if (node.left) count += this.countNodes(node.left);
    if (node.right) count += this.countNodes(node.right);
    return count;
  }

  private getLongestAxis(bounds: BoundingBox): Axis {
    const dx = bounds.max.x - bounds.min.x;
    const dy = bounds.max.y - bounds.min.y;
    const dz = bounds.max.z - bounds.min.z;

    if (dx > dy && dx > dz) return 'x';
    if (dy > dz) return 'y';
    return 'z';
  }
}
