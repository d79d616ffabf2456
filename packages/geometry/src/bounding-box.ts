/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Axis-aligned bounding boxes
 */

import { AXES, type Vec3 } from '@luxray/data';
import { boundingExtent, type Shape } from './shapes.js';
import type { Ray } from './types.js';

export interface BoundingBox {
  min: Vec3;
  max: Vec3;
}

const PARALLEL_EPSILON = 0.0000001;

export class BoundingBoxUtils {
  /**
   * Box enclosing a shape: its extents along the three unit axes
   */
  static fromShape(shape: Shape): BoundingBox {
    const x = boundingExtent(shape, 'x');
    const y = boundingExtent(shape, 'y');
    const z = boundingExtent(shape, 'z');
    return {
      min: { x: x.min, y: y.min, z: z.min },
      max: { x: x.max, y: y.max, z: z.max },
    };
  }

  /**
   * Smallest box enclosing both
   */
  static union(a: BoundingBox, b: BoundingBox): BoundingBox {
    return {
      min: { x: Math.min(a.min.x, b.min.x), y: Math.min(a.min.y, b.min.y), z: Math.min(a.min.z, b.min.z) },
      max: { x: Math.max(a.max.x, b.max.x), y: Math.max(a.max.y, b.max.y), z: Math.max(a.max.z, b.max.z) },
    };
  }

  static empty(): BoundingBox {
    return {
      min: { x: Infinity, y: Infinity, z: Infinity },
      max: { x: -Infinity, y: -Infinity, z: -Infinity },
    };
  }

  static isEmpty(box: BoundingBox): boolean {
    return box.max.x < box.min.x || box.max.y < box.min.y || box.max.z < box.min.z;
  }

  /**
   * Every side finite (planes are not)
   */
  static isBounded(box: BoundingBox): boolean {
    return AXES.every((axis) => Number.isFinite(box.min[axis]) && Number.isFinite(box.max[axis]));
  }

  static center(box: BoundingBox): Vec3 {
    return {
      x: (box.min.x + box.max.x) / 2,
      y: (box.min.y + box.max.y) / 2,
      z: (box.min.z + box.max.z) / 2,
    };
  }

  static surfaceArea(box: BoundingBox): number {
    const dx = box.max.x - box.min.x;
    const dy = box.max.y - box.min.y;
    const dz = box.max.z - box.min.z;
    return 2 * (dx * dy + dx * dz + dy * dz);
  }

  /**
   * Slab test: does the ray cross the box in front of its origin?
   */
  static intersectsRay(box: BoundingBox, ray: Ray): boolean {
    const { origin, direction } = ray;
    let tmin = -Infinity;
    let tmax = Infinity;

    for (const axis of AXES) {
      if (Math.abs(direction[axis]) < PARALLEL_EPSILON) {
        // Ray parallel to this slab
        if (origin[axis] < box.min[axis] || origin[axis] > box.max[axis]) {
          return false;
        }
      } else {
        const invD = 1.0 / direction[axis];
        let t0 = (box.min[axis] - origin[axis]) * invD;
        let t1 = (box.max[axis] - origin[axis]) * invD;
        if (t0 > t1) {
          [t0, t1] = [t1, t0];
        }
        tmin = Math.max(tmin, t0);
        tmax = Math.min(tmax, t1);
        if (tmin > tmax) {
          return false;
        }
      }
    }

    return tmax >= 0;
  }
}
