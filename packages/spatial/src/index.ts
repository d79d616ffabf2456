/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @luxray/spatial - Spatial indexing
 */

export { BVH } from './bvh.js';
export type { BVHNode, BVHOptions, BoundedItem } from './bvh.js';

import type { Ray } from '@luxray/geometry';

/**
 * Candidate lookup used by the ray tracer's intersection search
 */
export interface SpatialIndex {
    /**
     * Ids of items the ray may hit, ascending
     */
    getCandidates(ray: Ray): number[];
}
