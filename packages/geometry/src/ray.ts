/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { Vec3Utils, type Vec3 } from '@luxray/data';
import type { Ray } from './types.js';

/**
 * Create a ray. `direction` must already be unit length.
 */
export function createRay(origin: Vec3, direction: Vec3): Ray {
  return Object.freeze({ origin, direction });
}

/**
 * Point at `distance` along the ray
 */
export function pointAt(ray: Ray, distance: number): Vec3 {
  return Vec3Utils.addScaled(ray.origin, ray.direction, distance);
}
