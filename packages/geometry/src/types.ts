/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Geometry types for luxray
 */

import type { Color, Vec3 } from '@luxray/data';

/** Shape id meaning "no shape": never assigned, excludes nothing */
export const NO_SHAPE = 0;

export interface Ray {
  readonly origin: Vec3;
  /** Unit length */
  readonly direction: Vec3;
}

export interface Background {
  /** Color returned for rays that hit nothing */
  color: Color;
  /** Scalar applied to the hit color as the ambient term */
  ambience: number;
}

export interface IntersectionResult {
  isHit: boolean;
  /** Distance along the ray; Infinity when there is no hit */
  distance: number;
  position: Vec3;
  normal: Vec3;
  /** Base surface color at the hit point */
  color: Color;
  /** Id of the hit shape, NO_SHAPE until the compiled scene stamps it */
  shapeId: number;
}

export const MISS: Readonly<IntersectionResult> = Object.freeze({
  isHit: false,
  distance: Infinity,
  position: Object.freeze({ x: 0, y: 0, z: 0 }),
  normal: Object.freeze({ x: 0, y: 0, z: 0 }),
  color: Object.freeze({ r: 0, g: 0, b: 0 }),
  shapeId: NO_SHAPE,
});

/** Thrown for inputs that would produce NaN or infinite geometry */
export class GeometryError extends Error {
  constructor(
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GeometryError';
  }
}
