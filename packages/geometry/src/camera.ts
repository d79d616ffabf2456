/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Pinhole camera: orthonormal view basis plus projection distance
 */

import { Vec3Utils, type Vec3 } from '@luxray/data';
import { createRay } from './ray.js';
import { GeometryError, type Ray } from './types.js';

/** Degrees to radians, at the precision earlier renders were produced with */
export const DEGREES_TO_RADIANS = 0.017453239;

export interface CameraSetup {
  position: Vec3;
  lookAt: Vec3;
  up: Vec3;
  /** Field of view in degrees */
  fov: number;
}

export class Camera {
  readonly position: Vec3;
  readonly forward: Vec3;
  readonly right: Vec3;
  readonly screenUp: Vec3;
  /** Distance of the image plane for a [-1, 1] screen */
  readonly projectionScale: number;

  constructor(readonly setup: Readonly<CameraSetup>) {
    const { position, lookAt, up, fov } = setup;

    const view = Vec3Utils.subtract(lookAt, position);
    if (Vec3Utils.magnitudeSquared(view) === 0) {
      throw new GeometryError('Camera lookAt must differ from its position', { position, lookAt });
    }
    const side = Vec3Utils.cross(view, up);
    if (Vec3Utils.magnitudeSquared(side) === 0) {
      throw new GeometryError('Camera up vector must not be parallel to the view direction', { up });
    }
    if (!(fov > 0 && fov < 180)) {
      throw new GeometryError(`Camera field of view must be in (0, 180) degrees, got ${fov}`);
    }

    this.position = position;
    this.forward = Vec3Utils.normalize(view);
    this.right = Vec3Utils.normalize(Vec3Utils.cross(this.forward, up));
    this.screenUp = Vec3Utils.normalize(Vec3Utils.cross(this.right, this.forward));

    const halfAngle = (fov * DEGREES_TO_RADIANS) / 2;
    this.projectionScale = Math.cos(halfAngle) / Math.sin(halfAngle);
  }

  /**
   * Ray through normalized device coordinates (vx, vy in [-1, 1], y up)
   */
  getRay(vx: number, vy: number): Ray {
    let dir = Vec3Utils.scale(this.forward, this.projectionScale);
    dir = Vec3Utils.addScaled(dir, this.right, vx);
    dir = Vec3Utils.addScaled(dir, this.screenUp, vy);
    return createRay(this.position, Vec3Utils.normalize(dir));
  }
}
