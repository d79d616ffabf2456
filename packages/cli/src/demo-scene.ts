/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * "Marbles" demo: a row of spheres along each axis over a checkerboard wall
 */

import { ColorUtils, Vec3Utils, type Color, type Vec3 } from '@luxray/data';
import {
  createCheckerboardMaterial,
  createPlane,
  createPointLight,
  createSolidMaterial,
  createSphere,
  type CameraSetup,
  type Shape,
} from '@luxray/geometry';
import type { SceneDescription } from '@luxray/renderer';

export interface MarblesOptions {
  ambience?: number;
  fov?: number;
  sphereRadius?: number;
  /** Distance between neighbouring sphere centers */
  spacing?: number;
  /** Spheres per axis beyond the one at the origin */
  spheresPerAxis?: number;
  showPlane?: boolean;
}

export interface DemoScene {
  scene: SceneDescription;
  camera: CameraSetup;
}

export const DEMO_DEFAULTS = {
  width: 1500,
  height: 1500,
  depth: 5,
  ambience: 0.2,
  fov: 50,
} as const;

export function createMarblesScene(options: MarblesOptions = {}): DemoScene {
  const radius = options.sphereRadius ?? 2;
  const spacing = options.spacing ?? 4;
  const perAxis = options.spheresPerAxis ?? 10;

  const shapes: Shape[] = [
    ...sphereRow(Vec3Utils.UNIT_X, ColorUtils.create(0, 0, 0.9), radius, spacing, perAxis),
    ...sphereRow(Vec3Utils.UNIT_Y, ColorUtils.create(0, 0.9, 0), radius, spacing, perAxis),
    ...sphereRow(Vec3Utils.UNIT_Z, ColorUtils.create(0.9, 0, 0), radius, spacing, perAxis),
  ];

  if (options.showPlane ?? true) {
    const tiles = createCheckerboardMaterial(ColorUtils.create(0.8, 0.8, 0.8), ColorUtils.BLACK, 15, {
      reflectivity: 0.2,
      gloss: 1,
    });
    shapes.push(createPlane(Vec3Utils.UNIT_X, 1.2, tiles));
  }

  const lightColor = ColorUtils.create(0.8, 0.8, 0.8);
  return {
    scene: {
      background: { color: ColorUtils.BLACK, ambience: options.ambience ?? DEMO_DEFAULTS.ambience },
      shapes,
      lights: [
        createPointLight(Vec3Utils.create(-5, 10, 10), lightColor),
        createPointLight(Vec3Utils.create(5, 10, 10), lightColor),
      ],
    },
    camera: {
      position: Vec3Utils.create(30, 30, 70),
      lookAt: Vec3Utils.create(-0.1, 0.1, 0),
      up: Vec3Utils.UNIT_Z,
      fov: options.fov ?? DEMO_DEFAULTS.fov,
    },
  };
}

function sphereRow(axis: Vec3, color: Color, radius: number, spacing: number, count: number): Shape[] {
  const material = createSolidMaterial(color, { gloss: 2, reflectivity: 0.2 });
  const row: Shape[] = [];
  for (let i = 0; i <= count; i++) {
    row.push(createSphere(Vec3Utils.scale(axis, i * spacing), radius, material));
  }
  return row;
}
