/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Types for the NFF parser
 */

import type { Vec3 } from '@luxray/data';
import type { Background, CameraSetup, Light, Shape } from '@luxray/geometry';

export interface ParseOptions {
  /** Camera field of view in degrees; the file's `angle` is not applied (default 50) */
  fieldOfView?: number;
  /** Ambient intensity of the background (default 0) */
  ambience?: number;
  /** Prepend a checkerboard ground plane (default false) */
  groundPlane?: boolean;
  /** Throw on bad directives instead of warning and skipping them (default true) */
  strict?: boolean;
}

/** Uncompiled scene, ready for the scene compiler */
export interface NffScene {
  background: Background;
  shapes: Shape[];
  lights: Light[];
}

/** The `v` block as written in the file */
export interface Viewpoint {
  from: Vec3;
  at: Vec3;
  up: Vec3;
  /** Recorded but not applied */
  angle: number;
  /** Recorded but not applied */
  hither: number;
  resolution: { width: number; height: number };
}

export interface NffDocument {
  scene: NffScene;
  camera: CameraSetup;
  /** Image size requested by the viewpoint block */
  resolution: Viewpoint['resolution'];
  viewpoint: Viewpoint;
  /** Directives skipped in non-strict mode or because they are unsupported */
  skipped: number;
}

export class NffParseError extends Error {
  constructor(
    message: string,
    /** 1-based source line; 0 when the problem is the file as a whole */
    public readonly line: number,
    public readonly directive: string,
    options?: { cause?: unknown }
  ) {
    super(line > 0 ? `Line ${line} (${directive}): ${message}` : message, options);
    this.name = 'NffParseError';
  }
}
