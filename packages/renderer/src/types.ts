/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Render configuration types
 */

/** Work unit granularity: one task per raster row or per pixel */
export type Partition = 'row' | 'pixel';

/** Intersection search: scan every shape, or prune with a BVH */
export type Accelerator = 'linear' | 'bvh';

export interface RenderFeatures {
  diffuse: boolean;
  reflection: boolean;
  refraction: boolean;
  shadow: boolean;
  highlights: boolean;
}

export interface RenderConfig {
  width: number;
  height: number;
  /** Recursion bound for reflection and refraction; 0 shades direct light only */
  maxDepth: number;
  threadCount: number;
  partition: Partition;
  features: RenderFeatures;
  accelerator: Accelerator;
}

/** Fields every caller must give; the rest have defaults */
export type RenderConfigInit = Omit<RenderConfig, 'features' | 'accelerator'> & {
  features?: Partial<RenderFeatures>;
  accelerator?: Accelerator;
};

export class RenderConfigError extends Error {
  constructor(
    message: string,
    public readonly field: keyof RenderConfig
  ) {
    super(message);
    this.name = 'RenderConfigError';
  }
}
