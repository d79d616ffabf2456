/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Renderer constants - extracted magic numbers for maintainability
 */

import type { RenderFeatures } from './types.js';

// ============================================================================
// Shading Constants
// ============================================================================

export const SHADING_CONSTANTS = {
  /** Fraction of the color kept in full shadow */
  SHADOW_FLOOR: 0.5,
  /** Weight of sqrt(occluder transparency) added on top of the floor */
  SHADOW_TRANSMISSION: 0.5,
} as const;

// ============================================================================
// Render Defaults
// ============================================================================

/** Every shading term enabled */
export const DEFAULT_FEATURES: Readonly<RenderFeatures> = Object.freeze({
  diffuse: true,
  reflection: true,
  refraction: true,
  shadow: true,
  highlights: true,
});

export const PARTITIONS = ['row', 'pixel'] as const;
export const ACCELERATORS = ['linear', 'bvh'] as const;
