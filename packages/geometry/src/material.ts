/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Surface materials: solid color and procedural checkerboard
 */

import type { Color } from '@luxray/data';

export interface SurfaceProperties {
  /** Phong exponent for highlights; 0 disables them */
  gloss: number;
  /** Mirror weight in [0, 1] */
  reflectivity: number;
  refractiveIndex: number;
  /** Transmission weight in [0, 1] */
  transparency: number;
}

export interface SolidMaterial extends SurfaceProperties {
  kind: 'solid';
  color: Color;
}

export interface CheckerboardMaterial extends SurfaceProperties {
  kind: 'checkerboard';
  evenColor: Color;
  oddColor: Color;
  /** Tile period in surface units */
  scale: number;
}

export type Material = SolidMaterial | CheckerboardMaterial;

export const MATTE: SurfaceProperties = Object.freeze({
  gloss: 0,
  reflectivity: 0,
  refractiveIndex: 0,
  transparency: 0,
});

export function createSolidMaterial(color: Color, props: Partial<SurfaceProperties> = {}): SolidMaterial {
  return { kind: 'solid', color, ...MATTE, ...props };
}

export function createCheckerboardMaterial(
  evenColor: Color,
  oddColor: Color,
  scale: number,
  props: Partial<SurfaceProperties> = {}
): CheckerboardMaterial {
  return { kind: 'checkerboard', evenColor, oddColor, scale, ...MATTE, ...props };
}

/**
 * Wrap t into [-scale/2, scale/2)
 */
export function wrapScaled(t: number, scale: number): number {
  let x = t % scale;
  if (x < -scale / 2) {
    x += scale;
  }
  if (x >= scale / 2) {
    x -= scale;
  }
  return x;
}

export function colorAt(material: Material, u: number, v: number): Color {
  switch (material.kind) {
    case 'solid':
      return material.color;
    case 'checkerboard': {
      const t = wrapScaled(u, material.scale) * wrapScaled(v, material.scale);
      return t < 0 ? material.evenColor : material.oddColor;
    }
  }
}

/**
 * Whether the color depends on (u, v)
 */
export function hasTexture(material: Material): boolean {
  return material.kind === 'checkerboard';
}
