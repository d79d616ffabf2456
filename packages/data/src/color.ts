/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Color arithmetic. Channels are unclamped while shading; clamping happens
 * only when a color is written to an output buffer.
 */

export interface Color {
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

export type Rgb8 = [number, number, number];

function clampChannel(value: number): number {
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

export class ColorUtils {
  static readonly BLACK: Color = Object.freeze({ r: 0, g: 0, b: 0 });
  static readonly WHITE: Color = Object.freeze({ r: 1, g: 1, b: 1 });

  static create(r: number, g: number, b: number): Color {
    return { r, g, b };
  }

  static add(a: Color, b: Color): Color {
    return { r: a.r + b.r, g: a.g + b.g, b: a.b + b.b };
  }

  /** Componentwise product */
  static multiply(a: Color, b: Color): Color {
    return { r: a.r * b.r, g: a.g * b.g, b: a.b * b.b };
  }

  static scale(c: Color, s: number): Color {
    return { r: c.r * s, g: c.g * s, b: c.b * s };
  }

  /**
   * Blend toward `other`: `self * (1 - weight) + other * (1 - weight)`.
   *
   * Both terms use `1 - weight`. This is not a lerp; images rendered by
   * earlier versions of the tracer depend on it.
   */
  static blend(self: Color, other: Color, weight: number): Color {
    return ColorUtils.add(ColorUtils.scale(self, 1 - weight), ColorUtils.scale(other, 1 - weight));
  }

  static clamp(c: Color): Color {
    return { r: clampChannel(c.r), g: clampChannel(c.g), b: clampChannel(c.b) };
  }

  /**
   * Clamp to [0, 1] and quantize each channel to 0..255 (truncating)
   */
  static toRgb8(c: Color): Rgb8 {
    return [
      Math.floor(clampChannel(c.r) * 255),
      Math.floor(clampChannel(c.g) * 255),
      Math.floor(clampChannel(c.b) * 255),
    ];
  }

  static equals(a: Color, b: Color): boolean {
    return a.r === b.r && a.g === b.g && a.b === b.b;
  }
}
