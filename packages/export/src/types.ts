/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Encoder input: packed 8-bit RGB rows, top row first
 */
export interface RgbImage {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
}

export type ImageFormat = 'ppm' | 'png';

export class ExportError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'ExportError';
  }
}

export function validateImage(image: RgbImage): void {
  const { width, height, data } = image;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new ExportError(`Image dimensions must be positive integers, got ${width}x${height}`);
  }
  if (data.length !== width * height * 3) {
    throw new ExportError(`Expected ${width * height * 3} bytes of RGB data, got ${data.length}`);
  }
}
