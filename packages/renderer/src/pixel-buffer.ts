/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * RGB8 frame buffer in shared memory, written under a single lock
 */

import { ColorUtils, type Color, type Rgb8 } from '@luxray/data';
import { Mutex } from './mutex.js';

export const CHANNELS = 3;

/** Shared memory behind a PixelBuffer, passed to worker threads */
export interface PixelBufferHandles {
  pixels: SharedArrayBuffer;
  lock: SharedArrayBuffer;
}

export class PixelBuffer {
  readonly data: Uint8Array;
  private readonly mutex: Mutex;
  private readonly pixels: SharedArrayBuffer;

  constructor(
    readonly width: number,
    readonly height: number,
    handles?: PixelBufferHandles
  ) {
    const byteLength = width * height * CHANNELS;
    if (handles && handles.pixels.byteLength !== byteLength) {
      throw new RangeError(`Pixel memory holds ${handles.pixels.byteLength} bytes, expected ${byteLength}`);
    }
    this.pixels = handles?.pixels ?? new SharedArrayBuffer(byteLength);
    this.mutex = new Mutex(handles?.lock);
    this.data = new Uint8Array(this.pixels);
  }

  get handles(): PixelBufferHandles {
    return { pixels: this.pixels, lock: this.mutex.buffer };
  }

  /**
   * Clamp, quantize and store one pixel
   */
  writePixel(x: number, y: number, color: Color): void {
    this.checkBounds(x, y);
    const rgb = ColorUtils.toRgb8(color);
    this.mutex.withLock(() => {
      this.data.set(rgb, this.offset(x, y));
    });
  }

  /**
   * Store a full row in one critical section
   */
  writeRow(y: number, colors: readonly Color[]): void {
    this.checkBounds(0, y);
    if (colors.length !== this.width) {
      throw new RangeError(`Row ${y} has ${colors.length} pixels, expected ${this.width}`);
    }
    const row = new Uint8Array(this.width * CHANNELS);
    colors.forEach((color, x) => row.set(ColorUtils.toRgb8(color), x * CHANNELS));
    this.mutex.withLock(() => {
      this.data.set(row, this.offset(0, y));
    });
  }

  getPixel(x: number, y: number): Rgb8 {
    this.checkBounds(x, y);
    const i = this.offset(x, y);
    return [this.data[i], this.data[i + 1], this.data[i + 2]];
  }

  private offset(x: number, y: number): number {
    return (y * this.width + x) * CHANNELS;
  }

  private checkBounds(x: number, y: number): void {
    if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= this.width || y >= this.height) {
      throw new RangeError(`Pixel (${x}, ${y}) is outside ${this.width}x${this.height}`);
    }
  }
}
