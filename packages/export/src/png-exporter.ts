/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * PNG encoder: 8-bit truecolor, no interlace, filter type 0 on every row
 */

import { deflateSync } from 'node:zlib';
import { crc32, updateCrc32 } from './crc32.js';
import { validateImage, type RgbImage } from './types.js';

const PNG_SIGNATURE = Uint8Array.of(0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a);

const COLOR_TYPE_RGB = 2;
const BIT_DEPTH = 8;

export interface PngOptions {
  /** zlib level, 0-9 */
  compressionLevel?: number;
}

export function encodePng(image: RgbImage, options: PngOptions = {}): Uint8Array {
  validateImage(image);
  const { width, height, data } = image;

  const ihdr = new Uint8Array(13);
  const ihdrView = new DataView(ihdr.buffer);
  ihdrView.setUint32(0, width);
  ihdrView.setUint32(4, height);
  ihdr[8] = BIT_DEPTH;
  ihdr[9] = COLOR_TYPE_RGB;
  // compression, filter and interlace methods stay 0

  const stride = width * 3;
  const raw = new Uint8Array((stride + 1) * height);
  for (let y = 0; y < height; y++) {
    const rowStart = y * (stride + 1);
    raw[rowStart] = 0;
    raw.set(data.subarray(y * stride, (y + 1) * stride), rowStart + 1);
  }
  const idat = deflateSync(raw, { level: options.compressionLevel ?? 6 });

  const chunks = [chunk('IHDR', ihdr), chunk('IDAT', idat), chunk('IEND', new Uint8Array(0))];
  const total = PNG_SIGNATURE.byteLength + chunks.reduce((sum, c) => sum + c.byteLength, 0);

  const out = new Uint8Array(total);
  let offset = 0;
  out.set(PNG_SIGNATURE, offset);
  offset += PNG_SIGNATURE.byteLength;
  for (const c of chunks) {
    out.set(c, offset);
    offset += c.byteLength;
  }
  return out;
}

/**
 * length (4) | type (4) | payload | CRC over type + payload (4)
 */
function chunk(type: string, payload: Uint8Array): Uint8Array {
  const typeBytes = new TextEncoder().encode(type);
  const out = new Uint8Array(12 + payload.byteLength);
  const view = new DataView(out.buffer);

  view.setUint32(0, payload.byteLength);
  out.set(typeBytes, 4);
  out.set(payload, 8);
  view.setUint32(8 + payload.byteLength, updateCrc32(crc32(typeBytes), payload));
  return out;
}
