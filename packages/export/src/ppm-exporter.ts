/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Binary PPM (P6) encoder
 */

import { validateImage, type RgbImage } from './types.js';

export function encodePpm(image: RgbImage): Uint8Array {
  validateImage(image);
  const header = new TextEncoder().encode(`P6\n${image.width} ${image.height}\n255\n`);
  const out = new Uint8Array(header.byteLength + image.data.byteLength);
  out.set(header, 0);
  out.set(image.data, header.byteLength);
  return out;
}
