/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @luxray/export - PPM and PNG encoders
 */

export { crc32, updateCrc32 } from './crc32.js';
export { encodePpm } from './ppm-exporter.js';
export { encodePng } from './png-exporter.js';
export type { PngOptions } from './png-exporter.js';
export { writeImage, encodeImage, formatForPath } from './image-writer.js';
export { ExportError, validateImage } from './types.js';
export type { RgbImage, ImageFormat } from './types.js';
