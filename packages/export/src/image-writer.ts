/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Write an image to disk, choosing the encoder by file extension
 */

import { writeFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { createLogger } from '@luxray/data';
import { encodePng } from './png-exporter.js';
import { encodePpm } from './ppm-exporter.js';
import { ExportError, type ImageFormat, type RgbImage } from './types.js';

const log = createLogger('ImageWriter');

export function formatForPath(path: string): ImageFormat {
  const ext = extname(path).toLowerCase();
  switch (ext) {
    case '.png':
      return 'png';
    case '.ppm':
      return 'ppm';
    default:
      throw new ExportError(`Unsupported image extension '${ext}' (expected .png or .ppm)`, path);
  }
}

export function encodeImage(image: RgbImage, format: ImageFormat): Uint8Array {
  return format === 'png' ? encodePng(image) : encodePpm(image);
}

/**
 * Encode and write; resolves to the number of bytes written
 */
export async function writeImage(image: RgbImage, path: string): Promise<number> {
  const format = formatForPath(path);
  const bytes = encodeImage(image, format);
  try {
    await writeFile(path, bytes);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ExportError(`Failed to write ${path}: ${reason}`, path, { cause: error });
  }
  log.info(`wrote ${bytes.byteLength} bytes`, { operation: 'writeImage', data: { path, format } });
  return bytes.byteLength;
}
