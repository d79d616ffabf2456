/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { formatForPath, writeImage } from './image-writer.js';
import { ExportError } from './types.js';

const image = { width: 1, height: 1, data: Uint8Array.of(1, 2, 3) };

describe('formatForPath', () => {
  it('picks the encoder by extension', () => {
    expect(formatForPath('out/frame.png')).toBe('png');
    expect(formatForPath('FRAME.PPM')).toBe('ppm');
  });

  it('rejects other extensions', () => {
    expect(() => formatForPath('frame.jpg')).toThrow("Unsupported image extension '.jpg' (expected .png or .ppm)");
  });
});

describe('writeImage', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'luxray-export-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes a PPM file', async () => {
    const path = join(dir, 'frame.ppm');
    const written = await writeImage(image, path);

    const bytes = await readFile(path);
    expect(written).toBe(bytes.byteLength);
    expect(bytes.toString('latin1')).toBe('P6\n1 1\n255\n\x01\x02\x03');
  });

  it('writes a PNG file', async () => {
    const path = join(dir, 'frame.png');
    await writeImage(image, path);

    const bytes = await readFile(path);
    expect(bytes.subarray(1, 4).toString('latin1')).toBe('PNG');
  });

  it('wraps write failures', async () => {
    const path = join(dir, 'missing', 'frame.ppm');
    await expect(writeImage(image, path)).rejects.toBeInstanceOf(ExportError);
  });
});
