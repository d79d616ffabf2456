/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { renderDemo, renderSceneFile, toRenderConfig, type RenderCommandOptions } from './commands.js';

function options(overrides: Partial<RenderCommandOptions> = {}): RenderCommandOptions {
  return {
    output: 'unused.ppm',
    threads: 2,
    partition: 'row',
    accelerator: 'linear',
    lenient: false,
    inline: true,
    diffuse: true,
    reflection: true,
    refraction: true,
    shadow: true,
    highlights: true,
    ...overrides,
  };
}

const SCENE = ['v', 'from 0 -6 2', 'at 0 0 0', 'up 0 0 1', 'angle 40', 'hither 1', 'resolution 4 3', 'b 0 0 0.3', 'l 2 -4 6', 'f 1 0 0 1 0 0 0 1', 's 0 0 0 1'].join('\n');

describe('toRenderConfig', () => {
  it('maps CLI flags onto a render config', () => {
    const config = toRenderConfig(options({ depth: 2, shadow: false, partition: 'pixel' }), 16, 9);
    expect(config).toEqual({
      width: 16,
      height: 9,
      maxDepth: 2,
      threadCount: 2,
      partition: 'pixel',
      accelerator: 'linear',
      features: { diffuse: true, reflection: true, refraction: true, shadow: false, highlights: true },
    });
  });

  it('defaults the depth to 5', () => {
    expect(toRenderConfig(options(), 1, 1).maxDepth).toBe(5);
  });
});

describe('render commands', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'luxray-cli-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('renders an NFF file at its own resolution', async () => {
    const scenePath = join(dir, 'ball.nff');
    const output = join(dir, 'ball.ppm');
    await writeFile(scenePath, SCENE);

    const summary = await renderSceneFile(scenePath, options({ output }));

    expect(summary).toMatchObject({ width: 4, height: 3, shapes: 1, lights: 1, bytes: 47 });
    const bytes = await readFile(output);
    expect(bytes.subarray(0, 11).toString('latin1')).toBe('P6\n4 3\n255\n');
  });

  it('lets the width and height be overridden', async () => {
    const scenePath = join(dir, 'ball.nff');
    await writeFile(scenePath, SCENE);

    const summary = await renderSceneFile(scenePath, options({ output: join(dir, 'ball.png'), width: 6, height: 2 }));
    expect(summary).toMatchObject({ width: 6, height: 2 });
  });

  it('renders the demo scene', async () => {
    const output = join(dir, 'marbles.ppm');
    const summary = await renderDemo(options({ output, width: 8, height: 6, depth: 1, accelerator: 'bvh' }));

    expect(summary).toMatchObject({ width: 8, height: 6, shapes: 34, lights: 2, bytes: 11 + 8 * 6 * 3 });
  });
});
