/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { ColorUtils, Vec3Utils } from '@luxray/data';
import {
  createCheckerboardMaterial,
  createPlane,
  createPointLight,
  createSolidMaterial,
  createSphere,
  createTriangle,
  type CameraSetup,
  type Shape,
} from '@luxray/geometry';
import { createRenderConfig } from './render-config.js';
import { RenderCancelledError, renderFrame, type RenderProgress } from './render-frame.js';
import { partitionFrame } from './render-task.js';
import { compileScene, type CompiledScene } from './scene.js';
import { RenderConfigError, type RenderConfig } from './types.js';

function buildScene(): CompiledScene {
  const shapes: Shape[] = [
    createPlane(
      Vec3Utils.create(0, 0, 1),
      1,
      createCheckerboardMaterial(ColorUtils.create(0.8, 0.8, 0.8), ColorUtils.BLACK, 2, { reflectivity: 0.2, gloss: 1 })
    ),
    createTriangle(
      Vec3Utils.create(-3, -3, -0.5),
      Vec3Utils.create(3, -3, -0.5),
      Vec3Utils.create(0, 3, -0.5),
      createSolidMaterial(ColorUtils.create(0.2, 0.6, 0.2)),
      createSolidMaterial(ColorUtils.create(0.6, 0.2, 0.2))
    ),
  ];
  for (let i = 0; i < 12; i++) {
    shapes.push(
      createSphere(
        Vec3Utils.create((i % 4) * 1.5 - 2.25, Math.floor(i / 4) * 1.5 - 1.5, 0.5),
        0.6,
        createSolidMaterial(ColorUtils.create(0.2 + i * 0.05, 0.3, 0.9 - i * 0.05), {
          gloss: i % 3,
          reflectivity: i % 2 === 0 ? 0.3 : 0,
          transparency: i % 5 === 0 ? 0.4 : 0,
          refractiveIndex: 1.1,
        })
      )
    );
  }
  return compileScene({
    background: { color: ColorUtils.create(0.05, 0.05, 0.1), ambience: 0.2 },
    shapes,
    lights: [
      createPointLight(Vec3Utils.create(-5, 10, 10), ColorUtils.create(0.8, 0.8, 0.8)),
      createPointLight(Vec3Utils.create(5, 10, 10), ColorUtils.create(0.8, 0.8, 0.8)),
    ],
  });
}

const camera: CameraSetup = {
  position: Vec3Utils.create(0, -8, 6),
  lookAt: Vec3Utils.create(0, 0, 0),
  up: Vec3Utils.create(0, 0, 1),
  fov: 50,
};

function configFor(overrides: Partial<RenderConfig> = {}): RenderConfig {
  return { ...createRenderConfig({ width: 24, height: 16, maxDepth: 3, threadCount: 3, partition: 'row' }), ...overrides };
}

describe('partitionFrame', () => {
  it('makes one task per row or per pixel', () => {
    expect(partitionFrame({ width: 3, height: 2, partition: 'row' })).toEqual([
      { kind: 'row', y: 0 },
      { kind: 'row', y: 1 },
    ]);
    expect(partitionFrame({ width: 2, height: 1, partition: 'pixel' })).toEqual([
      { kind: 'pixel', x: 0, y: 0 },
      { kind: 'pixel', x: 1, y: 0 },
    ]);
  });
});

describe('renderFrame', () => {
  const scene = buildScene();

  it('fills the whole frame', async () => {
    const buffer = await renderFrame(scene, camera, configFor(), { inline: true });
    expect(buffer.width).toBe(24);
    expect(buffer.height).toBe(16);
    // The view is centered on the spheres, so the middle pixel is not background
    expect(buffer.getPixel(12, 8)).not.toEqual(ColorUtils.toRgb8(scene.background.color));
  });

  it('produces identical buffers for row and pixel partitioning', async () => {
    const byRow = await renderFrame(scene, camera, configFor({ partition: 'row' }), { inline: true });
    const byPixel = await renderFrame(scene, camera, configFor({ partition: 'pixel', threadCount: 4 }), { inline: true });
    expect(Array.from(byPixel.data)).toEqual(Array.from(byRow.data));
  });

  it('produces identical buffers with the BVH and the linear scan', async () => {
    const linear = await renderFrame(scene, camera, configFor({ accelerator: 'linear' }), { inline: true });
    const bvh = await renderFrame(scene, camera, configFor({ accelerator: 'bvh' }), { inline: true });
    expect(Array.from(bvh.data)).toEqual(Array.from(linear.data));
  });

  it('renders the same image on worker threads for both partitions', async () => {
    const inline = await renderFrame(scene, camera, configFor(), { inline: true });
    const byRow = await renderFrame(scene, camera, configFor({ partition: 'row', threadCount: 2 }));
    const byPixel = await renderFrame(scene, camera, configFor({ partition: 'pixel', threadCount: 2 }));

    expect(Array.from(byRow.data)).toEqual(Array.from(inline.data));
    expect(Array.from(byPixel.data)).toEqual(Array.from(inline.data));
  }, 60000);

  it('reports progress per task', async () => {
    const seen: RenderProgress[] = [];
    await renderFrame(scene, camera, configFor({ height: 4, threadCount: 1 }), {
      inline: true,
      onProgress: (progress) => seen.push(progress),
    });
    expect(seen).toEqual([
      { completed: 1, total: 4 },
      { completed: 2, total: 4 },
      { completed: 3, total: 4 },
      { completed: 4, total: 4 },
    ]);
  });

  it('validates the config before rendering', async () => {
    await expect(renderFrame(scene, camera, configFor({ width: 0 }), { inline: true })).rejects.toBeInstanceOf(
      RenderConfigError
    );
  });

  it('rejects with RenderCancelledError when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(
      renderFrame(scene, camera, configFor(), { inline: true, signal: controller.signal })
    ).rejects.toBeInstanceOf(RenderCancelledError);
  });

  it('stops between tasks when aborted mid-frame', async () => {
    const controller = new AbortController();
    const error = await renderFrame(scene, camera, configFor({ threadCount: 1 }), {
      inline: true,
      signal: controller.signal,
      onProgress: ({ completed }) => {
        if (completed === 3) controller.abort();
      },
    }).then(
      () => undefined,
      (reason: unknown) => reason
    );

    expect(error).toBeInstanceOf(RenderCancelledError);
    if (error instanceof RenderCancelledError) {
      expect(error.completedTasks).toBe(3);
    }
  });
});
