/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Render work units and the handler both worker kinds run
 */

import type { Color } from '@luxray/data';
import { Camera, type CameraSetup } from '@luxray/geometry';
import { PixelBuffer, type PixelBufferHandles } from './pixel-buffer.js';
import { RayTracer } from './ray-tracer.js';
import type { CompiledScene } from './scene.js';
import type { RenderConfig } from './types.js';

export type RenderTask =
  | { kind: 'row'; y: number }
  | { kind: 'pixel'; x: number; y: number };

/** Everything a worker needs, sent once at start-up */
export interface RenderWorkerData extends PixelBufferHandles {
  scene: CompiledScene;
  camera: CameraSetup;
  config: RenderConfig;
}

export interface RenderContext {
  tracer: RayTracer;
  buffer: PixelBuffer;
}

export function createRenderContext(data: RenderWorkerData): RenderContext {
  const { scene, camera, config, pixels, lock } = data;
  return {
    tracer: new RayTracer(scene, new Camera(camera), config),
    buffer: new PixelBuffer(config.width, config.height, { pixels, lock }),
  };
}

/**
 * Split a frame into tasks, top row first
 */
export function partitionFrame(config: Pick<RenderConfig, 'width' | 'height' | 'partition'>): RenderTask[] {
  const tasks: RenderTask[] = [];
  for (let y = 0; y < config.height; y++) {
    if (config.partition === 'row') {
      tasks.push({ kind: 'row', y });
    } else {
      for (let x = 0; x < config.width; x++) {
        tasks.push({ kind: 'pixel', x, y });
      }
    }
  }
  return tasks;
}

/**
 * Compute the task's colors, then take the buffer lock only to store them
 */
export function executeRenderTask(context: RenderContext, task: RenderTask): void {
  const { tracer, buffer } = context;
  switch (task.kind) {
    case 'row': {
      const colors: Color[] = [];
      for (let x = 0; x < buffer.width; x++) {
        colors.push(tracer.getPixelColor(x, task.y));
      }
      buffer.writeRow(task.y, colors);
      break;
    }
    case 'pixel':
      buffer.writePixel(task.x, task.y, tracer.getPixelColor(task.x, task.y));
      break;
  }
}
