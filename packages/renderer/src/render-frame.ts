/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Parallel frame rendering: partition, fan out over a worker pool, collect
 * into one shared pixel buffer
 */

import { createLogger } from '@luxray/data';
import { Camera, type CameraSetup } from '@luxray/geometry';
import { PixelBuffer } from './pixel-buffer.js';
import { InlineWorker, ThreadWorker, defaultWorkerUrl } from './render-workers.js';
import { createRenderContext, partitionFrame, type RenderTask, type RenderWorkerData } from './render-task.js';
import { validateRenderConfig } from './render-config.js';
import type { CompiledScene } from './scene.js';
import type { RenderConfig } from './types.js';
import { WorkerPool, type PoolWorkerFactory } from './worker-pool.js';

const log = createLogger('Renderer');

export interface RenderProgress {
  completed: number;
  total: number;
}

export interface RenderOptions {
  /** Abort between tasks; the frame then rejects with RenderCancelledError */
  signal?: AbortSignal;
  /** Run every pool worker on the calling thread instead of worker threads */
  inline?: boolean;
  /** Worker thread entry (default: render.worker next to this module) */
  workerUrl?: URL;
  onProgress?: (progress: RenderProgress) => void;
}

export class RenderCancelledError extends Error {
  constructor(
    message: string,
    public readonly completedTasks: number
  ) {
    super(message);
    this.name = 'RenderCancelledError';
  }
}

/**
 * Render a full frame. Resolves once every worker has exited.
 */
export async function renderFrame(
  scene: CompiledScene,
  cameraSetup: CameraSetup,
  config: RenderConfig,
  options: RenderOptions = {}
): Promise<PixelBuffer> {
  validateRenderConfig(config);
  // Fail on a bad camera here rather than inside every worker
  new Camera(cameraSetup);

  if (options.signal?.aborted) {
    throw new RenderCancelledError('Render cancelled before start', 0);
  }

  const buffer = new PixelBuffer(config.width, config.height);
  const tasks = partitionFrame(config);
  const data: RenderWorkerData = { scene, camera: cameraSetup, config, ...buffer.handles };

  let factory: PoolWorkerFactory<RenderTask>;
  if (options.inline) {
    const context = createRenderContext(data);
    factory = () => new InlineWorker(context);
  } else {
    const workerUrl = options.workerUrl ?? defaultWorkerUrl();
    factory = () => new ThreadWorker(workerUrl, data);
  }

  const started = Date.now();
  log.info(
    `rendering ${config.width}x${config.height}, ${tasks.length} ${config.partition} tasks on ${config.threadCount} ${options.inline ? 'inline' : 'thread'} workers`,
    { operation: 'renderFrame' }
  );

  const onProgress = options.onProgress;
  const pool = new WorkerPool(config.threadCount, factory, {
    signal: options.signal,
    onTaskComplete: onProgress ? (completed) => onProgress({ completed, total: tasks.length }) : undefined,
  });

  for (const task of tasks) {
    pool.submit(task);
  }
  await pool.close();

  if (pool.wasCancelled) {
    log.warn(`cancelled after ${pool.completed}/${tasks.length} tasks`, { operation: 'renderFrame' });
    throw new RenderCancelledError(`Render cancelled after ${pool.completed} of ${tasks.length} tasks`, pool.completed);
  }

  log.info(`finished in ${Date.now() - started}ms`, { operation: 'renderFrame' });
  return buffer;
}
