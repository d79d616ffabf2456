/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @luxray/renderer - Scene compiler, ray tracer and parallel frame renderer
 */

export { SHADING_CONSTANTS, DEFAULT_FEATURES, PARTITIONS, ACCELERATORS } from './constants.js';
export { RenderConfigError } from './types.js';
export type { RenderConfig, RenderConfigInit, RenderFeatures, Partition, Accelerator } from './types.js';
export { createRenderConfig, validateRenderConfig } from './render-config.js';

export { compileScene, getShape, getLight, shapeProblem, SceneCompileError } from './scene.js';
export type {
  SceneDescription,
  CompiledScene,
  CompiledShape,
  CompiledLight,
  CompileOptions,
  DegeneratePolicy,
} from './scene.js';

export { RayTracer, reflectionRay, refractionRay } from './ray-tracer.js';

export { Mutex } from './mutex.js';
export { PixelBuffer, CHANNELS } from './pixel-buffer.js';
export type { PixelBufferHandles } from './pixel-buffer.js';

export { WorkerPool, TaskQueue, PoolClosedError, RenderTaskError } from './worker-pool.js';
export type { PoolWorker, PoolWorkerFactory, WorkerPoolOptions } from './worker-pool.js';
export { createRenderContext, executeRenderTask, partitionFrame } from './render-task.js';
export type { RenderTask, RenderContext, RenderWorkerData } from './render-task.js';
export { InlineWorker, ThreadWorker, WorkerThreadError, defaultWorkerUrl } from './render-workers.js';
export type { WorkerRequest, WorkerReply } from './render-workers.js';

export { renderFrame, RenderCancelledError } from './render-frame.js';
export type { RenderOptions, RenderProgress } from './render-frame.js';
