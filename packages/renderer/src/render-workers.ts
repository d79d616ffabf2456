/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Pool workers: inline (calling thread) and worker_threads backed
 */

import { Worker } from 'node:worker_threads';
import { executeRenderTask, type RenderContext, type RenderTask, type RenderWorkerData } from './render-task.js';
import type { PoolWorker } from './worker-pool.js';

/** Main thread -> worker */
export type WorkerRequest =
  | { type: 'task'; task: RenderTask }
  | { type: 'terminate' };

/** Worker -> main thread, one per task */
export type WorkerReply =
  | { type: 'complete' }
  | { type: 'error'; error: string; stack?: string };

function isWorkerReply(value: unknown): value is WorkerReply {
  if (typeof value !== 'object' || value === null || !('type' in value)) return false;
  return value.type === 'complete' || (value.type === 'error' && 'error' in value && typeof value.error === 'string');
}

/**
 * Runs tasks on the calling thread. Used for tests and single-threaded renders.
 */
export class InlineWorker implements PoolWorker<RenderTask> {
  constructor(private readonly context: RenderContext) {}

  async run(task: RenderTask): Promise<void> {
    executeRenderTask(this.context, task);
  }

  async terminate(): Promise<void> {
    // Nothing to release
  }
}

/** Raised in the main thread for a task that failed inside a worker thread */
export class WorkerThreadError extends Error {
  constructor(message: string, stack?: string) {
    super(message);
    this.name = 'WorkerThreadError';
    if (stack) this.stack = stack;
  }
}

interface PendingTask {
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * Runs tasks in a dedicated worker thread. The thread receives the scene,
 * camera, config and shared buffer handles once, through workerData.
 */
export class ThreadWorker implements PoolWorker<RenderTask> {
  private readonly worker: Worker;
  /** Resolves once the thread has exited, for whatever reason */
  readonly exited: Promise<void>;
  private pending: PendingTask | null = null;
  private failure: WorkerThreadError | null = null;
  private hasExited = false;

  constructor(workerUrl: URL, data: RenderWorkerData) {
    // The entry registers its own loader when it needs one
    this.worker = new Worker(workerUrl, { workerData: data, execArgv: [] });

    this.worker.on('message', (message: unknown) => {
      const pending = this.pending;
      this.pending = null;
      if (!pending) return;
      if (!isWorkerReply(message)) {
        pending.reject(new WorkerThreadError('Malformed reply from render worker'));
      } else if (message.type === 'complete') {
        pending.resolve();
      } else {
        pending.reject(new WorkerThreadError(message.error, message.stack));
      }
    });

    this.worker.on('error', (error: Error) => {
      const failure = this.failure ?? new WorkerThreadError(`Worker error: ${error.message}`, error.stack);
      this.failure = failure;
      this.rejectPending(failure);
    });

    this.exited = new Promise((resolve) => {
      this.worker.once('exit', (code: number) => {
        this.hasExited = true;
        const failure = this.failure ?? new WorkerThreadError(`Render worker exited with code ${code}`);
        this.failure = failure;
        this.rejectPending(failure);
        resolve();
      });
    });
  }

  run(task: RenderTask): Promise<void> {
    if (this.hasExited) {
      return Promise.reject(this.failure ?? new WorkerThreadError('Render worker has exited'));
    }
    return new Promise((resolve, reject) => {
      this.pending = { resolve, reject };
      const request: WorkerRequest = { type: 'task', task };
      this.worker.postMessage(request);
    });
  }

  async terminate(): Promise<void> {
    if (!this.hasExited) {
      const request: WorkerRequest = { type: 'terminate' };
      this.worker.postMessage(request);
    }
    await this.exited;
  }

  private rejectPending(error: Error): void {
    const pending = this.pending;
    this.pending = null;
    pending?.reject(error);
  }
}

/**
 * Worker entry next to this module. Under TypeScript sources that is the
 * render.worker.mjs bootstrap, which registers tsx before loading the entry.
 */
export function defaultWorkerUrl(): URL {
  const entry = import.meta.url.endsWith('.ts') ? './render.worker.mjs' : './render.worker.js';
  return new URL(entry, import.meta.url);
}
