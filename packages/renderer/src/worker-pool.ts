/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Fixed-size worker pool fed from one shared task queue.
 *
 * Each worker has a consumer loop that takes tasks until it receives a
 * terminate message. `close` lets queued work drain first; `shutdown`
 * discards it. Both send one terminate message per worker and resolve once
 * every worker has exited.
 */

import { createLogger } from '@luxray/data';

const log = createLogger('WorkerPool');

/** Something that executes tasks one at a time */
export interface PoolWorker<T> {
  run(task: T): Promise<void>;
  terminate(): Promise<void>;
}

export type PoolWorkerFactory<T> = (index: number) => PoolWorker<T>;

export interface WorkerPoolOptions {
  /** Checked before each task; once aborted, queued tasks are discarded */
  signal?: AbortSignal;
  /** Called after each task completes */
  onTaskComplete?: (completed: number) => void;
}

export class PoolClosedError extends Error {
  constructor(message = 'Worker pool no longer accepts tasks') {
    super(message);
    this.name = 'PoolClosedError';
  }
}

/** A task threw; fatal to everything the pool was running */
export class RenderTaskError extends Error {
  constructor(
    message: string,
    public readonly workerIndex: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RenderTaskError';
  }
}

/**
 * Unbounded FIFO whose `take` waits for the next item
 */
export class TaskQueue<T extends object> {
  private readonly items: T[] = [];
  private readonly waiters: Array<(item: T) => void> = [];

  push(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
    } else {
      this.items.push(item);
    }
  }

  take(): Promise<T> {
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve(item);
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  /**
   * Remove and return everything queued
   */
  drain(): T[] {
    return this.items.splice(0);
  }

  get size(): number {
    return this.items.length;
  }
}

type PoolMessage<T> = { kind: 'task'; task: T } | { kind: 'terminate' };

const TERMINATE = Object.freeze({ kind: 'terminate' } as const);

export class WorkerPool<T> {
  private readonly queue = new TaskQueue<PoolMessage<T>>();
  private readonly loops: Promise<void>[];
  private accepting = true;
  private failure: RenderTaskError | null = null;
  private cancelled = false;
  private completedCount = 0;

  constructor(
    readonly size: number,
    factory: PoolWorkerFactory<T>,
    private readonly options: WorkerPoolOptions = {}
  ) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
    }
    const workers = Array.from({ length: size }, (_, index) => factory(index));
    this.loops = workers.map((worker, index) => this.consume(worker, index));
  }

  get completed(): number {
    return this.completedCount;
  }

  /** True when the pool stopped early because its signal fired */
  get wasCancelled(): boolean {
    return this.cancelled;
  }

  get isAccepting(): boolean {
    return this.accepting;
  }

  submit(task: T): void {
    if (!this.accepting) {
      throw new PoolClosedError();
    }
    this.queue.push({ kind: 'task', task });
  }

  /**
   * Stop accepting tasks, run everything already queued, then stop every
   * worker. Rejects with the first RenderTaskError if any task failed.
   */
  async close(): Promise<void> {
    this.stopAccepting();
    await Promise.all(this.loops);
    if (this.failure) {
      throw this.failure;
    }
  }

  /**
   * Discard queued tasks and stop every worker once its in-flight task
   * finishes. Resolves with the number of discarded tasks.
   */
  async shutdown(): Promise<number> {
    const discarded = this.discardPending();
    await Promise.all(this.loops);
    return discarded;
  }

  private stopAccepting(): void {
    if (!this.accepting) return;
    this.accepting = false;
    for (let i = 0; i < this.size; i++) {
      this.queue.push(TERMINATE);
    }
  }

  private discardPending(): number {
    const pending = this.queue.drain();
    const discarded = pending.filter((message) => message.kind === 'task').length;
    if (this.accepting) {
      this.stopAccepting();
    } else {
      // Put back the terminate messages the drain removed
      for (let i = discarded; i < pending.length; i++) {
        this.queue.push(TERMINATE);
      }
    }
    if (discarded > 0) {
      log.debug(`discarded ${discarded} queued tasks`);
    }
    return discarded;
  }

  private async consume(worker: PoolWorker<T>, index: number): Promise<void> {
    try {
      for (;;) {
        const message = await this.queue.take();
        if (message.kind === 'terminate') {
          break;
        }
        if (this.options.signal?.aborted) {
          this.cancelled = true;
          this.discardPending();
          continue;
        }
        try {
          await worker.run(message.task);
        } catch (error) {
          this.fail(error, index);
          continue;
        }
        this.completedCount++;
        this.options.onTaskComplete?.(this.completedCount);
      }
    } finally {
      await worker.terminate();
    }
  }

  private fail(error: unknown, index: number): void {
    if (!this.failure) {
      log.error(`worker ${index} task failed`, error);
      this.failure = new RenderTaskError(
        `Render task failed in worker ${index}: ${error instanceof Error ? error.message : String(error)}`,
        index,
        { cause: error }
      );
    }
    this.discardPending();
  }
}
