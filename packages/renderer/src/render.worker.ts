/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Worker thread entry for parallel frame rendering.
 * Builds its tracer once from workerData, then runs tasks until told to stop.
 */

import { parentPort, workerData } from 'node:worker_threads';
import { createRenderContext, executeRenderTask, type RenderWorkerData } from './render-task.js';
import type { WorkerReply, WorkerRequest } from './render-workers.js';

const port = parentPort;
if (!port) {
  throw new Error('render.worker must be started as a worker thread');
}

const data: RenderWorkerData = workerData;
const context = createRenderContext(data);

port.on('message', (request: WorkerRequest) => {
  if (request.type === 'terminate') {
    port.close();
    return;
  }

  let reply: WorkerReply;
  try {
    executeRenderTask(context, request.task);
    reply = { type: 'complete' };
  } catch (error) {
    reply = error instanceof Error
      ? { type: 'error', error: error.message, stack: error.stack }
      : { type: 'error', error: String(error) };
  }
  port.postMessage(reply);
});
