#!/usr/bin/env -S node --import tsx
/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * luxray CLI entry point
 */

import { createLogger } from '@luxray/data';
import { RenderCancelledError } from '@luxray/renderer';
import { renderDemo, renderSceneFile, type RenderSummary, type RunContext } from './commands.js';
import { createProgram } from './program.js';

const log = createLogger('CLI');

async function run(label: string, job: (context: RunContext) => Promise<RenderSummary>): Promise<void> {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);

  let lastPercent = -1;
  const context: RunContext = {
    signal: controller.signal,
    onProgress: ({ completed, total }) => {
      const percent = Math.floor((completed / total) * 100);
      if (percent !== lastPercent && percent % 10 === 0) {
        lastPercent = percent;
        log.info(`${percent}%`, { operation: label });
      }
    },
  };

  try {
    console.log(`Rendering ${label}...`);
    const summary = await job(context);
    console.log(
      `Wrote ${summary.output} (${summary.width}x${summary.height}, ${summary.shapes} shapes, ${summary.lights} lights) in ${summary.elapsedMs}ms`
    );
  } catch (error) {
    if (error instanceof RenderCancelledError) {
      console.error(`Cancelled after ${error.completedTasks} tasks`);
    } else {
      console.error('Error:', error instanceof Error ? error.message : error);
      log.caught('render failed', error, { operation: label });
    }
    process.exitCode = 1;
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

const program = createProgram({
  render: (scenePath, options) => run(scenePath, (context) => renderSceneFile(scenePath, options, context)),
  demo: (options) => run('marbles demo', (context) => renderDemo(options, context)),
});

await program.parseAsync();
