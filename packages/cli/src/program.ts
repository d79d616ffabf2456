/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Command-line surface: `luxray render <scene.nff>` and `luxray demo`
 */

import { availableParallelism } from 'node:os';
import { Command, InvalidArgumentError } from 'commander';
import { ACCELERATORS, PARTITIONS } from '@luxray/renderer';
import type { RenderCommandOptions } from './commands.js';

export interface CliHandlers {
  render(scenePath: string, options: RenderCommandOptions): Promise<void>;
  demo(options: RenderCommandOptions): Promise<void>;
}

function positiveInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

function nonNegativeInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}

function finiteNumber(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n)) {
    throw new InvalidArgumentError('Expected a number.');
  }
  return n;
}

function oneOf<T extends string>(values: readonly T[]): (value: string) => T {
  return (value) => {
    const match = values.find((candidate) => candidate === value);
    if (match === undefined) {
      throw new InvalidArgumentError(`Expected one of: ${values.join(', ')}.`);
    }
    return match;
  };
}

function addRenderOptions(command: Command, defaultOutput: string): Command {
  return command
    .option('-o, --output <file>', 'Output image (.png or .ppm)', defaultOutput)
    .option('-t, --threads <n>', 'Worker threads', positiveInteger, availableParallelism())
    .option('-d, --depth <n>', 'Reflection/refraction recursion depth', nonNegativeInteger)
    .option('--partition <mode>', `Task granularity (${PARTITIONS.join('|')})`, oneOf(PARTITIONS), 'row')
    .option('--accelerator <kind>', `Intersection search (${ACCELERATORS.join('|')})`, oneOf(ACCELERATORS), 'linear')
    .option('--ambience <value>', 'Ambient light scalar', finiteNumber)
    .option('--fov <degrees>', 'Camera field of view', finiteNumber)
    .option('--width <px>', 'Image width', positiveInteger)
    .option('--height <px>', 'Image height', positiveInteger)
    .option('--inline', 'Render on the main thread', false)
    .option('--no-diffuse', 'Disable diffuse shading')
    .option('--no-reflection', 'Disable reflections')
    .option('--no-refraction', 'Disable refraction')
    .option('--no-shadow', 'Disable shadows')
    .option('--no-highlights', 'Disable specular highlights');
}

export function createProgram(handlers: CliHandlers): Command {
  const program = new Command();

  program.name('luxray').description('Offline ray tracer for NFF scenes').version('0.1.0');

  addRenderOptions(
    program
      .command('render')
      .description('Render an NFF scene file')
      .argument('<scene>', 'Path to the .nff file')
      .option('--ground-plane', 'Add a checkerboard floor at z = 0', false)
      .option('--lenient', 'Skip malformed directives instead of failing', false),
    'render.png'
  ).action((scenePath: string, options: RenderCommandOptions) => handlers.render(scenePath, options));

  addRenderOptions(
    program
      .command('demo')
      .description('Render the built-in marbles scene')
      .option('--lenient', 'Skip degenerate shapes instead of failing', false),
    'marbles.png'
  ).action((options: RenderCommandOptions) => handlers.demo(options));

  return program;
}
