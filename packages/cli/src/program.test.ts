/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { CommanderError } from 'commander';
import type { RenderCommandOptions } from './commands.js';
import { createProgram } from './program.js';

interface Call {
  command: 'render' | 'demo';
  scenePath?: string;
  options: RenderCommandOptions;
}

function recordingProgram() {
  const calls: Call[] = [];
  const program = createProgram({
    render: async (scenePath, options) => {
      calls.push({ command: 'render', scenePath, options });
    },
    demo: async (options) => {
      calls.push({ command: 'demo', options });
    },
  });
  for (const command of [program, ...program.commands]) {
    command.exitOverride().configureOutput({ writeErr: () => {}, writeOut: () => {} });
  }
  return { program, calls };
}

describe('createProgram', () => {
  it('parses demo options', async () => {
    const { program, calls } = recordingProgram();
    await program.parseAsync(['demo', '--width', '8', '--height', '6', '-t', '2', '--no-shadow', '--partition', 'pixel'], {
      from: 'user',
    });

    expect(calls).toHaveLength(1);
    expect(calls[0].command).toBe('demo');
    expect(calls[0].options).toMatchObject({
      output: 'marbles.png',
      threads: 2,
      width: 8,
      height: 6,
      partition: 'pixel',
      accelerator: 'linear',
      inline: false,
      lenient: false,
      diffuse: true,
      reflection: true,
      refraction: true,
      shadow: false,
      highlights: true,
    });
    expect(calls[0].options.depth).toBeUndefined();
  });

  it('parses render arguments', async () => {
    const { program, calls } = recordingProgram();
    await program.parseAsync(
      ['render', 'scene.nff', '-o', 'out.ppm', '-d', '3', '--accelerator', 'bvh', '--ambience', '0.25', '--lenient', '--ground-plane'],
      { from: 'user' }
    );

    expect(calls[0].scenePath).toBe('scene.nff');
    expect(calls[0].options).toMatchObject({
      output: 'out.ppm',
      depth: 3,
      accelerator: 'bvh',
      ambience: 0.25,
      lenient: true,
      groundPlane: true,
    });
  });

  it('rejects invalid numbers', async () => {
    const { program, calls } = recordingProgram();
    await expect(program.parseAsync(['demo', '--threads', '0'], { from: 'user' })).rejects.toBeInstanceOf(CommanderError);
    expect(calls).toHaveLength(0);
  });

  it('rejects unknown accelerators', async () => {
    const { program } = recordingProgram();
    await expect(program.parseAsync(['demo', '--accelerator', 'kd-tree'], { from: 'user' })).rejects.toMatchObject({
      code: 'commander.invalidArgument',
    });
  });
});
