/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Command implementations behind the luxray CLI
 */

import { createLogger } from '@luxray/data';
import type { CameraSetup } from '@luxray/geometry';
import { writeImage } from '@luxray/export';
import { parseNffFile } from '@luxray/parser';
import {
  compileScene,
  createRenderConfig,
  renderFrame,
  type Accelerator,
  type Partition,
  type RenderConfig,
  type RenderProgress,
  type SceneDescription,
} from '@luxray/renderer';
import { DEMO_DEFAULTS, createMarblesScene } from './demo-scene.js';

const log = createLogger('CLI');

/** Options shared by `render` and `demo` */
export interface RenderCommandOptions {
  output: string;
  threads: number;
  depth?: number;
  partition: Partition;
  accelerator: Accelerator;
  ambience?: number;
  fov?: number;
  width?: number;
  height?: number;
  /** Prepend a checkerboard floor (render only) */
  groundPlane?: boolean;
  lenient: boolean;
  inline: boolean;
  diffuse: boolean;
  reflection: boolean;
  refraction: boolean;
  shadow: boolean;
  highlights: boolean;
}

export interface RenderSummary {
  output: string;
  width: number;
  height: number;
  shapes: number;
  lights: number;
  bytes: number;
  elapsedMs: number;
}

export interface RunContext {
  signal?: AbortSignal;
  onProgress?: (progress: RenderProgress) => void;
}

export const DEFAULT_DEPTH = 5;

export function toRenderConfig(options: RenderCommandOptions, width: number, height: number): RenderConfig {
  return createRenderConfig({
    width,
    height,
    maxDepth: options.depth ?? DEFAULT_DEPTH,
    threadCount: options.threads,
    partition: options.partition,
    accelerator: options.accelerator,
    features: {
      diffuse: options.diffuse,
      reflection: options.reflection,
      refraction: options.refraction,
      shadow: options.shadow,
      highlights: options.highlights,
    },
  });
}

/**
 * Parse an NFF file, render it and write the image
 */
export async function renderSceneFile(
  path: string,
  options: RenderCommandOptions,
  context: RunContext = {}
): Promise<RenderSummary> {
  const doc = await parseNffFile(path, {
    fieldOfView: options.fov,
    ambience: options.ambience,
    groundPlane: options.groundPlane,
    strict: !options.lenient,
  });
  if (doc.skipped > 0) {
    log.warn(`skipped ${doc.skipped} unsupported or malformed directives`, { operation: 'render' });
  }

  const width = options.width ?? doc.resolution.width;
  const height = options.height ?? doc.resolution.height;
  return renderAndWrite(doc.scene, doc.camera, toRenderConfig(options, width, height), options, context);
}

/**
 * Render the built-in marbles scene
 */
export async function renderDemo(options: RenderCommandOptions, context: RunContext = {}): Promise<RenderSummary> {
  const { scene, camera } = createMarblesScene({
    ambience: options.ambience,
    fov: options.fov,
  });
  const config = toRenderConfig(
    { ...options, depth: options.depth ?? DEMO_DEFAULTS.depth },
    options.width ?? DEMO_DEFAULTS.width,
    options.height ?? DEMO_DEFAULTS.height
  );
  return renderAndWrite(scene, camera, config, options, context);
}

async function renderAndWrite(
  description: SceneDescription,
  camera: CameraSetup,
  config: RenderConfig,
  options: RenderCommandOptions,
  context: RunContext
): Promise<RenderSummary> {
  const started = Date.now();
  const scene = compileScene(description, { onDegenerate: options.lenient ? 'skip' : 'error' });
  const buffer = await renderFrame(scene, camera, config, {
    inline: options.inline,
    signal: context.signal,
    onProgress: context.onProgress,
  });
  const bytes = await writeImage(buffer, options.output);

  return {
    output: options.output,
    width: config.width,
    height: config.height,
    shapes: scene.shapes.length,
    lights: scene.lights.length,
    bytes,
    elapsedMs: Date.now() - started,
  };
}
