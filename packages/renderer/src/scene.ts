/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Scene compilation: stable ids, O(1) lookup and per-shape bounding boxes.
 *
 * A compiled scene is plain data. Worker threads receive it by structured
 * clone and never mutate it.
 */

import { createLogger, Vec3Utils, type Color, type Vec3 } from '@luxray/data';
import {
  BoundingBoxUtils,
  GeometryError,
  NO_SHAPE,
  type Background,
  type BoundingBox,
  type Light,
  type Material,
  type Shape,
} from '@luxray/geometry';

const log = createLogger('SceneCompiler');

/** Uncompiled scene: unordered shapes and lights plus a background */
export interface SceneDescription {
  background: Background;
  shapes: readonly Shape[];
  lights: readonly Light[];
}

export interface CompiledShape {
  /** 1-based; slot `id - 1` of `CompiledScene.shapes` */
  readonly id: number;
  readonly shape: Shape;
  readonly bounds: BoundingBox;
}

export interface CompiledLight {
  readonly id: number;
  readonly light: Light;
}

export interface CompiledScene {
  readonly background: Background;
  readonly shapes: readonly CompiledShape[];
  readonly lights: readonly CompiledLight[];
}

export type DegeneratePolicy = 'error' | 'skip';

export interface CompileOptions {
  /** What to do with shapes that would produce NaN geometry (default 'error') */
  onDegenerate?: DegeneratePolicy;
}

export class SceneCompileError extends Error {
  constructor(
    message: string,
    /** Position of the offending shape or light in the description */
    public readonly index: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SceneCompileError';
  }
}

function isFiniteColor(color: Color): boolean {
  return Number.isFinite(color.r) && Number.isFinite(color.g) && Number.isFinite(color.b);
}

function materialProblem(material: Material): string | null {
  const { gloss, reflectivity, refractiveIndex, transparency } = material;
  if (![gloss, reflectivity, refractiveIndex, transparency].every(Number.isFinite)) {
    return 'material has a non-finite surface property';
  }
  const colors = material.kind === 'solid' ? [material.color] : [material.evenColor, material.oddColor];
  if (!colors.every(isFiniteColor)) {
    return 'material has a non-finite color';
  }
  if (material.kind === 'checkerboard' && !(material.scale > 0)) {
    return `checkerboard scale must be positive, got ${material.scale}`;
  }
  return null;
}

/**
 * Reason the shape cannot be intersected safely, or null
 */
export function shapeProblem(shape: Shape): string | null {
  switch (shape.kind) {
    case 'sphere':
      if (!Vec3Utils.isFinite(shape.center)) return 'sphere center is not finite';
      if (!(shape.radius > 0) || !Number.isFinite(shape.radius)) {
        return `sphere radius must be positive, got ${shape.radius}`;
      }
      return materialProblem(shape.material);
    case 'plane':
      if (!Vec3Utils.isFinite(shape.normal) || Vec3Utils.magnitudeSquared(shape.normal) === 0) {
        return 'plane normal must be finite and nonzero';
      }
      if (!Number.isFinite(shape.offset)) return 'plane offset is not finite';
      return materialProblem(shape.material);
    case 'triangle': {
      const points: Vec3[] = [shape.a, shape.b, shape.c];
      if (!points.every((p) => Vec3Utils.isFinite(p))) return 'triangle vertex is not finite';
      if (!Vec3Utils.isFinite(shape.normal) || Vec3Utils.magnitudeSquared(shape.normal) === 0) {
        return 'triangle is degenerate';
      }
      return materialProblem(shape.frontMaterial) ?? (shape.backMaterial ? materialProblem(shape.backMaterial) : null);
    }
  }
}

/**
 * Assign ids 1..n in insertion order and precompute bounding boxes
 */
export function compileScene(description: SceneDescription, options: CompileOptions = {}): CompiledScene {
  const policy = options.onDegenerate ?? 'error';
  const shapes: CompiledShape[] = [];

  description.shapes.forEach((shape, index) => {
    const problem = shapeProblem(shape);
    if (problem) {
      if (policy === 'error') {
        throw new SceneCompileError(`Shape ${index} (${shape.kind}): ${problem}`, index, {
          cause: new GeometryError(problem, { kind: shape.kind, index }),
        });
      }
      log.warn(`skipping ${shape.kind} ${index}: ${problem}`, { operation: 'compileScene' });
      return;
    }
    shapes.push(Object.freeze({ id: shapes.length + 1, shape, bounds: BoundingBoxUtils.fromShape(shape) }));
  });

  const lights: CompiledLight[] = description.lights.map((light, index) => {
    if (!Vec3Utils.isFinite(light.position) || !isFiniteColor(light.color)) {
      throw new SceneCompileError(`Light ${index} has a non-finite position or color`, index);
    }
    return Object.freeze({ id: index + 1, light });
  });

  if (!isFiniteColor(description.background.color) || !Number.isFinite(description.background.ambience)) {
    throw new SceneCompileError('Background color and ambience must be finite', -1);
  }

  log.debug(`compiled ${shapes.length} shapes, ${lights.length} lights`);

  return Object.freeze({
    background: description.background,
    shapes: Object.freeze(shapes),
    lights: Object.freeze(lights),
  });
}

/**
 * Compiled shape by id; undefined for NO_SHAPE and unknown ids
 */
export function getShape(scene: CompiledScene, id: number): CompiledShape | undefined {
  if (id === NO_SHAPE) return undefined;
  return scene.shapes[id - 1];
}

export function getLight(scene: CompiledScene, id: number): CompiledLight | undefined {
  if (id < 1) return undefined;
  return scene.lights[id - 1];
}
