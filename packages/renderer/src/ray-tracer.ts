/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Recursive Whitted-style ray tracer over a compiled scene.
 *
 * Every method is a pure function of the scene, camera and config, so one
 * tracer can serve any number of pixels in any order.
 */

import { ColorUtils, Vec3Utils, type Color, type Vec3 } from '@luxray/data';
import {
  MISS,
  NO_SHAPE,
  createRay,
  intersectShape,
  shapeMaterial,
  type Camera,
  type IntersectionResult,
  type Light,
  type Ray,
} from '@luxray/geometry';
import { BVH, type SpatialIndex } from '@luxray/spatial';
import { SHADING_CONSTANTS } from './constants.js';
import { getShape, type CompiledScene, type CompiledShape } from './scene.js';
import type { RenderConfig } from './types.js';

/**
 * Mirror `incoming` about the normal at `position`
 */
export function reflectionRay(position: Vec3, normal: Vec3, incoming: Vec3): Ray {
  const c1 = -Vec3Utils.dot(normal, incoming);
  return createRay(position, Vec3Utils.addScaled(incoming, normal, 2 * c1));
}

/**
 * Bend `incoming` through the surface with the given refractive index
 */
export function refractionRay(position: Vec3, normal: Vec3, incoming: Vec3, index: number): Ray {
  const c1 = Vec3Utils.dot(normal, incoming);
  // Rounding can push |c1| just past 1
  const c2 = 1 - index * index * Math.sqrt(Math.max(0, 1 - c1 * c1));
  const bent = Vec3Utils.subtract(
    Vec3Utils.scale(normal, index * c1 - c2),
    Vec3Utils.scale(incoming, index)
  );
  return createRay(position, Vec3Utils.normalize(Vec3Utils.negate(bent)));
}

export class RayTracer {
  private readonly index: SpatialIndex | null;

  constructor(
    readonly scene: CompiledScene,
    readonly camera: Camera,
    readonly config: RenderConfig
  ) {
    this.index = config.accelerator === 'bvh' ? BVH.fromItems(scene.shapes) : null;
  }

  /**
   * Nearest hit at distance >= 0 on any shape except `excludeId`.
   * The result carries the hit shape's id.
   */
  testIntersection(ray: Ray, excludeId: number = NO_SHAPE): IntersectionResult {
    let best: IntersectionResult = MISS;

    const consider = (compiled: CompiledShape): void => {
      if (compiled.id === excludeId) return;
      const result = intersectShape(compiled.shape, ray);
      if (result.isHit && result.distance < best.distance && result.distance >= 0) {
        best = { ...result, shapeId: compiled.id };
      }
    };

    if (this.index) {
      for (const id of this.index.getCandidates(ray)) {
        const compiled = getShape(this.scene, id);
        if (compiled) consider(compiled);
      }
    } else {
      for (const compiled of this.scene.shapes) {
        consider(compiled);
      }
    }

    return best;
  }

  /**
   * Color seen along a primary ray
   */
  calculateColor(ray: Ray): Color {
    const hit = this.testIntersection(ray, NO_SHAPE);
    if (!hit.isHit) {
      return this.scene.background.color;
    }
    return this.rayTrace(hit, ray, 0);
  }

  /**
   * Shade a hit: ambient, then per light diffuse and, below the depth
   * bound, reflection, refraction, shadow and highlights
   */
  rayTrace(hit: IntersectionResult, ray: Ray, depth: number): Color {
    const { features, maxDepth } = this.config;
    const compiled = getShape(this.scene, hit.shapeId);
    let color = ColorUtils.scale(hit.color, this.scene.background.ambience);

    for (const { light } of this.scene.lights) {
      if (features.diffuse) {
        color = this.renderDiffuse(color, hit, light);
      }

      if (depth < maxDepth && compiled) {
        if (features.reflection) {
          color = this.renderReflection(color, hit, compiled, ray, depth);
        }
        if (features.refraction) {
          color = this.renderRefraction(color, hit, compiled, ray, depth);
        }
        color = this.renderShadowAndHighlights(color, hit, compiled, ray, light);
      }
    }

    return color;
  }

  /**
   * Color of pixel (x, y), y growing downward
   */
  getPixelColor(x: number, y: number): Color {
    const { width, height } = this.config;
    const xp = (x / width) * 2 - 1;
    const yp = -((y / height) * 2 - 1);
    return this.calculateColor(this.camera.getRay(xp, yp));
  }

  private renderDiffuse(color: Color, hit: IntersectionResult, light: Light): Color {
    const toLight = Vec3Utils.normalize(Vec3Utils.subtract(light.position, hit.position));
    const l = Vec3Utils.dot(toLight, hit.normal);
    if (!(l > 0)) return color;
    return ColorUtils.add(color, ColorUtils.scale(ColorUtils.multiply(hit.color, light.color), l));
  }

  private renderReflection(
    color: Color,
    hit: IntersectionResult,
    compiled: CompiledShape,
    ray: Ray,
    depth: number
  ): Color {
    const { reflectivity } = shapeMaterial(compiled.shape);
    if (!(reflectivity > 0)) return color;

    const reflected = reflectionRay(hit.position, hit.normal, ray.direction);
    const next = this.testIntersection(reflected, compiled.id);
    const reflectedColor = next.isHit && next.distance > 0
      ? this.rayTrace(next, reflected, depth + 1)
      : this.scene.background.color;

    return ColorUtils.blend(color, reflectedColor, reflectivity);
  }

  private renderRefraction(
    color: Color,
    hit: IntersectionResult,
    compiled: CompiledShape,
    ray: Ray,
    depth: number
  ): Color {
    const material = shapeMaterial(compiled.shape);
    if (!(material.transparency > 0)) return color;

    const entering = refractionRay(hit.position, hit.normal, ray.direction, material.refractiveIndex);
    // Where the bent ray leaves the same shape
    const exit = intersectShape(compiled.shape, entering);

    let refractedColor = this.scene.background.color;
    if (exit.isHit) {
      const leaving = refractionRay(exit.position, exit.normal, entering.direction, material.refractiveIndex);
      const next = this.testIntersection(leaving, compiled.id);
      if (next.isHit && next.distance > 0) {
        refractedColor = this.rayTrace(next, leaving, depth + 1);
      }
    }

    return ColorUtils.blend(color, refractedColor, material.transparency);
  }

  private renderShadowAndHighlights(
    color: Color,
    hit: IntersectionResult,
    compiled: CompiledShape,
    ray: Ray,
    light: Light
  ): Color {
    const { features } = this.config;
    const { gloss } = shapeMaterial(compiled.shape);
    const wantsHighlight = features.highlights && gloss > 0;
    if (!features.shadow && !wantsHighlight) return color;

    const toLight = Vec3Utils.normalize(Vec3Utils.subtract(light.position, hit.position));
    const shadow = this.testIntersection(createRay(hit.position, toLight), compiled.id);

    if (features.shadow && shadow.isHit) {
      const occluder = getShape(this.scene, shadow.shapeId);
      if (occluder) {
        const { transparency } = shapeMaterial(occluder.shape);
        const factor = SHADING_CONSTANTS.SHADOW_FLOOR + SHADING_CONSTANTS.SHADOW_TRANSMISSION * Math.sqrt(transparency);
        color = ColorUtils.scale(color, factor);
      }
    }

    if (wantsHighlight && !shadow.isHit) {
      // Blinn half vector between the viewer and the light
      const half = Vec3Utils.normalize(Vec3Utils.add(Vec3Utils.negate(ray.direction), toLight));
      const weight = Math.pow(Math.max(0, Vec3Utils.dot(hit.normal, half)), gloss);
      color = ColorUtils.add(color, ColorUtils.scale(light.color, weight));
    }

    return color;
  }
}
