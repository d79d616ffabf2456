/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @luxray/geometry - Rays, camera, materials, shapes and lights
 */

export { NO_SHAPE, MISS, GeometryError } from './types.js';
export type { Ray, Background, IntersectionResult } from './types.js';
export { createRay, pointAt } from './ray.js';
export { Camera, DEGREES_TO_RADIANS } from './camera.js';
export type { CameraSetup } from './camera.js';
export {
  MATTE,
  createSolidMaterial,
  createCheckerboardMaterial,
  colorAt,
  hasTexture,
  wrapScaled,
} from './material.js';
export type { Material, SolidMaterial, CheckerboardMaterial, SurfaceProperties } from './material.js';
export {
  createSphere,
  createPlane,
  createTriangle,
  barycentricAt,
  intersectShape,
  boundingExtent,
  shapePosition,
  shapeMaterial,
} from './shapes.js';
export type { Shape, ShapeKind, SphereShape, PlaneShape, TriangleShape, Bound } from './shapes.js';
export { createPointLight } from './light.js';
export type { Light, PointLight } from './light.js';
export { BoundingBoxUtils } from './bounding-box.js';
export type { BoundingBox } from './bounding-box.js';
