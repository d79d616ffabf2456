/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Shapes: sphere, plane and triangle. Each reports at most one hit per ray,
 * the nearest crossing in front of the origin.
 */

import { Vec3Utils, type Axis, type Vec3 } from '@luxray/data';
import { colorAt, hasTexture, type Material } from './material.js';
import { pointAt } from './ray.js';
import { GeometryError, MISS, NO_SHAPE, type IntersectionResult, type Ray } from './types.js';

export interface SphereShape {
  kind: 'sphere';
  center: Vec3;
  radius: number;
  material: Material;
}

export interface PlaneShape {
  kind: 'plane';
  /** Unit normal */
  normal: Vec3;
  /** Signed offset d of the plane normal·p + d = 0 */
  offset: number;
  material: Material;
}

export interface TriangleShape {
  kind: 'triangle';
  a: Vec3;
  b: Vec3;
  c: Vec3;
  frontMaterial: Material;
  /** Back faces are culled when absent */
  backMaterial?: Material;

  edgeAB: Vec3;
  edgeBC: Vec3;
  edgeCA: Vec3;
  normal: Vec3;
  planeCoefficient: number;
  uBeta: Vec3;
  uGamma: Vec3;
}

export type Shape = SphereShape | PlaneShape | TriangleShape;
export type ShapeKind = Shape['kind'];

export interface Bound {
  min: number;
  max: number;
}

export function createSphere(center: Vec3, radius: number, material: Material): SphereShape {
  return { kind: 'sphere', center, radius, material };
}

export function createPlane(normal: Vec3, offset: number, material: Material): PlaneShape {
  if (Vec3Utils.magnitudeSquared(normal) === 0) {
    throw new GeometryError('Plane normal must be nonzero');
  }
  return { kind: 'plane', normal: Vec3Utils.normalize(normal), offset, material };
}

/**
 * Build a triangle and precompute its plane and barycentric basis.
 * Throws GeometryError when the vertices are collinear.
 */
export function createTriangle(
  a: Vec3,
  b: Vec3,
  c: Vec3,
  frontMaterial: Material,
  backMaterial?: Material
): TriangleShape {
  const edgeAB = Vec3Utils.subtract(b, a);
  const edgeBC = Vec3Utils.subtract(c, b);
  const edgeCA = Vec3Utils.subtract(a, c);

  // Cross the pair of edges with the wider angle between them
  const rawNormal = Vec3Utils.dot(edgeAB, edgeBC) < Vec3Utils.dot(edgeBC, edgeCA)
    ? Vec3Utils.cross(edgeAB, edgeBC)
    : Vec3Utils.cross(edgeBC, edgeCA);
  const magnitude = Vec3Utils.magnitude(rawNormal);
  if (!(magnitude > 0)) {
    throw new GeometryError('Triangle is degenerate (collinear vertices)', { a, b, c });
  }
  const normal = Vec3Utils.scale(rawNormal, 1 / magnitude);
  const planeCoefficient = Vec3Utils.dot(normal, a);

  const lenAB = Vec3Utils.magnitudeSquared(edgeAB);
  const dotABCA = Vec3Utils.dot(edgeAB, edgeCA);
  const lenCA = Vec3Utils.magnitudeSquared(edgeCA);
  const dinv = 1 / (lenAB * lenCA - dotABCA * dotABCA);

  const uBeta = Vec3Utils.addScaled(Vec3Utils.scale(edgeAB, lenCA * dinv), edgeCA, -dotABCA * dinv);
  const uGamma = Vec3Utils.addScaled(Vec3Utils.scale(edgeCA, -lenAB * dinv), edgeAB, dotABCA * dinv);

  return {
    kind: 'triangle',
    a, b, c,
    frontMaterial,
    backMaterial,
    edgeAB, edgeBC, edgeCA,
    normal,
    planeCoefficient,
    uBeta,
    uGamma,
  };
}

/**
 * Barycentric weights of b (beta) and c (gamma) for a point in the triangle's plane
 */
export function barycentricAt(triangle: TriangleShape, point: Vec3): { beta: number; gamma: number } {
  const v = Vec3Utils.subtract(point, triangle.a);
  return {
    beta: Vec3Utils.dot(v, triangle.uBeta),
    gamma: Vec3Utils.dot(v, triangle.uGamma),
  };
}

export function shapePosition(shape: Shape): Vec3 {
  switch (shape.kind) {
    case 'sphere':
      return shape.center;
    case 'plane':
      return Vec3Utils.scale(shape.normal, -shape.offset);
    case 'triangle':
      return shape.a;
  }
}

/**
 * Material driving reflection, refraction and highlights. Triangles use their
 * front material; the back material only colors back-facing hits.
 */
export function shapeMaterial(shape: Shape): Material {
  return shape.kind === 'triangle' ? shape.frontMaterial : shape.material;
}

function hit(distance: number, position: Vec3, normal: Vec3, material: Material, u: number, v: number): IntersectionResult {
  return { isHit: true, distance, position, normal, color: colorAt(material, u, v), shapeId: NO_SHAPE };
}

function intersectSphere(sphere: SphereShape, ray: Ray): IntersectionResult {
  const dst = Vec3Utils.subtract(ray.origin, sphere.center);
  const b = Vec3Utils.dot(dst, ray.direction);
  const c = Vec3Utils.dot(dst, dst) - sphere.radius * sphere.radius;
  const d = b * b - c;
  if (!(d > 0)) return MISS;

  // Near root only
  const distance = -b - Math.sqrt(d);
  const position = pointAt(ray, distance);
  const normal = Vec3Utils.normalize(Vec3Utils.subtract(position, sphere.center));
  return hit(distance, position, normal, sphere.material, 0, 0);
}

function intersectPlane(plane: PlaneShape, ray: Ray): IntersectionResult {
  const vd = Vec3Utils.dot(plane.normal, ray.direction);
  // Parallel or facing away; also keeps the division below nonzero
  if (!(vd < 0)) return MISS;

  const t = -(Vec3Utils.dot(plane.normal, ray.origin) + plane.offset) / vd;
  if (!(t > 0)) return MISS;

  const position = pointAt(ray, t);
  if (!hasTexture(plane.material)) {
    return hit(t, position, plane.normal, plane.material, 0, 0);
  }

  const { normal } = plane;
  const uAxis = Vec3Utils.create(normal.y, normal.z, -normal.x);
  const vAxis = Vec3Utils.cross(uAxis, normal);
  return hit(t, position, normal, plane.material, Vec3Utils.dot(position, uAxis), Vec3Utils.dot(position, vAxis));
}

function intersectTriangle(triangle: TriangleShape, ray: Ray): IntersectionResult {
  const maxDistance = Number.MAX_VALUE;
  const mdotn = Vec3Utils.dot(ray.direction, triangle.normal);
  const planarDist = Vec3Utils.dot(ray.origin, triangle.normal) - triangle.planeCoefficient;

  const frontFace = mdotn <= 0;
  if (frontFace) {
    // mdotn === 0 lands here and is always rejected
    if (planarDist <= 0 || planarDist >= -maxDistance * mdotn) return MISS;
  } else {
    if (!triangle.backMaterial || planarDist >= 0 || -planarDist >= maxDistance * mdotn) return MISS;
  }

  const distance = -planarDist / mdotn;
  const q = pointAt(ray, distance);

  const { beta, gamma } = barycentricAt(triangle, q);
  if (beta < 0 || gamma < 0 || beta + gamma > 1) return MISS;

  const material = frontFace ? triangle.frontMaterial : triangle.backMaterial;
  if (!material) return MISS;
  return hit(distance, q, triangle.normal, material, beta, gamma);
}

/**
 * Nearest forward hit of the ray on the shape, or MISS
 */
export function intersectShape(shape: Shape, ray: Ray): IntersectionResult {
  switch (shape.kind) {
    case 'sphere':
      return intersectSphere(shape, ray);
    case 'plane':
      return intersectPlane(shape, ray);
    case 'triangle':
      return intersectTriangle(shape, ray);
  }
}

/**
 * Extent of the shape projected on a cardinal axis
 */
export function boundingExtent(shape: Shape, axis: Axis): Bound {
  switch (shape.kind) {
    case 'sphere': {
      const cd = shape.center[axis];
      return { min: cd - shape.radius, max: cd + shape.radius };
    }
    case 'plane':
      return { min: -Infinity, max: Infinity };
    case 'triangle': {
      const pa = shape.a[axis];
      const pb = shape.b[axis];
      const pc = shape.c[axis];
      return { min: Math.min(pa, pb, pc), max: Math.max(pa, pb, pc) };
    }
  }
}
