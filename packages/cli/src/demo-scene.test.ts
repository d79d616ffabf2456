/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import type { Shape } from '@luxray/geometry';
import { createMarblesScene } from './demo-scene.js';

function centers(shapes: readonly Shape[]) {
  return shapes.flatMap((shape) => (shape.kind === 'sphere' ? [shape.center] : []));
}

describe('createMarblesScene', () => {
  it('lays out eleven spheres per axis plus the wall', () => {
    const { scene } = createMarblesScene();
    expect(scene.shapes).toHaveLength(34);
    expect(centers(scene.shapes)).toHaveLength(33);
    expect(scene.shapes[33].kind).toBe('plane');
  });

  it('colours the rows by axis', () => {
    const { scene } = createMarblesScene({ spheresPerAxis: 1 });
    const colors = scene.shapes.flatMap((shape) =>
      shape.kind === 'sphere' && shape.material.kind === 'solid' ? [shape.material.color] : []
    );
    expect(colors).toEqual([
      { r: 0, g: 0, b: 0.9 },
      { r: 0, g: 0, b: 0.9 },
      { r: 0, g: 0.9, b: 0 },
      { r: 0, g: 0.9, b: 0 },
      { r: 0.9, g: 0, b: 0 },
      { r: 0.9, g: 0, b: 0 },
    ]);
  });

  it('spaces spheres along each axis', () => {
    const { scene } = createMarblesScene({ spheresPerAxis: 2, spacing: 3, showPlane: false });
    expect(centers(scene.shapes)).toEqual([
      { x: 0, y: 0, z: 0 },
      { x: 3, y: 0, z: 0 },
      { x: 6, y: 0, z: 0 },
      { x: 0, y: 0, z: 0 },
      { x: 0, y: 3, z: 0 },
      { x: 0, y: 6, z: 0 },
      { x: 0, y: 0, z: 0 },
      { x: 0, y: 0, z: 3 },
      { x: 0, y: 0, z: 6 },
    ]);
  });

  it('places two grey lights and a camera looking at the origin', () => {
    const { scene, camera } = createMarblesScene({ ambience: 0.5, fov: 30 });
    expect(scene.lights.map((light) => light.position)).toEqual([
      { x: -5, y: 10, z: 10 },
      { x: 5, y: 10, z: 10 },
    ]);
    expect(scene.background.ambience).toBe(0.5);
    expect(camera.position).toEqual({ x: 30, y: 30, z: 70 });
    expect(camera.fov).toBe(30);
  });
});
