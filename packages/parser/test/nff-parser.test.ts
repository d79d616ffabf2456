/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Tests for the NFF parser
 */

import { fileURLToPath } from 'node:url';
import { describe, it, expect, vi, afterEach } from 'vitest';
import type { Shape } from '@luxray/geometry';
import { NffParseError, parseNff, parseNffFile } from '../src/index.js';

const VIEWPOINT = ['v', 'from 0 0 5', 'at 0 0 0', 'up 0 1 0', 'angle 45', 'hither 0.5', 'resolution 64 48'];

function nff(...lines: string[]): string {
  return [...VIEWPOINT, ...lines].join('\n');
}

function kinds(shapes: Shape[]): string[] {
  return shapes.map((shape) => shape.kind);
}

describe('parseNff', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reads the viewpoint block and applies the configured field of view', () => {
    const doc = parseNff(nff(), { fieldOfView: 35 });
    expect(doc.camera).toEqual({
      position: { x: 0, y: 0, z: 5 },
      lookAt: { x: 0, y: 0, z: 0 },
      up: { x: 0, y: 1, z: 0 },
      fov: 35,
    });
    expect(doc.viewpoint.angle).toBe(45);
    expect(doc.viewpoint.hither).toBe(0.5);
    expect(doc.resolution).toEqual({ width: 64, height: 48 });
  });

  it('defaults the field of view to 50 degrees', () => {
    expect(parseNff(nff()).camera.fov).toBe(50);
  });

  it('reads the background color with the configured ambience', () => {
    const doc = parseNff(nff('b 0.2 0.3 0.4'), { ambience: 0.25 });
    expect(doc.scene.background).toEqual({ color: { r: 0.2, g: 0.3, b: 0.4 }, ambience: 0.25 });
  });

  it('reads lights with and without a color', () => {
    const doc = parseNff(nff('l 1 2 3', 'l 4 5 6 0.5 0.25 0'));
    expect(doc.scene.lights).toEqual([
      { kind: 'point', position: { x: 1, y: 2, z: 3 }, color: { r: 1, g: 1, b: 1 } },
      { kind: 'point', position: { x: 4, y: 5, z: 6 }, color: { r: 0.5, g: 0.25, b: 0 } },
    ]);
  });

  it('maps f fields to material properties', () => {
    const doc = parseNff(nff('f 1 0.5 0 0.7 0.3 12 0.4 1.5', 's 0 0 0 2'));
    const [sphere] = doc.scene.shapes;
    expect(sphere.kind).toBe('sphere');
    if (sphere.kind === 'sphere') {
      expect(sphere.radius).toBe(2);
      expect(sphere.material).toEqual({
        kind: 'solid',
        color: { r: 1, g: 0.5, b: 0 },
        reflectivity: 0.3,
        gloss: 12,
        transparency: 0.4,
        refractiveIndex: 1.5,
      });
    }
  });

  it('turns polygons into two-sided triangle fans', () => {
    const doc = parseNff(nff('p 4', '0 0 0', '1 0 0', '1 1 0', '0 1 0'));
    expect(kinds(doc.scene.shapes)).toEqual(['triangle', 'triangle']);
    const [first, second] = doc.scene.shapes;
    if (first.kind === 'triangle' && second.kind === 'triangle') {
      expect(first.c).toEqual({ x: 1, y: 1, z: 0 });
      expect(second.b).toEqual({ x: 1, y: 1, z: 0 });
      expect(second.c).toEqual({ x: 0, y: 1, z: 0 });
      expect(first.backMaterial).toBe(first.frontMaterial);
    }
  });

  it('reads polygon patches and ignores their normals', () => {
    const doc = parseNff(nff('pp 3', '0 0 0 0 0 1', '1 0 0 0 0 1', '0 1 0 0 0 1', 's 0 0 3 1'));
    expect(kinds(doc.scene.shapes)).toEqual(['triangle', 'sphere']);
  });

  it('skips cones with a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const doc = parseNff(nff('c', '0 0 0 1', '0 0 2 0.5', 's 0 0 0 1'));
    expect(kinds(doc.scene.shapes)).toEqual(['sphere']);
    expect(doc.skipped).toBe(1);
    expect(warn).toHaveBeenCalledWith('[NffParser] (line 8) skipping cone');
  });

  it('ignores comments and blank lines', () => {
    const doc = parseNff(nff('', '# a comment', '   ', 's 0 0 0 1'));
    expect(doc.scene.shapes).toHaveLength(1);
  });

  it('prepends a checkerboard ground plane on request', () => {
    const doc = parseNff(nff('s 0 0 0 1'), { groundPlane: true });
    expect(kinds(doc.scene.shapes)).toEqual(['plane', 'sphere']);
    const [plane] = doc.scene.shapes;
    if (plane.kind === 'plane') {
      expect(plane.normal).toEqual({ x: 0, y: 0, z: 1 });
      expect(plane.material.kind).toBe('checkerboard');
      expect(plane.material.reflectivity).toBe(0.2);
    }
  });

  describe('errors', () => {
    function parseError(text: string): NffParseError {
      try {
        parseNff(text);
      } catch (error) {
        if (error instanceof NffParseError) return error;
        throw error;
      }
      throw new Error('expected parseNff to throw');
    }

    it('rejects unknown directives with their line', () => {
      const error = parseError(nff('q 1 2 3'));
      expect(error.line).toBe(8);
      expect(error.directive).toBe('q');
      expect(error.message).toBe("Line 8 (q): Unknown directive 'q'");
    });

    it('rejects malformed numbers', () => {
      const error = parseError(nff('s 0 zero 0 1'));
      expect(error.message).toBe("Line 8 (s): Expected a number at field 2, got 'zero'");
    });

    it('rejects missing fields', () => {
      expect(parseError(nff('s 0 0 0')).message).toBe('Line 8 (s): Expected 4 values, got 3');
    });

    it('rejects a viewpoint block out of order', () => {
      const error = parseError(['v', 'at 0 0 0', 'from 0 0 5', 'up 0 1 0', 'angle 45', 'hither 1', 'resolution 8 8'].join('\n'));
      expect(error.line).toBe(2);
      expect(error.directive).toBe('at');
    });

    it('rejects a file without a viewpoint', () => {
      expect(parseError('s 0 0 0 1').message).toBe('Scene has no viewpoint (v) block');
    });

    it('rejects degenerate polygons', () => {
      const error = parseError(nff('p 3', '0 0 0', '1 0 0', '2 0 0'));
      expect(error.directive).toBe('p');
      expect(error.message).toBe('Line 8 (p): Triangle is degenerate (collinear vertices)');
    });

    it('rejects truncated polygons', () => {
      expect(parseError(nff('p 3', '0 0 0')).message).toBe(
        "Line 8 (p): Unexpected end of file: expected 3 lines after 'p', found 1"
      );
    });
  });

  describe('non-strict mode', () => {
    it('warns and skips bad directives', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const doc = parseNff(nff('q 1', 's 0 0 0 1', 'p 3', '0 0 0', '1 0 0', '2 0 0', 's 0 0 4 1'), { strict: false });

      expect(kinds(doc.scene.shapes)).toEqual(['sphere', 'sphere']);
      expect(doc.skipped).toBe(2);
      expect(warn).toHaveBeenNthCalledWith(1, "[NffParser] (line 8) Line 8 (q): Unknown directive 'q'");
    });
  });
});

describe('parseNffFile', () => {
  it('reads a scene from disk', async () => {
    const path = fileURLToPath(new URL('./fixtures/two-spheres.nff', import.meta.url));
    const doc = await parseNffFile(path);

    expect(doc.viewpoint.resolution).toEqual({ width: 32, height: 24 });
    expect(doc.scene.background.color).toEqual({ r: 0.1, g: 0.1, b: 0.2 });
    expect(doc.scene.lights).toHaveLength(2);
    expect(kinds(doc.scene.shapes)).toEqual(['sphere', 'sphere', 'triangle']);
  });
});
