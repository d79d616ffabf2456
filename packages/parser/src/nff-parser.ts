/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * NFF (Neutral File Format) scene parser.
 *
 * Supported directives: b, v (from/at/up/angle/hither/resolution), l, f, s,
 * p, pp. Cones (c) are skipped with a warning.
 */

import { readFile } from 'node:fs/promises';
import { ColorUtils, Vec3Utils, createLogger, type Color, type Vec3 } from '@luxray/data';
import {
  GeometryError,
  createCheckerboardMaterial,
  createPlane,
  createPointLight,
  createSolidMaterial,
  createSphere,
  createTriangle,
  type Material,
  type Shape,
} from '@luxray/geometry';
import { NffTokenizer, parseCount, parseDecimal, type NffLine } from './tokenizer.js';
import { NffParseError, type NffDocument, type NffScene, type ParseOptions, type Viewpoint } from './types.js';

const log = createLogger('NffParser');

export const DEFAULT_FIELD_OF_VIEW = 50;

/** Checkerboard floor: z = 0, grey and black tiles */
export function createGroundPlane(): Shape {
  const tiles = createCheckerboardMaterial(ColorUtils.create(0.8, 0.8, 0.8), ColorUtils.BLACK, 15, {
    reflectivity: 0.2,
    gloss: 1,
  });
  return createPlane(Vec3Utils.UNIT_Z, 0, tiles);
}

const VIEWPOINT_KEYWORDS = ['from', 'at', 'up', 'angle', 'hither', 'resolution'] as const;

export class NffParser {
  private readonly strict: boolean;
  private readonly fieldOfView: number;
  private readonly ambience: number;
  private readonly groundPlane: boolean;

  private tokenizer = new NffTokenizer('');
  private scene: NffScene = { background: { color: ColorUtils.BLACK, ambience: 0 }, shapes: [], lights: [] };
  private viewpoint: Viewpoint | null = null;
  private material: Material = createSolidMaterial(ColorUtils.BLACK);
  private skipped = 0;

  constructor(options: ParseOptions = {}) {
    this.strict = options.strict ?? true;
    this.fieldOfView = options.fieldOfView ?? DEFAULT_FIELD_OF_VIEW;
    this.ambience = options.ambience ?? 0;
    this.groundPlane = options.groundPlane ?? false;
  }

  parse(text: string): NffDocument {
    this.tokenizer = new NffTokenizer(text);
    this.scene = {
      background: { color: ColorUtils.BLACK, ambience: this.ambience },
      shapes: this.groundPlane ? [createGroundPlane()] : [],
      lights: [],
    };
    this.viewpoint = null;
    this.material = createSolidMaterial(ColorUtils.BLACK);
    this.skipped = 0;

    for (const entry of this.tokenizer) {
      this.guard(entry, () => this.parseDirective(entry));
    }

    const viewpoint = this.viewpoint;
    if (!viewpoint) {
      throw new NffParseError('Scene has no viewpoint (v) block', 0, 'v');
    }

    log.debug(`parsed ${this.scene.shapes.length} shapes, ${this.scene.lights.length} lights`, undefined, {
      operation: 'parse',
    });

    return {
      scene: this.scene,
      camera: { position: viewpoint.from, lookAt: viewpoint.at, up: viewpoint.up, fov: this.fieldOfView },
      resolution: viewpoint.resolution,
      viewpoint,
      skipped: this.skipped,
    };
  }

  /**
   * Run `fn`; in non-strict mode turn input errors into a warning
   */
  private guard(entry: NffLine, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      const parseError = this.toParseError(error, entry);
      if (!parseError || this.strict) {
        throw parseError ?? error;
      }
      this.skip(entry.line, parseError.message);
    }
  }

  private toParseError(error: unknown, entry: NffLine): NffParseError | null {
    if (error instanceof NffParseError) return error;
    if (error instanceof GeometryError) {
      return new NffParseError(error.message, entry.line, entry.directive, { cause: error });
    }
    return null;
  }

  private skip(line: number, message: string): void {
    this.skipped++;
    log.warn(message, { line });
  }

  private parseDirective(entry: NffLine): void {
    switch (entry.directive) {
      case 'b':
        this.expectArgs(entry, [3]);
        this.scene.background = { color: this.readColor(entry, 0), ambience: this.ambience };
        break;
      case 'v':
        this.expectArgs(entry, [0]);
        this.viewpoint = this.parseViewpoint(entry);
        break;
      case 'l':
        this.parseLight(entry);
        break;
      case 'f':
        this.parseMaterial(entry);
        break;
      case 's': {
        this.expectArgs(entry, [4]);
        const center = this.readVec3(entry, 0);
        const radius = this.readNumber(entry, 3);
        this.scene.shapes.push(createSphere(center, radius, this.material));
        break;
      }
      case 'p':
        this.parsePolygon(entry, 3);
        break;
      case 'pp':
        this.parsePolygon(entry, 6);
        break;
      case 'c':
        this.takeLines(entry, 2);
        this.skip(entry.line, 'skipping cone');
        break;
      default:
        throw new NffParseError(`Unknown directive '${entry.directive}'`, entry.line, entry.directive);
    }
  }

  private parseViewpoint(entry: NffLine): Viewpoint {
    const lines = this.takeLines(entry, VIEWPOINT_KEYWORDS.length);
    VIEWPOINT_KEYWORDS.forEach((keyword, i) => {
      if (lines[i].directive !== keyword) {
        throw new NffParseError(
          `Expected '${keyword}' in viewpoint block, found '${lines[i].directive}'`,
          lines[i].line,
          lines[i].directive
        );
      }
    });
    const [from, at, up, angle, hither, resolution] = lines;

    for (const line of [from, at, up]) this.expectArgs(line, [3]);
    for (const line of [angle, hither]) this.expectArgs(line, [1]);
    this.expectArgs(resolution, [2]);

    const width = parseCount(resolution.args[0]);
    const height = parseCount(resolution.args[1]);
    if (!width || !height) {
      throw new NffParseError('Resolution must be two positive integers', resolution.line, resolution.directive);
    }

    return {
      from: this.readVec3(from, 0),
      at: this.readVec3(at, 0),
      up: this.readVec3(up, 0),
      angle: this.readNumber(angle, 0),
      hither: this.readNumber(hither, 0),
      resolution: { width, height },
    };
  }

  private parseLight(entry: NffLine): void {
    this.expectArgs(entry, [3, 6]);
    const position = this.readVec3(entry, 0);
    const color = entry.args.length === 6 ? this.readColor(entry, 3) : ColorUtils.WHITE;
    this.scene.lights.push(createPointLight(position, color));
  }

  /**
   * f red green blue Kd Ks Shine T index_of_refraction
   */
  private parseMaterial(entry: NffLine): void {
    this.expectArgs(entry, [8]);
    const color = this.readColor(entry, 0);
    // Kd (args[3]) is validated but unused: diffuse always uses the full color
    this.readNumber(entry, 3);
    this.material = createSolidMaterial(color, {
      reflectivity: this.readNumber(entry, 4),
      gloss: this.readNumber(entry, 5),
      transparency: this.readNumber(entry, 6),
      refractiveIndex: this.readNumber(entry, 7),
    });
  }

  /**
   * Polygon as a triangle fan around its first vertex, visible from both sides
   */
  private parsePolygon(entry: NffLine, fieldsPerVertex: number): void {
    this.expectArgs(entry, [1]);
    const count = parseCount(entry.args[0]);
    if (count === null) {
      throw new NffParseError(`Vertex count must be an integer, got '${entry.args[0]}'`, entry.line, entry.directive);
    }
    // Consume the vertex lines before validating so a bad polygon is skipped whole
    const lines = this.takeLines(entry, count);
    if (count < 3) {
      throw new NffParseError(`Polygon needs at least 3 vertices, got ${count}`, entry.line, entry.directive);
    }

    const vertices = lines.map((line) => {
      const tokens: NffLine = { line: line.line, directive: entry.directive, args: [line.directive, ...line.args] };
      this.expectArgs(tokens, [fieldsPerVertex]);
      // pp vertex normals are ignored
      return this.readVec3(tokens, 0);
    });

    const triangles: Shape[] = [];
    for (let i = 1; i < vertices.length - 1; i++) {
      triangles.push(createTriangle(vertices[0], vertices[i], vertices[i + 1], this.material, this.material));
    }
    this.scene.shapes.push(...triangles);
  }

  private takeLines(entry: NffLine, count: number): NffLine[] {
    const lines: NffLine[] = [];
    for (let i = 0; i < count; i++) {
      const line = this.tokenizer.next();
      if (!line) {
        throw new NffParseError(
          `Unexpected end of file: expected ${count} lines after '${entry.directive}', found ${i}`,
          entry.line,
          entry.directive
        );
      }
      lines.push(line);
    }
    return lines;
  }

  private expectArgs(entry: NffLine, counts: number[]): void {
    if (!counts.includes(entry.args.length)) {
      throw new NffParseError(
        `Expected ${counts.join(' or ')} values, got ${entry.args.length}`,
        entry.line,
        entry.directive
      );
    }
  }

  private readNumber(entry: NffLine, index: number): number {
    const token = entry.args[index];
    const value = token === undefined ? null : parseDecimal(token);
    if (value === null) {
      throw new NffParseError(`Expected a number at field ${index + 1}, got '${token ?? ''}'`, entry.line, entry.directive);
    }
    return value;
  }

  private readVec3(entry: NffLine, start: number): Vec3 {
    return Vec3Utils.create(this.readNumber(entry, start), this.readNumber(entry, start + 1), this.readNumber(entry, start + 2));
  }

  private readColor(entry: NffLine, start: number): Color {
    return ColorUtils.create(this.readNumber(entry, start), this.readNumber(entry, start + 1), this.readNumber(entry, start + 2));
  }
}

/**
 * Parse NFF text into an uncompiled scene and camera
 */
export function parseNff(text: string, options?: ParseOptions): NffDocument {
  return new NffParser(options).parse(text);
}

export async function parseNffFile(path: string, options?: ParseOptions): Promise<NffDocument> {
  const text = await readFile(path, 'utf8');
  return parseNff(text, options);
}
