/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * 3-component vector algebra
 */

export interface Vec3 {
    readonly x: number;
    readonly y: number;
    readonly z: number;
}

export type Axis = 'x' | 'y' | 'z';

export const AXES: readonly Axis[] = ['x', 'y', 'z'];

export class Vec3Utils {
    static readonly ZERO: Vec3 = Object.freeze({ x: 0, y: 0, z: 0 });
    static readonly UNIT_X: Vec3 = Object.freeze({ x: 1, y: 0, z: 0 });
    static readonly UNIT_Y: Vec3 = Object.freeze({ x: 0, y: 1, z: 0 });
    static readonly UNIT_Z: Vec3 = Object.freeze({ x: 0, y: 0, z: 1 });

    static create(x: number, y: number, z: number): Vec3 {
        return { x, y, z };
    }

    /**
     * Unit vector along a cardinal axis
     */
    static unit(axis: Axis): Vec3 {
        switch (axis) {
            case 'x': return Vec3Utils.UNIT_X;
            case 'y': return Vec3Utils.UNIT_Y;
            case 'z': return Vec3Utils.UNIT_Z;
        }
    }

    static add(a: Vec3, b: Vec3): Vec3 {
        return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
    }

    static subtract(a: Vec3, b: Vec3): Vec3 {
        return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
    }

    static scale(v: Vec3, s: number): Vec3 {
        return { x: v.x * s, y: v.y * s, z: v.z * s };
    }

    /**
     * a + b * s
     */
    static addScaled(a: Vec3, b: Vec3, s: number): Vec3 {
        return { x: a.x + s * b.x, y: a.y + s * b.y, z: a.z + s * b.z };
    }

    static negate(v: Vec3): Vec3 {
        return { x: -v.x, y: -v.y, z: -v.z };
    }

    static dot(a: Vec3, b: Vec3): number {
        return a.x * b.x + a.y * b.y + a.z * b.z;
    }

    static cross(a: Vec3, b: Vec3): Vec3 {
        return {
            x: a.y * b.z - a.z * b.y,
            y: a.z * b.x - a.x * b.z,
            z: a.x * b.y - a.y * b.x,
        };
    }

    static magnitudeSquared(v: Vec3): number {
        return v.x * v.x + v.y * v.y + v.z * v.z;
    }

    static magnitude(v: Vec3): number {
        return Math.sqrt(Vec3Utils.magnitudeSquared(v));
    }

    /**
     * Normalize vector. A zero vector stays zero: a zero direction never
     * intersects anything, so the result degrades to a miss instead of NaN.
     */
    static normalize(v: Vec3): Vec3 {
        const len = Vec3Utils.magnitude(v);
        if (len === 0) return Vec3Utils.ZERO;
        return { x: v.x / len, y: v.y / len, z: v.z / len };
    }

    static isFinite(v: Vec3): boolean {
        return Number.isFinite(v.x) && Number.isFinite(v.y) && Number.isFinite(v.z);
    }
}
