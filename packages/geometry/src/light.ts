/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { ColorUtils, type Color, type Vec3 } from '@luxray/data';

export interface PointLight {
  kind: 'point';
  position: Vec3;
  color: Color;
}

export type Light = PointLight;

export function createPointLight(position: Vec3, color: Color = ColorUtils.WHITE): PointLight {
  return { kind: 'point', position, color };
}
