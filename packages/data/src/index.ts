/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @luxray/data - Vector and color primitives, logging
 */

export { Vec3Utils, AXES } from './vector.js';
export type { Vec3, Axis } from './vector.js';
export { ColorUtils } from './color.js';
export type { Color, Rgb8 } from './color.js';
export { createLogger, isDebugEnabled, formatContext } from './logger.js';
export type { Logger, LogLevel, LogContext } from './logger.js';
