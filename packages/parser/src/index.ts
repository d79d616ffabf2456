/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @luxray/parser - NFF scene-description parser
 */

export { NffTokenizer, parseDecimal, parseCount } from './tokenizer.js';
export type { NffLine } from './tokenizer.js';
export { NffParser, parseNff, parseNffFile, createGroundPlane, DEFAULT_FIELD_OF_VIEW } from './nff-parser.js';
export { NffParseError } from './types.js';
export type { ParseOptions, NffDocument, NffScene, Viewpoint } from './types.js';
