/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @luxray/cli - command implementations and the marbles demo scene
 */

export { createMarblesScene, DEMO_DEFAULTS } from './demo-scene.js';
export type { MarblesOptions, DemoScene } from './demo-scene.js';
export { renderSceneFile, renderDemo, toRenderConfig, DEFAULT_DEPTH } from './commands.js';
export type { RenderCommandOptions, RenderSummary, RunContext } from './commands.js';
export { createProgram } from './program.js';
export type { CliHandlers } from './program.js';
