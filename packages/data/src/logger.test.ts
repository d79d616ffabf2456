/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger, formatContext } from './logger.js';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it('formats component, operation, shape id and line', () => {
    expect(formatContext({ component: 'NffParser', operation: 'parseDirective', line: 12 }))
      .toBe('[NffParser] parseDirective (line 12)');
    expect(formatContext({ component: 'SceneCompiler', shapeId: 3 })).toBe('[SceneCompiler] #3');
  });

  it('always prints warnings', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    createLogger('NffParser').warn('skipping cone', { line: 4 });
    expect(warn).toHaveBeenCalledWith('[NffParser] (line 4) skipping cone');
  });

  it('prints info only when LUXRAY_DEBUG=true', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const log1 = createLogger('Renderer');

    vi.stubEnv('LUXRAY_DEBUG', 'false');
    log1.info('frame started');
    expect(log).not.toHaveBeenCalled();

    vi.stubEnv('LUXRAY_DEBUG', 'true');
    log1.info('frame started', { operation: 'renderFrame' });
    expect(log).toHaveBeenCalledWith('[Renderer] renderFrame frame started');
  });

  it('appends the formatted error to error messages', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failure = new Error('boom');
    failure.stack = undefined;
    createLogger('Renderer').error('task failed', failure);
    expect(error).toHaveBeenCalledWith('[Renderer] task failed:', 'Error: boom');
  });
});
