/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { ACCELERATORS, DEFAULT_FEATURES, PARTITIONS } from './constants.js';
import { RenderConfigError, type RenderConfig, type RenderConfigInit } from './types.js';

/**
 * Fill in feature toggles (all on) and the accelerator (linear scan), then validate
 */
export function createRenderConfig(init: RenderConfigInit): RenderConfig {
  const config: RenderConfig = {
    width: init.width,
    height: init.height,
    maxDepth: init.maxDepth,
    threadCount: init.threadCount,
    partition: init.partition,
    features: { ...DEFAULT_FEATURES, ...init.features },
    accelerator: init.accelerator ?? 'linear',
  };
  validateRenderConfig(config);
  return config;
}

function requireInteger(config: RenderConfig, field: 'width' | 'height' | 'maxDepth' | 'threadCount', min: number): void {
  const value = config[field];
  if (!Number.isInteger(value) || value < min) {
    throw new RenderConfigError(`${field} must be an integer >= ${min}, got ${value}`, field);
  }
}

export function validateRenderConfig(config: RenderConfig): void {
  requireInteger(config, 'width', 1);
  requireInteger(config, 'height', 1);
  requireInteger(config, 'maxDepth', 0);
  requireInteger(config, 'threadCount', 1);

  if (!PARTITIONS.some((partition) => partition === config.partition)) {
    throw new RenderConfigError(`partition must be one of ${PARTITIONS.join(', ')}`, 'partition');
  }
  if (!ACCELERATORS.some((accelerator) => accelerator === config.accelerator)) {
    throw new RenderConfigError(`accelerator must be one of ${ACCELERATORS.join(', ')}`, 'accelerator');
  }
  for (const [name, enabled] of Object.entries(config.features)) {
    if (typeof enabled !== 'boolean') {
      throw new RenderConfigError(`features.${name} must be a boolean`, 'features');
    }
  }
}
