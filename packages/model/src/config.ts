/**
 * Engine defaults and config validation
 */

import type { EngineConfig } from './types.js';

export const DEFAULT_CONFIG: Readonly<EngineConfig> = {
  rollingWindows: [50, 100, 250],
  trendPoints: 20,
  minPa: 50,
  primaryWindowOrder: [100, 50, 250],
  progressInterval: 50,
};

function assertInteger(value: number, field: string, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Invalid config: ${field} must be an integer >= ${min}, got ${value}`);
  }
}

/**
 * Merge a partial config over the defaults and validate it
 */
export function resolveConfig(config: Partial<EngineConfig> = {}): EngineConfig {
  const resolved: EngineConfig = {
    rollingWindows: [...(config.rollingWindows ?? DEFAULT_CONFIG.rollingWindows)],
    trendPoints: config.trendPoints ?? DEFAULT_CONFIG.trendPoints,
    minPa: config.minPa ?? DEFAULT_CONFIG.minPa,
    primaryWindowOrder: [...(config.primaryWindowOrder ?? DEFAULT_CONFIG.primaryWindowOrder)],
    progressInterval: config.progressInterval ?? DEFAULT_CONFIG.progressInterval,
  };

  for (const window of resolved.rollingWindows) {
    assertInteger(window, 'rollingWindows', 1);
  }
  for (const window of resolved.primaryWindowOrder) {
    assertInteger(window, 'primaryWindowOrder', 1);
  }
  assertInteger(resolved.trendPoints, 'trendPoints', 0);
  assertInteger(resolved.minPa, 'minPa', 0);
  assertInteger(resolved.progressInterval, 'progressInterval', 1);

  return resolved;
}
