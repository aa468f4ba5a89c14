/**
 * @fileoverview Public entry point of the tagnotes library.
 *
 * @module tagnotes
 */

export type * from './types/index.js';
export * from './core/index.js';
export * from './connectors/index.js';
export { getDefault, loadConfig, validateConfig, mergeConfigs, CONFIG_FILE } from './state/config.js';
export type { ConfigError, ConfigOverride } from './state/config.js';
export { ok, err, mapResult, mapInBatches, consoleLogger } from './utils/index.js';
