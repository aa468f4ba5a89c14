/**
 * @fileoverview Barrel file for utility functions.
 * Layer 1 - pure utilities that import only from types/.
 *
 * @module utils
 */

// Result helpers
export { ok, err, mapResult } from './result.js';

// Bounded concurrency
export { mapInBatches } from './batch.js';

// Logging
export { consoleLogger } from './logger.js';
