/**
 * @fileoverview Version module exports.
 *
 * @module core/version
 */

// Tag parsing
export { parseVersion, parseTagHistory } from './parser.js';

// Target and baseline selection
export { findTagIndex, resolveBaseline, resolveTarget } from './baseline.js';

export type { TargetResolutionInput } from './baseline.js';
