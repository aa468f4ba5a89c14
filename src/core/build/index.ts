/**
 * @fileoverview Build information module exports.
 *
 * @module core/build
 */

export { createBuildInformation } from './assembler.js';
export type { BuildInformationOptions } from './assembler.js';
