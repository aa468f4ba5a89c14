/**
 * @fileoverview Barrel file for the build-information engine.
 *
 * @module core
 */

export * from './version/index.js';
export * from './changes/index.js';
export * from './build/index.js';
export {
    TagnotesError,
    VersionResolutionError,
    ConnectorError,
    AssemblyAbortedError,
    errorMessage,
} from './errors.js';
export type { TagnotesErrorCode } from './errors.js';
