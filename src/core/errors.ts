/**
 * @fileoverview Error types raised by the build-information engine.
 *
 * @module core/errors
 */

/**
 * Error codes carried by {@link TagnotesError}.
 */
export type TagnotesErrorCode = 'VERSION_RESOLUTION' | 'CONNECTOR' | 'ABORTED';

/**
 * Base class for fatal tagnotes errors.
 */
export class TagnotesError extends Error {
    constructor(
        message: string,
        public readonly code: TagnotesErrorCode,
        public readonly details?: unknown,
    ) {
        super(message);
        this.name = 'TagnotesError';
    }
}

/**
 * The target or baseline version cannot be determined.
 * Raised when there are no tags and no explicit version, when the checkout is
 * not at the latest tag in automatic mode, or when an explicit version does
 * not parse.
 */
export class VersionResolutionError extends TagnotesError {
    constructor(message: string, details?: unknown) {
        super(message, 'VERSION_RESOLUTION', details);
        this.name = 'VersionResolutionError';
    }
}

/**
 * A connector call failed. `operation` names the connector method.
 */
export class ConnectorError extends TagnotesError {
    constructor(
        message: string,
        public readonly operation: string,
        details?: unknown,
    ) {
        super(message, 'CONNECTOR', details);
        this.name = 'ConnectorError';
    }
}

/**
 * Assembly was aborted through the caller's AbortSignal.
 */
export class AssemblyAbortedError extends TagnotesError {
    constructor(reason?: unknown) {
        super('Build information assembly was aborted', 'ABORTED', reason);
        this.name = 'AssemblyAbortedError';
    }
}

/**
 * Extracts a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
