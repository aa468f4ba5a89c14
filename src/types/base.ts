/**
 * @fileoverview Foundational types shared by every tagnotes layer.
 * Nothing in here imports from the rest of the project.
 *
 * @module types/base
 */

// ============================================================
// Result Types
// ============================================================

/**
 * Outcome of an operation that can fail without throwing.
 *
 * @typeParam T - The success value type
 * @typeParam E - The error type (defaults to Error)
 *
 * @example
 * function parsePort(raw: string): Result<number, string> {
 *   const port = Number(raw);
 *   return Number.isInteger(port) ? { ok: true, value: port } : { ok: false, error: `bad port ${raw}` };
 * }
 */
export type Result<T, E = Error> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: E };

/**
 * Promise of a {@link Result}, for async operations.
 */
export type AsyncResult<T, E = Error> = Promise<Result<T, E>>;

// ============================================================
// Logging
// ============================================================

/**
 * Minimal logging sink. Implementations write to stderr; stdout is reserved
 * for the MCP transport.
 */
export interface Logger {
    warn(message: string): void;
    debug?(message: string): void;
}
