/**
 * @fileoverview Result helpers for error handling without exceptions.
 *
 * @module utils/result
 */

import type { Result } from '../types/base.js';

/**
 * Wraps a value in a successful Result.
 *
 * @example
 * const result = ok('v1.0.0');
 * // result: { ok: true, value: 'v1.0.0' }
 */
export function ok<T>(value: T): Result<T, never> {
    return { ok: true, value };
}

/**
 * Wraps an error in a failed Result.
 *
 * @example
 * const result = err({ type: 'parse', message: 'Unexpected token' });
 * // result: { ok: false, error: { type: 'parse', ... } }
 */
export function err<E>(error: E): Result<never, E> {
    return { ok: false, error };
}

/**
 * Transforms the success value of a Result, passing errors through unchanged.
 *
 * @example
 * const tags = mapResult(ok(['v1.0.0', 'junk']), parseTagHistory);
 * // tags: { ok: true, value: [Version for v1.0.0] }
 */
export function mapResult<T, U, E>(
    result: Result<T, E>,
    fn: (value: T) => U
): Result<U, E> {
    if (result.ok) {
        return { ok: true, value: fn(result.value) };
    }
    return result;
}

