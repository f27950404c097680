/**
 * Result\<T\> — Railway-Oriented Parsing
 *
 * A discriminated union for expressing success/failure without
 * exception throwing, used by the non-throwing parse entry points.
 *
 * @example
 * ```typescript
 * import { safeParseRequest } from 'md-api-schema';
 *
 * const result = safeParseRequest(text, 'student-details');
 * if (!result.ok) {
 *     console.error(result.error.code);   // Failure path
 *     return;
 * }
 * const request = result.value;           // Narrowed to Request
 * ```
 *
 * @module
 */
import type { DocParseError } from './parser/ParseError.js';

// ── Discriminated Union ──────────────────────────────────

/**
 * Successful result containing a typed value.
 *
 * @typeParam T - The success value type
 */
export interface Success<T> {
    readonly ok: true;
    readonly value: T;
}

/**
 * Failed result containing the error that aborted parsing.
 *
 * @typeParam E - The error type
 */
export interface Failure<E = DocParseError> {
    readonly ok: false;
    readonly error: E;
}

/** Check `result.ok` to narrow the type */
export type Result<T, E = DocParseError> = Success<T> | Failure<E>;

// ── Constructors ─────────────────────────────────────────

/** Create a successful result */
export function succeed<T>(value: T): Success<T> {
    return { ok: true, value };
}

/** Create a failed result */
export function fail<E = DocParseError>(error: E): Failure<E> {
    return { ok: false, error };
}
