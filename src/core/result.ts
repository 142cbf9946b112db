/**
 * Result\<T, E\> — Railway-Oriented Binding Results
 *
 * A lightweight discriminated union for expressing success/failure
 * pipelines without exception throwing. The grammar parser, the binding
 * compiler and the chain executor all return `Result` values so callers
 * can branch on `ok` before touching the payload.
 *
 * @example
 * ```typescript
 * import { subValue } from 'bindchain';
 *
 * const lookup = subValue("json:'id,omitempty' default:7", 'default');
 * if (!lookup.ok) throw lookup.error;        // Malformed tag
 * if (lookup.value === undefined) return;    // Key not present
 * const raw = lookup.value;                  // Narrowed to string
 * ```
 *
 * @see {@link succeed} for creating successful results
 * @see {@link fail} for creating failure results
 *
 * @module
 */

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
 * Failed result carrying the error that stopped the pipeline.
 *
 * @typeParam E - The error type
 */
export interface Failure<E> {
    readonly ok: false;
    readonly error: E;
}

/**
 * Discriminated union: either `Success<T>` or `Failure<E>`.
 *
 * Check `result.ok` to narrow the type.
 */
export type Result<T, E = Error> = Success<T> | Failure<E>;

// ── Constructors ─────────────────────────────────────────

/**
 * Create a successful result.
 *
 * @example
 * ```typescript
 * return succeed(42);
 * return succeed(new Map([['a', 'b']]));
 * ```
 */
export function succeed<T>(value: T): Success<T> {
    return { ok: true, value };
}

/**
 * Create a failed result.
 *
 * @example
 * ```typescript
 * return fail(new GrammarError('UNTERMINATED_SCOPE', 'unterminated value for "a"'));
 * ```
 */
export function fail<E>(error: E): Failure<E> {
    return { ok: false, error };
}

/** Shared `Success<void>` so hot paths don't allocate per step. */
export const OK: Success<void> = Object.freeze({ ok: true, value: undefined });
