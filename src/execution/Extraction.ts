/**
 * Extraction — The Per-Source-Kind Integration Point
 *
 * An extraction function reads one binding's value out of one source
 * instance. It knows nothing about destination records: the executor
 * decides what to do with what it reports.
 *
 * @example
 * ```typescript
 * const fromMap: ExtractFn<Map<string, string>> = (source, binding) =>
 *     source.has(binding.identifier)
 *         ? found(source.get(binding.identifier))
 *         : notFound();
 * ```
 *
 * @module
 */
import { type Binding } from '../compiler/Chain.js';

/** What the source reported for one binding */
export type Extraction =
    | { readonly status: 'found'; readonly value: unknown }
    | { readonly status: 'missing' }
    | { readonly status: 'error'; readonly error: unknown };

/**
 * Read one binding from one source instance. May throw; a thrown value
 * is handled like an `error` extraction.
 */
export type ExtractFn<S> = (source: S, binding: Binding) => Extraction;

const MISSING: Extraction = Object.freeze({ status: 'missing' });

/** The source holds the key. A `null`/`undefined` value counts as nil. */
export function found(value: unknown): Extraction {
    return { status: 'found', value };
}

/** The source does not hold the key */
export function notFound(): Extraction {
    return MISSING;
}

/** Reading the key failed */
export function errored(error: unknown): Extraction {
    return { status: 'error', error };
}
