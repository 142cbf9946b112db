/**
 * SourceValueCache — Per-Source-Instance Memoization
 *
 * Adapters often need expensive, reusable views of a source: a parsed
 * JSON body, a lower-cased header index, a cookie map. The cache keys
 * those views by source *identity* (never structural equality) so every
 * binding of one parse shares them, and each view is computed once.
 *
 * - {@link SourceValueCache}: identity map, one entry per source instance
 * - {@link CacheEntry}: holds the payload behind scoped read/write access
 * - {@link Lazy}: compute-once latch for one sub-field of a payload
 *
 * @example
 * ```typescript
 * interface RequestViews { body: Lazy<unknown>; cookies: Lazy<Map<string, string>> }
 *
 * const cache = new SourceValueCache<IncomingRequest, RequestViews>();
 * const entry = cache.getOrCreate(request, () => ({
 *     body: new Lazy(() => JSON.parse(request.body)),
 *     cookies: new Lazy(() => parseCookies(request.headers.cookie)),
 * }));
 * const body = entry.readLocked(views => views.body.get());
 * ```
 *
 * @module
 */
import { StructuralError } from '../core/errors.js';

// ============================================================================
// Lazy
// ============================================================================

type LatchState<T> =
    | { readonly status: 'pending' }
    | { readonly status: 'resolved'; readonly value: T }
    | { readonly status: 'rejected'; readonly error: unknown };

/**
 * Compute-once latch. The first `get()` runs the factory; every later
 * call observes the same value, or rethrows the same error.
 */
export class Lazy<T> {
    private _state: LatchState<T> = { status: 'pending' };
    private _factory: (() => T) | undefined;

    constructor(factory: () => T) {
        this._factory = factory;
    }

    /** Whether the factory has run (successfully or not) */
    get isResolved(): boolean {
        return this._state.status !== 'pending';
    }

    get(): T {
        const state = this._state;
        if (state.status === 'resolved') return state.value;
        if (state.status === 'rejected') throw state.error;

        const factory = this._factory;
        if (!factory) {
            throw new StructuralError('LOCK_CONFLICT', 'lazy value requested while it is being computed');
        }

        this._factory = undefined;
        try {
            const value = factory();
            this._state = { status: 'resolved', value };
            return value;
        } catch (err) {
            this._state = { status: 'rejected', error: err };
            throw err;
        }
    }
}

// ============================================================================
// CacheEntry
// ============================================================================

/**
 * Payload holder with scoped access.
 *
 * Reads are shared and re-entrant. A write is exclusive: requesting it
 * while the entry is being read or written is a `LOCK_CONFLICT`
 * structural error, since a synchronous caller could never be released.
 */
export class CacheEntry<C> {
    private _payload: C;
    private _readers = 0;
    private _writing = false;

    constructor(payload: C) {
        this._payload = payload;
    }

    readLocked<R>(fn: (payload: C) => R): R {
        if (this._writing) {
            throw new StructuralError('LOCK_CONFLICT', 'cache entry read while it is being written');
        }
        this._readers++;
        try {
            return fn(this._payload);
        } finally {
            this._readers--;
        }
    }

    /**
     * Run `fn` with exclusive access. The payload may be mutated in place
     * or swapped through `replace`.
     */
    writeLocked<R>(fn: (payload: C, replace: (next: C) => void) => R): R {
        if (this._writing || this._readers > 0) {
            throw new StructuralError('LOCK_CONFLICT', 'cache entry written while it is in use');
        }
        this._writing = true;
        try {
            return fn(this._payload, (next) => { this._payload = next; });
        } finally {
            this._writing = false;
        }
    }
}

// ============================================================================
// SourceValueCache
// ============================================================================

/**
 * Identity-keyed map from source instances to {@link CacheEntry}s.
 *
 * Entries persist until deleted. `delete()` after a parse bounds memory;
 * the binding parser does it unless told to retain entries.
 */
export class SourceValueCache<S extends object, C> {
    private readonly _entries = new Map<S, CacheEntry<C>>();
    /** Sources whose factory is running */
    private readonly _creating = new Set<S>();

    get size(): number {
        return this._entries.size;
    }

    /**
     * Entry of `source`, created from `factory` on first access. The
     * factory runs at most once per published entry; a factory that
     * throws publishes nothing.
     *
     * @throws {StructuralError} `LOCK_CONFLICT` when the factory asks for
     *         the entry of the source it is creating
     */
    getOrCreate(source: S, factory: (source: S) => C): CacheEntry<C> {
        const existing = this._entries.get(source);
        if (existing) return existing;

        if (this._creating.has(source)) {
            throw new StructuralError('LOCK_CONFLICT', 'cache entry requested while it is being created');
        }

        this._creating.add(source);
        try {
            const entry = new CacheEntry(factory(source));
            this._entries.set(source, entry);
            return entry;
        } finally {
            this._creating.delete(source);
        }
    }

    get(source: S): CacheEntry<C> | undefined {
        return this._entries.get(source);
    }

    /** @returns whether an entry was removed */
    delete(source: S): boolean {
        return this._entries.delete(source);
    }

    clear(): void {
        this._entries.clear();
    }
}
