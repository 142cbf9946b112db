import { describe, it, expect, vi } from 'vitest';
import { SourceValueCache, CacheEntry, Lazy } from '../../src/cache/SourceValueCache.js';
import { StructuralError } from '../../src/core/errors.js';

// ============================================================================
// Lazy
// ============================================================================

describe('Lazy', () => {
    it('runs the factory once and returns the same value', () => {
        const factory = vi.fn(() => ({ parsed: true }));
        const lazy = new Lazy(factory);

        expect(lazy.isResolved).toBe(false);
        const first = lazy.get();
        expect(lazy.get()).toBe(first);
        expect(factory).toHaveBeenCalledTimes(1);
        expect(lazy.isResolved).toBe(true);
    });

    it('replays the first error without re-running the factory', () => {
        const failure = new SyntaxError('Unexpected token');
        const factory = vi.fn((): number => { throw failure; });
        const lazy = new Lazy(factory);

        expect(() => lazy.get()).toThrow(failure);
        expect(() => lazy.get()).toThrow(failure);
        expect(factory).toHaveBeenCalledTimes(1);
        expect(lazy.isResolved).toBe(true);
    });

    it('rejects a re-entrant get()', () => {
        const lazy: Lazy<number> = new Lazy<number>(() => lazy.get() + 1);
        expect(() => lazy.get()).toThrow('lazy value requested while it is being computed');
        expect(() => lazy.get()).toThrow(StructuralError);
    });
});

// ============================================================================
// CacheEntry
// ============================================================================

describe('CacheEntry', () => {
    it('allows nested reads', () => {
        const entry = new CacheEntry({ n: 1 });
        const value = entry.readLocked(outer => entry.readLocked(inner => outer.n + inner.n));
        expect(value).toBe(2);
    });

    it('mutates or replaces the payload under a write', () => {
        const entry = new CacheEntry({ n: 1 });
        entry.writeLocked(payload => { payload.n = 2; });
        expect(entry.readLocked(p => p.n)).toBe(2);

        entry.writeLocked((_payload, replace) => replace({ n: 10 }));
        expect(entry.readLocked(p => p.n)).toBe(10);
    });

    it('rejects a write while reading', () => {
        const entry = new CacheEntry({ n: 1 });
        expect(() => entry.readLocked(() => entry.writeLocked(() => undefined)))
            .toThrow('cache entry written while it is in use');
    });

    it('rejects a read while writing', () => {
        const entry = new CacheEntry({ n: 1 });
        expect(() => entry.writeLocked(() => entry.readLocked(p => p.n)))
            .toThrow('cache entry read while it is being written');
    });

    it('releases the lock when the callback throws', () => {
        const entry = new CacheEntry({ n: 1 });
        expect(() => entry.readLocked(() => { throw new Error('boom'); })).toThrow('boom');
        expect(() => entry.writeLocked(p => { p.n = 3; })).not.toThrow();
    });
});

// ============================================================================
// SourceValueCache
// ============================================================================

describe('SourceValueCache', () => {
    it('runs the factory once per source instance', () => {
        const cache = new SourceValueCache<object, number>();
        const source = {};
        const factory = vi.fn(() => 42);

        const first = cache.getOrCreate(source, factory);
        const second = cache.getOrCreate(source, factory);

        expect(second).toBe(first);
        expect(factory).toHaveBeenCalledTimes(1);
        expect(cache.size).toBe(1);
    });

    it('keys entries by identity, not structure', () => {
        const cache = new SourceValueCache<{ id: number }, number>();
        const a = cache.getOrCreate({ id: 1 }, s => s.id);
        const b = cache.getOrCreate({ id: 1 }, s => s.id);
        expect(a).not.toBe(b);
        expect(cache.size).toBe(2);
    });

    it('rejects a factory that asks for its own entry', () => {
        const cache = new SourceValueCache<object, string>();
        const source = {};
        let calls = 0;
        function factory(s: object): string {
            calls++;
            cache.getOrCreate(s, factory);
            return 'outer';
        }

        expect(() => cache.getOrCreate(source, factory))
            .toThrow('cache entry requested while it is being created');
        expect(calls).toBe(1);
        expect(cache.size).toBe(0);
    });

    it('creates the entry on a later call after the factory threw', () => {
        const cache = new SourceValueCache<object, number>();
        const source = {};
        expect(() => cache.getOrCreate(source, () => { throw new Error('no body'); })).toThrow('no body');

        const entry = cache.getOrCreate(source, () => 7);
        expect(entry.readLocked(p => p)).toBe(7);
        expect(cache.size).toBe(1);
    });

    it('deletes and clears entries', () => {
        const cache = new SourceValueCache<object, number>();
        const a = {};
        const b = {};
        cache.getOrCreate(a, () => 1);
        cache.getOrCreate(b, () => 2);

        expect(cache.delete(a)).toBe(true);
        expect(cache.delete(a)).toBe(false);
        expect(cache.get(a)).toBeUndefined();
        expect(cache.get(b)?.readLocked(p => p)).toBe(2);

        cache.clear();
        expect(cache.size).toBe(0);
    });
});
