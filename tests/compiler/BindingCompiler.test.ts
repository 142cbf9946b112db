/**
 * BindingCompiler — schema to chain compilation and caching.
 *
 * Categories:
 *   1. Step layout
 *   2. Determinism and caching
 *   3. Nested records, atomic types and cycles
 *   4. Errors and debug events
 */
import { describe, it, expect, vi } from 'vitest';
import { BindingCompiler, chainDepth } from '../../src/compiler/BindingCompiler.js';
import { type Chain, type Step } from '../../src/compiler/Chain.js';
import { StructuralError } from '../../src/core/errors.js';
import { type DebugEvent } from '../../src/observability/DebugObserver.js';
import { type RecordSchema, defineRecord, field } from '../../src/schema/RecordSchema.js';

const HTTP = { bindingNames: ['header', 'query', 'json'] };

const Money = defineRecord('Money', {
    amount: field.int64('json:amount'),
    currency: field.string('json:currency'),
});

const Address = defineRecord('Address', {
    city: field.string("header:'X-City,omitempty' default:Paris"),
    zip: field.uint32("query:'zip,omitempty'"),
});

const Signup = defineRecord('Signup', {
    id: field.uuid('json:id'),
    age: field.int("query:'age,omitempty' json:'age,omitempty' default:18"),
    address: field.record(Address),
    price: field.record(Money, 'json:price'),
    createdAt: field.date('json:created_at'),
    secret: field.string('json:secret', { internal: true }),
    untagged: field.string(),
});

function compiled(compiler: BindingCompiler, schema: RecordSchema): Chain {
    const result = compiler.getOrCompile(schema);
    if (!result.ok) throw result.error;
    return result.value;
}

function stepAt(chain: Chain, fieldName: string): Step | undefined {
    return chain.steps.find(step => step.field === fieldName);
}

// ============================================================================
// 1. Step layout
// ============================================================================

describe('BindingCompiler — step layout', () => {
    it('emits steps in field order, skipping internal and untagged fields', () => {
        const chain = compiled(new BindingCompiler(HTTP), Signup);
        expect(chain.steps.map(step => `${step.field}:${step.mode}`)).toEqual([
            'id:bindings',
            'age:bindings',
            'address:nested',
            'price:nested',
            'createdAt:bindings',
        ]);
    });

    it('keeps bindings in tag order with the raw default', () => {
        const step = stepAt(compiled(new BindingCompiler(HTTP), Signup), 'age');
        expect(step?.mode).toBe('bindings');
        if (step?.mode === 'bindings') {
            expect(step.bindings.map(b => `${b.name}:${b.identifier}`)).toEqual(['query:age', 'json:age']);
            expect(step.defaultValue).toBe('18');
        }
    });

    it('never recurses into date and uuid fields', () => {
        const chain = compiled(new BindingCompiler(HTTP), Signup);
        expect(stepAt(chain, 'id')?.mode).toBe('bindings');
        expect(stepAt(chain, 'createdAt')?.mode).toBe('bindings');
    });

    it('freezes chains and steps', () => {
        const chain = compiled(new BindingCompiler(HTTP), Signup);
        expect(Object.isFrozen(chain)).toBe(true);
        expect(Object.isFrozen(chain.steps)).toBe(true);
        expect(chain.steps.every(step => Object.isFrozen(step))).toBe(true);
    });

    it('ignores tag keys the compiler was not configured for', () => {
        const chain = compiled(new BindingCompiler({ bindingNames: ['cookie'] }), Address);
        expect(chain.steps).toEqual([]);
    });
});

// ============================================================================
// 2. Determinism and caching
// ============================================================================

describe('BindingCompiler — determinism and caching', () => {
    it('compiles the same schema to equal chains', () => {
        const compiler = new BindingCompiler(HTTP);
        const first = compiler.compile(Signup);
        const second = new BindingCompiler(HTTP).compile(Signup);
        expect(first).toEqual(second);
    });

    it('compile() never fills the cache', () => {
        const compiler = new BindingCompiler(HTTP);
        compiler.compile(Signup);
        expect(compiler.size).toBe(0);
        expect(compiler.peek(Signup)).toBeUndefined();
    });

    it('returns the published chain on every getOrCompile()', () => {
        const compiler = new BindingCompiler(HTTP);
        const first = compiled(compiler, Signup);
        expect(compiled(compiler, Signup)).toBe(first);
        expect(compiler.peek(Signup)).toBe(first);
    });

    it('publishes nested chains and reuses them', () => {
        const compiler = new BindingCompiler(HTTP);
        const signup = compiled(compiler, Signup);
        expect(compiler.size).toBe(3);

        const nested = stepAt(signup, 'address');
        const address = compiled(compiler, Address);
        expect(nested?.mode === 'nested' && nested.subChain).toBe(address);
    });

    it('clear() drops every cached chain', () => {
        const compiler = new BindingCompiler(HTTP);
        const first = compiled(compiler, Signup);
        compiler.clear();
        expect(compiler.size).toBe(0);
        expect(compiled(compiler, Signup)).not.toBe(first);
    });
});

// ============================================================================
// 3. Nested records, atomic types and cycles
// ============================================================================

describe('BindingCompiler — nesting', () => {
    it('binds atomic record types as a whole value', () => {
        const chain = compiled(new BindingCompiler({ ...HTTP, atomicTypes: ['Money'] }), Signup);
        const price = stepAt(chain, 'price');
        expect(price?.mode).toBe('bindings');
        if (price?.mode === 'bindings') {
            expect(price.bindings.map(b => b.identifier)).toEqual(['price']);
        }
    });

    it('binds recursive:false record fields as a whole value', () => {
        const Order = defineRecord('Order', {
            total: field.record(Money, 'recursive:false json:total'),
        });
        const step = stepAt(compiled(new BindingCompiler(HTTP), Order), 'total');
        expect(step?.mode).toBe('bindings');
    });

    it('omits nested records without any bound field', () => {
        const Empty = defineRecord('Empty', { note: field.string() });
        const Holder = defineRecord('Holder', {
            empty: field.record(Empty),
            name: field.string('json:name'),
        });
        const chain = compiled(new BindingCompiler(HTTP), Holder);
        expect(chain.steps.map(step => step.field)).toEqual(['name']);
    });

    it('rejects a cycle through recursive record fields', () => {
        const A: RecordSchema = defineRecord('A', { b: field.record((): RecordSchema => B) });
        const B: RecordSchema = defineRecord('B', {
            a: field.record((): RecordSchema => A),
            name: field.string('json:name'),
        });

        const result = new BindingCompiler(HTTP).getOrCompile(A);
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error).toBeInstanceOf(StructuralError);
            expect(result.error.code).toBe('RECURSIVE_SCHEMA');
            expect(result.error.message).toBe(
                'recursive schema A.b -> B.a -> A: declare the field recursive:false to bind it as a whole value',
            );
        }
    });

    it('accepts a self-reference declared recursive:false', () => {
        const Node: RecordSchema = defineRecord('Node', {
            value: field.int('json:value'),
            next: field.record((): RecordSchema => Node, 'recursive:false json:next', { optional: true }),
        });
        const chain = compiled(new BindingCompiler(HTTP), Node);
        expect(chain.steps.map(step => `${step.field}:${step.mode}`)).toEqual(['value:bindings', 'next:bindings']);
    });

    it('enforces maxDepth', () => {
        const C = defineRecord('C', { v: field.string('json:v') });
        const B = defineRecord('B', { c: field.record(C) });
        const A = defineRecord('A', { b: field.record(B) });

        expect(chainDepth(compiled(new BindingCompiler({ ...HTTP, maxDepth: 3 }), A))).toBe(3);

        const result = new BindingCompiler({ ...HTTP, maxDepth: 2 }).getOrCompile(A);
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.code).toBe('MAX_DEPTH');
            expect(result.error.message).toBe('schema A nests records deeper than 2 levels');
        }
    });

    it('counts cached sub-chains toward the depth limit', () => {
        const C = defineRecord('C', { v: field.string('json:v') });
        const B = defineRecord('B', { c: field.record(C) });
        const A = defineRecord('A', { b: field.record(B) });

        const compiler = new BindingCompiler({ ...HTTP, maxDepth: 2 });
        expect(compiler.getOrCompile(B).ok).toBe(true);
        const result = compiler.getOrCompile(A);
        expect(!result.ok && result.error.code).toBe('MAX_DEPTH');
    });
});

// ============================================================================
// 4. Errors and debug events
// ============================================================================

describe('BindingCompiler — errors and events', () => {
    it('fails the whole schema on a malformed nested tag and caches nothing', () => {
        const Broken = defineRecord('Broken', { x: field.int("json:'x") });
        const Outer = defineRecord('Outer', { ok: field.string('json:ok'), broken: field.record(Broken) });

        const compiler = new BindingCompiler(HTTP);
        const result = compiler.getOrCompile(Outer);
        expect(!result.ok && result.error.code).toBe('UNTERMINATED_SCOPE');
        expect(compiler.size).toBe(0);
    });

    it('throws INVALID_OPTIONS for bad options', () => {
        expect(() => new BindingCompiler({ bindingNames: ['recursive'] })).toThrow(StructuralError);
    });

    it('reports compile events, cached or not', () => {
        const events: DebugEvent[] = [];
        const debug = vi.fn((event: DebugEvent) => { events.push(event); });
        const compiler = new BindingCompiler(HTTP, { debug });

        compiled(compiler, Address);
        compiled(compiler, Address);

        expect(debug).toHaveBeenCalledTimes(2);
        expect(events.map(e => e.type === 'compile' && [e.schema, e.steps, e.cached])).toEqual([
            ['Address', 2, false],
            ['Address', 2, true],
        ]);
    });
});
