/**
 * BindingCompiler — Record Schema → Chain Pre-Compilation
 *
 * Walks a record schema once, decodes every field tag and produces the
 * immutable {@link Chain} the executor runs. Chains are cached per
 * schema: the tag grammar is parsed once per record type, never per
 * parse.
 *
 * Nested record fields compile into sub-chains (cached per schema as
 * well) unless they are atomic: listed in `atomicTypes` or tagged
 * `recursive:false`. Atomic record fields are bound as a whole value.
 *
 * A schema that re-enters itself through recursive record fields is
 * rejected with a `RECURSIVE_SCHEMA` structural error naming the cycle.
 * Declaring the cyclic field `recursive:false` breaks the cycle.
 *
 * @example
 * ```typescript
 * const compiler = new BindingCompiler({ bindingNames: ['header', 'query'] });
 * const chain = compiler.getOrCompile(Signup);
 * if (chain.ok) chain.value.steps.length;
 * ```
 *
 * @module
 */
import {
    type CompilerOptionsInput, type ResolvedCompilerOptions, resolveCompilerOptions,
} from '../core/config.js';
import { type BindError, StructuralError } from '../core/errors.js';
import { type Result, succeed, fail } from '../core/result.js';
import { decodeFieldTag } from '../grammar/BindingTag.js';
import { type DebugObserverFn } from '../observability/DebugObserver.js';
import { type RecordSchema, type RecordType } from '../schema/RecordSchema.js';
import { type Chain, type Step } from './Chain.js';

// ── Types ────────────────────────────────────────────────

export interface BindingCompilerHooks {
    /** Receives a `compile` event for every `getOrCompile()` */
    readonly debug?: DebugObserverFn;
}

/** One schema on the current compilation path */
interface PathEntry {
    readonly schema: RecordSchema;
    /** Field of `schema` being descended into, once known */
    readonly via: string;
}

// ── Helpers ──────────────────────────────────────────────

/** Nesting depth of a compiled chain (1 for a chain without sub-chains) */
export function chainDepth(chain: Chain): number {
    let deepest = 0;
    for (const step of chain.steps) {
        if (step.mode === 'nested') deepest = Math.max(deepest, chainDepth(step.subChain));
    }
    return deepest + 1;
}

function describeCycle(path: readonly PathEntry[], closing: RecordSchema): string {
    const start = path.findIndex(entry => entry.schema === closing);
    const hops = path.slice(start).map(entry => `${entry.schema.name}.${entry.via}`);
    return [...hops, closing.name].join(' -> ');
}

// ============================================================================
// BindingCompiler
// ============================================================================

export class BindingCompiler {
    readonly options: ResolvedCompilerOptions;
    private readonly _chains = new Map<RecordSchema, Chain>();
    private readonly _debug: DebugObserverFn | undefined;

    /**
     * @throws {StructuralError} `INVALID_OPTIONS` when the options do not validate
     */
    constructor(options: CompilerOptionsInput, hooks: BindingCompilerHooks = {}) {
        this.options = resolveCompilerOptions(options);
        this._debug = hooks.debug;
    }

    /** Number of cached chains, nested sub-chains included */
    get size(): number {
        return this._chains.size;
    }

    /** Cached chain of a schema, if compiled */
    peek(schema: RecordSchema): Chain | undefined {
        return this._chains.get(schema);
    }

    /**
     * Build the chain of a schema without consulting or filling the cache.
     *
     * Deterministic: the same schema and options always produce
     * structurally equal chains. Errors abort the whole schema.
     */
    compile(schema: RecordSchema): Result<Chain, BindError> {
        return this._build(schema, [], false);
    }

    /**
     * Return the cached chain of a schema, compiling and publishing it
     * (and its sub-chains) on first use. Failures are not cached.
     *
     * When a chain for the schema is already published, the published
     * value is returned and any freshly built one is discarded.
     */
    getOrCompile(schema: RecordSchema): Result<Chain, BindError> {
        const start = this._debug ? performance.now() : 0;
        const cached = this._chains.get(schema);
        if (cached) {
            this._emitCompile(schema, cached, true, start);
            return succeed(cached);
        }

        const built = this._build(schema, [], true);
        if (!built.ok) return built;

        const chain = this._publish(schema, built.value);
        this._emitCompile(schema, chain, false, start);
        return succeed(chain);
    }

    /** Drop every cached chain */
    clear(): void {
        this._chains.clear();
    }

    // ── Internals ────────────────────────────────────────

    private _publish(schema: RecordSchema, chain: Chain): Chain {
        const existing = this._chains.get(schema);
        if (existing) return existing;
        this._chains.set(schema, chain);
        return chain;
    }

    private _build(
        schema: RecordSchema,
        path: readonly PathEntry[],
        publish: boolean,
    ): Result<Chain, BindError> {
        const steps: Step[] = [];

        for (const key of schema.keys) {
            const def = schema.fields[key];
            if (!def || def.internal) continue;

            const decoded = decodeFieldTag(def.tag, { name: key, type: def.type }, this.options);
            if (!decoded.ok) return decoded;

            const { bindings, defaultValue, recursive } = decoded.value;

            if (def.type.kind === 'record' && recursive && !this._isAtomic(def.type)) {
                const nested = this._nested(def.type, [...path, { schema, via: key }], publish);
                if (!nested.ok) return nested;
                if (nested.value.steps.length > 0) {
                    steps.push(Object.freeze({
                        mode: 'nested',
                        field: key,
                        type: def.type,
                        subChain: nested.value,
                    }));
                }
                continue;
            }

            if (bindings.length > 0) {
                steps.push(Object.freeze({
                    mode: 'bindings',
                    field: key,
                    type: def.type,
                    bindings: Object.freeze([...bindings]),
                    defaultValue,
                }));
            }
        }

        return succeed(Object.freeze({
            schema,
            sourceKind: this.options.sourceKind,
            steps: Object.freeze(steps),
        }));
    }

    private _nested(
        type: RecordType,
        path: readonly PathEntry[],
        publish: boolean,
    ): Result<Chain, BindError> {
        const schema = type.schema();

        if (path.some(entry => entry.schema === schema)) {
            return fail(new StructuralError(
                'RECURSIVE_SCHEMA',
                `recursive schema ${describeCycle(path, schema)}: declare the field recursive:false to bind it as a whole value`,
            ));
        }

        const cached = publish ? this._chains.get(schema) : undefined;
        const depth = path.length + (cached ? chainDepth(cached) : 1);
        if (depth > this.options.maxDepth) {
            return fail(new StructuralError(
                'MAX_DEPTH',
                `schema ${path[0]?.schema.name ?? schema.name} nests records deeper than ${this.options.maxDepth} levels`,
            ));
        }
        if (cached) return succeed(cached);

        const built = this._build(schema, path, publish);
        if (!built.ok || !publish) return built;
        return succeed(this._publish(schema, built.value));
    }

    private _isAtomic(type: RecordType): boolean {
        return this.options.atomicTypes.has(type.schema().name);
    }

    private _emitCompile(schema: RecordSchema, chain: Chain, cached: boolean, start: number): void {
        if (!this._debug) return;
        this._debug({
            type: 'compile',
            schema: schema.name,
            steps: chain.steps.length,
            cached,
            durationMs: performance.now() - start,
            timestamp: Date.now(),
        });
    }
}
