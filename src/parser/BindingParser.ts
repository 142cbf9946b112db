/**
 * BindingParser — One Source Kind, Fully Wired
 *
 * The facade most callers use. A parser owns, for one source kind:
 *
 * - a {@link BindingCompiler} configured with the kind's binding names
 *   and custom modifiers;
 * - a {@link ChainExecutor} calling the kind's extraction function;
 * - a {@link SourceValueCache}, when the kind memoizes per-source views;
 * - optional debug and tracing hooks.
 *
 * `parse()` throws the {@link BindError}; `safeParse()` returns it.
 *
 * @example
 * ```typescript
 * const parser = new BindingParser(httpRequestSource, { debug: createDebugObserver() });
 *
 * const form = parser.parse(request, Signup);        // InferRecord<typeof Signup>
 * const again = parser.safeParse(request, Signup);   // Result<...>
 * ```
 *
 * @module
 */
import { type Binding, type Chain } from '../compiler/Chain.js';
import { BindingCompiler } from '../compiler/BindingCompiler.js';
import { type BindError, FieldError } from '../core/errors.js';
import { type Result, succeed, fail } from '../core/result.js';
import { type CacheEntry, SourceValueCache } from '../cache/SourceValueCache.js';
import { ChainExecutor } from '../execution/ChainExecutor.js';
import { type ExtractFn, type Extraction } from '../execution/Extraction.js';
import { type DebugObserverFn } from '../observability/DebugObserver.js';
import { type BindSpan, type BindTracer, SpanStatusCode } from '../observability/Tracing.js';
import { type InferRecord, type RecordSchema } from '../schema/RecordSchema.js';
import { createRecord, resetRecord } from '../schema/ZeroValues.js';

// ============================================================================
// Source Kinds
// ============================================================================

interface SourceKindBase {
    /**
     * Short name used in spans and messages, e.g. `http`. Chains compiled
     * by the parser are stamped with it.
     */
    readonly name: string;
    /** Tag keys this kind binds from, in no particular order */
    readonly bindingNames: readonly string[];
    readonly customModifiers?: readonly string[];
}

/** A source kind that reads straight from the source instance */
export interface DirectSourceKind<S extends object> extends SourceKindBase {
    extract(source: S, binding: Binding): Extraction;
}

/**
 * A source kind that derives reusable views of each source instance
 * (parsed body, header index, ...) and keeps them in a
 * {@link SourceValueCache} for the duration of a parse.
 */
export interface CachedSourceKind<S extends object, C> extends SourceKindBase {
    /** Build the payload of a fresh cache entry; runs once per source instance */
    createCached(source: S): C;
    extractCached(source: S, entry: CacheEntry<C>, binding: Binding): Extraction;
}

export type SourceKind<S extends object, C = never> =
    | DirectSourceKind<S>
    | CachedSourceKind<S, C>;

function isCached<S extends object, C>(kind: SourceKind<S, C>): kind is CachedSourceKind<S, C> {
    return 'extractCached' in kind;
}

// ============================================================================
// Options
// ============================================================================

export interface ParserOptions {
    /** Receives compile, bind, execute and error events */
    readonly debug?: DebugObserverFn;
    /** Wraps every parse in a `bind.parse.<schema>` span */
    readonly tracing?: BindTracer;
    /**
     * Reset the destination to zero values when a parse fails, so no
     * half-bound record escapes. Default `true`.
     */
    readonly invalidateOnFailure?: boolean;
    /**
     * Keep cache entries after a parse instead of deleting them. Only
     * useful when the same source instance is parsed into several records.
     * Default `false`.
     */
    readonly retainCache?: boolean;
    /** Record schema names bound as a whole value; see `CompilerOptions` */
    readonly atomicTypes?: readonly string[];
    readonly maxDepth?: number;
}

// ============================================================================
// BindingParser
// ============================================================================

export class BindingParser<S extends object, C = never> {
    readonly kind: SourceKind<S, C>;
    readonly compiler: BindingCompiler;
    readonly executor: ChainExecutor<S>;
    /** Present when the kind is a {@link CachedSourceKind} */
    readonly cache: SourceValueCache<S, C> | undefined;

    private readonly _tracer: BindTracer | undefined;
    private readonly _invalidateOnFailure: boolean;
    private readonly _retainCache: boolean;

    /**
     * @throws {StructuralError} `INVALID_OPTIONS` when the kind's binding
     *         names or modifiers, or the compiler options, do not validate
     */
    constructor(kind: SourceKind<S, C>, options: ParserOptions = {}) {
        this.kind = kind;
        this._tracer = options.tracing;
        this._invalidateOnFailure = options.invalidateOnFailure ?? true;
        this._retainCache = options.retainCache ?? false;

        this.compiler = new BindingCompiler({
            bindingNames: kind.bindingNames,
            customModifiers: kind.customModifiers,
            atomicTypes: options.atomicTypes,
            maxDepth: options.maxDepth,
            sourceKind: kind.name,
        }, { debug: options.debug });

        let extract: ExtractFn<S>;
        if (isCached(kind)) {
            const cached = kind;
            const cache = new SourceValueCache<S, C>();
            this.cache = cache;
            extract = (source, binding) => cached.extractCached(
                source,
                cache.getOrCreate(source, s => cached.createCached(s)),
                binding,
            );
        } else {
            const direct = kind;
            this.cache = undefined;
            extract = (source, binding) => direct.extract(source, binding);
        }
        this.executor = new ChainExecutor(extract, { sourceKind: kind.name, debug: options.debug });
    }

    /** Compiled (and cached) chain of a schema */
    chainFor(schema: RecordSchema): Result<Chain, BindError> {
        return this.compiler.getOrCompile(schema);
    }

    /**
     * Bind `source` into `destination` (a fresh zero record by default).
     *
     * @throws {BindError} the first failure
     */
    parse<R extends RecordSchema>(source: S, schema: R, destination?: InferRecord<R>): InferRecord<R> {
        const result = this.safeParse(source, schema, destination);
        if (!result.ok) throw result.error;
        return result.value;
    }

    /**
     * Bind `source` into `destination` (a fresh zero record by default)
     * and report the outcome as a `Result`.
     */
    safeParse<R extends RecordSchema>(
        source: S,
        schema: R,
        destination?: InferRecord<R>,
    ): Result<InferRecord<R>, BindError> {
        const dest = destination ?? createRecord(schema);
        const span = this._tracer?.startSpan(`bind.parse.${schema.name}`, {
            attributes: { 'bind.source': this.kind.name, 'bind.schema': schema.name },
        });

        try {
            const result = this._bind(source, schema, dest);
            if (result.ok) {
                span?.setStatus({ code: SpanStatusCode.OK });
                return succeed(dest);
            }

            if (this._invalidateOnFailure && typeof dest === 'object' && dest !== null) {
                resetRecord(schema, dest);
            }
            if (span) recordFailure(span, result.error);
            return result;
        } catch (err) {
            span?.recordException(err instanceof Error ? err : String(err));
            span?.setStatus({ code: SpanStatusCode.ERROR, message: err instanceof Error ? err.message : String(err) });
            throw err;
        } finally {
            span?.end();
            if (this.cache && !this._retainCache) this.cache.delete(source);
        }
    }

    /**
     * Reset a destination to zero values, recursing into nested records.
     *
     * @throws {StructuralError} `INVALID_DESTINATION` when `destination` is not an object
     */
    invalidate(schema: RecordSchema, destination: unknown): void {
        resetRecord(schema, destination);
    }

    // ── Internals ────────────────────────────────────────

    private _bind(source: S, schema: RecordSchema, dest: unknown): Result<void, BindError> {
        const chain = this.compiler.getOrCompile(schema);
        if (!chain.ok) return chain;

        const executed = this.executor.execute(chain.value, source, dest);
        return executed.ok ? executed : fail(executed.error);
    }
}

// ── Tracing ──────────────────────────────────────────────

/** The error that decides a span's status */
function rootCause(error: BindError): BindError {
    return error instanceof FieldError ? error.cause : error;
}

/**
 * Data-driven failures (missing or malformed values) leave the span
 * `UNSET`; extractor, schema and destination failures mark it `ERROR`.
 */
function recordFailure(span: BindSpan, error: BindError): void {
    const cause = rootCause(error);
    span.setAttribute('bind.error.kind', cause.kind);
    span.setAttribute('bind.error.code', cause.code);
    if (error instanceof FieldError) span.setAttribute('bind.error.field', error.field);

    const systemic = cause.kind === 'extraction' || cause.kind === 'structural' || cause.kind === 'grammar';
    if (systemic) {
        span.recordException(cause);
        span.setStatus({ code: SpanStatusCode.ERROR, message: cause.message });
    } else {
        span.setStatus({ code: SpanStatusCode.UNSET, message: cause.message });
    }
}
