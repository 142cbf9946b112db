/**
 * ChainExecutor — Runs a Compiled Chain Against One Source Instance
 *
 * Steps run in field-declaration order and fail fast: the first failing
 * step aborts the chain, and fields written before it stay written.
 *
 * Within a step, candidate bindings are tried in tag order until one
 * produces a value:
 *
 * | extraction          | `omit*` flag set      | required binding         | otherwise         |
 * |---------------------|-----------------------|--------------------------|-------------------|
 * | error               | `omiterror`: next     | abort the field          | record, next      |
 * | found, not nil      | coerce and stop       | coerce and stop          | coerce and stop   |
 * | found, nil          | `omitnil`: next       | unsatisfied              | next              |
 * | missing             | next                  | unsatisfied              | next              |
 *
 * When every binding is exhausted without a value, the default value is
 * coerced and applied; without a default the field keeps its zero value.
 * Errors recorded from omittable bindings only surface through a later
 * required failure.
 *
 * An executor runs only chains compiled for its own source kind.
 *
 * @module
 */
import { type Binding, type BindingStep, type Chain, type NestedStep, type Step } from '../compiler/Chain.js';
import { coerce } from '../coercion/Coercer.js';
import { DEFAULT_SOURCE_KIND } from '../core/config.js';
import {
    type AnyBindError, type BindError,
    BindingUnsatisfiedError, ExtractionError, FieldError, StructuralError,
} from '../core/errors.js';
import { type Result, OK, fail } from '../core/result.js';
import { type BindOutcome, type DebugObserverFn } from '../observability/DebugObserver.js';
import { createRecord } from '../schema/ZeroValues.js';
import { type ExtractFn, type Extraction, errored } from './Extraction.js';

// ── Types ────────────────────────────────────────────────

export interface ChainExecutorOptions {
    /** Must match the `sourceKind` of every chain executed. Default `'default'` */
    readonly sourceKind?: string;
    /** Receives `bind`, `error` and `execute` events */
    readonly debug?: DebugObserverFn;
}

export type ExecuteError = FieldError | StructuralError;

// ── Writability ──────────────────────────────────────────

/**
 * Whether `key` can be assigned on `target`: not frozen, not a read-only
 * data property, not an accessor without a setter (own or inherited).
 */
export function isWritable(target: object, key: string): boolean {
    let owner: object | null = target;
    while (owner !== null) {
        const descriptor = Object.getOwnPropertyDescriptor(owner, key);
        if (descriptor) {
            if ('value' in descriptor) {
                return owner === target
                    ? descriptor.writable === true
                    : descriptor.writable === true && Object.isExtensible(target);
            }
            return descriptor.set !== undefined;
        }
        owner = Object.getPrototypeOf(owner);
    }
    return Object.isExtensible(target);
}

function isObject(value: unknown): value is object {
    return typeof value === 'object' && value !== null;
}

// ============================================================================
// ChainExecutor
// ============================================================================

export class ChainExecutor<S> {
    readonly sourceKind: string;
    private readonly _extract: ExtractFn<S>;
    private readonly _debug: DebugObserverFn | undefined;

    constructor(extract: ExtractFn<S>, options: ChainExecutorOptions = {}) {
        this._extract = extract;
        this.sourceKind = options.sourceKind ?? DEFAULT_SOURCE_KIND;
        this._debug = options.debug;
    }

    /**
     * Populate `destination` from `source` following `chain`.
     *
     * @returns a `FieldError` naming the dotted path of the failing field,
     *          or a `StructuralError` when `destination` is not an object
     *          or the chain was compiled for another source kind
     */
    execute(chain: Chain, source: S, destination: unknown): Result<void, ExecuteError> {
        if (chain.sourceKind !== this.sourceKind) {
            return fail(new StructuralError(
                'SOURCE_KIND_MISMATCH',
                `chain for ${chain.schema.name} was compiled for source kind ${chain.sourceKind}, not ${this.sourceKind}`,
            ));
        }
        if (!isObject(destination)) {
            return fail(new StructuralError(
                'INVALID_DESTINATION',
                `destination for ${chain.schema.name} must be an object, got ${destination === null ? 'null' : typeof destination}`,
            ));
        }

        const start = this._debug ? performance.now() : 0;
        const result = this._run(chain, source, destination, chain.schema.name, '');

        if (this._debug) {
            this._debug({
                type: 'execute',
                schema: chain.schema.name,
                ok: result.ok,
                durationMs: performance.now() - start,
                timestamp: Date.now(),
            });
        }
        return result;
    }

    // ── Chain & Steps ────────────────────────────────────

    private _run(
        chain: Chain,
        source: S,
        dest: object,
        schema: string,
        prefix: string,
    ): Result<void, FieldError> {
        for (const step of chain.steps) {
            if (!isWritable(dest, step.field)) continue;

            const result = this._step(step, source, dest, schema, prefix);
            if (!result.ok) {
                const error = result.error instanceof FieldError
                    ? new FieldError(step.field, result.error)
                    : this._fieldError(step.field, result.error, schema, prefix);
                return fail(error);
            }
        }
        return OK;
    }

    private _step(
        step: Step,
        source: S,
        dest: object,
        schema: string,
        prefix: string,
    ): Result<void, AnyBindError> {
        return step.mode === 'nested'
            ? this._nested(step, source, dest, schema, prefix)
            : this._bindings(step, source, dest, schema, prefix + step.field);
    }

    private _nested(
        step: NestedStep,
        source: S,
        dest: object,
        schema: string,
        prefix: string,
    ): Result<void, AnyBindError> {
        let nested: unknown = Reflect.get(dest, step.field);

        if (nested === undefined || nested === null) {
            nested = createRecord(step.subChain.schema);
            Reflect.set(dest, step.field, nested);
        }

        if (!isObject(nested)) {
            return fail(new StructuralError(
                'NOT_ADDRESSABLE',
                `nested field ${prefix + step.field} holds a ${typeof nested}, not a ${step.subChain.schema.name} record`,
            ));
        }

        return this._run(step.subChain, source, nested, schema, `${prefix}${step.field}.`);
    }

    private _bindings(
        step: BindingStep,
        source: S,
        dest: object,
        schema: string,
        path: string,
    ): Result<void, AnyBindError> {
        const errors: BindError[] = [];

        for (const binding of step.bindings) {
            const { modifiers } = binding;
            const extraction = this._safeExtract(source, binding);

            if (extraction.status === 'error') {
                this._emitBind(schema, path, binding, 'error');
                if (modifiers.omitError) continue;

                const error = new ExtractionError(binding, extraction.error);
                if (modifiers.required) {
                    return fail(errors.length === 0 ? error : new BindingUnsatisfiedError(binding, [...errors, error]));
                }
                errors.push(error);
                continue;
            }

            if (extraction.status === 'found' && extraction.value !== null && extraction.value !== undefined) {
                const coerced = coerce(step.type, extraction.value);
                if (!coerced.ok) {
                    this._emitBind(schema, path, binding, 'error');
                    return coerced;
                }
                Reflect.set(dest, step.field, coerced.value);
                this._emitBind(schema, path, binding, 'hit');
                return OK;
            }

            const outcome: BindOutcome = extraction.status === 'found' ? 'nil' : 'miss';
            this._emitBind(schema, path, binding, outcome);
            if (outcome === 'nil' && modifiers.omitNil) continue;

            if (modifiers.required) {
                return fail(new BindingUnsatisfiedError(binding, errors));
            }
        }

        if (step.defaultValue !== undefined) {
            const coerced = coerce(step.type, step.defaultValue);
            if (!coerced.ok) return coerced;
            Reflect.set(dest, step.field, coerced.value);
            this._emitFallback(schema, path, 'default');
            return OK;
        }

        this._emitFallback(schema, path, 'zero');
        return OK;
    }

    // ── Helpers ──────────────────────────────────────────

    private _safeExtract(source: S, binding: Binding): Extraction {
        try {
            return this._extract(source, binding);
        } catch (err) {
            return errored(err);
        }
    }

    private _fieldError(
        field: string,
        cause: Exclude<AnyBindError, FieldError>,
        schema: string,
        prefix: string,
    ): FieldError {
        const error = new FieldError(field, cause);
        if (this._debug) {
            this._debug({
                type: 'error',
                schema,
                field: prefix + field,
                kind: cause.kind,
                error: cause.message,
                timestamp: Date.now(),
            });
        }
        return error;
    }

    private _emitBind(schema: string, field: string, binding: Binding, outcome: BindOutcome): void {
        if (!this._debug) return;
        this._debug({
            type: 'bind',
            schema,
            field,
            binding: binding.name,
            identifier: binding.identifier,
            outcome,
            timestamp: Date.now(),
        });
    }

    private _emitFallback(schema: string, field: string, outcome: 'default' | 'zero'): void {
        if (!this._debug) return;
        this._debug({
            type: 'bind',
            schema,
            field,
            binding: '',
            identifier: '',
            outcome,
            timestamp: Date.now(),
        });
    }
}
