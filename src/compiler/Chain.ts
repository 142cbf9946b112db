/**
 * Chain — Compiled Resolution Plan Types
 *
 * A {@link Chain} is the immutable, per-schema plan produced by the
 * {@link BindingCompiler}: one {@link Step} per bound field, each holding
 * either an ordered list of candidate {@link Binding}s or a nested
 * sub-chain for record fields.
 *
 * @module
 */
import { type FieldType, type RecordSchema } from '../schema/RecordSchema.js';

// ── Bindings ─────────────────────────────────────────────

/**
 * Per-binding flags altering fallback behavior.
 *
 * `required` is true exactly when none of the omit flags is set: a
 * binding without any omit modifier is terminal on failure.
 */
export interface BindingModifiers {
    readonly required: boolean;
    /** Skip to the next binding when the value is not found */
    readonly omitEmpty: boolean;
    /** Skip to the next binding when the value is found but null */
    readonly omitNil: boolean;
    /** Skip to the next binding when extraction errors */
    readonly omitError: boolean;
    /** Source-specific modifiers from the caller's allow-list */
    readonly custom: ReadonlySet<string>;
}

/**
 * One candidate extraction rule for a field.
 *
 * @example
 * ```typescript
 * // From the tag  header:'X-Request-Id,omitempty'
 * { name: 'header', identifier: 'X-Request-Id', modifiers: { required: false, omitEmpty: true, ... } }
 * ```
 */
export interface Binding {
    /** Source name, e.g. `header`, `cookie`, `query`, `json` */
    readonly name: string;
    /** Key of the value within that source */
    readonly identifier: string;
    readonly modifiers: BindingModifiers;
}

// ── Steps ────────────────────────────────────────────────

interface StepBase {
    /** Destination property written by this step */
    readonly field: string;
    readonly type: FieldType;
}

/** Resolve a field from its candidate bindings, in declaration order. */
export interface BindingStep extends StepBase {
    readonly mode: 'bindings';
    readonly bindings: readonly Binding[];
    /** Raw default, coerced only when every binding is omittable */
    readonly defaultValue: string | undefined;
}

/** Populate a nested record field by running its own chain. */
export interface NestedStep extends StepBase {
    readonly mode: 'nested';
    readonly subChain: Chain;
}

export type Step = BindingStep | NestedStep;

// ── Chain ────────────────────────────────────────────────

/**
 * Ordered steps for one record schema, plus the source kind whose
 * extraction function they were compiled for. Frozen once published.
 */
export interface Chain {
    readonly schema: RecordSchema;
    /** `sourceKind` of the compiler that built the chain */
    readonly sourceKind: string;
    readonly steps: readonly Step[];
}
