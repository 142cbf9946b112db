/**
 * Binding Errors — Kind-Tagged Error Taxonomy
 *
 * Every failure raised by the grammar parser, the compiler, the executor
 * or the coercer is a {@link BindError}. Callers branch on `kind` (and the
 * finer-grained `code`), never on message text.
 *
 * | kind          | raised by                     | when                                         |
 * |---------------|-------------------------------|----------------------------------------------|
 * | `grammar`     | grammar parser, compiler      | malformed tag, empty identifier, bad modifier |
 * | `extraction`  | executor (from the extractor) | the source adapter reported or threw an error |
 * | `unsatisfied` | executor                      | no candidate binding produced a value         |
 * | `coercion`    | coercer                       | raw value does not fit the field type         |
 * | `structural`  | compiler, executor, cache     | bad destination, schema cycle, bad options    |
 * | `field`       | executor                      | wraps any of the above with the field path    |
 *
 * @example
 * ```typescript
 * const result = parser.safeParse(request, SignupForm);
 * if (!result.ok) {
 *     const { field, cause } = result.error;
 *     if (cause.kind === 'unsatisfied') return badRequest(`missing ${field}`);
 *     throw result.error;
 * }
 * ```
 *
 * @module
 */
import { type Binding } from '../compiler/Chain.js';

// ── Kinds & Codes ────────────────────────────────────────

export type BindErrorKind =
    | 'grammar'
    | 'extraction'
    | 'unsatisfied'
    | 'coercion'
    | 'structural'
    | 'field';

export type GrammarErrorCode =
    | 'EXPECTED_KEY'
    | 'UNTERMINATED_SCOPE'
    | 'MISSING_VALUE'
    | 'EMPTY_IDENTIFIER'
    | 'UNALLOWED_MODIFIER'
    | 'EMPTY_DEFAULT'
    | 'INVALID_RECURSIVE';

export type StructuralErrorCode =
    | 'RECURSIVE_SCHEMA'
    | 'MAX_DEPTH'
    | 'NOT_ADDRESSABLE'
    | 'INVALID_DESTINATION'
    | 'SOURCE_KIND_MISMATCH'
    | 'INVALID_OPTIONS'
    | 'LOCK_CONFLICT';

// ── Base ─────────────────────────────────────────────────

/**
 * Base class of every error produced by the binding pipeline.
 */
export abstract class BindError extends Error {
    abstract readonly kind: BindErrorKind;
    readonly code: string;

    protected constructor(code: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.code = code;
    }
}

// ── Concrete Errors ──────────────────────────────────────

/** Malformed annotation. Only raised at compile time, never cached. */
export class GrammarError extends BindError {
    readonly kind = 'grammar' as const;
    declare readonly code: GrammarErrorCode;

    constructor(code: GrammarErrorCode, message: string) {
        super(code, message);
        this.name = 'GrammarError';
    }
}

/** The extraction function reported (or threw) an error for a binding. */
export class ExtractionError extends BindError {
    readonly kind = 'extraction' as const;
    readonly binding: Binding;

    constructor(binding: Binding, cause: unknown) {
        super(
            'EXTRACTION_FAILED',
            `error getting value from source ${binding.name} for "${binding.identifier}": ${describe(cause)}`,
            { cause },
        );
        this.name = 'ExtractionError';
        this.binding = binding;
    }
}

/**
 * A required binding produced no value.
 *
 * `causes` holds the errors recorded from earlier candidates of the same
 * field, in binding order.
 */
export class BindingUnsatisfiedError extends BindError {
    readonly kind = 'unsatisfied' as const;
    readonly binding: Binding;
    readonly causes: readonly BindError[];

    constructor(binding: Binding, causes: readonly BindError[] = []) {
        const tail = causes.length > 0
            ? `: ${causes.map(c => c.message).join('; ')}`
            : '';
        super('REQUIRED_MISSING', `required binding ${binding.name}:'${binding.identifier}' not satisfied${tail}`);
        this.name = 'BindingUnsatisfiedError';
        this.binding = binding;
        this.causes = causes;
    }
}

/** An extracted value could not be converted to the field's declared type. */
export class CoercionError extends BindError {
    readonly kind = 'coercion' as const;
    readonly target: string;
    readonly raw: string;

    constructor(target: string, raw: string, reason: string, cause?: unknown) {
        super('COERCION_FAILED', `cannot convert "${raw}" to ${target}: ${reason}`, { cause });
        this.name = 'CoercionError';
        this.target = target;
        this.raw = raw;
    }
}

/** Invalid destination shape, schema cycle, bad options or lock misuse. */
export class StructuralError extends BindError {
    readonly kind = 'structural' as const;
    declare readonly code: StructuralErrorCode;

    constructor(code: StructuralErrorCode, message: string, cause?: unknown) {
        super(code, message, { cause });
        this.name = 'StructuralError';
    }
}

/**
 * A step failure, tagged with the dotted path of the field that failed.
 *
 * Nested failures are flattened: a failure of `street` inside `address`
 * surfaces as one `FieldError` with `field === 'address.street'` whose
 * `cause` is the original leaf error.
 */
export class FieldError extends BindError {
    readonly kind = 'field' as const;
    readonly field: string;
    declare readonly cause: Exclude<AnyBindError, FieldError>;

    constructor(field: string, cause: AnyBindError) {
        const leaf = cause instanceof FieldError ? cause.cause : cause;
        const path = cause instanceof FieldError ? `${field}.${cause.field}` : field;
        super(leaf.code, `failed to bind field ${path}: ${leaf.message}`, { cause: leaf });
        this.name = 'FieldError';
        this.field = path;
    }
}

/** Union of all concrete error classes. */
export type AnyBindError =
    | GrammarError
    | ExtractionError
    | BindingUnsatisfiedError
    | CoercionError
    | StructuralError
    | FieldError;

// ── Guards ───────────────────────────────────────────────

/**
 * Check whether a value is a binding error, optionally of a given kind.
 *
 * @example
 * ```typescript
 * if (isBindError(err, 'coercion')) console.warn(err.target);
 * ```
 */
export function isBindError<K extends BindErrorKind>(
    value: unknown,
    kind?: K,
): value is Extract<AnyBindError, { kind: K }> {
    if (!(value instanceof BindError)) return false;
    return kind === undefined || value.kind === kind;
}

/** Render an unknown thrown value for an error message. */
export function describe(value: unknown): string {
    if (value instanceof Error) return value.message;
    if (typeof value === 'string') return value;
    try {
        return JSON.stringify(value) ?? String(value);
    } catch {
        return String(value);
    }
}
