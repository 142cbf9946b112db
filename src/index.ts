/**
 * @module
 * @description
 * Result union and the binding error taxonomy.
 */
// ── Core ─────────────────────────────────────────────────
/** @category Core */
export { succeed, fail, OK } from './core/result.js';
/** @category Core */
export type { Result, Success, Failure } from './core/result.js';
/** @category Core */
export {
    BindError, GrammarError, ExtractionError, BindingUnsatisfiedError,
    CoercionError, StructuralError, FieldError,
    isBindError,
} from './core/errors.js';
/** @category Core */
export type {
    AnyBindError, BindErrorKind, GrammarErrorCode, StructuralErrorCode,
} from './core/errors.js';
/** @category Core */
export { DEFAULT_COMPILER_OPTIONS, DEFAULT_SOURCE_KIND, resolveCompilerOptions } from './core/config.js';
/** @category Core */
export type {
    CompilerOptions, CompilerOptionsInput, ResolvedCompilerOptions,
} from './core/config.js';

/**
 * @module
 * @description
 * Record schemas: the ordered, typed field descriptors bound into.
 */
// ── Schema ───────────────────────────────────────────────
/** @category Schema */
export {
    field, defineRecord, defineCustomType, typeName,
} from './schema/RecordSchema.js';
/** @category Schema */
export type {
    ScalarKind, ScalarType, CustomType, RecordType, FieldType,
    FieldOptions, OptionalFieldOptions, FieldBuilder, FieldDef, FieldsMap, RecordSchema,
    InferFieldType, InferRecord,
} from './schema/RecordSchema.js';
/** @category Schema */
export {
    NIL_UUID, zeroOf, zeroOfField, createRecord, resetRecord,
} from './schema/ZeroValues.js';

/**
 * @module
 * @description
 * Tag grammar, compiler, coercer and executor.
 */
// ── Grammar ──────────────────────────────────────────────
/** @category Grammar */
export {
    SCOPE_DELIMITER, subValue, allSubValues, tagEntries,
    OMIT_EMPTY, OMIT_NIL, OMIT_ERROR, STANDARD_MODIFIERS,
    DEFAULT_KEY, RECURSIVE_KEY, RESERVED_TAG_KEYS,
    decodeBindingTag, decodeFieldTag,
} from './grammar/index.js';
/** @category Grammar */
export type {
    TagEntry, FieldTagOptions, TaggedField, DecodedFieldTag,
} from './grammar/index.js';

// ── Compiler ─────────────────────────────────────────────
/** @category Compiler */
export { BindingCompiler, chainDepth } from './compiler/BindingCompiler.js';
/** @category Compiler */
export type { BindingCompilerHooks } from './compiler/BindingCompiler.js';
/** @category Compiler */
export type {
    Binding, BindingModifiers, BindingStep, NestedStep, Step, Chain,
} from './compiler/Chain.js';

// ── Coercion ─────────────────────────────────────────────
/** @category Coercion */
export { coerce, parseBoolean, MAX_FLOAT32 } from './coercion/Coercer.js';

// ── Execution ────────────────────────────────────────────
/** @category Execution */
export {
    ChainExecutor, isWritable, found, notFound, errored,
} from './execution/index.js';
/** @category Execution */
export type {
    ChainExecutorOptions, ExecuteError, Extraction, ExtractFn,
} from './execution/index.js';

/**
 * @module
 * @description
 * Per-source memoization, the parser facade and ready-made sources.
 */
// ── Cache ────────────────────────────────────────────────
/** @category Cache */
export { SourceValueCache, CacheEntry, Lazy } from './cache/index.js';

// ── Parser ───────────────────────────────────────────────
/** @category Parser */
export { BindingParser } from './parser/index.js';
/** @category Parser */
export type {
    SourceKind, DirectSourceKind, CachedSourceKind, ParserOptions,
} from './parser/index.js';

// ── Adapters ─────────────────────────────────────────────
/** @category Adapters */
export {
    recordSource, lookupPath,
    httpRequestSource, createHttpRequestViews, parseCookies,
} from './adapters/index.js';
/** @category Adapters */
export type {
    RecordSourceValue, HttpRequestLike, HttpRequestViews,
} from './adapters/index.js';

/**
 * @module
 * @description
 * Debug events and OpenTelemetry-compatible tracing.
 */
// ── Observability ────────────────────────────────────────
/** @category Observability */
export { createDebugObserver } from './observability/DebugObserver.js';
/** @category Observability */
export type {
    DebugEvent, DebugObserverFn, BindOutcome,
    CompileEvent, BindEvent, ExecuteEvent, ErrorEvent,
} from './observability/DebugObserver.js';
/** @category Observability */
export { SpanStatusCode } from './observability/Tracing.js';
/** @category Observability */
export type { BindTracer, BindSpan, BindAttributeValue } from './observability/Tracing.js';
