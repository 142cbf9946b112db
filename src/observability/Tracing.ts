/**
 * Tracing — OpenTelemetry-Compatible Tracing Abstraction
 *
 * Minimal interfaces that are structurally compatible with OpenTelemetry's
 * `Tracer` and `Span`, so `trace.getTracer('bindchain')` can be passed
 * straight to a parser without an adapter or an `@opentelemetry/*`
 * dependency.
 *
 * @example
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 *
 * const parser = new BindingParser(httpRequestSource, {
 *     tracing: trace.getTracer('bindchain'),
 * });
 * ```
 *
 * @module
 */

// ============================================================================
// Constants
// ============================================================================

/**
 * Span status codes matching OpenTelemetry's `SpanStatusCode` enum.
 *
 * - `UNSET` (0): binding failures caused by the incoming data (missing
 *   or malformed values). These should not page anyone.
 * - `OK` (1): the destination was fully bound.
 * - `ERROR` (2): the extractor threw, or the schema or destination is
 *   broken.
 */
export const SpanStatusCode = { UNSET: 0, OK: 1, ERROR: 2 } as const;

// ============================================================================
// Types
// ============================================================================

/**
 * Attribute value type, matching OpenTelemetry's `SpanAttributeValue`.
 */
export type BindAttributeValue =
    | string
    | number
    | boolean
    | ReadonlyArray<string>
    | ReadonlyArray<number>
    | ReadonlyArray<boolean>;

/**
 * Structural subset of OTel's `Span`.
 */
export interface BindSpan {
    setAttribute(key: string, value: BindAttributeValue): void;
    setStatus(status: { code: number; message?: string }): void;
    /** Must be called exactly once. The parser calls it in a `finally` block. */
    end(): void;
    recordException(exception: Error | string): void;
}

/**
 * Structural subset of OTel's `Tracer`: the first two parameters of
 * `startSpan(name, options?, context?)`.
 */
export interface BindTracer {
    startSpan(name: string, options?: {
        attributes?: Record<string, BindAttributeValue>;
    }): BindSpan;
}
