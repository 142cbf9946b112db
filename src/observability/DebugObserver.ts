/**
 * DebugObserver — Opt-In Binding Diagnostics
 *
 * Structured, typed debug events emitted by the compiler and the
 * executor. When no observer is attached nothing is built: every emit
 * site is guarded by a single `if (debug)`.
 *
 * @example
 * ```typescript
 * // Default: pretty console.debug output
 * const debug = createDebugObserver();
 *
 * // Custom handler (e.g. forward to a logger)
 * const debug = createDebugObserver((event) => {
 *     logger.debug(event);
 * });
 *
 * const parser = new BindingParser(httpRequestSource, { debug });
 * ```
 *
 * @module
 */
import { type BindErrorKind } from '../core/errors.js';

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/**
 * Emitted when a chain is requested from the compiler.
 */
export interface CompileEvent {
    readonly type: 'compile';
    readonly schema: string;
    /** Top-level steps in the chain */
    readonly steps: number;
    /** Whether the chain came from the compiler cache */
    readonly cached: boolean;
    readonly durationMs: number;
    readonly timestamp: number;
}

/**
 * Outcome of one candidate binding.
 *
 * - `hit`: a value was found and coerced; the field is bound
 * - `miss`: the source had no value
 * - `nil`: the source had a value, but it was null
 * - `error`: extraction or coercion failed
 * - `default`: no binding matched and the default value was applied
 * - `zero`: no binding matched and the field kept its zero value
 */
export type BindOutcome = 'hit' | 'miss' | 'nil' | 'error' | 'default' | 'zero';

/**
 * Emitted for every candidate binding the executor tries, and once more
 * when a field falls back to its default or zero value.
 */
export interface BindEvent {
    readonly type: 'bind';
    readonly schema: string;
    /** Dotted field path */
    readonly field: string;
    /** Source name; empty for `default` and `zero` outcomes */
    readonly binding: string;
    readonly identifier: string;
    readonly outcome: BindOutcome;
    readonly timestamp: number;
}

/**
 * Emitted once per chain execution.
 */
export interface ExecuteEvent {
    readonly type: 'execute';
    readonly schema: string;
    readonly ok: boolean;
    readonly durationMs: number;
    readonly timestamp: number;
}

/**
 * Emitted when a field fails and the chain aborts.
 */
export interface ErrorEvent {
    readonly type: 'error';
    readonly schema: string;
    readonly field: string;
    readonly kind: BindErrorKind;
    readonly error: string;
    readonly timestamp: number;
}

/**
 * Union of all debug event types.
 */
export type DebugEvent =
    | CompileEvent
    | BindEvent
    | ExecuteEvent
    | ErrorEvent;

/**
 * Observer function that receives debug events.
 */
export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Factory
// ============================================================================

const OUTCOME_ICONS: Readonly<Record<BindOutcome, string>> = {
    hit: '✓',
    miss: '·',
    nil: '∅',
    error: '✗',
    default: '↺',
    zero: '0',
};

/**
 * Create a debug observer with compact console output.
 *
 * If a custom handler is provided, events are forwarded to it instead.
 *
 * ```
 * [bindchain] compile   Signup (4 steps) 0.2ms
 * [bindchain] bind      Signup.age query:age ·
 * [bindchain] bind      Signup.age json:age ✓
 * [bindchain] execute   Signup ✓ 0.1ms
 * ```
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        const prefix = '[bindchain]';

        switch (event.type) {
            case 'compile': {
                const cached = event.cached ? ' cached' : '';
                console.debug(`${prefix} compile   ${event.schema} (${event.steps} steps)${cached} ${event.durationMs.toFixed(1)}ms`);
                break;
            }

            case 'bind': {
                const source = event.binding ? `${event.binding}:${event.identifier}` : event.outcome;
                console.debug(`${prefix} bind      ${event.schema}.${event.field} ${source} ${OUTCOME_ICONS[event.outcome]}`);
                break;
            }

            case 'execute': {
                const icon = event.ok ? '✓' : '✗';
                console.debug(`${prefix} execute   ${event.schema} ${icon} ${event.durationMs.toFixed(1)}ms`);
                break;
            }

            case 'error':
                console.debug(`${prefix} ERROR     ${event.schema}.${event.field} [${event.kind}] ${event.error}`);
                break;
        }
    };
}
