/**
 * Compiler Configuration — Defaults, Merge and Validation
 *
 * Options are fixed per compiler instance. `resolveCompilerOptions()`
 * merges a caller's partial options over {@link DEFAULT_COMPILER_OPTIONS}
 * and validates the result with zod.
 *
 * @example
 * ```typescript
 * const options = resolveCompilerOptions({
 *     bindingNames: ['header', 'query', 'json'],
 *     customModifiers: ['trim'],
 * });
 * options.customModifiers.has('trim'); // true
 * options.maxDepth;                    // 32
 * ```
 *
 * @module
 */
import { z, type ZodError } from 'zod';
import { RESERVED_TAG_KEYS, STANDARD_MODIFIERS } from '../grammar/BindingTag.js';
import { StructuralError } from './errors.js';

// ── Types ────────────────────────────────────────────────

/** Options accepted by the binding compiler */
export interface CompilerOptions {
    /** Tag keys that name sources; at least one, unique, never `default` or `recursive` */
    readonly bindingNames: readonly string[];
    /** Source-specific modifiers accepted after the binding identifier */
    readonly customModifiers: readonly string[];
    /**
     * Record schema names bound as a whole value instead of recursed into.
     * `date`, `uuid` and custom types are always atomic.
     */
    readonly atomicTypes: readonly string[];
    /** Maximum nesting depth of record fields */
    readonly maxDepth: number;
    /**
     * Source kind stamped on every compiled chain. An executor only runs
     * chains compiled for its own kind.
     */
    readonly sourceKind: string;
}

/** Validated, normalized compiler options */
export interface ResolvedCompilerOptions {
    readonly bindingNames: readonly string[];
    readonly customModifiers: ReadonlySet<string>;
    readonly atomicTypes: ReadonlySet<string>;
    readonly maxDepth: number;
    readonly sourceKind: string;
}

export type CompilerOptionsInput =
    Partial<CompilerOptions> & Pick<CompilerOptions, 'bindingNames'>;

// ── Defaults ─────────────────────────────────────────────

/** Source kind of compilers and executors created without one */
export const DEFAULT_SOURCE_KIND = 'default';

export const DEFAULT_COMPILER_OPTIONS: Readonly<Omit<CompilerOptions, 'bindingNames'>> = Object.freeze({
    customModifiers: [],
    atomicTypes: [],
    maxDepth: 32,
    sourceKind: DEFAULT_SOURCE_KIND,
});

// ── Validation ───────────────────────────────────────────

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_-]*$/;

const bindingNameSchema = z.string()
    .regex(IDENTIFIER, 'must be a non-empty identifier')
    .refine(name => !RESERVED_TAG_KEYS.has(name), { message: 'is a reserved tag key' });

const modifierSchema = z.string()
    .regex(IDENTIFIER, 'must be a non-empty identifier')
    .refine(name => !STANDARD_MODIFIERS.has(name), { message: 'is a standard modifier' });

const compilerOptionsSchema = z.object({
    bindingNames: z.array(bindingNameSchema)
        .min(1, 'at least one binding name is required')
        .refine(names => new Set(names).size === names.length, { message: 'binding names must be unique' }),
    customModifiers: z.array(modifierSchema),
    atomicTypes: z.array(z.string().min(1)),
    maxDepth: z.number().int().positive(),
    sourceKind: z.string().min(1, 'must be a non-empty name'),
}).strict();

function formatIssues(error: ZodError): string {
    return error.issues
        .map(issue => {
            const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
            return `${path}: ${issue.message}`;
        })
        .join('; ');
}

/**
 * Merge and validate compiler options.
 *
 * @throws {StructuralError} `INVALID_OPTIONS`, with the `ZodError` as `cause`
 */
export function resolveCompilerOptions(input: CompilerOptionsInput): ResolvedCompilerOptions {
    const result = compilerOptionsSchema.safeParse({
        ...input,
        customModifiers: input.customModifiers ?? DEFAULT_COMPILER_OPTIONS.customModifiers,
        atomicTypes: input.atomicTypes ?? DEFAULT_COMPILER_OPTIONS.atomicTypes,
        maxDepth: input.maxDepth ?? DEFAULT_COMPILER_OPTIONS.maxDepth,
        sourceKind: input.sourceKind ?? DEFAULT_COMPILER_OPTIONS.sourceKind,
    });
    if (!result.success) {
        throw new StructuralError(
            'INVALID_OPTIONS',
            `invalid compiler options: ${formatIssues(result.error)}`,
            result.error,
        );
    }

    const { bindingNames, customModifiers, atomicTypes, maxDepth, sourceKind } = result.data;
    return Object.freeze({
        bindingNames: Object.freeze([...bindingNames]),
        customModifiers: new Set(customModifiers),
        atomicTypes: new Set(atomicTypes),
        maxDepth,
        sourceKind,
    });
}
