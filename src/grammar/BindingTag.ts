/**
 * BindingTag — Field Annotation Decoding
 *
 * Turns a field's tag into the pieces the compiler needs:
 *
 * - one {@link Binding} per allow-listed source name, in tag order;
 * - the raw `default` value;
 * - the `recursive` flag for nested record fields.
 *
 * A binding value has the shape `identifier[,modifier]*`. The standard
 * modifiers are `omitempty`, `omitnil` and `omiterror`; anything else must
 * be in the caller's custom allow-list.
 *
 * @example
 * ```typescript
 * decodeFieldTag(
 *     "header:'X-Id,omitempty' json:id default:7",
 *     { name: 'id', type: { kind: 'int' } },
 *     { bindingNames: ['header', 'json'], customModifiers: new Set() },
 * );
 * // succeed({ bindings: [header X-Id (omitempty), json id (required)], defaultValue: '7', recursive: false })
 * ```
 *
 * @module
 */
import { type Binding, type BindingModifiers } from '../compiler/Chain.js';
import { GrammarError } from '../core/errors.js';
import { type Result, succeed, fail } from '../core/result.js';
import { type FieldType } from '../schema/RecordSchema.js';
import { tagEntries } from './TagScanner.js';

// ── Reserved Vocabulary ──────────────────────────────────

export const OMIT_EMPTY = 'omitempty';
export const OMIT_NIL = 'omitnil';
export const OMIT_ERROR = 'omiterror';

/** Modifiers every source understands */
export const STANDARD_MODIFIERS: ReadonlySet<string> = new Set([OMIT_EMPTY, OMIT_NIL, OMIT_ERROR]);

export const DEFAULT_KEY = 'default';
export const RECURSIVE_KEY = 'recursive';

/** Tag keys that are never binding names */
export const RESERVED_TAG_KEYS: ReadonlySet<string> = new Set([DEFAULT_KEY, RECURSIVE_KEY]);

// ── Types ────────────────────────────────────────────────

export interface FieldTagOptions {
    /** Source names recognized as bindings; other tag keys are ignored */
    readonly bindingNames: readonly string[];
    /** Extra modifiers the source kind accepts */
    readonly customModifiers: ReadonlySet<string>;
}

/** The field a tag belongs to, for type-dependent rules and messages */
export interface TaggedField {
    readonly name: string;
    readonly type: FieldType;
}

export interface DecodedFieldTag {
    readonly bindings: readonly Binding[];
    readonly defaultValue: string | undefined;
    /** Only ever true for record fields; defaults to true there */
    readonly recursive: boolean;
}

// ── Binding ──────────────────────────────────────────────

/**
 * Decode a single binding value (`identifier[,modifier]*`).
 *
 * @example
 * ```typescript
 * decodeBindingTag('query', 'page,omitempty,omiterror', new Set());
 * // succeed({ name: 'query', identifier: 'page', modifiers: { required: false, omitEmpty: true, omitError: true, ... } })
 *
 * decodeBindingTag('query', ',omitempty', new Set());
 * // fail(GrammarError EMPTY_IDENTIFIER)
 * ```
 */
export function decodeBindingTag(
    name: string,
    value: string,
    customModifiers: ReadonlySet<string>,
): Result<Binding, GrammarError> {
    const [head = '', ...rest] = value.split(',');
    const identifier = head.trim();

    if (identifier.length === 0) {
        return fail(new GrammarError(
            'EMPTY_IDENTIFIER',
            `empty binding identifier in tag ${name}:'${value}'`,
        ));
    }

    const flags = new Set<string>();
    const custom = new Set<string>();

    for (const raw of rest) {
        const modifier = raw.trim();
        if (STANDARD_MODIFIERS.has(modifier)) {
            flags.add(modifier);
        } else if (customModifiers.has(modifier)) {
            custom.add(modifier);
        } else {
            return fail(new GrammarError(
                'UNALLOWED_MODIFIER',
                `unallowed binding modifier "${modifier}" in tag ${name}:'${value}'`,
            ));
        }
    }

    const omitEmpty = flags.has(OMIT_EMPTY);
    const omitNil = flags.has(OMIT_NIL);
    const omitError = flags.has(OMIT_ERROR);

    const modifiers: BindingModifiers = Object.freeze({
        required: !(omitEmpty || omitNil || omitError),
        omitEmpty,
        omitNil,
        omitError,
        custom,
    });

    return succeed(Object.freeze({ name, identifier, modifiers }));
}

// ── Field ────────────────────────────────────────────────

/**
 * Decode a whole field tag.
 *
 * Only keys listed in `options.bindingNames` become bindings. When a
 * source name repeats, its first entry is used.
 */
export function decodeFieldTag(
    tag: string,
    field: TaggedField,
    options: FieldTagOptions,
): Result<DecodedFieldTag, GrammarError> {
    const entries = tagEntries(tag);
    if (!entries.ok) return entries;

    const allowed = new Set(options.bindingNames);
    const seen = new Set<string>();
    const bindings: Binding[] = [];
    let defaultValue: string | undefined;
    let recursiveText: string | undefined;

    for (const { key, value } of entries.value) {
        if (seen.has(key)) continue;
        seen.add(key);

        if (key === DEFAULT_KEY) {
            defaultValue = value.trim();
            continue;
        }
        if (key === RECURSIVE_KEY) {
            recursiveText = value.trim();
            continue;
        }
        if (!allowed.has(key)) continue;

        const binding = decodeBindingTag(key, value, options.customModifiers);
        if (!binding.ok) {
            return fail(new GrammarError(
                binding.error.code,
                `field ${field.name}: ${binding.error.message}`,
            ));
        }
        bindings.push(binding.value);
    }

    if (defaultValue === '' && field.type.kind !== 'string') {
        return fail(new GrammarError(
            'EMPTY_DEFAULT',
            `field ${field.name}: empty default value for ${field.type.kind} field`,
        ));
    }

    if (recursiveText !== undefined && recursiveText !== 'true' && recursiveText !== 'false') {
        return fail(new GrammarError(
            'INVALID_RECURSIVE',
            `field ${field.name}: recursive must be true or false, got "${recursiveText}"`,
        ));
    }
    const recursive = field.type.kind === 'record' && recursiveText !== 'false';

    return succeed({ bindings, defaultValue, recursive });
}
