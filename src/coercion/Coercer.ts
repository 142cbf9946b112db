/**
 * Coercer — Raw Source Values to Typed Field Values
 *
 * Sources hand back text (headers, query strings, cookies) or loosely
 * typed JSON values. The coercer converts them to the field's declared
 * type, failing with a {@link CoercionError} instead of guessing.
 *
 * | kind                              | accepts                                 | result        |
 * |-----------------------------------|-----------------------------------------|---------------|
 * | `string`                          | any scalar                              | `string`      |
 * | `int` `int8..int32` `uint..uint32`| base-10 integer text, range checked     | `number`      |
 * | `int64` `uint64`                  | base-10 integer text, range checked     | `bigint`      |
 * | `float32` `float64`               | decimal / exponent text, `inf`, `nan`   | `number`      |
 * | `boolean`                         | `true 1 yes on t` / `false 0 no off f`  | `boolean`     |
 * | `bytes`                           | text (UTF-8) or `Uint8Array`            | `Uint8Array`  |
 * | `date`                            | RFC 3339, `YYYY-MM-DD[ HH:MM:SS]`, Date | `Date`        |
 * | `uuid`                            | canonical UUID text                     | `string` (lower-case) |
 * | `any`                             | anything                                | unchanged     |
 * | `custom`                          | text, through the type's `decode()`     | decoded value |
 * | `record`                          | object (or JSON object text)            | unchanged     |
 *
 * An empty string binds the zero value of `string`, `bytes` and `custom`
 * fields, passes through `any` unchanged and is an error for every other
 * kind.
 *
 * @module
 */
import { z } from 'zod';
import { CoercionError, describe } from '../core/errors.js';
import { type Result, succeed, fail } from '../core/result.js';
import { type FieldType, type ScalarKind, typeName } from '../schema/RecordSchema.js';
import { zeroOf } from '../schema/ZeroValues.js';

// ── Ranges ───────────────────────────────────────────────

interface IntRange {
    readonly min: bigint;
    readonly max: bigint;
    readonly big: boolean;
}

const INT_RANGES: Readonly<Partial<Record<ScalarKind, IntRange>>> = {
    int: { min: BigInt(Number.MIN_SAFE_INTEGER), max: BigInt(Number.MAX_SAFE_INTEGER), big: false },
    int8: { min: -128n, max: 127n, big: false },
    int16: { min: -32768n, max: 32767n, big: false },
    int32: { min: -2147483648n, max: 2147483647n, big: false },
    int64: { min: -9223372036854775808n, max: 9223372036854775807n, big: true },
    uint: { min: 0n, max: BigInt(Number.MAX_SAFE_INTEGER), big: false },
    uint8: { min: 0n, max: 255n, big: false },
    uint16: { min: 0n, max: 65535n, big: false },
    uint32: { min: 0n, max: 4294967295n, big: false },
    uint64: { min: 0n, max: 18446744073709551615n, big: true },
};

/** Largest finite float32 */
export const MAX_FLOAT32 = 3.4028234663852886e38;

// ── Vocabularies ─────────────────────────────────────────

const TRUE_WORDS: ReadonlySet<string> = new Set([
    'true', '1', 'yes', 'on', 'True', 'TRUE', 'YES', 'ON', 't', 'T',
]);

const FALSE_WORDS: ReadonlySet<string> = new Set([
    'false', '0', 'no', 'off', 'False', 'FALSE', 'NO', 'OFF', 'f', 'F',
]);

const SIGNED_INT = /^[+-]?\d+$/;
const UNSIGNED_INT = /^\d+$/;
const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL_FLOAT = /^([+-]?)(inf|infinity|nan)$/i;

const RFC3339 = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})$/;
const LOCAL_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,3})\d*)?)?$/;
/** Time of day, on January 1st of year 0 */
const TIME_ONLY = /^(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,3})\d*)?$/;

const uuidSchema = z.string().uuid();

// ── Scalar Parsers ───────────────────────────────────────

type Parsed = Result<unknown, string>;

function parseInteger(text: string, kind: ScalarKind, range: IntRange): Parsed {
    const syntax = range.min < 0n ? SIGNED_INT : UNSIGNED_INT;
    if (!syntax.test(text)) return fail('invalid syntax');

    const value = BigInt(text);
    if (value < range.min || value > range.max) return fail(`value ${text} overflows ${kind}`);
    return succeed(range.big ? value : Number(value));
}

function parseFloating(text: string, kind: 'float32' | 'float64'): Parsed {
    const special = SPECIAL_FLOAT.exec(text);
    if (special) {
        const [, sign, word = ''] = special;
        if (word.toLowerCase() === 'nan') return succeed(Number.NaN);
        return succeed(sign === '-' ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY);
    }
    if (!DECIMAL.test(text)) return fail('invalid syntax');

    const value = Number(text);
    if (!Number.isFinite(value)) return fail(`value ${text} overflows ${kind}`);
    if (kind === 'float32') {
        if (Math.abs(value) > MAX_FLOAT32) return fail(`value ${text} overflows ${kind}`);
        return succeed(Math.fround(value));
    }
    return succeed(value);
}

/**
 * Parse a boolean from the extended vocabulary.
 *
 * @returns `undefined` when the text is not a boolean word
 */
export function parseBoolean(text: string): boolean | undefined {
    if (TRUE_WORDS.has(text)) return true;
    if (FALSE_WORDS.has(text)) return false;
    return undefined;
}

/** Year, month, day, hour, minute, second and fraction digits of a zone-less date */
function localDateParts(text: string): readonly (string | undefined)[] | undefined {
    const local = LOCAL_DATE_TIME.exec(text);
    if (local) return local.slice(1);
    const time = TIME_ONLY.exec(text);
    return time ? [undefined, undefined, undefined, ...time.slice(1)] : undefined;
}

function parseDate(text: string): Parsed {
    if (RFC3339.test(text)) {
        const date = new Date(text);
        return Number.isNaN(date.getTime()) ? fail('invalid date') : succeed(date);
    }

    const parts = localDateParts(text);
    if (!parts) return fail('unrecognized date format');

    const part = (index: number, fallback: number): number => {
        const digits = parts[index];
        return digits === undefined ? fallback : Number(digits);
    };
    const year = part(0, 0);
    const month = part(1, 1) - 1;
    const day = part(2, 1);
    const hour = part(3, 0);
    const minute = part(4, 0);
    const second = part(5, 0);
    const millis = Number((parts[6] ?? '0').padEnd(3, '0'));
    // Date.UTC maps years 0-99 to 1900-1999; the setters take them as given
    const date = new Date(0);
    date.setUTCFullYear(year, month, day);
    date.setUTCHours(hour, minute, second, millis);

    // the setters roll out-of-range components over (month 13, day 32, ...)
    const roundTrips =
        date.getUTCFullYear() === year &&
        date.getUTCMonth() === month &&
        date.getUTCDate() === day &&
        date.getUTCHours() === hour &&
        date.getUTCMinutes() === minute &&
        date.getUTCSeconds() === second;

    return roundTrips ? succeed(date) : fail('date component out of range');
}

function parseRecord(raw: unknown): Parsed {
    if (typeof raw === 'object' && raw !== null) return succeed(raw);
    if (typeof raw !== 'string') return fail(`expected an object, got ${typeof raw}`);

    try {
        const parsed: unknown = JSON.parse(raw);
        return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
            ? succeed(parsed)
            : fail('expected a JSON object');
    } catch (err) {
        return fail(describe(err));
    }
}

// ── Rendering ────────────────────────────────────────────

/** Render a scalar raw value as text. Objects are not scalars. */
function render(raw: unknown): string | undefined {
    switch (typeof raw) {
        case 'string': return raw;
        case 'number':
        case 'boolean':
        case 'bigint': return String(raw);
        default: return undefined;
    }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Convert a raw, non-nil source value to the field's declared type.
 *
 * @example
 * ```typescript
 * coerce({ kind: 'int8' }, '42');     // succeed(42)
 * coerce({ kind: 'int8' }, '300');    // fail(CoercionError: cannot convert "300" to int8: value 300 overflows int8)
 * coerce({ kind: 'boolean' }, 'yes'); // succeed(true)
 * coerce({ kind: 'uint64' }, 7);      // succeed(7n)
 * ```
 */
export function coerce(type: FieldType, raw: unknown): Result<unknown, CoercionError> {
    const target = typeName(type);

    if (type.kind === 'any') return succeed(raw);
    if (type.kind === 'bytes' && raw instanceof Uint8Array) return succeed(raw);
    if (type.kind === 'date' && raw instanceof Date) {
        return Number.isNaN(raw.getTime())
            ? fail(new CoercionError(target, String(raw), 'invalid date'))
            : succeed(raw);
    }

    if (type.kind === 'record') {
        const parsed = parseRecord(raw);
        return parsed.ok ? parsed : fail(new CoercionError(target, describe(raw), parsed.error));
    }

    const text = render(raw);
    if (text === undefined) {
        return fail(new CoercionError(target, describe(raw), `unsupported value of type ${raw === null ? 'null' : typeof raw}`));
    }

    if (text === '') {
        switch (type.kind) {
            case 'string':
            case 'bytes':
            case 'custom':
                return succeed(zeroOf(type));
            default:
                return fail(new CoercionError(target, text, `cannot set empty value for ${target} field`));
        }
    }

    if (type.kind === 'custom') {
        try {
            return succeed(type.decode(text));
        } catch (err) {
            return fail(new CoercionError(target, text, describe(err), err));
        }
    }

    const parsed = parseScalar(type.kind, text);
    return parsed.ok ? parsed : fail(new CoercionError(target, text, parsed.error));
}

function parseScalar(kind: ScalarKind, text: string): Parsed {
    const range = INT_RANGES[kind];
    if (range) return parseInteger(text, kind, range);

    switch (kind) {
        case 'string':
            return succeed(text);
        case 'float32':
        case 'float64':
            return parseFloating(text, kind);
        case 'boolean': {
            const value = parseBoolean(text);
            return value === undefined ? fail('invalid syntax') : succeed(value);
        }
        case 'bytes':
            return succeed(new TextEncoder().encode(text));
        case 'date':
            return parseDate(text);
        case 'uuid':
            return uuidSchema.safeParse(text).success
                ? succeed(text.toLowerCase())
                : fail('invalid UUID');
        default:
            return succeed(text);
    }
}
