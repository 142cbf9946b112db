/**
 * TagScanner — Nested, Quoted Annotation Grammar
 *
 * A tag is a whitespace-separated sequence of `key:value` entries. A value
 * is either a bare token (up to the next whitespace) or a scope quoted
 * with the reserved delimiter `'`:
 *
 * ```
 * header:'X-Request-Id,omitempty' json:request_id default:'n/a'
 * ```
 *
 * Inside a quoted scope, `:'` opens a nested scope and the matching `'`
 * closes it, so scopes can carry whole tags of their own:
 *
 * ```
 * a:'b:'c:'d'''   →   a = "b:'c:'d''"   →   b = "c:'d'"   →   c = "d"
 * ```
 *
 * A backslash right before the delimiter escapes it. Escapes are copied
 * through untouched (backslash included) so that a nested value can be
 * scanned again with the same rules.
 *
 * The scope scan is an explicit state machine over
 * `{ state: 'normal' | 'escaped', depth }`.
 *
 * @module
 */
import { GrammarError } from '../core/errors.js';
import { type Result, succeed, fail } from '../core/result.js';

// ── Constants ────────────────────────────────────────────

/** Reserved scope delimiter */
export const SCOPE_DELIMITER = "'";

const KEY_VALUE_SEPARATOR = ':';
const ESCAPE = '\\';

// ── Types ────────────────────────────────────────────────

/** One top-level `key:value` entry of a tag, in source order */
export interface TagEntry {
    readonly key: string;
    /** Unwrapped value: the outer delimiters of a quoted scope are removed */
    readonly value: string;
    /** Whether the value was written as a quoted scope */
    readonly quoted: boolean;
}

type ScanState = 'normal' | 'escaped';

interface Scanned {
    readonly value: string;
    readonly quoted: boolean;
    /** Offset just past the value */
    readonly end: number;
}

// ── Character classes ────────────────────────────────────

function isBlank(c: string | undefined): boolean {
    return c === ' ' || c === '\t' || c === '\n' || c === '\r';
}

function skipBlanks(tag: string, from: number): number {
    let i = from;
    while (i < tag.length && isBlank(tag[i])) i++;
    return i;
}

// ── Value scanners ───────────────────────────────────────

/**
 * Scan a quoted scope. `open` is the offset of the opening delimiter.
 */
function scanScope(tag: string, key: string, open: number): Result<Scanned, GrammarError> {
    let state: ScanState = 'normal';
    let depth = 0;
    let out = '';

    for (let i = open + 1; i < tag.length; i++) {
        const c = tag[i];

        if (state === 'escaped') {
            out += c;
            state = 'normal';
            continue;
        }

        if (c === ESCAPE) {
            out += c;
            state = 'escaped';
            continue;
        }

        if (c === KEY_VALUE_SEPARATOR && tag[i + 1] === SCOPE_DELIMITER) {
            out += KEY_VALUE_SEPARATOR + SCOPE_DELIMITER;
            depth++;
            i++;
            continue;
        }

        if (c === SCOPE_DELIMITER) {
            if (depth === 0) {
                return succeed({ value: out, quoted: true, end: i + 1 });
            }
            out += c;
            depth--;
            continue;
        }

        out += c;
    }

    return fail(new GrammarError(
        'UNTERMINATED_SCOPE',
        `unterminated value for "${key}" in tag "${tag}"`,
    ));
}

/**
 * Scan the value following `key:`. `start` is the offset right after the
 * separator; the value must begin there.
 */
function scanValue(tag: string, key: string, start: number): Result<Scanned, GrammarError> {
    const i = start;
    if (i >= tag.length || isBlank(tag[i])) {
        return fail(new GrammarError('MISSING_VALUE', `no value found after "${key}:" in tag "${tag}"`));
    }

    if (tag[i] === SCOPE_DELIMITER) return scanScope(tag, key, i);

    let end = i;
    while (end < tag.length && !isBlank(tag[end])) end++;
    return succeed({ value: tag.slice(i, end), quoted: false, end });
}

/**
 * Walk every top-level entry of a tag. `visit` returns `true` to stop
 * early. Values of every entry are scanned, so the scan position always
 * lands right after a complete value.
 */
function walk(
    tag: string,
    visit: (key: string, value: Scanned) => boolean,
): Result<void, GrammarError> {
    let i = skipBlanks(tag, 0);

    while (i < tag.length) {
        let sep = i;
        while (sep < tag.length && tag[sep] !== KEY_VALUE_SEPARATOR && !isBlank(tag[sep])) sep++;

        if (sep === i || tag[sep] !== KEY_VALUE_SEPARATOR) {
            return fail(new GrammarError(
                'EXPECTED_KEY',
                `expected "key:" at offset ${i} in tag "${tag}"`,
            ));
        }

        const key = tag.slice(i, sep);
        const scanned = scanValue(tag, key, sep + 1);
        if (!scanned.ok) return scanned;

        if (visit(key, scanned.value)) return succeed(undefined);
        i = skipBlanks(tag, scanned.value.end);
    }

    return succeed(undefined);
}

// ── Public API ───────────────────────────────────────────

/**
 * Look up one key of a tag.
 *
 * Keys are matched as whole top-level entries: text inside a quoted
 * value never matches. When a key repeats, the first entry wins.
 *
 * @returns the unwrapped value, `undefined` when the key is absent, or a
 *          failure when the tag is malformed up to the matching entry
 *
 * @example
 * ```typescript
 * subValue("a:'b:'c:'d'''", 'a');   // succeed("b:'c:'d''")
 * subValue("json:id", 'header');     // succeed(undefined)
 * subValue("json:'id", 'json');      // fail(GrammarError UNTERMINATED_SCOPE)
 * ```
 */
export function subValue(tag: string, key: string): Result<string | undefined, GrammarError> {
    let found: string | undefined;
    const walked = walk(tag, (k, scanned) => {
        if (k !== key) return false;
        found = scanned.value;
        return true;
    });
    return walked.ok ? succeed(found) : walked;
}

/**
 * Decode every top-level entry of a tag into a key → value map.
 *
 * Excluded keys are scanned (so the position stays consistent) but not
 * recorded. When a key repeats, the first entry wins.
 */
export function allSubValues(
    tag: string,
    excludeKeys: Iterable<string> = [],
): Result<Map<string, string>, GrammarError> {
    const excluded = new Set(excludeKeys);
    const values = new Map<string, string>();
    const walked = walk(tag, (key, scanned) => {
        if (!excluded.has(key) && !values.has(key)) values.set(key, scanned.value);
        return false;
    });
    return walked.ok ? succeed(values) : walked;
}

/**
 * Decode every top-level entry in source order, duplicates included.
 */
export function tagEntries(tag: string): Result<readonly TagEntry[], GrammarError> {
    const entries: TagEntry[] = [];
    const walked = walk(tag, (key, scanned) => {
        entries.push({ key, value: scanned.value, quoted: scanned.quoted });
        return false;
    });
    return walked.ok ? succeed(entries) : walked;
}
