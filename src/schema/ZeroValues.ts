/**
 * ZeroValues — Destination Allocation and Reset
 *
 * Every field kind has a zero value: the value a field holds when no
 * binding populated it and no default applied. `createRecord()` builds a
 * destination filled with zero values; `resetRecord()` writes them back
 * over a partially bound destination.
 *
 * @module
 */
import { StructuralError } from '../core/errors.js';
import {
    type FieldDef, type FieldType, type InferRecord, type RecordSchema,
} from './RecordSchema.js';

export const NIL_UUID = '00000000-0000-0000-0000-000000000000';

/**
 * Zero value of a field type.
 *
 * `seen` holds the record schemas on the current allocation path; a
 * record field that would re-enter one of them is left `undefined`.
 */
export function zeroOf(type: FieldType, seen: ReadonlySet<RecordSchema> = new Set()): unknown {
    switch (type.kind) {
        case 'string': return '';
        case 'uuid': return NIL_UUID;
        case 'int64':
        case 'uint64': return 0n;
        case 'int': case 'int8': case 'int16': case 'int32':
        case 'uint': case 'uint8': case 'uint16': case 'uint32':
        case 'float32': case 'float64': return 0;
        case 'boolean': return false;
        case 'bytes': return new Uint8Array(0);
        case 'date': return new Date(0);
        case 'any': return undefined;
        case 'custom': return type.zero();
        case 'record': {
            const schema = type.schema();
            return seen.has(schema) ? undefined : zeroFields(schema, new Set([...seen, schema]));
        }
    }
}

/** Zero value of a field, honoring `optional` */
export function zeroOfField(def: FieldDef, seen?: ReadonlySet<RecordSchema>): unknown {
    return def.optional ? undefined : zeroOf(def.type, seen);
}

function zeroFields(schema: RecordSchema, seen: ReadonlySet<RecordSchema>): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const key of schema.keys) {
        const def = schema.fields[key];
        if (def) out[key] = zeroOfField(def, seen);
    }
    return out;
}

/**
 * Allocate a destination object for a schema, every field at its zero value.
 * A record field that re-enters a schema already being allocated starts
 * `undefined`; declare such fields optional.
 *
 * @example
 * ```typescript
 * const form = createRecord(Signup);
 * form.age;      // 0
 * form.address;  // { city: '', zip: 0 }
 * ```
 */
export function createRecord<S extends RecordSchema>(schema: S): InferRecord<S> {
    return zeroFields(schema, new Set([schema])) as InferRecord<S>;
}

/**
 * Reset a destination to zero values in place.
 *
 * Nested record fields are reset recursively when present; optional
 * nested records are dropped back to `undefined`. Read-only properties
 * are left as they are.
 *
 * @throws {StructuralError} `INVALID_DESTINATION` when `dest` is not an object
 */
export function resetRecord(schema: RecordSchema, dest: unknown): void {
    if (typeof dest !== 'object' || dest === null) {
        throw new StructuralError(
            'INVALID_DESTINATION',
            `cannot reset ${schema.name}: destination is ${dest === null ? 'null' : typeof dest}`,
        );
    }
    resetFields(schema, dest, new Set([schema]));
}

function resetFields(schema: RecordSchema, dest: object, seen: ReadonlySet<RecordSchema>): void {
    for (const key of schema.keys) {
        const def = schema.fields[key];
        if (!def) continue;

        const current: unknown = Reflect.get(dest, key);
        if (def.type.kind === 'record' && !def.optional && typeof current === 'object' && current !== null) {
            const nested = def.type.schema();
            if (!seen.has(nested)) {
                resetFields(nested, current, new Set([...seen, nested]));
                continue;
            }
        }
        Reflect.set(dest, key, zeroOfField(def, seen));
    }
}
