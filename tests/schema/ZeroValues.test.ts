import { describe, it, expect } from 'vitest';
import {
    NIL_UUID, zeroOf, zeroOfField, createRecord, resetRecord,
} from '../../src/schema/ZeroValues.js';
import {
    type RecordSchema, defineRecord, defineCustomType, field,
} from '../../src/schema/RecordSchema.js';
import { StructuralError } from '../../src/core/errors.js';

const Address = defineRecord('Address', {
    city: field.string('json:city'),
    zip: field.uint32('json:zip'),
});

const Profile = defineRecord('Profile', {
    name: field.string('json:name'),
    balance: field.int64('json:balance'),
    active: field.boolean('json:active'),
    id: field.uuid('json:id'),
    address: field.record(Address),
    nickname: field.string('json:nick', { optional: true }),
});

// ============================================================================
// zeroOf
// ============================================================================

describe('zeroOf', () => {
    it('returns the zero value of each scalar kind', () => {
        expect(zeroOf({ kind: 'string' })).toBe('');
        expect(zeroOf({ kind: 'uuid' })).toBe(NIL_UUID);
        expect(zeroOf({ kind: 'int8' })).toBe(0);
        expect(zeroOf({ kind: 'float64' })).toBe(0);
        expect(zeroOf({ kind: 'uint64' })).toBe(0n);
        expect(zeroOf({ kind: 'boolean' })).toBe(false);
        expect(zeroOf({ kind: 'bytes' })).toEqual(new Uint8Array(0));
        expect(zeroOf({ kind: 'date' })).toEqual(new Date(0));
        expect(zeroOf({ kind: 'any' })).toBeUndefined();
    });

    it('asks custom types for their zero', () => {
        const Level = defineCustomType('level', { decode: (text: string) => text, zero: () => 'info' });
        expect(zeroOf(Level)).toBe('info');
    });

    it('returns fresh mutable values', () => {
        const a = zeroOf({ kind: 'date' });
        const b = zeroOf({ kind: 'date' });
        expect(a).not.toBe(b);
    });

    it('leaves optional fields undefined', () => {
        expect(zeroOfField(field.int('json:n', { optional: true }))).toBeUndefined();
        expect(zeroOfField(field.int('json:n'))).toBe(0);
    });
});

// ============================================================================
// createRecord
// ============================================================================

describe('createRecord', () => {
    it('allocates every field at its zero value, nested records included', () => {
        expect(createRecord(Profile)).toEqual({
            name: '',
            balance: 0n,
            active: false,
            id: NIL_UUID,
            address: { city: '', zip: 0 },
            nickname: undefined,
        });
    });

    it('stops at a record that re-enters itself', () => {
        const Node: RecordSchema = defineRecord('Node', {
            value: field.int('json:value'),
            next: field.record((): RecordSchema => Node, 'recursive:false json:next'),
        });
        expect(createRecord(Node)).toEqual({ value: 0, next: undefined });
    });
});

// ============================================================================
// resetRecord
// ============================================================================

describe('resetRecord', () => {
    it('writes zero values back in place', () => {
        const dest = createRecord(Profile);
        const address = dest.address;
        dest.name = 'Ada';
        dest.balance = 12n;
        dest.address.city = 'Paris';
        dest.nickname = 'ada';

        resetRecord(Profile, dest);

        expect(dest).toEqual(createRecord(Profile));
        expect(dest.address).toBe(address);
    });

    it('allocates a nested record that was missing', () => {
        const dest: Record<string, unknown> = { name: 'x' };
        resetRecord(Profile, dest);
        expect(dest['address']).toEqual({ city: '', zip: 0 });
    });

    it('leaves read-only properties alone', () => {
        const dest = createRecord(Address);
        dest.zip = 75001;
        Object.defineProperty(dest, 'city', { value: 'Lyon', writable: false });

        resetRecord(Address, dest);

        expect(dest).toEqual({ city: 'Lyon', zip: 0 });
    });

    it('rejects a destination that is not an object', () => {
        expect(() => resetRecord(Address, null)).toThrow(StructuralError);
        expect(() => resetRecord(Address, 42)).toThrow('cannot reset Address: destination is number');
    });
});
