/**
 * RecordSchema — Explicitly Registered Field Schemas with Type Inference
 *
 * A record schema is the ordered list of fields a destination object
 * exposes to binding: for each field its declared type, its annotation
 * tag and a couple of flags. The compiler reads the schema instead of
 * reflecting over a class, so "compile once per record type" stays the
 * observable contract.
 *
 * @example
 * ```typescript
 * const Address = defineRecord('Address', {
 *     city:    field.string("header:'X-City,omitempty' default:Paris"),
 *     zip:     field.uint32("query:'zip,omitempty'"),
 * });
 *
 * const Signup = defineRecord('Signup', {
 *     id:        field.uuid("json:id"),
 *     age:       field.int("query:'age,omitempty' json:'age,omitempty' default:18"),
 *     address:   field.record(Address),
 *     createdAt: field.date("json:'created_at,omitnil'", { optional: true }),
 * });
 *
 * type SignupData = InferRecord<typeof Signup>;
 * // { id: string; age: number; address: { city: string; zip: number }; createdAt?: Date | undefined }
 * ```
 *
 * @module
 */

// ============================================================================
// Field Types
// ============================================================================

/** Scalar kinds understood by the coercer */
export type ScalarKind =
    | 'string'
    | 'int' | 'int8' | 'int16' | 'int32' | 'int64'
    | 'uint' | 'uint8' | 'uint16' | 'uint32' | 'uint64'
    | 'float32' | 'float64'
    | 'boolean'
    | 'bytes'
    | 'date'
    | 'uuid'
    | 'any';

/** Built-in scalar field type */
export interface ScalarType<K extends ScalarKind = ScalarKind> {
    readonly kind: K;
}

/**
 * A user-defined leaf type decoded from text.
 *
 * Custom types are atomic: the compiler never recurses into them.
 */
export interface CustomType<T = unknown> {
    readonly kind: 'custom';
    /** Type name used in error messages and in `atomicTypes` */
    readonly name: string;
    /** Decode the textual value. Throw to report a coercion failure. */
    decode(text: string): T;
    /** Zero value assigned by `createRecord()` and `invalidate()` */
    zero(): T;
}

/**
 * A nested record field.
 *
 * The schema is referenced through a thunk so self-referential and
 * mutually-referential records can be declared.
 */
export interface RecordType<S extends RecordSchema = RecordSchema> {
    readonly kind: 'record';
    readonly schema: () => S;
}

export type FieldType = ScalarType | CustomType | RecordType;

// ============================================================================
// Field & Record Definitions
// ============================================================================

/** Flags accepted by every `field.*()` builder */
export interface FieldOptions {
    /**
     * The destination property may be `undefined`. Optional scalar fields
     * start out `undefined`; optional record fields are allocated on
     * demand when their sub-chain runs.
     */
    readonly optional?: boolean;
    /**
     * The field is not externally visible: it is carried in the schema
     * (for `createRecord()`) but never bound from a source.
     */
    readonly internal?: boolean;
}

/** One field of a record schema */
export interface FieldDef<T extends FieldType = FieldType, O extends boolean = boolean> {
    readonly type: T;
    /** Annotation tag, e.g. `header:'X-Id,omitempty' default:7` */
    readonly tag: string;
    readonly optional: O;
    readonly internal: boolean;
}

/** Map of destination property names to field definitions */
export type FieldsMap = Readonly<Record<string, FieldDef>>;

/**
 * An ordered, named set of fields. `keys` preserves declaration order,
 * which is the step execution order of the compiled chain.
 */
export interface RecordSchema<F extends FieldsMap = FieldsMap> {
    readonly name: string;
    readonly fields: F;
    readonly keys: readonly string[];
}

// ============================================================================
// Type Inference — destination types from schemas
// ============================================================================

type InferScalar<K extends ScalarKind> =
    K extends 'string' | 'uuid' ? string :
    K extends 'int64' | 'uint64' ? bigint :
    K extends 'int' | 'int8' | 'int16' | 'int32' | 'uint' | 'uint8' | 'uint16' | 'uint32' | 'float32' | 'float64' ? number :
    K extends 'boolean' ? boolean :
    K extends 'bytes' ? Uint8Array :
    K extends 'date' ? Date :
    unknown;

/** Infer the TypeScript type of a single field type */
export type InferFieldType<T extends FieldType> =
    T extends ScalarType<infer K> ? InferScalar<K> :
    T extends CustomType<infer V> ? V :
    T extends RecordType<infer S extends RecordSchema> ? InferRecord<S> :
    unknown;

type RequiredKeys<F extends FieldsMap> = {
    [K in keyof F]: F[K] extends FieldDef<FieldType, true> ? never : K;
}[keyof F];

type OptionalKeys<F extends FieldsMap> = {
    [K in keyof F]: F[K] extends FieldDef<FieldType, true> ? K : never;
}[keyof F];

/**
 * Infer the destination object type of a record schema.
 *
 * Optional fields become optional properties with `| undefined`.
 */
export type InferRecord<S extends RecordSchema> =
    S extends RecordSchema<infer F extends FieldsMap>
        ? { -readonly [K in RequiredKeys<F>]: InferFieldType<F[K]['type']> } &
          { -readonly [K in OptionalKeys<F>]?: InferFieldType<F[K]['type']> | undefined }
        : never;

// ============================================================================
// Builders
// ============================================================================

/** Options that make a field optional */
export type OptionalFieldOptions = FieldOptions & { readonly optional: true };

/** A `field.*()` builder: optional when passed `{ optional: true }` */
export interface FieldBuilder<T extends FieldType> {
    (tag: string, options: OptionalFieldOptions): FieldDef<T, true>;
    (tag?: string, options?: FieldOptions): FieldDef<T, false>;
}

function makeField<T extends FieldType>(
    type: T,
    tag: string,
    options: FieldOptions | undefined,
): FieldDef<T> {
    return Object.freeze({
        type,
        tag: tag.trim(),
        optional: options?.optional === true,
        internal: options?.internal === true,
    });
}

function builderFor<T extends FieldType>(type: T): FieldBuilder<T> {
    function build(tag: string, options: OptionalFieldOptions): FieldDef<T, true>;
    function build(tag?: string, options?: FieldOptions): FieldDef<T, false>;
    function build(tag = '', options?: FieldOptions): FieldDef<T> {
        return makeField(type, tag, options);
    }
    return build;
}

function scalar<K extends ScalarKind>(kind: K): FieldBuilder<ScalarType<K>> {
    return builderFor<ScalarType<K>>(Object.freeze({ kind }));
}

function customField<T>(type: CustomType<T>, tag: string, options: OptionalFieldOptions): FieldDef<CustomType<T>, true>;
function customField<T>(type: CustomType<T>, tag?: string, options?: FieldOptions): FieldDef<CustomType<T>, false>;
function customField<T>(type: CustomType<T>, tag = '', options?: FieldOptions): FieldDef<CustomType<T>> {
    return makeField(type, tag, options);
}

function recordField<S extends RecordSchema>(
    schema: S | (() => S), tag: string, options: OptionalFieldOptions,
): FieldDef<RecordType<S>, true>;
function recordField<S extends RecordSchema>(
    schema: S | (() => S), tag?: string, options?: FieldOptions,
): FieldDef<RecordType<S>, false>;
function recordField<S extends RecordSchema>(
    schema: S | (() => S), tag = '', options?: FieldOptions,
): FieldDef<RecordType<S>> {
    const thunk: () => S = isSchema(schema) ? () => schema : schema;
    const type: RecordType<S> = Object.freeze({ kind: 'record', schema: thunk });
    return makeField(type, tag, options);
}

/**
 * Field builders. Each takes the annotation tag and optional flags.
 *
 * @example
 * ```typescript
 * field.string("header:Authorization")
 * field.int64("json:'balance,omitnil' default:0")
 * field.record(Address, "recursive:false json:address")
 * field.custom(Semver, "query:version")
 * ```
 */
export const field = {
    string: scalar('string'),
    int: scalar('int'),
    int8: scalar('int8'),
    int16: scalar('int16'),
    int32: scalar('int32'),
    int64: scalar('int64'),
    uint: scalar('uint'),
    uint8: scalar('uint8'),
    uint16: scalar('uint16'),
    uint32: scalar('uint32'),
    uint64: scalar('uint64'),
    float32: scalar('float32'),
    float64: scalar('float64'),
    boolean: scalar('boolean'),
    bytes: scalar('bytes'),
    date: scalar('date'),
    uuid: scalar('uuid'),
    any: scalar('any'),

    custom: customField,
    record: recordField,
} as const;

/**
 * Declare a custom text-decoded leaf type.
 *
 * @example
 * ```typescript
 * const Semver = defineCustomType('semver', {
 *     decode: (text) => parseSemver(text),
 *     zero: () => ({ major: 0, minor: 0, patch: 0 }),
 * });
 * ```
 */
export function defineCustomType<T>(
    name: string,
    impl: { decode(text: string): T; zero(): T },
): CustomType<T> {
    return Object.freeze({
        kind: 'custom',
        name,
        decode: (text: string) => impl.decode(text),
        zero: () => impl.zero(),
    });
}

/**
 * Declare a record schema. Field order is the declaration order of
 * `fields`.
 */
export function defineRecord<F extends FieldsMap>(name: string, fields: F): RecordSchema<F> {
    const schema: RecordSchema<F> = {
        name,
        fields,
        keys: Object.freeze(Object.keys(fields)),
    };
    return Object.freeze(schema);
}

// ============================================================================
// Helpers
// ============================================================================

function isSchema<S extends RecordSchema>(value: S | (() => S)): value is S {
    return typeof value !== 'function';
}

/** Human-readable name of a field type for messages */
export function typeName(type: FieldType): string {
    switch (type.kind) {
        case 'custom': return type.name;
        case 'record': return type.schema().name;
        default: return type.kind;
    }
}
