/**
 * RecordSource — Binding From Plain Objects
 *
 * Binds from an already-decoded object: a parsed JSON document, a config
 * map, a message payload. Both `json` and `mapvalue` bindings read the
 * identifier as a dotted path:
 *
 * ```
 * json:user.address.city    →  source.user.address.city
 * mapvalue:'servers.0.port' →  source.servers[0].port
 * ```
 *
 * @example
 * ```typescript
 * const Config = defineRecord('Config', {
 *     port:  field.uint16("mapvalue:'port,omitempty' default:8080"),
 *     debug: field.boolean("mapvalue:'debug,omitempty'"),
 * });
 *
 * const parser = new BindingParser(recordSource);
 * parser.parse({ port: 3000 }, Config); // { port: 3000, debug: false }
 * ```
 *
 * @module
 */
import { type Binding } from '../compiler/Chain.js';
import { type Extraction, found, notFound } from '../execution/Extraction.js';
import { type DirectSourceKind } from '../parser/BindingParser.js';

const INDEX = /^\d+$/;

/**
 * Resolve a dotted path inside a decoded value.
 *
 * Array elements are addressed by numeric segments. A path running
 * through a missing key, `null` or a scalar is not found; a path ending
 * on `null` is found with a nil value.
 */
export function lookupPath(root: unknown, path: string): Extraction {
    let current: unknown = root;

    for (const segment of path.split('.')) {
        if (typeof current !== 'object' || current === null) return notFound();

        if (Array.isArray(current)) {
            if (!INDEX.test(segment)) return notFound();
            const index = Number(segment);
            if (index >= current.length) return notFound();
            current = current[index];
            continue;
        }

        if (!Object.hasOwn(current, segment)) return notFound();
        current = Reflect.get(current, segment);
    }

    return found(current);
}

/** A decoded object to bind from */
export type RecordSourceValue = Readonly<Record<string, unknown>>;

/**
 * Source kind for plain objects, binding names `json` and `mapvalue`.
 */
export const recordSource: DirectSourceKind<RecordSourceValue> = Object.freeze({
    name: 'record',
    bindingNames: Object.freeze(['json', 'mapvalue']),
    extract: (source: RecordSourceValue, binding: Binding) => lookupPath(source, binding.identifier),
});
