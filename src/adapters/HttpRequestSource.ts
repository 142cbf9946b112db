/**
 * HttpRequestSource — Binding From a Received HTTP Request
 *
 * Operates on a request that has already been received and read; no
 * network I/O happens here. Four binding names are understood:
 *
 * | binding  | reads                                  | not found when                 |
 * |----------|----------------------------------------|--------------------------------|
 * | `header` | first value, case-insensitive name     | absent or empty                |
 * | `cookie` | first cookie of that name              | absent                         |
 * | `query`  | first query-string value               | absent                         |
 * | `json`   | dotted path into the JSON body         | path absent                    |
 *
 * `Authorization: Bearer <token>` binds as `<token>`.
 *
 * The header index, cookie map, query parameters and parsed body are
 * derived lazily, once per request, through the parser's
 * {@link SourceValueCache}. A body that fails to parse is an extraction
 * error for every `json` binding of that request.
 *
 * @example
 * ```typescript
 * const Signup = defineRecord('Signup', {
 *     token: field.string('header:Authorization'),
 *     age:   field.int("query:'age,omitempty' json:'age,omitempty' default:18"),
 * });
 *
 * const parser = new BindingParser(httpRequestSource);
 * parser.parse({ url: '/signup?age=30', headers: { authorization: 'Bearer test-token' } }, Signup);
 * // { token: 'test-token', age: 30 }
 * ```
 *
 * @module
 */
import { type CacheEntry, Lazy } from '../cache/SourceValueCache.js';
import { type Binding } from '../compiler/Chain.js';
import { type Extraction, errored, found, notFound } from '../execution/Extraction.js';
import { type CachedSourceKind } from '../parser/BindingParser.js';
import { lookupPath } from './RecordSource.js';

// ── Request Shape ────────────────────────────────────────

/**
 * The parts of a received request this source reads. Node's
 * `IncomingMessage` headers and url fit as they are.
 */
export interface HttpRequestLike {
    /** Request target, e.g. `/signup?age=30` */
    readonly url?: string | undefined;
    readonly headers: Readonly<Record<string, string | readonly string[] | undefined>>;
    /** Raw body text or bytes, or a body a framework already decoded */
    readonly body?: string | Uint8Array | object | null | undefined;
}

/** Per-request views, each computed on first use */
export interface HttpRequestViews {
    readonly headers: Lazy<ReadonlyMap<string, string>>;
    readonly cookies: Lazy<ReadonlyMap<string, string>>;
    readonly query: Lazy<URLSearchParams>;
    readonly body: Lazy<unknown>;
}

// ── Parsers ──────────────────────────────────────────────

const BEARER_PREFIX = 'Bearer ';

function indexHeaders(request: HttpRequestLike): ReadonlyMap<string, string> {
    const index = new Map<string, string>();
    for (const [name, raw] of Object.entries(request.headers)) {
        const value = typeof raw === 'string' ? raw : raw?.[0];
        const key = name.toLowerCase();
        if (value !== undefined && !index.has(key)) index.set(key, value);
    }
    return index;
}

/** Parse a `Cookie` header. The first cookie of a name wins. */
export function parseCookies(header: string | undefined): ReadonlyMap<string, string> {
    const cookies = new Map<string, string>();
    if (!header) return cookies;

    for (const pair of header.split(';')) {
        const eq = pair.indexOf('=');
        if (eq === -1) continue;

        const name = pair.slice(0, eq).trim();
        let value = pair.slice(eq + 1).trim();
        if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
            value = value.slice(1, -1);
        }
        if (name && !cookies.has(name)) cookies.set(name, value);
    }
    return cookies;
}

function parseQuery(request: HttpRequestLike): URLSearchParams {
    const url = request.url ?? '';
    const mark = url.indexOf('?');
    return new URLSearchParams(mark === -1 ? '' : url.slice(mark + 1));
}

function parseBody(request: HttpRequestLike): unknown {
    const { body } = request;
    if (body === undefined || body === null) return {};

    const text = typeof body === 'string'
        ? body
        : body instanceof Uint8Array ? new TextDecoder().decode(body) : undefined;

    if (text === undefined) return body;
    if (text.trim() === '') return {};

    const parsed: unknown = JSON.parse(text);
    return parsed;
}

// ── Extraction ───────────────────────────────────────────

function extractHeader(views: HttpRequestViews, name: string): Extraction {
    const value = views.headers.get().get(name.toLowerCase());
    if (value === undefined || value === '') return notFound();

    if (name.toLowerCase() === 'authorization' && value.startsWith(BEARER_PREFIX)) {
        return found(value.slice(BEARER_PREFIX.length));
    }
    return found(value);
}

function extractFromViews(views: HttpRequestViews, binding: Binding): Extraction {
    switch (binding.name) {
        case 'header':
            return extractHeader(views, binding.identifier);

        case 'cookie': {
            const value = views.cookies.get().get(binding.identifier);
            return value === undefined ? notFound() : found(value);
        }

        case 'query': {
            const value = views.query.get().get(binding.identifier);
            return value === null ? notFound() : found(value);
        }

        case 'json':
            return lookupPath(views.body.get(), binding.identifier);

        default:
            return errored(new Error(`unsupported binding ${binding.name} for http requests`));
    }
}

// ── Source Kind ──────────────────────────────────────────

/** Build the lazy views of one request */
export function createHttpRequestViews(request: HttpRequestLike): HttpRequestViews {
    return {
        headers: new Lazy(() => indexHeaders(request)),
        cookies: new Lazy(() => {
            const raw = request.headers['cookie'];
            return parseCookies(typeof raw === 'string' ? raw : raw?.join('; '));
        }),
        query: new Lazy(() => parseQuery(request)),
        body: new Lazy(() => parseBody(request)),
    };
}

/**
 * Source kind for received HTTP requests: `header`, `cookie`, `query`
 * and `json` bindings.
 */
export const httpRequestSource: CachedSourceKind<HttpRequestLike, HttpRequestViews> = Object.freeze({
    name: 'http',
    bindingNames: Object.freeze(['header', 'cookie', 'query', 'json']),
    createCached: createHttpRequestViews,
    extractCached: (
        _request: HttpRequestLike,
        entry: CacheEntry<HttpRequestViews>,
        binding: Binding,
    ): Extraction => {
        try {
            return entry.readLocked(views => extractFromViews(views, binding));
        } catch (err) {
            return errored(err);
        }
    },
});
