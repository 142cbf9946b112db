/** Adapters — ready-made source kinds */
export { recordSource, lookupPath } from './RecordSource.js';
export type { RecordSourceValue } from './RecordSource.js';
export {
    httpRequestSource, createHttpRequestViews, parseCookies,
} from './HttpRequestSource.js';
export type { HttpRequestLike, HttpRequestViews } from './HttpRequestSource.js';
