/** Parser — the per-source-kind facade */
export { BindingParser } from './BindingParser.js';
export type {
    SourceKind, DirectSourceKind, CachedSourceKind, ParserOptions,
} from './BindingParser.js';
