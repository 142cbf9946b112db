/** Grammar — tag scanning and binding decoding */
export { SCOPE_DELIMITER, subValue, allSubValues, tagEntries } from './TagScanner.js';
export type { TagEntry } from './TagScanner.js';
export {
    OMIT_EMPTY, OMIT_NIL, OMIT_ERROR, STANDARD_MODIFIERS,
    DEFAULT_KEY, RECURSIVE_KEY, RESERVED_TAG_KEYS,
    decodeBindingTag, decodeFieldTag,
} from './BindingTag.js';
export type { FieldTagOptions, TaggedField, DecodedFieldTag } from './BindingTag.js';
