import { ReferenceStore, SchemeHandlerMap } from './schema.js';

/**
 * What to do with a reference whose target is already being expanded higher up the same branch.
 * - 'link': replace it with the ancestor's resolved object (the result becomes a cyclic graph).
 * - 'ignore': leave the `{"$ref": ...}` node in place.
 * - 'error': throw a `CircularReferenceError`.
 */
export type CircularRefMode = 'link' | 'ignore' | 'error';

/** Direction of the payload being validated. */
export type ValidationMode = 'request' | 'response';

/** Options accepted by `resolveRefs`. */
export interface ResolverOptions {
    /** Previously fetched documents keyed by absolute URI. A fresh map is used when omitted. */
    store?: ReferenceStore;
    /** Scheme handlers. Defaults to `DEFAULT_SCHEME_HANDLERS` (http, https, file). */
    handlers?: SchemeHandlerMap;
    /** URI that relative external references are joined against. */
    baseUri?: string;
    /** @default 'link' */
    circular?: CircularRefMode;
}

/** Options accepted by every validator class. */
export interface ValidatorOptions {
    /** Enables the `format` keyword for the formats the built-in checker knows. */
    formats?: boolean;
}

/** Options for the default http/https/file handlers. */
export interface UrlHandlerOptions {
    /** Aborts an http(s) fetch after this many milliseconds. No deadline when omitted. */
    timeoutMs?: number;
}

/** The configuration read from a `-c` config file and merged with CLI flags. */
export interface GuardConfig {
    /** Local path or URL of the schema document. */
    input?: string;
    /** Where `resolve` writes its result. Printed to stdout when omitted. */
    output?: string;
    /** @default 'json' */
    format?: 'json' | 'yaml';
    /** @default 'request' */
    mode?: ValidationMode;
    /** JSON pointer selecting the schema to validate against inside the resolved document. */
    pointer?: string;
    /** @default false */
    formats?: boolean;
    /** @default 'link' */
    circular?: CircularRefMode;
    timeoutMs?: number;
}
