// src/index.ts

import * as path from 'node:path';
import { pathToFileURL } from 'node:url';

import yaml from 'js-yaml';

import { InvalidReferenceError, UnknownSchemeError } from './core/errors.js';
import { resolvePointer } from './core/parser/json-pointer.js';
import { resolveRefs } from './core/parser/reference-resolver.js';
import { createDefaultHandlers } from './core/parser/spec-loader.js';
import {
    ReferenceStore,
    ResolverOptions,
    SchemaNode,
    UrlHandlerOptions,
    ValidationMode,
    ValidatorOptions,
} from './core/types.js';
import { getScheme, hasOwn, isUrl } from './core/utils/index.js';
import { Draft4RequestValidator, Draft4ResponseValidator } from './core/validator/openapi.js';
import { SchemaValidator } from './core/validator/schema-validator.js';
import { ValidationError } from './core/validator/validation-error.js';

export * from './core/types.js';
export * from './core/errors.js';
export * from './core/parser/index.js';
export * from './core/validator/index.js';
export { loadConfigFile, mergeConfig, parseConfig } from './core/config-loader.js';

export type LoadSchemaOptions = ResolverOptions & UrlHandlerOptions;

export interface LoadedSchema {
    /** The resolved schema document. */
    schema: SchemaNode;
    /** Absolute URI the document was read from; relative references were joined against it. */
    documentUri: string;
    /** Every external document fetched while resolving, keyed by URI. */
    store: ReferenceStore;
}

/**
 * Turns a local path (relative to the working directory) or URL into an absolute URI.
 */
export function toDocumentUri(input: string): string {
    return isUrl(input) ? input : pathToFileURL(path.resolve(process.cwd(), input)).href;
}

/**
 * Reads a schema document from a path or URL and resolves all of its references.
 */
export async function loadSchema(input: string, options: LoadSchemaOptions = {}): Promise<LoadedSchema> {
    const documentUri = toDocumentUri(input);
    const handlers = options.handlers ?? createDefaultHandlers({ timeoutMs: options.timeoutMs });
    const scheme = getScheme(documentUri) ?? '';
    if (!hasOwn(handlers, scheme)) {
        throw new UnknownSchemeError(scheme, documentUri);
    }

    const document = await handlers[scheme](documentUri);
    const store = options.store ?? new Map<string, SchemaNode>();
    const schema = await resolveRefs(document, {
        store,
        handlers,
        baseUri: documentUri,
        circular: options.circular,
    });
    return { schema, documentUri, store };
}

/**
 * Picks a subschema out of a document by JSON pointer (`"#/components/schemas/User"` or
 * `"/components/schemas/User"`). Returns the document itself when no pointer is given.
 */
export function selectSchema(document: SchemaNode, pointer?: string): SchemaNode {
    if (pointer === undefined || pointer === '' || pointer === '#') return document;

    const fragment = pointer.startsWith('#') ? pointer.slice(1) : pointer;
    const lookup = resolvePointer(document, fragment);
    if (!lookup.found) {
        throw new InvalidReferenceError(pointer, '');
    }
    return lookup.value;
}

/**
 * Builds the validator for one direction of the data flow.
 */
export function createValidator(
    schema: SchemaNode,
    mode: ValidationMode = 'request',
    options: ValidatorOptions = {},
): SchemaValidator {
    const Validator = mode === 'request' ? Draft4RequestValidator : Draft4ResponseValidator;
    return new Validator(schema, options);
}

export interface ValidateInstanceOptions extends ValidatorOptions {
    /** @default 'request' */
    mode?: ValidationMode;
    /** Subschema to validate against, as accepted by `selectSchema`. The whole document by default. */
    pointer?: string;
}

/**
 * Collects every validation error of `instance`. An empty array means the instance is valid.
 *
 * The validator is bound to the whole `document`, so `$ref`s left in place by `circular: 'ignore'`
 * resolve against it even when `pointer` selects a subschema.
 */
export function validateInstance(
    document: SchemaNode,
    instance: unknown,
    options: ValidateInstanceOptions = {},
): ValidationError[] {
    const validator = createValidator(document, options.mode, { formats: options.formats });
    return Array.from(validator.iterErrors(instance, selectSchema(document, options.pointer)));
}

/**
 * Serializes a resolved schema. YAML writes shared and cyclic nodes as anchors and aliases;
 * JSON cannot hold cycles.
 */
export function formatDocument(document: SchemaNode, format: 'json' | 'yaml' = 'json'): string {
    if (format === 'yaml') {
        return yaml.dump(document, { indent: 2 });
    }
    try {
        return JSON.stringify(document, null, 2);
    } catch (error) {
        throw new Error(
            'Resolved schema contains circular references and cannot be written as JSON. ' +
                'Use the yaml format or the "ignore" circular mode.',
            { cause: error },
        );
    }
}
