// src/core/errors.ts

import type { ValidationError } from './validator/validation-error.js';

/**
 * Error thrown when a `$ref` cannot be turned into a schema: the document could not be fetched or
 * parsed, or the fragment does not exist in it. Fatal for the whole `resolveRefs` call.
 */
export class ReferenceResolutionError extends Error {
    constructor(
        message: string,
        public readonly uri: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'ReferenceResolutionError';
    }
}

/** No handler is registered for the scheme of an external reference. */
export class UnknownSchemeError extends ReferenceResolutionError {
    constructor(
        public readonly scheme: string,
        uri: string,
    ) {
        super(`No handler registered for scheme "${scheme}" (reference: ${uri})`, uri);
        this.name = 'UnknownSchemeError';
    }
}

/** A document-local reference (`#/...`) points at a path that does not exist. */
export class InvalidReferenceError extends ReferenceResolutionError {
    constructor(uri: string, documentUri: string) {
        super(`Unresolvable JSON pointer ${uri} in ${documentUri || 'the root document'}`, uri);
        this.name = 'InvalidReferenceError';
    }
}

/** A reference leads back to a target that is still being expanded, and cycles are disallowed. */
export class CircularReferenceError extends ReferenceResolutionError {
    constructor(uri: string) {
        super(`Circular reference detected: ${uri}`, uri);
        this.name = 'CircularReferenceError';
    }
}

/** A schema keyword holds a value of the wrong shape, e.g. `"required": 5`. */
export class SchemaError extends Error {
    constructor(
        message: string,
        public readonly keyword: string,
    ) {
        super(message);
        this.name = 'SchemaError';
    }
}

/** A `type` keyword names a type the validator does not know. */
export class UnknownTypeError extends SchemaError {
    constructor(public readonly type: string) {
        super(`Unknown type ${JSON.stringify(type)}`, 'type');
        this.name = 'UnknownTypeError';
    }
}

/**
 * Thrown by `assertValid` only. `iterErrors` never throws for a failing instance.
 */
export class InstanceValidationError extends Error {
    constructor(public readonly errors: readonly ValidationError[]) {
        super(errors.length > 0 ? errors[0].message : 'Instance is invalid');
        this.name = 'InstanceValidationError';
    }
}

/** A config file is missing, unreadable or holds an invalid value. */
export class ConfigError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConfigError';
    }
}
