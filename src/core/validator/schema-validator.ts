import { InstanceValidationError, InvalidReferenceError, ReferenceResolutionError, SchemaError, UnknownTypeError } from '../errors.js';
import { resolvePointer } from '../parser/json-pointer.js';
import { PathSegment, SchemaNode, SchemaObject, ValidatorOptions } from '../types/index.js';
import { hasOwn, isRecord, isSchemaObject, repr } from '../utils/index.js';
import { DRAFT4_FORMATS } from './formats.js';
import { ValidationError } from './validation-error.js';

/**
 * Checks one keyword. Yields nothing when the instance passes.
 *
 * @param validator The validator running the check; use it to `descend` into subschemas.
 * @param value The keyword's value in the schema.
 * @param instance The value under validation.
 * @param schema The (sub)schema that holds the keyword.
 */
export type KeywordHandler = (
    validator: SchemaValidator,
    value: SchemaNode,
    instance: unknown,
    schema: SchemaObject,
) => Iterable<ValidationError>;

/** Keyword name → handler. Keywords without a handler are ignored. */
export type KeywordRegistry = Readonly<Record<string, KeywordHandler>>;

export type TypeCheck = (instance: unknown) => boolean;

export const DRAFT4_TYPES: Readonly<Record<string, TypeCheck>> = Object.freeze({
    array: (instance: unknown) => Array.isArray(instance),
    boolean: (instance: unknown) => typeof instance === 'boolean',
    integer: (instance: unknown) => typeof instance === 'number' && Number.isInteger(instance),
    null: (instance: unknown) => instance === null,
    number: (instance: unknown) => typeof instance === 'number',
    object: isRecord,
    string: (instance: unknown) => typeof instance === 'string',
});

/** A validator class built from a keyword registry; see `extendValidator`. */
export interface ValidatorClass {
    readonly KEYWORDS: KeywordRegistry;
    new (schema: SchemaNode, options?: ValidatorOptions): SchemaValidator;
}

/**
 * Keyword-dispatch validation engine. Binds a keyword registry to a root schema; holds no other
 * state, so one instance can validate any number of instances, concurrently if need be.
 */
export class SchemaValidator {
    public static readonly KEYWORDS: KeywordRegistry = Object.freeze({});

    public readonly formats: boolean;

    constructor(
        public readonly schema: SchemaNode,
        private readonly keywords: KeywordRegistry,
        options: ValidatorOptions = {},
    ) {
        this.formats = options.formats ?? false;
    }

    /** Whether this validator's configuration installs a handler for `keyword`. */
    public hasKeyword(keyword: string): boolean {
        return hasOwn(this.keywords, keyword);
    }

    /**
     * Lazily yields every error of `instance` against `schema` (the root schema by default).
     * Each call starts a fresh pass. A schema containing `$ref` is validated against the reference
     * only; its sibling keywords are ignored.
     *
     * @throws {SchemaError} when the schema itself is malformed.
     */
    public *iterErrors(instance: unknown, schema: SchemaNode = this.schema): Generator<ValidationError, void, undefined> {
        if (!isSchemaObject(schema)) {
            throw new SchemaError(`A schema must be an object, got ${repr(schema)}`, '');
        }

        const ref = schema.$ref;
        const entries: [string, SchemaNode][] = typeof ref === 'string' ? [['$ref', ref]] : Object.entries(schema);

        for (const [keyword, value] of entries) {
            if (!this.hasKeyword(keyword)) continue;
            for (const error of this.keywords[keyword](this, value, instance, schema)) {
                error.annotate(keyword, value, instance, schema);
                if (keyword !== '$ref') {
                    error.prepend(undefined, keyword);
                }
                yield error;
            }
        }
    }

    /**
     * Validates `instance` against a subschema, prefixing the produced errors' paths.
     * @param path Property name or index of `instance` within its parent.
     * @param schemaPath Key or index of `schema` within the keyword value.
     */
    public *descend(
        instance: unknown,
        schema: SchemaNode,
        path?: PathSegment,
        schemaPath?: PathSegment,
    ): Generator<ValidationError, void, undefined> {
        for (const error of this.iterErrors(instance, schema)) {
            error.prepend(path, schemaPath);
            yield error;
        }
    }

    public isValid(instance: unknown, schema: SchemaNode = this.schema): boolean {
        return this.iterErrors(instance, schema).next().done === true;
    }

    /**
     * @throws {UnknownTypeError} for a type name outside Draft-4's seven types.
     */
    public isType(instance: unknown, type: string): boolean {
        if (!hasOwn(DRAFT4_TYPES, type)) {
            throw new UnknownTypeError(type);
        }
        return DRAFT4_TYPES[type](instance);
    }

    /**
     * Checks a string against a known format. Always passes when format checking is off,
     * for unknown formats, and for non-strings.
     */
    public conformsTo(instance: unknown, format: string): boolean {
        if (!this.formats || typeof instance !== 'string' || !hasOwn(DRAFT4_FORMATS, format)) return true;
        return DRAFT4_FORMATS[format](instance);
    }

    /**
     * Looks up a document-local `$ref` in the root schema. Schemas are expected to come out of
     * `resolveRefs`, so only cycles left in place (`circular: 'ignore'`) reach this.
     */
    public resolveRef(ref: string): SchemaNode {
        if (!ref.startsWith('#')) {
            throw new ReferenceResolutionError(`External reference ${ref} must be resolved before validation`, ref);
        }
        const lookup = resolvePointer(this.schema, ref.slice(1));
        if (!lookup.found) {
            throw new InvalidReferenceError(ref, '');
        }
        return lookup.value;
    }

    /**
     * @throws {InstanceValidationError} carrying every error, when there is at least one.
     */
    public assertValid(instance: unknown): void {
        const errors = Array.from(this.iterErrors(instance));
        if (errors.length > 0) {
            throw new InstanceValidationError(errors);
        }
    }
}

/**
 * Creates a validator class whose registry is `base`'s with `keywords` added or overriding.
 */
export function extendValidator(base: ValidatorClass, keywords: KeywordRegistry): ValidatorClass {
    const registry: KeywordRegistry = Object.freeze({ ...base.KEYWORDS, ...keywords });

    return class extends SchemaValidator {
        public static readonly KEYWORDS = registry;

        constructor(schema: SchemaNode, options: ValidatorOptions = {}) {
            super(schema, registry, options);
        }
    };
}
