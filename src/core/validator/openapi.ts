import { SchemaNode, SchemaObject } from '../types/index.js';
import { deepEqual, hasOwn, isRecord, isSchemaObject, repr } from '../utils/index.js';
import { Draft4Validator, oneOf, typesMessage } from './draft4.js';
import { expectArray, expectSchemaList, expectSchemaMap, expectStringList, expectTypeList } from './keyword-values.js';
import { extendValidator, SchemaValidator, ValidatorClass } from './schema-validator.js';
import { ValidationError } from './validation-error.js';

/**
 * `x-nullable` (Swagger 2.0 vendor extension) and `nullable` (OpenAPI 3.0) both make `null` valid
 * regardless of the declared type or enum.
 */
export function isNullable(schema: SchemaObject): boolean {
    return schema['x-nullable'] === true || schema.nullable === true;
}

export function* validateType(
    validator: SchemaValidator,
    value: SchemaNode,
    instance: unknown,
    schema: SchemaObject,
): Generator<ValidationError> {
    if (instance === null && isNullable(schema)) return;

    const types = expectTypeList(value);
    if (!types.some(name => validator.isType(instance, name))) {
        yield new ValidationError(typesMessage(instance, types));
    }
}

export function* validateEnum(
    _validator: SchemaValidator,
    value: SchemaNode,
    instance: unknown,
    schema: SchemaObject,
): Generator<ValidationError> {
    if (instance === null && isNullable(schema)) return;

    const enums = expectArray('enum', value);
    if (!enums.some(item => deepEqual(instance, item))) {
        yield new ValidationError(`${repr(instance)} is not one of ${repr(enums)}`);
    }
}

/**
 * Whether a missing property is expected to be filled in by the other direction of the flow.
 * A marker only counts when the running configuration installs the matching keyword.
 */
function isExemptFromRequired(validator: SchemaValidator, subschema: SchemaObject): boolean {
    return (
        (validator.hasKeyword('readOnly') && subschema.readOnly === true) ||
        (validator.hasKeyword('writeOnly') && subschema.writeOnly === true) ||
        (validator.hasKeyword('x-writeOnly') && subschema['x-writeOnly'] === true)
    );
}

export function* validateRequired(
    validator: SchemaValidator,
    value: SchemaNode,
    instance: unknown,
    schema: SchemaObject,
): Generator<ValidationError> {
    if (!isRecord(instance)) return;

    const properties = schema.properties;
    for (const property of expectStringList('required', value)) {
        if (hasOwn(instance, property)) continue;

        if (isSchemaObject(properties) && hasOwn(properties, property)) {
            const subschema = properties[property];
            if (isSchemaObject(subschema) && isExemptFromRequired(validator, subschema)) continue;
        }
        yield new ValidationError(`${repr(property)} is a required property`);
    }
}

/** Reached only for a value present in the instance, which a request must not carry. */
export function* validateReadOnly(): Generator<ValidationError> {
    yield new ValidationError('Property is read-only');
}

/** Reached only for a value present in the instance, which a response must not carry. */
export function* validateWriteOnly(): Generator<ValidationError> {
    yield new ValidationError('Property is write-only');
}

export function* validateOneOf(
    validator: SchemaValidator,
    value: SchemaNode,
    instance: unknown,
    schema: SchemaObject,
): Generator<ValidationError> {
    if (instance === null && isNullable(schema)) return;
    yield* oneOf(validator, value, instance);
}

/**
 * Shallow-merges every subschema (a later subschema's keyword replaces an earlier one's) and
 * validates once against the result. Each error's schema path starts with the index of the
 * subschema its keyword came from.
 */
export function* validateAllOf(validator: SchemaValidator, value: SchemaNode, instance: unknown): Generator<ValidationError> {
    const merged: SchemaObject = {};
    const owners = new Map<string, number>();
    for (const [index, subschema] of expectSchemaList('allOf', value).entries()) {
        for (const [keyword, keywordValue] of Object.entries(subschema)) {
            merged[keyword] = keywordValue;
            owners.set(keyword, index);
        }
    }

    for (const error of validator.iterErrors(instance, merged)) {
        // With a `$ref` present only the reference is validated, and it adds no schema path segment.
        const keyword = typeof merged.$ref === 'string' ? '$ref' : String(error.schemaPath[0]);
        error.prepend(undefined, owners.get(keyword) ?? 0);
        yield error;
    }
}

export function* validateProperties(
    validator: SchemaValidator,
    value: SchemaNode,
    instance: unknown,
    schema: SchemaObject,
): Generator<ValidationError> {
    if (instance === null && isNullable(schema)) return;
    if (!isRecord(instance)) return;

    for (const [property, subschema] of Object.entries(expectSchemaMap('properties', value))) {
        if (hasOwn(instance, property)) {
            yield* validator.descend(instance[property], subschema, property, property);
        }
    }
}

/**
 * Validates inbound payloads: read-only properties may be omitted even when required, and are
 * rejected when supplied.
 */
export const Draft4RequestValidator: ValidatorClass = extendValidator(Draft4Validator, {
    type: validateType,
    enum: validateEnum,
    required: validateRequired,
    readOnly: validateReadOnly,
    oneOf: validateOneOf,
    allOf: validateAllOf,
});

/**
 * Validates outbound payloads: write-only properties may be omitted even when required, and are
 * rejected when echoed back.
 */
export const Draft4ResponseValidator: ValidatorClass = extendValidator(Draft4Validator, {
    type: validateType,
    enum: validateEnum,
    required: validateRequired,
    writeOnly: validateWriteOnly,
    'x-writeOnly': validateWriteOnly,
    properties: validateProperties,
    oneOf: validateOneOf,
});
