import { SchemaNode, SchemaObject, ValidatorOptions } from '../types/index.js';
import { deepEqual, hasOwn, isRecord, isSchemaObject, repr } from '../utils/index.js';
import {
    compilePattern,
    expectArray,
    expectNumber,
    expectSchema,
    expectSchemaList,
    expectSchemaMap,
    expectString,
    expectStringList,
    expectTypeList,
} from './keyword-values.js';
import { KeywordRegistry, SchemaValidator } from './schema-validator.js';
import { ValidationError } from './validation-error.js';

// Draft-4 keyword handlers. Each one only constrains the instance types it is about and passes
// every other type.

function extrasMessage(extras: readonly unknown[]): string {
    const verb = extras.length === 1 ? 'was' : 'were';
    return `${extras.map(repr).join(', ')} ${verb}`;
}

export function typesMessage(instance: unknown, types: readonly string[]): string {
    return `${repr(instance)} is not of type ${types.map(repr).join(', ')}`;
}

export function* ref(validator: SchemaValidator, value: SchemaNode, instance: unknown): Generator<ValidationError> {
    const target = validator.resolveRef(expectString('$ref', value));
    yield* validator.descend(instance, target);
}

export function* additionalItems(
    validator: SchemaValidator,
    value: SchemaNode,
    instance: unknown,
    schema: SchemaObject,
): Generator<ValidationError> {
    const items = schema.items ?? {};
    if (!Array.isArray(instance) || isSchemaObject(items)) return;

    const covered = expectArray('items', items).length;
    if (isSchemaObject(value)) {
        for (let index = covered; index < instance.length; index++) {
            yield* validator.descend(instance[index], value, index);
        }
    } else if (value === false && instance.length > covered) {
        yield new ValidationError(`Additional items are not allowed (${extrasMessage(instance.slice(covered))} unexpected)`);
    }
}

export function* additionalProperties(
    validator: SchemaValidator,
    value: SchemaNode,
    instance: unknown,
    schema: SchemaObject,
): Generator<ValidationError> {
    if (!isRecord(instance)) return;

    const properties = isSchemaObject(schema.properties) ? schema.properties : {};
    const patternProperties = isSchemaObject(schema.patternProperties) ? schema.patternProperties : {};
    const patterns = Object.keys(patternProperties);
    const regexes = patterns.map(pattern => compilePattern('patternProperties', pattern));
    const extras = Object.keys(instance).filter(
        key => !hasOwn(properties, key) && !regexes.some(regex => regex.test(key)),
    );

    if (isSchemaObject(value)) {
        for (const extra of extras) {
            yield* validator.descend(instance[extra], value, extra);
        }
    } else if (value === false && extras.length > 0) {
        if (patterns.length > 0) {
            const verb = extras.length === 1 ? 'does' : 'do';
            const names = [...extras].sort().map(repr).join(', ');
            yield new ValidationError(`${names} ${verb} not match any of the regexes: ${[...patterns].sort().map(repr).join(', ')}`);
        } else {
            yield new ValidationError(`Additional properties are not allowed (${extrasMessage(extras)} unexpected)`);
        }
    }
}

export function* allOf(validator: SchemaValidator, value: SchemaNode, instance: unknown): Generator<ValidationError> {
    const subschemas = expectSchemaList('allOf', value);
    for (const [index, subschema] of subschemas.entries()) {
        yield* validator.descend(instance, subschema, undefined, index);
    }
}

export function* anyOf(validator: SchemaValidator, value: SchemaNode, instance: unknown): Generator<ValidationError> {
    const subschemas = expectSchemaList('anyOf', value);
    const allErrors: ValidationError[] = [];
    for (const [index, subschema] of subschemas.entries()) {
        const errors = Array.from(validator.descend(instance, subschema, undefined, index));
        if (errors.length === 0) return;
        allErrors.push(...errors);
    }
    yield new ValidationError(`${repr(instance)} is not valid under any of the given schemas`, { context: allErrors });
}

export function* dependencies(validator: SchemaValidator, value: SchemaNode, instance: unknown): Generator<ValidationError> {
    if (!isRecord(instance)) return;

    for (const [property, dependency] of Object.entries(expectSchema('dependencies', value))) {
        if (!hasOwn(instance, property)) continue;

        if (Array.isArray(dependency)) {
            for (const each of expectStringList('dependencies', dependency)) {
                if (!hasOwn(instance, each)) {
                    yield new ValidationError(`${repr(each)} is a dependency of ${repr(property)}`);
                }
            }
        } else {
            yield* validator.descend(instance, dependency, undefined, property);
        }
    }
}

export function* enumKeyword(_validator: SchemaValidator, value: SchemaNode, instance: unknown): Generator<ValidationError> {
    const enums = expectArray('enum', value);
    if (!enums.some(item => deepEqual(instance, item))) {
        yield new ValidationError(`${repr(instance)} is not one of ${repr(enums)}`);
    }
}

export function* format(validator: SchemaValidator, value: SchemaNode, instance: unknown): Generator<ValidationError> {
    const name = expectString('format', value);
    if (!validator.conformsTo(instance, name)) {
        yield new ValidationError(`${repr(instance)} is not a ${repr(name)}`);
    }
}

export function* items(validator: SchemaValidator, value: SchemaNode, instance: unknown): Generator<ValidationError> {
    if (!Array.isArray(instance)) return;

    if (Array.isArray(value)) {
        const subschemas = expectSchemaList('items', value);
        const count = Math.min(instance.length, subschemas.length);
        for (let index = 0; index < count; index++) {
            yield* validator.descend(instance[index], subschemas[index], index, index);
        }
    } else {
        const subschema = expectSchema('items', value);
        for (const [index, item] of instance.entries()) {
            yield* validator.descend(item, subschema, index);
        }
    }
}

export function* maxItems(_validator: SchemaValidator, value: SchemaNode, instance: unknown): Generator<ValidationError> {
    if (Array.isArray(instance) && instance.length > expectNumber('maxItems', value)) {
        yield new ValidationError(`${repr(instance)} is too long`);
    }
}

export function* minItems(_validator: SchemaValidator, value: SchemaNode, instance: unknown): Generator<ValidationError> {
    if (Array.isArray(instance) && instance.length < expectNumber('minItems', value)) {
        yield new ValidationError(`${repr(instance)} is too short`);
    }
}

/** Length in code points, so an astral character counts once. */
const stringLength = (value: string): number => Array.from(value).length;

export function* maxLength(_validator: SchemaValidator, value: SchemaNode, instance: unknown): Generator<ValidationError> {
    if (typeof instance === 'string' && stringLength(instance) > expectNumber('maxLength', value)) {
        yield new ValidationError(`${repr(instance)} is too long`);
    }
}

export function* minLength(_validator: SchemaValidator, value: SchemaNode, instance: unknown): Generator<ValidationError> {
    if (typeof instance === 'string' && stringLength(instance) < expectNumber('minLength', value)) {
        yield new ValidationError(`${repr(instance)} is too short`);
    }
}

export function* maxProperties(_validator: SchemaValidator, value: SchemaNode, instance: unknown): Generator<ValidationError> {
    if (isRecord(instance) && Object.keys(instance).length > expectNumber('maxProperties', value)) {
        yield new ValidationError(`${repr(instance)} has too many properties`);
    }
}

export function* minProperties(_validator: SchemaValidator, value: SchemaNode, instance: unknown): Generator<ValidationError> {
    if (isRecord(instance) && Object.keys(instance).length < expectNumber('minProperties', value)) {
        yield new ValidationError(`${repr(instance)} does not have enough properties`);
    }
}

export function* maximum(
    _validator: SchemaValidator,
    value: SchemaNode,
    instance: unknown,
    schema: SchemaObject,
): Generator<ValidationError> {
    if (typeof instance !== 'number') return;

    const limit = expectNumber('maximum', value);
    const exclusive = schema.exclusiveMaximum === true;
    const failed = exclusive ? instance >= limit : instance > limit;
    if (failed) {
        const comparison = exclusive ? 'greater than or equal to' : 'greater than';
        yield new ValidationError(`${repr(instance)} is ${comparison} the maximum of ${repr(limit)}`);
    }
}

export function* minimum(
    _validator: SchemaValidator,
    value: SchemaNode,
    instance: unknown,
    schema: SchemaObject,
): Generator<ValidationError> {
    if (typeof instance !== 'number') return;

    const limit = expectNumber('minimum', value);
    const exclusive = schema.exclusiveMinimum === true;
    const failed = exclusive ? instance <= limit : instance < limit;
    if (failed) {
        const comparison = exclusive ? 'less than or equal to' : 'less than';
        yield new ValidationError(`${repr(instance)} is ${comparison} the minimum of ${repr(limit)}`);
    }
}

export function* multipleOf(_validator: SchemaValidator, value: SchemaNode, instance: unknown): Generator<ValidationError> {
    if (typeof instance !== 'number') return;

    const divisor = expectNumber('multipleOf', value);
    if (!Number.isInteger(instance / divisor)) {
        yield new ValidationError(`${repr(instance)} is not a multiple of ${repr(divisor)}`);
    }
}

export function* not(validator: SchemaValidator, value: SchemaNode, instance: unknown): Generator<ValidationError> {
    const subschema = expectSchema('not', value);
    if (validator.isValid(instance, subschema)) {
        yield new ValidationError(`${repr(subschema)} is not allowed for ${repr(instance)}`);
    }
}

/**
 * Exactly one subschema must match. All subschemas are tried in a single pass; failing ones
 * contribute their errors as context when none matches.
 */
export function* oneOf(validator: SchemaValidator, value: SchemaNode, instance: unknown): Generator<ValidationError> {
    const subschemas = expectSchemaList('oneOf', value);
    const allErrors: ValidationError[] = [];
    const matching: number[] = [];

    for (const [index, subschema] of subschemas.entries()) {
        const errors = Array.from(validator.descend(instance, subschema, undefined, index));
        if (errors.length === 0) {
            matching.push(index);
        } else {
            allErrors.push(...errors);
        }
    }

    if (matching.length === 0) {
        yield new ValidationError(`${repr(instance)} is not valid under any of the given schemas`, { context: allErrors });
    } else if (matching.length > 1) {
        const reprs = matching.map(index => repr(subschemas[index])).join(', ');
        yield new ValidationError(`${repr(instance)} is valid under each of ${reprs}`);
    }
}

export function* pattern(_validator: SchemaValidator, value: SchemaNode, instance: unknown): Generator<ValidationError> {
    if (typeof instance !== 'string') return;

    const source = expectString('pattern', value);
    if (!compilePattern('pattern', source).test(instance)) {
        yield new ValidationError(`${repr(instance)} does not match ${repr(source)}`);
    }
}

export function* patternProperties(validator: SchemaValidator, value: SchemaNode, instance: unknown): Generator<ValidationError> {
    if (!isRecord(instance)) return;

    for (const [source, subschema] of Object.entries(expectSchemaMap('patternProperties', value))) {
        const regex = compilePattern('patternProperties', source);
        for (const [key, item] of Object.entries(instance)) {
            if (regex.test(key)) {
                yield* validator.descend(item, subschema, key, source);
            }
        }
    }
}

export function* properties(validator: SchemaValidator, value: SchemaNode, instance: unknown): Generator<ValidationError> {
    if (!isRecord(instance)) return;

    for (const [property, subschema] of Object.entries(expectSchemaMap('properties', value))) {
        if (hasOwn(instance, property)) {
            yield* validator.descend(instance[property], subschema, property, property);
        }
    }
}

export function* required(_validator: SchemaValidator, value: SchemaNode, instance: unknown): Generator<ValidationError> {
    if (!isRecord(instance)) return;

    for (const property of expectStringList('required', value)) {
        if (!hasOwn(instance, property)) {
            yield new ValidationError(`${repr(property)} is a required property`);
        }
    }
}

export function* typeKeyword(validator: SchemaValidator, value: SchemaNode, instance: unknown): Generator<ValidationError> {
    const types = expectTypeList(value);
    if (!types.some(name => validator.isType(instance, name))) {
        yield new ValidationError(typesMessage(instance, types));
    }
}

export function* uniqueItems(_validator: SchemaValidator, value: SchemaNode, instance: unknown): Generator<ValidationError> {
    if (value !== true || !Array.isArray(instance)) return;

    const unique = instance.every((item, i) => instance.slice(i + 1).every(other => !deepEqual(item, other)));
    if (!unique) {
        yield new ValidationError(`${repr(instance)} has non-unique elements`);
    }
}

export const DRAFT4_KEYWORDS: KeywordRegistry = Object.freeze({
    $ref: ref,
    additionalItems,
    additionalProperties,
    allOf,
    anyOf,
    dependencies,
    enum: enumKeyword,
    format,
    items,
    maxItems,
    maxLength,
    maxProperties,
    maximum,
    minItems,
    minLength,
    minProperties,
    minimum,
    multipleOf,
    not,
    oneOf,
    pattern,
    patternProperties,
    properties,
    required,
    type: typeKeyword,
    uniqueItems,
});

/**
 * Baseline JSON-Schema Draft-4 validator.
 */
export class Draft4Validator extends SchemaValidator {
    public static readonly KEYWORDS: KeywordRegistry = DRAFT4_KEYWORDS;

    constructor(schema: SchemaNode, options: ValidatorOptions = {}) {
        super(schema, DRAFT4_KEYWORDS, options);
    }
}
