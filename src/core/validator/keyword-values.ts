import { SchemaError } from '../errors.js';
import { SchemaNode, SchemaObject } from '../types/index.js';
import { isSchemaObject, repr } from '../utils/index.js';

// Narrowing helpers for keyword values. A value of the wrong shape is a broken schema, not a
// failing instance, so these throw `SchemaError`.

export function expectSchema(keyword: string, value: SchemaNode): SchemaObject {
    if (!isSchemaObject(value)) {
        throw new SchemaError(`"${keyword}" must be a schema object, got ${repr(value)}`, keyword);
    }
    return value;
}

export function expectSchemaList(keyword: string, value: SchemaNode): SchemaObject[] {
    if (!Array.isArray(value)) {
        throw new SchemaError(`"${keyword}" must be an array of schemas, got ${repr(value)}`, keyword);
    }
    return value.map(item => expectSchema(keyword, item));
}

export function expectSchemaMap(keyword: string, value: SchemaNode): Record<string, SchemaObject> {
    const map = expectSchema(keyword, value);
    const out: Record<string, SchemaObject> = {};
    for (const [key, item] of Object.entries(map)) {
        out[key] = expectSchema(keyword, item);
    }
    return out;
}

export function expectNumber(keyword: string, value: SchemaNode): number {
    if (typeof value !== 'number') {
        throw new SchemaError(`"${keyword}" must be a number, got ${repr(value)}`, keyword);
    }
    return value;
}

export function expectString(keyword: string, value: SchemaNode): string {
    if (typeof value !== 'string') {
        throw new SchemaError(`"${keyword}" must be a string, got ${repr(value)}`, keyword);
    }
    return value;
}

export function expectArray(keyword: string, value: SchemaNode): SchemaNode[] {
    if (!Array.isArray(value)) {
        throw new SchemaError(`"${keyword}" must be an array, got ${repr(value)}`, keyword);
    }
    return value;
}

export function expectStringList(keyword: string, value: SchemaNode): string[] {
    return expectArray(keyword, value).map(item => expectString(keyword, item));
}

/** `type` accepts a single name or a list of names. */
export function expectTypeList(value: SchemaNode): string[] {
    return typeof value === 'string' ? [value] : expectStringList('type', value);
}

export function compilePattern(keyword: string, pattern: string): RegExp {
    try {
        return new RegExp(pattern);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new SchemaError(`"${keyword}" holds an invalid regular expression: ${message}`, keyword);
    }
}
