import { JsonPrimitive, ReferenceObject, SchemaNode, SchemaObject } from '../types/index.js';

/**
 * Narrows a schema node to a JSON object (not an array, not null).
 */
export function isSchemaObject(node: SchemaNode | undefined): node is SchemaObject {
    return typeof node === 'object' && node !== null && !Array.isArray(node);
}

/**
 * Narrows an arbitrary runtime value to a plain string-keyed record.
 * Arrays and `null` are not records.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const isReferenceObject = (node: SchemaNode | undefined): node is ReferenceObject =>
    isSchemaObject(node) && typeof node.$ref === 'string';

export function hasOwn(obj: object, key: string): boolean {
    return Object.prototype.hasOwnProperty.call(obj, key);
}

/**
 * Deep copy of a schema tree. Shared subtrees are copied once and stay shared,
 * so cyclic input yields a cyclic copy instead of overflowing the stack.
 */
export function deepClone<T extends SchemaNode>(node: T): T;
export function deepClone(node: SchemaNode): SchemaNode {
    const seen = new Map<object, SchemaNode>();

    const copy = (value: SchemaNode): SchemaNode => {
        if (typeof value !== 'object' || value === null) return value;
        const existing = seen.get(value);
        if (existing !== undefined) return existing;

        if (Array.isArray(value)) {
            const out: SchemaNode[] = [];
            seen.set(value, out);
            for (const item of value) out.push(copy(item));
            return out;
        }

        const out: SchemaObject = {};
        seen.set(value, out);
        for (const key of Object.keys(value)) {
            out[key] = copy(value[key]);
        }
        return out;
    };

    return copy(node);
}

/**
 * Structural equality for JSON values. Numbers compare by value, so `1` equals `1.0`;
 * booleans never equal numbers.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
    if (a === b) return true;
    if (typeof a !== typeof b || a === null || b === null) return false;

    if (Array.isArray(a) || Array.isArray(b)) {
        if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
        return a.every((item, i) => deepEqual(item, b[i]));
    }

    if (isRecord(a) && isRecord(b)) {
        const keysA = Object.keys(a);
        const keysB = Object.keys(b);
        if (keysA.length !== keysB.length) return false;
        return keysA.every(key => hasOwn(b, key) && deepEqual(a[key], b[key]));
    }

    return false;
}

/**
 * Compact textual form of a value for error messages.
 * Falls back to `String()` for values JSON cannot express.
 */
export function repr(value: unknown): string {
    if (value === undefined) return 'undefined';
    try {
        const json = JSON.stringify(value);
        return json === undefined ? String(value) : json;
    } catch {
        // cyclic schema graphs
        return Array.isArray(value) ? '[...]' : '{...}';
    }
}

function isJsonPrimitive(value: unknown): value is JsonPrimitive {
    return (
        value === null ||
        typeof value === 'string' ||
        typeof value === 'boolean' ||
        (typeof value === 'number' && Number.isFinite(value))
    );
}

/**
 * Converts a parsed document (JSON or YAML) into a `SchemaNode`.
 * YAML timestamps become ISO-8601 strings; anything JSON cannot hold is rejected.
 *
 * @throws {TypeError} for functions, symbols, bigints, `undefined` and non-finite numbers.
 */
export function toSchemaNode(value: unknown, location: string = '#'): SchemaNode {
    if (isJsonPrimitive(value)) return value;
    if (value instanceof Date) return value.toISOString();
    if (Array.isArray(value)) {
        return value.map((item: unknown, i) => toSchemaNode(item, `${location}/${i}`));
    }
    if (isRecord(value)) {
        const out: SchemaObject = {};
        for (const [key, item] of Object.entries(value)) {
            out[key] = toSchemaNode(item, `${location}/${key}`);
        }
        return out;
    }
    throw new TypeError(`Value at ${location} is not representable as JSON: ${String(value)}`);
}
