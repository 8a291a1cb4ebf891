import { describe, expect, it } from 'vitest';

import { SchemaObject } from '@src/core/types/index.js';
import { deepClone, deepEqual, isRecord, isReferenceObject, isSchemaObject, repr, toSchemaNode } from '@src/core/utils/index.js';

describe('Core Utils: JSON helpers', () => {
    describe('type guards', () => {
        it('should only accept non-array objects', () => {
            expect(isSchemaObject({})).toBe(true);
            expect(isSchemaObject([])).toBe(false);
            expect(isSchemaObject(null)).toBe(false);
            expect(isSchemaObject('x')).toBe(false);
            expect(isRecord({ a: 1 })).toBe(true);
            expect(isRecord([1])).toBe(false);
        });

        it('should recognise reference objects by a string $ref', () => {
            expect(isReferenceObject({ $ref: '#/a' })).toBe(true);
            expect(isReferenceObject({ $ref: { type: 'string' } })).toBe(false);
            expect(isReferenceObject(['#/a'])).toBe(false);
        });
    });

    describe('deepClone', () => {
        it('should copy nested structures without sharing them', () => {
            const source = { a: { b: [1, { c: 'x' }] } };
            const copy = deepClone(source);
            expect(copy).toEqual(source);
            expect(copy.a).not.toBe(source.a);
            expect(copy.a.b).not.toBe(source.a.b);
        });

        it('should preserve shared and cyclic nodes', () => {
            const shared: SchemaObject = { type: 'string' };
            const cyclic: SchemaObject = { first: shared, second: shared };
            cyclic.self = cyclic;

            const copy = deepClone(cyclic);
            expect(copy.first).toBe(copy.second);
            expect(copy.first).not.toBe(shared);
            expect(copy.self).toBe(copy);
        });
    });

    describe('deepEqual', () => {
        it('should compare JSON values structurally', () => {
            expect(deepEqual({ a: [1, { b: null }] }, { a: [1, { b: null }] })).toBe(true);
            expect(deepEqual({ a: 1, b: 2 }, { b: 2, a: 1 })).toBe(true);
            expect(deepEqual({ a: 1 }, { a: 1, b: undefined })).toBe(false);
            expect(deepEqual([1, 2], [2, 1])).toBe(false);
            expect(deepEqual([], {})).toBe(false);
            expect(deepEqual(1, true)).toBe(false);
            expect(deepEqual(null, {})).toBe(false);
        });
    });

    describe('repr', () => {
        it('should render values as compact JSON', () => {
            expect(repr('x')).toBe('"x"');
            expect(repr(42)).toBe('42');
            expect(repr(null)).toBe('null');
            expect(repr({ a: [1, 'b'] })).toBe('{"a":[1,"b"]}');
            expect(repr(undefined)).toBe('undefined');
        });

        it('should not throw on cyclic values', () => {
            const cyclic: SchemaObject = {};
            cyclic.self = cyclic;
            expect(repr(cyclic)).toBe('{...}');
        });
    });

    describe('toSchemaNode', () => {
        it('should accept JSON values and turn dates into ISO strings', () => {
            const when = new Date(Date.UTC(2024, 0, 2));
            expect(toSchemaNode({ a: [1, 'x', true, null], when })).toEqual({
                a: [1, 'x', true, null],
                when: '2024-01-02T00:00:00.000Z',
            });
        });

        it('should reject values JSON cannot hold, naming their location', () => {
            expect(() => toSchemaNode({ a: [() => 1] })).toThrow(TypeError);
            expect(() => toSchemaNode({ a: { b: Number.NaN } })).toThrow('Value at #/a/b is not representable as JSON: NaN');
        });
    });
});
