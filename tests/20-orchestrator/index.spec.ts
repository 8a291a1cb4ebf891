import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { pathToFileURL } from 'node:url';

import {
    createValidator,
    formatDocument,
    InvalidReferenceError,
    loadSchema,
    resolveRefs,
    SchemaNode,
    SchemaObject,
    SchemaValidator,
    selectSchema,
    toDocumentUri,
    UnknownSchemeError,
    validateInstance,
} from '@src/index.js';

const rootYaml = `
definitions:
  Pet:
    type: object
    required: [id, name, owner]
    properties:
      id:
        type: integer
        readOnly: true
      name:
        type: string
      owner:
        $ref: 'common.json#/definitions/Person'
      tag:
        $ref: '#/definitions/Tag'
  Tag:
    type: string
    nullable: true
`;

const commonJson = {
    definitions: {
        Person: {
            type: 'object',
            required: ['name'],
            properties: {
                name: { type: 'string' },
                secret: { type: 'string', writeOnly: true },
            },
        },
    },
};

describe('Orchestrator: loadSchema and validateInstance', () => {
    let tempDir: string;
    let rootPath: string;
    let commonPath: string;

    beforeAll(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'oas-schema-guard-index-'));
        rootPath = path.join(tempDir, 'root.yaml');
        commonPath = path.join(tempDir, 'common.json');
        fs.writeFileSync(rootPath, rootYaml);
        fs.writeFileSync(commonPath, JSON.stringify(commonJson));
    });

    afterAll(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    const loadPet = async (): Promise<SchemaNode> => selectSchema((await loadSchema(rootPath)).schema, '#/definitions/Pet');

    it('should turn paths into file URIs and leave URLs alone', () => {
        expect(toDocumentUri(rootPath)).toBe(pathToFileURL(rootPath).href);
        expect(toDocumentUri('https://api.test/openapi.json')).toBe('https://api.test/openapi.json');
    });

    it('should inline local and external references', async () => {
        const { schema, documentUri, store } = await loadSchema(rootPath);
        expect(documentUri).toBe(pathToFileURL(rootPath).href);
        expect([...store.keys()]).toEqual([pathToFileURL(commonPath).href]);

        const pet = selectSchema(schema, '#/definitions/Pet');
        expect(pet).toMatchObject({
            properties: {
                owner: commonJson.definitions.Person,
                tag: { type: 'string', nullable: true },
            },
        });
    });

    it('should select subschemas with or without the leading #', async () => {
        const { schema } = await loadSchema(rootPath);
        expect(selectSchema(schema, '/definitions/Tag')).toEqual({ type: 'string', nullable: true });
        expect(selectSchema(schema)).toBe(schema);
        expect(selectSchema(schema, '#')).toBe(schema);
        expect(() => selectSchema(schema, '#/definitions/Nope')).toThrow(InvalidReferenceError);
        expect(() => selectSchema(schema, '#/definitions/Nope')).toThrow(
            'Unresolvable JSON pointer #/definitions/Nope in the root document',
        );
    });

    it('should validate requests', async () => {
        const pet = await loadPet();
        expect(validateInstance(pet, { name: 'Rex', owner: { name: 'Ann' }, tag: null })).toEqual([]);

        const errors = validateInstance(pet, { id: 1, name: 'Rex', owner: { name: 'Ann' } });
        expect(errors.map(error => error.toString())).toEqual(['/id: Property is read-only']);
    });

    it('should validate responses', async () => {
        const pet = await loadPet();
        expect(validateInstance(pet, { id: 1, name: 'Rex', owner: { name: 'Ann' } }, { mode: 'response' })).toEqual([]);

        const errors = validateInstance(pet, { id: 1, name: 'Rex', owner: { name: 'Ann', secret: 's' } }, { mode: 'response' });
        expect(errors.map(error => error.toString())).toEqual(['/owner/secret: Property is write-only']);

        const missing = validateInstance(pet, { name: 'Rex', owner: { name: 'Ann' } }, { mode: 'response' });
        expect(missing.map(error => error.message)).toEqual(['"id" is a required property']);
    });

    it('should follow references left in place when validating against a subschema', async () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const document = await resolveRefs(
            { definitions: { Node: { type: 'object', properties: { child: { $ref: '#/definitions/Node' } } } } },
            { handlers: {}, circular: 'ignore' },
        );
        const options = { pointer: '#/definitions/Node' };

        expect(validateInstance(document, { child: { child: { child: {} } } }, options)).toEqual([]);
        expect(validateInstance(document, { child: { child: 1 } }, options).map(error => error.toString())).toEqual([
            '/child/child: 1 is not of type "object"',
        ]);
        expect(warn).toHaveBeenCalledTimes(1);
        warn.mockRestore();
    });

    it('should build validators per direction', () => {
        const request = createValidator({ type: 'string' });
        const response = createValidator({ type: 'string' }, 'response', { formats: true });
        expect(request).toBeInstanceOf(SchemaValidator);
        expect(request.hasKeyword('readOnly')).toBe(true);
        expect(response.hasKeyword('writeOnly')).toBe(true);
        expect(response.formats).toBe(true);
    });

    it('should refuse inputs with an unsupported scheme', async () => {
        await expect(loadSchema('ftp://files.test/api.json')).rejects.toBeInstanceOf(UnknownSchemeError);
    });

    describe('formatDocument', () => {
        it('should write JSON and YAML', () => {
            expect(formatDocument({ a: 1 })).toBe('{\n  "a": 1\n}');
            expect(formatDocument({ a: [1, 'x'] }, 'yaml')).toBe('a:\n  - 1\n  - x\n');
        });

        it('should refuse to write a cyclic document as JSON', () => {
            const node: SchemaObject = { type: 'object' };
            node.self = node;
            expect(() => formatDocument(node)).toThrow(
                'Resolved schema contains circular references and cannot be written as JSON. ' +
                    'Use the yaml format or the "ignore" circular mode.',
            );
            expect(formatDocument(node, 'yaml')).toContain('*ref_0');
        });
    });
});
