import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { pathToFileURL } from 'node:url';

import { ReferenceResolutionError } from '@src/core/errors.js';
import { createUrlHandler, DEFAULT_SCHEME_HANDLERS, SpecLoader } from '@src/core/parser/spec-loader.js';

describe('Core: SpecLoader', () => {
    const mockFetch = vi.fn();
    let tempDir: string;

    beforeAll(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'oas-schema-guard-loader-'));
    });

    afterAll(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    beforeEach(() => {
        vi.stubGlobal('fetch', mockFetch);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        mockFetch.mockReset();
    });

    describe('loadContent', () => {
        it('should fetch http(s) URIs', async () => {
            mockFetch.mockResolvedValue({ ok: true, text: () => Promise.resolve('{"type":"string"}') });
            const content = await SpecLoader.loadContent('https://api.test/schema.json');
            expect(content).toBe('{"type":"string"}');
            expect(mockFetch).toHaveBeenCalledWith('https://api.test/schema.json', { signal: undefined });
        });

        it('should pass a deadline signal when a timeout is configured', async () => {
            mockFetch.mockResolvedValue({ ok: true, text: () => Promise.resolve('{}') });
            await SpecLoader.loadContent('http://api.test/schema.json', { timeoutMs: 50 });
            const init = mockFetch.mock.calls[0][1];
            expect(init.signal).toBeInstanceOf(AbortSignal);
        });

        it('should wrap a non-OK response in a ReferenceResolutionError naming the URI', async () => {
            mockFetch.mockResolvedValue({ ok: false, status: 404, statusText: 'Not Found' });
            const failure = SpecLoader.loadContent('http://api.test/missing.json');
            await expect(failure).rejects.toBeInstanceOf(ReferenceResolutionError);
            await expect(failure).rejects.toThrow(
                'Failed to read content from "http://api.test/missing.json": ' +
                    'Failed to fetch spec from http://api.test/missing.json: 404 Not Found',
            );
        });

        it('should wrap network errors', async () => {
            mockFetch.mockRejectedValue(new TypeError('fetch failed'));
            await expect(SpecLoader.loadContent('http://down.test/a.json')).rejects.toMatchObject({
                uri: 'http://down.test/a.json',
                message: 'Failed to read content from "http://down.test/a.json": fetch failed',
            });
        });

        it('should read file URIs from disk', async () => {
            const file = path.join(tempDir, 'plain.json');
            fs.writeFileSync(file, '{"a":1}');
            await expect(SpecLoader.loadContent(pathToFileURL(file).href)).resolves.toBe('{"a":1}');
            expect(mockFetch).not.toHaveBeenCalled();
        });

        it('should fail for a missing file', async () => {
            const uri = pathToFileURL(path.join(tempDir, 'nope.json')).href;
            await expect(SpecLoader.loadContent(uri)).rejects.toThrow(`Failed to read content from "${uri}"`);
        });

        it('should reject schemes it has no transport for', async () => {
            await expect(SpecLoader.loadContent('ftp://x.test/a.json')).rejects.toThrow('Unsupported scheme "ftp"');
        });
    });

    describe('parseDocument', () => {
        it('should parse JSON', () => {
            expect(SpecLoader.parseDocument('{"type":"integer"}', 'http://x.test/a.json')).toEqual({ type: 'integer' });
        });

        it('should parse YAML by extension and turn timestamps into strings', () => {
            const content = 'type: string\nnullable: true\nexample: 2024-01-02\n';
            expect(SpecLoader.parseDocument(content, 'file:///schemas/a.yaml')).toEqual({
                type: 'string',
                nullable: true,
                example: '2024-01-02T00:00:00.000Z',
            });
        });

        it('should fall back to YAML when the content is not JSON', () => {
            expect(SpecLoader.parseDocument('a: 1\nb: [x, y]\n', 'http://x.test/schema')).toEqual({ a: 1, b: ['x', 'y'] });
        });

        it('should report unparsable content', () => {
            expect(() => SpecLoader.parseDocument('{ "a": [', 'file:///bad.json')).toThrow(
                /^Failed to parse content from file:\/\/\/bad\.json\. Error: /,
            );
        });
    });

    describe('createUrlHandler', () => {
        it('should fetch and parse a document', async () => {
            mockFetch.mockResolvedValue({ ok: true, text: () => Promise.resolve('Pet:\n  type: object\n') });
            const handler = createUrlHandler('http');
            await expect(handler('http://x.test/pets.yaml')).resolves.toEqual({ Pet: { type: 'object' } });
        });

        it('should refuse URIs of another scheme', async () => {
            await expect(createUrlHandler('http')('https://x.test/a.json')).rejects.toThrow(
                'Handler for "http" cannot fetch https://x.test/a.json',
            );
        });

        it('should read YAML files through the file handler', async () => {
            const file = path.join(tempDir, 'common.yaml');
            fs.writeFileSync(file, 'Name:\n  type: string\n');
            await expect(DEFAULT_SCHEME_HANDLERS.file(pathToFileURL(file).href)).resolves.toEqual({
                Name: { type: 'string' },
            });
        });

        it('should register http, https and file by default', () => {
            expect(Object.keys(DEFAULT_SCHEME_HANDLERS)).toEqual(['http', 'https', 'file']);
        });
    });
});
