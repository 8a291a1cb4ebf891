import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { loadConfigFile, mergeConfig, parseConfig } from '@src/core/config-loader.js';
import { ConfigError } from '@src/core/errors.js';

describe('Core: Config Loader', () => {
    let tempDir: string;

    beforeAll(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'oas-schema-guard-config-'));
    });

    afterAll(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    describe('parseConfig', () => {
        it('should accept a complete configuration', () => {
            const raw = {
                input: 'api.yaml',
                output: 'out.json',
                format: 'yaml',
                mode: 'response',
                pointer: '#/definitions/User',
                formats: true,
                circular: 'error',
                timeoutMs: 500,
                unknown: 'ignored',
            };
            expect(parseConfig(raw)).toEqual({
                input: 'api.yaml',
                output: 'out.json',
                format: 'yaml',
                mode: 'response',
                pointer: '#/definitions/User',
                formats: true,
                circular: 'error',
                timeoutMs: 500,
            });
        });

        it('should reject values of the wrong type', () => {
            expect(() => parseConfig([])).toThrow('Configuration must be an object.');
            expect(() => parseConfig({ mode: 'both' })).toThrow('Config option "mode" must be one of: request, response.');
            expect(() => parseConfig({ circular: 'skip' })).toThrow(
                'Config option "circular" must be one of: link, ignore, error.',
            );
            expect(() => parseConfig({ timeoutMs: 0 })).toThrow('Config option "timeoutMs" must be a positive number.');
            expect(() => parseConfig({ formats: 'yes' })).toThrow('Config option "formats" must be a boolean.');
            expect(() => parseConfig({ input: 5 })).toThrow(ConfigError);
            expect(() => parseConfig({ input: 5 })).toThrow('Config option "input" must be a string.');
        });
    });

    describe('loadConfigFile', () => {
        it('should load YAML and resolve paths against the config directory', () => {
            const configPath = path.join(tempDir, 'guard.yaml');
            fs.writeFileSync(configPath, 'input: ./schemas/api.yaml\noutput: dist/api.json\nmode: response\n');
            expect(loadConfigFile(configPath)).toEqual({
                input: path.join(tempDir, 'schemas', 'api.yaml'),
                output: path.join(tempDir, 'dist', 'api.json'),
                format: undefined,
                mode: 'response',
                pointer: undefined,
                formats: undefined,
                circular: undefined,
                timeoutMs: undefined,
            });
        });

        it('should load JSON and leave URL inputs alone', () => {
            const configPath = path.join(tempDir, 'guard.json');
            fs.writeFileSync(configPath, JSON.stringify({ input: 'https://api.test/openapi.json', timeoutMs: 100 }));
            const config = loadConfigFile(configPath);
            expect(config.input).toBe('https://api.test/openapi.json');
            expect(config.timeoutMs).toBe(100);
        });

        it('should treat an empty file as an empty configuration', () => {
            const configPath = path.join(tempDir, 'empty.yaml');
            fs.writeFileSync(configPath, '');
            expect(loadConfigFile(configPath).input).toBeUndefined();
        });

        it('should throw ConfigError for a missing file', () => {
            const missing = path.join(tempDir, 'missing.yaml');
            expect(() => loadConfigFile(missing)).toThrow(`Configuration file not found: ${missing}`);
        });

        it('should throw ConfigError for unparsable content', () => {
            const configPath = path.join(tempDir, 'broken.yaml');
            fs.writeFileSync(configPath, 'input: [unclosed\n');
            expect(() => loadConfigFile(configPath)).toThrow(/^Failed to load configuration file: /);
        });
    });

    describe('mergeConfig', () => {
        it('should let defined overrides win and keep base values otherwise', () => {
            const merged = mergeConfig({ input: 'a.yaml', mode: 'response', formats: true }, { input: 'b.yaml', mode: undefined });
            expect(merged).toEqual({ input: 'b.yaml', mode: 'response', formats: true });
        });
    });
});
