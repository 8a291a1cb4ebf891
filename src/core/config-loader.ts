import * as fs from 'node:fs';
import * as path from 'node:path';

import yaml from 'js-yaml';

import { ConfigError } from './errors.js';
import { CircularRefMode, GuardConfig, ValidationMode } from './types/index.js';
import { isRecord, isUrl } from './utils/index.js';

const FORMATS = ['json', 'yaml'] as const;
const MODES: readonly ValidationMode[] = ['request', 'response'];
const CIRCULAR_MODES: readonly CircularRefMode[] = ['link', 'ignore', 'error'];

function isOneOf<T extends string>(value: unknown, options: readonly T[]): value is T {
    return options.some(option => option === value);
}

function optionalString(raw: Record<string, unknown>, key: string): string | undefined {
    const value = raw[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'string') {
        throw new ConfigError(`Config option "${key}" must be a string.`);
    }
    return value;
}

function optionalChoice<T extends string>(raw: Record<string, unknown>, key: string, options: readonly T[]): T | undefined {
    const value = raw[key];
    if (value === undefined) return undefined;
    if (!isOneOf(value, options)) {
        throw new ConfigError(`Config option "${key}" must be one of: ${options.join(', ')}.`);
    }
    return value;
}

/**
 * Checks the shape of a parsed config object. Unknown keys are ignored.
 * @throws {ConfigError} for a value of the wrong type.
 */
export function parseConfig(raw: unknown): GuardConfig {
    if (!isRecord(raw)) {
        throw new ConfigError('Configuration must be an object.');
    }

    const formats = raw.formats;
    if (formats !== undefined && typeof formats !== 'boolean') {
        throw new ConfigError('Config option "formats" must be a boolean.');
    }
    const timeoutMs = raw.timeoutMs;
    if (timeoutMs !== undefined && (typeof timeoutMs !== 'number' || !(timeoutMs > 0))) {
        throw new ConfigError('Config option "timeoutMs" must be a positive number.');
    }

    return {
        input: optionalString(raw, 'input'),
        output: optionalString(raw, 'output'),
        format: optionalChoice(raw, 'format', FORMATS),
        mode: optionalChoice(raw, 'mode', MODES),
        pointer: optionalString(raw, 'pointer'),
        formats,
        circular: optionalChoice(raw, 'circular', CIRCULAR_MODES),
        timeoutMs,
    };
}

/**
 * Loads a JSON or YAML config file. Relative `input`/`output` paths are resolved against the
 * directory of the config file.
 */
export function loadConfigFile(configPath: string): GuardConfig {
    const resolvedPath = path.resolve(process.cwd(), configPath);
    if (!fs.existsSync(resolvedPath)) {
        throw new ConfigError(`Configuration file not found: ${resolvedPath}`);
    }

    let raw: unknown;
    try {
        raw = yaml.load(fs.readFileSync(resolvedPath, 'utf8'));
    } catch (error) {
        throw new ConfigError(
            `Failed to load configuration file: ${error instanceof Error ? error.message : String(error)}`,
            { cause: error },
        );
    }

    const config = parseConfig(raw ?? {});
    const configDir = path.dirname(resolvedPath);
    if (config.input && !isUrl(config.input) && !path.isAbsolute(config.input)) {
        config.input = path.resolve(configDir, config.input);
    }
    if (config.output && !path.isAbsolute(config.output)) {
        config.output = path.resolve(configDir, config.output);
    }
    return config;
}

/**
 * Layers `overrides` (typically CLI flags) over `base`. Options left `undefined` in `overrides`
 * do not erase the base value.
 */
export function mergeConfig(base: GuardConfig, overrides: GuardConfig): GuardConfig {
    const merged: GuardConfig = { ...base };
    for (const [key, value] of Object.entries(overrides)) {
        if (value !== undefined) {
            Object.assign(merged, { [key]: value });
        }
    }
    return merged;
}
