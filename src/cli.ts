#!/usr/bin/env node
import { Command, Option } from 'commander';
import * as fs from 'node:fs';
import * as path from 'node:path';

import { loadConfigFile, mergeConfig } from './core/config-loader.js';
import { SpecLoader } from './core/parser/spec-loader.js';
import { CircularRefMode, GuardConfig, ValidationMode } from './core/types.js';
import { formatDocument, loadSchema, toDocumentUri, validateInstance } from './index.js';

const packageJsonPath = new URL('../package.json', import.meta.url);
const packageJson: { version: string } = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));

interface ResolveCommandOptions {
    config?: string;
    input?: string;
    output?: string;
    format?: 'json' | 'yaml';
    circular?: CircularRefMode;
    timeout?: string;
}

interface ValidateCommandOptions {
    config?: string;
    schema?: string;
    data: string;
    mode?: ValidationMode;
    pointer?: string;
    formats?: boolean;
    circular?: CircularRefMode;
    timeout?: string;
}

function baseConfig(configPath?: string): GuardConfig {
    if (!configPath) return {};
    console.log(`📜 Loading configuration from: ${configPath}`);
    return loadConfigFile(configPath);
}

function parseTimeout(value?: string): number | undefined {
    if (value === undefined) return undefined;
    const timeoutMs = Number(value);
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
        throw new Error(`Invalid timeout "${value}": expected a positive number of milliseconds.`);
    }
    return timeoutMs;
}

async function runResolve(options: ResolveCommandOptions): Promise<void> {
    const startTime = Date.now();
    try {
        const config = mergeConfig(baseConfig(options.config), {
            input: options.input,
            output: options.output,
            format: options.format,
            circular: options.circular,
            timeoutMs: parseTimeout(options.timeout),
        });
        if (!config.input) {
            throw new Error('Input path or URL is required. Provide it via --input or a config file.');
        }

        const { schema, store } = await loadSchema(config.input, {
            circular: config.circular,
            timeoutMs: config.timeoutMs,
        });
        const text = formatDocument(schema, config.format ?? 'json');

        if (config.output) {
            const outputPath = path.resolve(process.cwd(), config.output);
            fs.mkdirSync(path.dirname(outputPath), { recursive: true });
            fs.writeFileSync(outputPath, text.endsWith('\n') ? text : `${text}\n`);
            console.log(`✅ Resolved schema written to ${outputPath} (${store.size} external document(s) fetched)`);
        } else {
            process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
        }
    } catch (error) {
        console.error('❌ Resolution failed:', error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
    } finally {
        const duration = (Date.now() - startTime) / 1000;
        console.error(`⏱️  Duration: ${duration.toFixed(2)} seconds`);
    }
}

async function runValidate(options: ValidateCommandOptions): Promise<void> {
    try {
        const config = mergeConfig(baseConfig(options.config), {
            input: options.schema,
            mode: options.mode,
            pointer: options.pointer,
            formats: options.formats,
            circular: options.circular,
            timeoutMs: parseTimeout(options.timeout),
        });
        if (!config.input) {
            throw new Error('Schema path or URL is required. Provide it via --schema or a config file.');
        }

        const { schema } = await loadSchema(config.input, {
            circular: config.circular,
            timeoutMs: config.timeoutMs,
        });
        const dataUri = toDocumentUri(options.data);
        const instance = SpecLoader.parseDocument(await SpecLoader.loadContent(dataUri, config), dataUri);

        const mode = config.mode ?? 'request';
        const errors = validateInstance(schema, instance, {
            mode,
            pointer: config.pointer,
            formats: config.formats,
        });

        if (errors.length === 0) {
            console.log(`✅ ${options.data} is a valid ${mode} payload.`);
            return;
        }

        console.error(`❌ ${errors.length} validation error(s) in ${options.data} (${mode} mode):`);
        for (const error of errors) {
            console.error(`  - ${error.toString()}  [schema: ${error.schemaPointer || '/'}]`);
        }
        process.exitCode = 1;
    } catch (error) {
        console.error('❌ Validation failed:', error instanceof Error ? error.message : String(error));
        process.exitCode = 2;
    }
}

const program = new Command();
program
    .name('oas-schema-guard')
    .description('Resolve JSON references in OpenAPI / JSON-Schema documents and validate payloads against them')
    .version(packageJson.version);

program
    .command('resolve')
    .description('Inline every $ref of a schema document')
    .option('-c, --config <path>', 'Path to a JSON or YAML configuration file')
    .option('-i, --input <path>', 'Path or URL of the schema document (overrides config)')
    .option('-o, --output <path>', 'File to write the resolved document to (defaults to stdout)')
    .addOption(new Option('--format <format>', 'Output format').choices(['json', 'yaml']))
    .addOption(new Option('--circular <mode>', 'Handling of circular references').choices(['link', 'ignore', 'error']))
    .option('--timeout <ms>', 'Deadline for each http(s) fetch, in milliseconds')
    .action(runResolve);

program
    .command('validate')
    .description('Validate a JSON or YAML payload against a schema')
    .option('-c, --config <path>', 'Path to a JSON or YAML configuration file')
    .option('-s, --schema <path>', 'Path or URL of the schema document (overrides config)')
    .requiredOption('-d, --data <path>', 'Path or URL of the payload to validate')
    .addOption(new Option('--mode <mode>', 'Direction of the payload').choices(['request', 'response']))
    .option('-p, --pointer <pointer>', 'JSON pointer to the schema inside the document, e.g. #/components/schemas/User')
    .option('--formats', 'Check the "format" keyword')
    .addOption(new Option('--circular <mode>', 'Handling of circular references').choices(['link', 'ignore', 'error']))
    .option('--timeout <ms>', 'Deadline for each http(s) fetch, in milliseconds')
    .action(runValidate);

await program.parseAsync(process.argv);
