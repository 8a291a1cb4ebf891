import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

import yaml from 'js-yaml';

import { ReferenceResolutionError } from '../errors.js';
import { SchemaNode, SchemeHandler, SchemeHandlerMap, UrlHandlerOptions } from '../types/index.js';
import { getScheme, toSchemaNode } from '../utils/index.js';

const YAML_EXTENSIONS = ['.yaml', '.yml'];

export class SpecLoader {
    /**
     * Reads the raw text behind an absolute `http:`, `https:` or `file:` URI.
     * @throws {ReferenceResolutionError} naming the URI when the transport fails.
     */
    public static async loadContent(uri: string, options: UrlHandlerOptions = {}): Promise<string> {
        const scheme = getScheme(uri);
        try {
            if (scheme === 'http' || scheme === 'https') {
                const signal = options.timeoutMs !== undefined ? AbortSignal.timeout(options.timeoutMs) : undefined;
                const response = await fetch(uri, { signal });
                if (!response.ok) {
                    throw new Error(`Failed to fetch spec from ${uri}: ${response.status} ${response.statusText}`);
                }
                return await response.text();
            }
            if (scheme === 'file') {
                return await fs.readFile(fileURLToPath(uri), 'utf8');
            }
            throw new Error(`Unsupported scheme "${scheme ?? ''}"`);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new ReferenceResolutionError(`Failed to read content from "${uri}": ${message}`, uri, {
                cause: error,
            });
        }
    }

    /**
     * Parses a fetched document. YAML is used for `.yaml`/`.yml` paths and as a fallback when the
     * content is not valid JSON (YAML 1.2 being a superset of JSON).
     * @throws {ReferenceResolutionError} when neither parser accepts the content.
     */
    public static parseDocument(content: string, uri: string): SchemaNode {
        try {
            const extension = path.extname(new URL(uri, 'file:///').pathname).toLowerCase();
            if (YAML_EXTENSIONS.includes(extension)) {
                return toSchemaNode(yaml.load(content));
            }
            try {
                return toSchemaNode(JSON.parse(content));
            } catch (jsonError) {
                if (jsonError instanceof TypeError) throw jsonError;
                return toSchemaNode(yaml.load(content));
            }
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new ReferenceResolutionError(`Failed to parse content from ${uri}. Error: ${message}`, uri, {
                cause: error,
            });
        }
    }
}

/**
 * Builds the default handler for one scheme: fetch (or read) the URI, then parse it as JSON or YAML.
 */
export function createUrlHandler(scheme: string, options: UrlHandlerOptions = {}): SchemeHandler {
    return async (uri: string): Promise<SchemaNode> => {
        if (getScheme(uri) !== scheme) {
            throw new ReferenceResolutionError(`Handler for "${scheme}" cannot fetch ${uri}`, uri);
        }
        const content = await SpecLoader.loadContent(uri, options);
        return SpecLoader.parseDocument(content, uri);
    };
}

export function createDefaultHandlers(options: UrlHandlerOptions = {}): SchemeHandlerMap {
    return Object.freeze({
        http: createUrlHandler('http', options),
        https: createUrlHandler('https', options),
        file: createUrlHandler('file', options),
    });
}

export const DEFAULT_SCHEME_HANDLERS: SchemeHandlerMap = createDefaultHandlers();
