import { SchemaNode } from '../types/index.js';
import { hasOwn } from '../utils/index.js';

export type PointerLookup = { found: true; value: SchemaNode } | { found: false };

const ARRAY_INDEX = /^(0|[1-9][0-9]*)$/;

/**
 * Splits a URI fragment (without the leading `#`) into JSON pointer segments.
 * Percent-decoding happens first, then `~1` → `/` and `~0` → `~` (RFC 6901, section 6).
 *
 * @returns The segments, or `undefined` if the fragment is not a JSON pointer
 *          (e.g. a plain-name anchor such as `#user`) or is malformed.
 */
export function parsePointer(fragment: string): string[] | undefined {
    if (fragment === '') return [];
    if (!fragment.startsWith('/')) return undefined;

    try {
        return fragment
            .slice(1)
            .split('/')
            .map(part => decodeURIComponent(part).replace(/~1/g, '/').replace(/~0/g, '~'));
    } catch {
        // malformed percent-encoding
        return undefined;
    }
}

/**
 * Walks `segments` down from `document`.
 */
export function lookupPath(document: SchemaNode, segments: readonly string[]): PointerLookup {
    let current: SchemaNode = document;
    for (const segment of segments) {
        if (Array.isArray(current)) {
            if (!ARRAY_INDEX.test(segment) || Number(segment) >= current.length) return { found: false };
            current = current[Number(segment)];
        } else if (typeof current === 'object' && current !== null && hasOwn(current, segment)) {
            current = current[segment];
        } else {
            return { found: false };
        }
    }
    return { found: true, value: current };
}

/**
 * Resolves a JSON pointer fragment (`"/components/schemas/User"`, without `#`) inside a document.
 */
export function resolvePointer(document: SchemaNode, fragment: string): PointerLookup {
    const segments = parsePointer(fragment);
    return segments === undefined ? { found: false } : lookupPath(document, segments);
}
