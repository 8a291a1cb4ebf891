/**
 * Checks if a string is a valid absolute URL. Windows paths such as `C:\\specs\\api.yaml` are not.
 */
export function isUrl(input: string): boolean {
    if (getScheme(input) === undefined) return false;
    try {
        new URL(input);
        return true;
    } catch {
        return false;
    }
}

/**
 * Returns the lower-cased scheme of a URI (`"https"` for `"HTTPS://x"`), or `undefined` for a
 * relative reference. Single-letter schemes are treated as Windows drive letters, not schemes.
 */
export function getScheme(uri: string): string | undefined {
    const match = /^([a-zA-Z][a-zA-Z0-9+.-]+):/.exec(uri);
    return match ? match[1].toLowerCase() : undefined;
}

/**
 * Joins a reference to a base URI. With an empty base the reference is returned unchanged,
 * which leaves relative references relative.
 */
export function joinUri(base: string, ref: string): string {
    if (!base) return ref;
    try {
        return new URL(ref, base).href;
    } catch {
        return ref;
    }
}

/**
 * Splits `"doc.json#/a/b"` into `["doc.json", "/a/b"]`. The fragment is returned raw (still
 * percent-encoded) and is `""` when the URI has none.
 */
export function splitFragment(uri: string): [string, string] {
    const hash = uri.indexOf('#');
    return hash === -1 ? [uri, ''] : [uri.slice(0, hash), uri.slice(hash + 1)];
}
