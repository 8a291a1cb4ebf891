import {
    CircularReferenceError,
    InvalidReferenceError,
    ReferenceResolutionError,
    UnknownSchemeError,
} from '../errors.js';
import {
    CircularRefMode,
    ReferenceObject,
    ReferenceStore,
    ResolverOptions,
    SchemaNode,
    SchemaObject,
    SchemeHandlerMap,
} from '../types/index.js';
import {
    deepClone,
    getScheme,
    hasOwn,
    isReferenceObject,
    isSchemaObject,
    joinUri,
    splitFragment,
} from '../utils/index.js';
import { resolvePointer } from './json-pointer.js';
import { DEFAULT_SCHEME_HANDLERS } from './spec-loader.js';

/** The document references are currently looked up in, and the URI relative references join to. */
interface ResolutionScope {
    document: SchemaNode;
    uri: string;
}

/**
 * Rewrites a schema document into a self-contained tree by inlining every `{"$ref": ...}` node.
 *
 * Local references (`#/...`) are looked up in the original, unresolved document and merged over
 * the reference node. Anything else is fetched through the scheme handlers (or taken from the
 * store) and substituted for the node. One instance serves one `resolve()` call.
 */
export class ReferenceResolver {
    private readonly store: ReferenceStore;
    private readonly handlers: SchemeHandlerMap;
    private readonly circular: CircularRefMode;
    private readonly scopes: ResolutionScope[];
    /** Absolute reference → the object its target is being expanded into, for the current branch. */
    private readonly expanding = new Map<string, SchemaObject | SchemaNode[]>();
    private readonly visited = new WeakSet<object>();

    constructor(
        private readonly root: SchemaNode,
        options: ResolverOptions = {},
    ) {
        this.store = options.store ?? new Map();
        this.handlers = options.handlers ?? DEFAULT_SCHEME_HANDLERS;
        this.circular = options.circular ?? 'link';
        this.scopes = [{ document: root, uri: options.baseUri ?? '' }];
    }

    /**
     * Recursively finds all unique `$ref` string values.
     */
    public static findRefs(node: SchemaNode): string[] {
        const refs = new Set<string>();
        const seen = new WeakSet<object>();

        const traverse = (current: SchemaNode) => {
            if (typeof current !== 'object' || current === null || seen.has(current)) return;
            seen.add(current);
            if (Array.isArray(current)) {
                current.forEach(traverse);
                return;
            }
            if (isReferenceObject(current)) refs.add(current.$ref);
            Object.values(current).forEach(traverse);
        };

        traverse(node);
        return Array.from(refs);
    }

    /** The scope at the top of the stack: the root document, or the external document being walked. */
    public get resolutionScope(): ResolutionScope {
        return this.scopes[this.scopes.length - 1];
    }

    /**
     * Produces the resolved copy. The document given to the constructor is never modified.
     * @throws {ReferenceResolutionError} (or a subclass) when any reference cannot be resolved.
     */
    public async resolve(): Promise<SchemaNode> {
        return this.walk(deepClone(this.root));
    }

    private async walk(node: SchemaNode): Promise<SchemaNode> {
        if (typeof node !== 'object' || node === null) return node;
        if (isReferenceObject(node)) return this.resolveReferenceNode(node);
        if (this.visited.has(node)) return node;
        this.visited.add(node);

        if (Array.isArray(node)) {
            for (let i = 0; i < node.length; i++) {
                node[i] = await this.walk(node[i]);
            }
            return node;
        }

        for (const key of Object.keys(node)) {
            node[key] = await this.walk(node[key]);
        }
        return node;
    }

    private async resolveReferenceNode(node: ReferenceObject): Promise<SchemaNode> {
        const ref = node.$ref;
        if (!ref.startsWith('#')) {
            return this.resolveExternal(node);
        }

        const scope = this.resolutionScope;
        const key = `${scope.uri}${ref}`;
        const cyclic = this.checkCycle(key, node);
        if (cyclic !== undefined) return cyclic;

        const lookup = resolvePointer(scope.document, ref.slice(1));
        if (!lookup.found) {
            throw new InvalidReferenceError(ref, scope.uri);
        }

        if (!isSchemaObject(lookup.value)) {
            return this.expand(key, deepClone(lookup.value));
        }

        // The target is merged over the reference node. A `$ref` inside the target replaces
        // the one removed here and is followed by the walk below.
        const merged: SchemaObject = node;
        delete merged.$ref;
        Object.assign(merged, deepClone(lookup.value));
        return this.expand(key, merged);
    }

    private async resolveExternal(node: ReferenceObject): Promise<SchemaNode> {
        const url = joinUri(this.resolutionScope.uri, node.$ref);
        const cyclic = this.checkCycle(url, node);
        if (cyclic !== undefined) return cyclic;

        const [documentUri, fragment] = splitFragment(url);
        const document = await this.resolveDocument(documentUri);
        const lookup = resolvePointer(document, fragment);
        if (!lookup.found) {
            throw new ReferenceResolutionError(`Unresolvable JSON pointer: "${fragment}" in ${documentUri}`, url);
        }

        this.scopes.push({ document, uri: documentUri });
        try {
            if (!isSchemaObject(lookup.value)) {
                return await this.expand(url, deepClone(lookup.value));
            }
            // Substituted in place so that references linked back to this node see the final object.
            const replaced: SchemaObject = node;
            for (const key of Object.keys(replaced)) delete replaced[key];
            Object.assign(replaced, deepClone(lookup.value));
            return await this.expand(url, replaced);
        } finally {
            this.scopes.pop();
        }
    }

    private async expand(key: string, replacement: SchemaNode): Promise<SchemaNode> {
        if (typeof replacement !== 'object' || replacement === null) return replacement;
        this.expanding.set(key, replacement);
        try {
            return await this.walk(replacement);
        } finally {
            this.expanding.delete(key);
        }
    }

    /**
     * Returns what a reference to a target still under expansion becomes, or `undefined` if the
     * reference is not cyclic.
     */
    private checkCycle(key: string, node: ReferenceObject): SchemaNode | undefined {
        const ancestor = this.expanding.get(key);
        if (ancestor === undefined) return undefined;

        switch (this.circular) {
            case 'error':
                throw new CircularReferenceError(key);
            case 'ignore':
                console.warn(`[RefResolver] Leaving circular reference "${node.$ref}" unresolved.`);
                return node;
            case 'link':
                return ancestor;
        }
    }

    /**
     * Returns the document at `uri` from the root, the store, or the scheme handler (storing it).
     */
    private async resolveDocument(uri: string): Promise<SchemaNode> {
        if (uri === this.scopes[0].uri) return this.root;

        const cached = this.store.get(uri);
        if (cached !== undefined) return cached;

        const scheme = getScheme(uri);
        if (scheme === undefined) {
            throw new ReferenceResolutionError(`Cannot resolve relative reference "${uri}" without a base URI`, uri);
        }
        if (!hasOwn(this.handlers, scheme)) {
            throw new UnknownSchemeError(scheme, uri);
        }

        let document: SchemaNode;
        try {
            document = await this.handlers[scheme](uri);
        } catch (error) {
            if (error instanceof ReferenceResolutionError) throw error;
            const message = error instanceof Error ? error.message : String(error);
            throw new ReferenceResolutionError(`Failed to resolve ${uri}: ${message}`, uri, { cause: error });
        }

        this.store.set(uri, document);
        return document;
    }
}

/**
 * Resolve JSON references like `{"$ref": <some URI>}` in a spec.
 * Optionally takes a store, which is a mapping from reference URLs to dereferenced documents.
 * Prepopulating the store can avoid network calls.
 *
 * @returns A resolved deep copy; `spec` itself is left untouched.
 */
export async function resolveRefs(spec: SchemaNode, options: ResolverOptions = {}): Promise<SchemaNode> {
    return new ReferenceResolver(spec, options).resolve();
}
