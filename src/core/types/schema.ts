// ===================================================================================
// JSON / Schema value types
// ===================================================================================

export type JsonPrimitive = string | number | boolean | null;

/**
 * A JSON-compatible value holding a schema document, a subschema or a reference node.
 */
export type SchemaNode = JsonPrimitive | SchemaNode[] | SchemaObject;

export interface SchemaObject {
    [key: string]: SchemaNode;
}

/** A `{"$ref": "<uri>"}` node, possibly carrying sibling keys. */
export interface ReferenceObject extends SchemaObject {
    $ref: string;
}

/**
 * Absolute document URI (fragment removed) to an already fetched document.
 * Caller-owned; pre-seed it to avoid network calls and reuse it across resolve calls.
 */
export type ReferenceStore = Map<string, SchemaNode>;

/** Fetches and parses the document at an absolute URI. */
export type SchemeHandler = (uri: string) => Promise<SchemaNode>;

/** URI scheme (without the trailing colon) to the handler that fetches it. */
export type SchemeHandlerMap = Readonly<Record<string, SchemeHandler>>;

/** One segment of an instance path or schema path: a property name or an array index. */
export type PathSegment = string | number;
