import { PathSegment, SchemaNode, SchemaObject } from '../types/index.js';

function toPointer(segments: readonly PathSegment[]): string {
    return segments.map(segment => '/' + String(segment).replace(/~/g, '~0').replace(/\//g, '~1')).join('');
}

/**
 * One reason an instance does not satisfy a schema.
 *
 * Validation failures are data, not exceptions: the validators yield these records and never throw
 * them. `path` and `schemaPath` are filled in by the engine as the record travels up from the
 * keyword that produced it, so they are complete by the time the caller receives it.
 */
export class ValidationError {
    /** Nested errors of a combinator keyword (`anyOf`, `oneOf`), relative to this error's instance. */
    public readonly context: readonly ValidationError[];

    private readonly pathSegments: PathSegment[] = [];
    private readonly schemaPathSegments: PathSegment[] = [];
    private annotated = false;
    private keywordName?: string;
    private keywordSchemaValue?: SchemaNode;
    private failingInstance?: unknown;
    private failingSchema?: SchemaObject;

    constructor(
        public readonly message: string,
        options: { context?: readonly ValidationError[] } = {},
    ) {
        this.context = options.context ?? [];
    }

    /** Property names and array indices leading from the instance root to the failing value. */
    public get path(): readonly PathSegment[] {
        return this.pathSegments;
    }

    /** Schema keys and indices leading from the schema root to the failing keyword. */
    public get schemaPath(): readonly PathSegment[] {
        return this.schemaPathSegments;
    }

    /** The keyword that failed, e.g. `"type"`. */
    public get keyword(): string | undefined {
        return this.keywordName;
    }

    /** The failing keyword's value in the schema, e.g. `["string", "null"]`. */
    public get keywordValue(): SchemaNode | undefined {
        return this.keywordSchemaValue;
    }

    public get instance(): unknown {
        return this.failingInstance;
    }

    /** The (sub)schema holding the failing keyword. */
    public get schema(): SchemaObject | undefined {
        return this.failingSchema;
    }

    /** `path` as an RFC 6901 JSON pointer; `""` for the instance root. */
    public get jsonPointer(): string {
        return toPointer(this.pathSegments);
    }

    /** `schemaPath` as an RFC 6901 JSON pointer. */
    public get schemaPointer(): string {
        return toPointer(this.schemaPathSegments);
    }

    /**
     * Records where the error came from. Only the innermost keyword is kept.
     * @internal Called by the validation engine.
     */
    public annotate(keyword: string, keywordValue: SchemaNode, instance: unknown, schema: SchemaObject): void {
        if (this.annotated) return;
        this.annotated = true;
        this.keywordName = keyword;
        this.keywordSchemaValue = keywordValue;
        this.failingInstance = instance;
        this.failingSchema = schema;
    }

    /**
     * Prefixes the instance path and/or schema path while the error bubbles up.
     * @internal Called by the validation engine.
     */
    public prepend(path?: PathSegment, schemaPath?: PathSegment): void {
        if (path !== undefined) this.pathSegments.unshift(path);
        if (schemaPath !== undefined) this.schemaPathSegments.unshift(schemaPath);
    }

    public toString(): string {
        return `${this.jsonPointer === '' ? '<root>' : this.jsonPointer}: ${this.message}`;
    }
}
