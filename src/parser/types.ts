/**
 * Intermediate Representation Types
 *
 * Normalized data structures produced by the markdown request parser.
 * Shared by the parameter parser, the schema inferrer and unifier, the
 * serializer and the CLI. Nothing markdown-specific appears here.
 *
 * @module
 */

// ── Decoded JSON ─────────────────────────────────────────

/** A value produced by `JSON.parse` */
export type JsonValue = string | number | boolean | null | JsonObject | JsonValue[];

/** A decoded JSON object */
export interface JsonObject { [key: string]: JsonValue; }

// ── Parameters ───────────────────────────────────────────

/** How a parameter line is declared in the documentation */
export type Presence = 'required' | 'optional' | 'conditional';

/** Canonical primitive type of a documented parameter */
export type TypeTag =
    | 'bool'
    | 'date'
    | 'datetime'
    | 'float'
    | 'int'
    | 'list'
    | 'str'
    | 'time'
    | 'any';

/**
 * A single documented request parameter.
 *
 * Conditional parameters describe a condition in prose: they carry
 * `doc` only, with an empty `name` and `type`.
 */
export interface Parameter {
    readonly name: string;
    /** Empty when the declaration names no `[type]` */
    readonly type: TypeTag | '';
    readonly doc: string;
    readonly presence: Presence;
}

// ── Response Schema ──────────────────────────────────────

/** Shape category of a response field */
export type FieldKind = 'primitive' | 'array' | 'object';

/** A scalar field (string, number, boolean or null in the samples) */
export interface PrimitiveField {
    readonly key: string;
    readonly kind: 'primitive';
}

/**
 * An array field.
 *
 * `nested` is present only when the samples contained object elements;
 * an array of primitives, or an array only ever seen empty, has none.
 */
export interface ArrayField {
    readonly key: string;
    readonly kind: 'array';
    readonly nested?: Response;
}

/** A nested object field */
export interface ObjectField {
    readonly key: string;
    readonly kind: 'object';
    readonly nested: Response;
}

/** One field of an inferred response schema */
export type ResponseField = PrimitiveField | ArrayField | ObjectField;

/**
 * An inferred response schema: field key → field, in first-seen order.
 *
 * Either a single JSON sample or the unification of several.
 */
export type Response = ReadonlyMap<string, ResponseField>;

// ── Request (top-level) ──────────────────────────────────

/** Normalized representation of one documented API request */
export interface Request {
    /** Title prefix before the first capital, e.g. `get` */
    readonly action: string;
    /** Title suffix from the first capital, e.g. `StudentDetails` */
    readonly resource: string;
    readonly doc: string;
    /** Caller-supplied origin of the document, attached verbatim */
    readonly scope: string;
    readonly version: number;
    /** Absent when the document has no permission section */
    readonly permissions?: string;
    readonly params: readonly Parameter[];
    readonly sampleParams: string;
    readonly successResponse: Response;
    readonly errorResponse: Response;
}
