/**
 * SchemaUnifier — Merge Independently Inferred Response Schemas
 *
 * Documentation often shows several samples of one payload: a list of
 * differently-shaped objects, or one error body per failure case. The
 * unifier folds them into one schema consistent with every sample.
 *
 * An array seen empty in one sample and populated in another is not a
 * conflict: absence of a nested schema adds no constraint.
 *
 * @module
 */
import { DocParseError } from '../parser/ParseError.js';
import type { ArrayField, Response, ResponseField } from '../parser/types.js';

/** The schema of a sample with no fields */
export const EMPTY_RESPONSE: Response = new Map<string, ResponseField>();

/**
 * Unify two schemas into a new one (inputs are not modified).
 *
 * Keys keep first-seen order: every key of `a`, then the keys only `b` has.
 *
 * @throws {DocParseError} `ConflictingFieldType` when a key has different kinds
 */
export function unifyResponses(a: Response, b: Response): Response {
    return unifyAt(a, b, '');
}

/** Fold any number of schemas, starting from the empty schema */
export function unifyAll(schemas: Iterable<Response>): Response {
    let result = EMPTY_RESPONSE;
    for (const schema of schemas) {
        result = unifyResponses(result, schema);
    }
    return result;
}

// ── Internal ─────────────────────────────────────────────

function unifyAt(a: Response, b: Response, path: string): Response {
    const merged = new Map<string, ResponseField>(a);

    for (const [key, right] of b) {
        const left = merged.get(key);
        merged.set(key, left === undefined ? right : unifyFields(left, right, path ? `${path}.${key}` : key));
    }

    return merged;
}

function unifyFields(left: ResponseField, right: ResponseField, path: string): ResponseField {
    if (left.kind === 'primitive' && right.kind === 'primitive') {
        return left;
    }
    if (left.kind === 'array' && right.kind === 'array') {
        return unifyArrays(left, right, path);
    }
    if (left.kind === 'object' && right.kind === 'object') {
        return { key: left.key, kind: 'object', nested: unifyAt(left.nested, right.nested, path) };
    }

    throw new DocParseError(
        'ConflictingFieldType',
        `field '${path}' has conflicting types (${left.kind} and ${right.kind})`,
        {},
        { details: { code: 'ConflictingFieldType', key: path, kinds: [left.kind, right.kind] } },
    );
}

function unifyArrays(left: ArrayField, right: ArrayField, path: string): ArrayField {
    if (left.nested === undefined) {
        return right.nested === undefined ? left : { key: left.key, kind: 'array', nested: right.nested };
    }
    if (right.nested === undefined) {
        return left;
    }
    return { key: left.key, kind: 'array', nested: unifyAt(left.nested, right.nested, path) };
}
