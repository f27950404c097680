/**
 * SchemaInferrer — Decoded JSON Sample → Response Schema
 *
 * Walks a sample payload and classifies every value as primitive,
 * array or object. Arrays of objects get one nested schema: the
 * unification of every element's schema, so a single sample list can
 * document several optional shapes at once.
 *
 * @module
 */
import { DEFAULT_POLICY, type ParserPolicy } from '../config/ParserConfig.js';
import { entriesInSourceOrder } from '../parser/JsonDecoder.js';
import { DocParseError } from '../parser/ParseError.js';
import type { ArrayField, JsonObject, JsonValue, Response, ResponseField } from '../parser/types.js';
import { unifyAll } from './SchemaUnifier.js';

type InferPolicy = Pick<ParserPolicy, 'allowNullArrayElements'>;

/** Element categories an array sample can hold */
type ElementKind = 'string' | 'number' | 'boolean' | 'null' | 'object' | 'array';

// ── Public API ───────────────────────────────────────────

/**
 * Infer the schema of one sample.
 *
 * The root must be an object, or an array of objects (whose schemas are
 * unified; an empty array yields the empty schema).
 *
 * @throws {DocParseError} `UnsupportedRootShape` for any other root,
 *   `HeterogeneousArray` for mixed arrays anywhere in the sample,
 *   `ConflictingFieldType` when object elements disagree
 */
export function inferResponse(value: JsonValue, policy: InferPolicy = DEFAULT_POLICY): Response {
    if (isJsonObject(value)) {
        return inferObject(value, '', policy);
    }

    if (Array.isArray(value)) {
        const elements = withoutIgnoredNulls(value, policy);
        const objects = elements.filter(isJsonObject);
        if (objects.length === elements.length) {
            return unifyAll(objects.map(o => inferObject(o, '', policy)));
        }
    }

    throw new DocParseError(
        'UnsupportedRootShape',
        `expected sample to be an object or an array of objects, got ${describeRoot(value)}`,
    );
}

/**
 * Classify an array value.
 *
 * Empty or uniformly primitive → array without nested schema;
 * all objects → array with the unified element schema.
 *
 * @param key - Field name the array is stored under
 * @param path - Dotted path of the field, used in error messages (defaults to `key`)
 * @throws {DocParseError} `HeterogeneousArray` for any other element mix
 */
export function inferArrayField(
    key: string,
    elements: readonly JsonValue[],
    policy: InferPolicy = DEFAULT_POLICY,
    path: string = key,
): ArrayField {
    const considered = withoutIgnoredNulls(elements, policy);
    const kinds = new Set(considered.map(elementKind));

    if (kinds.size === 0) {
        return { key, kind: 'array' };
    }

    if (kinds.size > 1) {
        throw new DocParseError(
            'HeterogeneousArray',
            `array '${path}' mixes element types: ${[...kinds].join(', ')}`,
        );
    }

    const [only] = kinds;
    switch (only) {
        case 'string':
        case 'number':
        case 'boolean':
            return { key, kind: 'array' };
        case 'object': {
            const objects = considered.filter(isJsonObject);
            return { key, kind: 'array', nested: unifyAll(objects.map(o => inferObject(o, path, policy))) };
        }
        default:
            throw new DocParseError(
                'HeterogeneousArray',
                `array '${path}' has unsupported element type: ${only ?? 'unknown'}`,
            );
    }
}

/** Narrow a decoded value to a JSON object */
export function isJsonObject(value: JsonValue): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ── Internal ─────────────────────────────────────────────

function inferObject(obj: JsonObject, parent: string, policy: InferPolicy): Response {
    const fields = new Map<string, ResponseField>();

    for (const [key, value] of entriesInSourceOrder(obj)) {
        const path = parent ? `${parent}.${key}` : key;

        if (isJsonObject(value)) {
            fields.set(key, { key, kind: 'object', nested: inferObject(value, path, policy) });
        } else if (Array.isArray(value)) {
            fields.set(key, inferArrayField(key, value, policy, path));
        } else {
            fields.set(key, { key, kind: 'primitive' });
        }
    }

    return fields;
}

function withoutIgnoredNulls(elements: readonly JsonValue[], policy: InferPolicy): readonly JsonValue[] {
    return policy.allowNullArrayElements ? elements.filter(e => e !== null) : elements;
}

function elementKind(value: JsonValue): ElementKind {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    switch (typeof value) {
        case 'string': return 'string';
        case 'number': return 'number';
        case 'boolean': return 'boolean';
        default: return 'object';
    }
}

function describeRoot(value: JsonValue): string {
    return Array.isArray(value) ? 'an array with non-object elements' : elementKind(value);
}
