/**
 * JsonDecoder — Sample Text → JSON Values, Keeping Key Order
 *
 * `JSON.parse` hands back objects whose integer-like keys (`"200"`,
 * `"0"`) enumerate before every other key. Response schemas list fields
 * in the order the sample wrote them, so the decoder records each
 * object's source key order on the side and {@link entriesInSourceOrder}
 * reads it back.
 *
 * @module
 */
import { DocParseError } from './ParseError.js';
import type { JsonObject, JsonValue } from './types.js';

/** Prefix that makes every key non-integer while the marked text is parsed */
const KEY_MARK = '\u0000';
const KEY_MARK_ESCAPE = '\\u0000';

const sourceOrder = new WeakMap<JsonObject, readonly string[]>();

/**
 * Decode a sample payload.
 *
 * @throws {DocParseError} `InvalidJson`, with the `SyntaxError` as `cause`
 */
export function decodeJson(text: string): JsonValue {
    try {
        JSON.parse(text);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new DocParseError('InvalidJson', `could not decode sample: ${reason}`, { line: text }, { cause: err });
    }
    const marked: JsonValue = JSON.parse(markKeys(text));
    return unmark(marked);
}

/**
 * Entries of an object in the order its source text declared them.
 * Objects not produced by {@link decodeJson} fall back to `Object.entries`.
 */
export function entriesInSourceOrder(obj: JsonObject): Array<[string, JsonValue]> {
    const keys = sourceOrder.get(obj);
    if (keys === undefined) return Object.entries(obj);

    const entries: Array<[string, JsonValue]> = [];
    for (const key of keys) {
        const value = obj[key];
        if (value !== undefined) entries.push([key, value]);
    }
    return entries;
}

// ── Internal ─────────────────────────────────────────────

/** Insert the key mark after the opening quote of every object key. Input must be valid JSON. */
function markKeys(text: string): string {
    let out = '';
    let i = 0;

    while (i < text.length) {
        const ch = text[i];
        if (ch !== '"') {
            out += ch;
            i++;
            continue;
        }

        let end = i + 1;
        while (end < text.length && text[end] !== '"') {
            end += text[end] === '\\' ? 2 : 1;
        }
        const literal = text.slice(i, end + 1);

        let next = end + 1;
        while (next < text.length && /\s/.test(text[next] ?? '')) next++;

        out += text[next] === ':' ? `"${KEY_MARK_ESCAPE}${literal.slice(1)}` : literal;
        i = end + 1;
    }

    return out;
}

function unmark(value: JsonValue): JsonValue {
    if (Array.isArray(value)) {
        return value.map(unmark);
    }
    if (typeof value !== 'object' || value === null) {
        return value;
    }

    const entries = Object.entries(value).map(([key, v]): [string, JsonValue] => [
        key.startsWith(KEY_MARK) ? key.slice(KEY_MARK.length) : key,
        unmark(v),
    ]);
    const obj: JsonObject = Object.fromEntries(entries);
    sourceOrder.set(obj, entries.map(([key]) => key));
    return obj;
}
