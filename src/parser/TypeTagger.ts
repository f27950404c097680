/**
 * TypeTagger — Documented Type Token → Canonical Tag
 *
 * @module
 */
import { DocParseError } from './ParseError.js';
import type { TypeTag } from './types.js';

/** Token (text between the square brackets) → canonical tag */
const TYPE_TAGS: ReadonlyMap<string, TypeTag> = new Map<string, TypeTag>([
    ['boolean', 'bool'],
    ['date', 'date'],
    ['date dd/mm/yyyy', 'date'],
    ['timestamp yyyy-MM-dd HH:mm:ss.SSS', 'datetime'],
    ['decimal', 'float'],
    ['number', 'int'],
    ['num', 'int'],
    ['integer', 'int'],
    ['array', 'list'],
    ['string', 'str'],
    ['time', 'time'],
    ['integer or "all"', 'any'],
]);

/**
 * Map a type token to its canonical tag.
 *
 * @param token - Text between the brackets, e.g. `decimal`
 * @throws {DocParseError} `UnknownType` for a token outside the table
 */
export function parseTypeTag(token: string): TypeTag {
    const tag = TYPE_TAGS.get(token);
    if (tag === undefined) {
        throw new DocParseError('UnknownType', `unknown type: '${token}'`, {}, {
            details: { code: 'UnknownType', token },
        });
    }
    return tag;
}

/**
 * Strip one pair of square brackets and map the token inside.
 *
 * @param text - e.g. `[integer]`
 * @throws {DocParseError} `MalformedParameterLine` when the brackets are missing
 */
export function parseBracketedType(text: string): TypeTag {
    if (text.length < 2 || !text.startsWith('[') || !text.endsWith(']')) {
        throw new DocParseError(
            'MalformedParameterLine',
            `expected type to be '[type]': '${text}'`,
        );
    }
    return parseTypeTag(text.slice(1, -1));
}
