/**
 * CodeBlockExtractor — Fenced Samples → Response Schemas
 *
 * Success sections hold one fenced ```` ```javascript ```` or
 * ```` ```json ```` sample. Error sections may hold one per failure
 * case; each is repaired, inferred and unified into one schema.
 *
 * @module
 */
import { DEFAULT_POLICY, type ParserPolicy } from '../config/ParserConfig.js';
import { inferResponse } from '../schema/SchemaInferrer.js';
import { EMPTY_RESPONSE, unifyResponses } from '../schema/SchemaUnifier.js';
import { repairErrorBlock, type JsonRepair, ERROR_BLOCK_REPAIRS } from './JsonRepair.js';
import { decodeJson } from './JsonDecoder.js';
import { DocParseError } from './ParseError.js';
import type { Response } from './types.js';

// ── Fences ───────────────────────────────────────────────

const OPEN_FENCE = /```(?:javascript|json)[ \t]*\n/g;
const CLOSE_FENCE = '```';

/** A located fenced block */
export interface CodeBlock {
    /** Text between the fences */
    readonly content: string;
    /** Offset just past the closing fence */
    readonly end: number;
}

/**
 * Find the first `javascript`/`json` fenced block at or after `from`.
 *
 * @returns The block, or `undefined` when no opening fence remains
 * @throws {DocParseError} `UnterminatedCodeBlock` when an opened block never closes
 */
export function findCodeBlock(text: string, from = 0): CodeBlock | undefined {
    const fence = new RegExp(OPEN_FENCE.source, 'g');
    fence.lastIndex = from;

    const open = fence.exec(text);
    if (open === null) return undefined;

    const contentStart = open.index + open[0].length;
    const closeAt = text.indexOf(CLOSE_FENCE, contentStart);
    if (closeAt === -1) {
        throw new DocParseError(
            'UnterminatedCodeBlock',
            'could not find end of code block',
            { line: open[0].trim() },
        );
    }

    return {
        content: text.slice(contentStart, closeAt),
        end: closeAt + CLOSE_FENCE.length,
    };
}

// ── Sections ─────────────────────────────────────────────

/**
 * Infer the schema of a `Success Response` section from its first sample.
 *
 * @throws {DocParseError} `NoCodeBlockFound`, `UnterminatedCodeBlock`,
 *   `InvalidJson` or any inference failure
 */
export function parseSuccessResponse(
    body: string,
    policy: Pick<ParserPolicy, 'allowNullArrayElements'> = DEFAULT_POLICY,
): Response {
    const block = findCodeBlock(body);
    if (block === undefined) {
        throw new DocParseError('NoCodeBlockFound', 'could not find start of code block');
    }
    return inferResponse(decodeJson(block.content), policy);
}

/**
 * Infer the unified schema of every sample in an `Error Response` section.
 * A section without samples yields the empty schema.
 *
 * @throws {DocParseError} `EmptyCodeBlock`, `UnterminatedCodeBlock`,
 *   `InvalidJson`, `ConflictingFieldType` or any inference failure
 */
export function parseErrorResponse(
    body: string,
    policy: Pick<ParserPolicy, 'allowNullArrayElements'> = DEFAULT_POLICY,
    repairs: readonly JsonRepair[] = ERROR_BLOCK_REPAIRS,
): Response {
    let schema = EMPTY_RESPONSE;

    for (let block = findCodeBlock(body); block !== undefined; block = findCodeBlock(body, block.end)) {
        const text = block.content.trim();
        if (text.length < 2) {
            throw new DocParseError('EmptyCodeBlock', `code block is empty: '${text}'`);
        }
        schema = unifyResponses(schema, inferResponse(decodeJson(repairErrorBlock(text, repairs)), policy));
    }

    return schema;
}
