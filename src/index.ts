/**
 * md-api-schema — Root Barrel Export
 *
 * Public API for programmatic usage.
 *
 * @example
 * ```typescript
 * import { parseRequest, toPlainRequest } from 'md-api-schema';
 *
 * const request = parseRequest(markdown, 'student-details');
 * console.log(JSON.stringify(toPlainRequest(request), null, 2));
 * ```
 *
 * @module
 */

// ── Config ───────────────────────────────────────────────
export { mergeConfig, resolvePolicy, DEFAULT_CONFIG, DEFAULT_POLICY } from './config/ParserConfig.js';
export type {
    ToolConfig, ParserPolicy, PartialPolicy,
    DiscoveryConfig, PartialConfig,
} from './config/ParserConfig.js';
export { loadConfig, applyCliOverrides, ConfigValidationError, CONFIG_FILENAMES } from './config/ConfigLoader.js';
export type { CliOverrides } from './config/ConfigLoader.js';

// ── Parser ───────────────────────────────────────────────
export { parseRequest, safeParseRequest, parseTitle, parseVersion } from './parser/RequestParser.js';
export type { ParseOptions } from './parser/RequestParser.js';
export { parseParams, parseParamLine, parsePresenceMarker } from './parser/ParameterParser.js';
export { parseTypeTag, parseBracketedType } from './parser/TypeTagger.js';
export { findCodeBlock, parseSuccessResponse, parseErrorResponse } from './parser/CodeBlockExtractor.js';
export { decodeJson, entriesInSourceOrder } from './parser/JsonDecoder.js';
export type { CodeBlock } from './parser/CodeBlockExtractor.js';
export { repairErrorBlock, ERROR_BLOCK_REPAIRS, quoteInvalidKey, wrapInBraces } from './parser/JsonRepair.js';
export type { JsonRepair } from './parser/JsonRepair.js';
export { parseDocuments } from './parser/BatchParser.js';
export type { BatchOptions, BatchResult, DocumentFailure } from './parser/BatchParser.js';
export type {
    Request, Parameter, Presence, TypeTag,
    Response, ResponseField, PrimitiveField, ArrayField, ObjectField, FieldKind,
    JsonValue, JsonObject,
} from './parser/types.js';

// ── Errors ───────────────────────────────────────────────
export { DocParseError, isParseError } from './parser/ParseError.js';
export type {
    ParseErrorCode, ParseErrorCategory, ParseErrorContext,
    ParseErrorDetails, ParseErrorOptions,
} from './parser/ParseError.js';
export { succeed, fail } from './result.js';
export type { Result, Success, Failure } from './result.js';

// ── Schema Inference ─────────────────────────────────────
export { inferResponse, inferArrayField, isJsonObject } from './schema/SchemaInferrer.js';
export { unifyResponses, unifyAll, EMPTY_RESPONSE } from './schema/SchemaUnifier.js';

// ── Serialization ────────────────────────────────────────
export {
    toPlainRequest, toPlainParameter, toPlainResponse,
    formatRequest, formatParameter, formatResponse,
} from './serialize/RequestSerializer.js';
export type { PlainRequest, PlainParameter, PlainResponse, PlainField } from './serialize/RequestSerializer.js';

// ── Discovery ────────────────────────────────────────────
export { discoverDocuments, listDocumentPaths } from './discovery/FileDiscovery.js';
export type { SourceDocument } from './discovery/FileDiscovery.js';

// ── Observability ────────────────────────────────────────
export { createDebugObserver } from './observability/DebugObserver.js';
export type {
    DebugEvent, DebugObserverFn,
    DiscoverEvent, SectionEvent, ParsedEvent, ErrorEvent,
} from './observability/DebugObserver.js';
