/**
 * RequestParser — Markdown Request Document → Request IR
 *
 * A document is a title, the `----` delimiter, a prose description, and
 * a run of `* **Header:**` sections:
 *
 * ```markdown
 * **getStudentDetails**
 * ----
 * Returns the details of one student.
 *
 * * **Version:**
 *
 *   3
 *
 * * **Params:**
 *
 *   **Required:**
 *
 *   `studentId [number]` - the student's id
 * ```
 *
 * Each section body goes to its sub-parser; any failure aborts the
 * document with a {@link DocParseError} naming the scope and section.
 *
 * @module
 */
import { DEFAULT_POLICY, resolvePolicy, type ParserPolicy, type PartialPolicy } from '../config/ParserConfig.js';
import type { DebugObserverFn } from '../observability/DebugObserver.js';
import { fail, succeed, type Result } from '../result.js';
import { parseErrorResponse, parseSuccessResponse } from './CodeBlockExtractor.js';
import { parseParams } from './ParameterParser.js';
import { DocParseError } from './ParseError.js';
import type { Parameter, Request, Response } from './types.js';

// ── Grammar ──────────────────────────────────────────────

const TITLE_DELIMITER = '----';
const SECTION_HEADER = /^[ \t]*\*[ \t]+\*\*/m;
const HEADER_END = ':**';
const EMPTY_DOC_MARKER = '**:';

/** What a recognised section header contributes to the request */
type SectionKind =
    | 'ignored'
    | 'version'
    | 'permission'
    | 'params'
    | 'sampleParams'
    | 'successResponse'
    | 'errorResponse';

/** Lower-cased header text → section kind. Anything else is rejected. */
const SECTION_KINDS: ReadonlyMap<string, SectionKind> = new Map<string, SectionKind>([
    ['version history', 'ignored'],
    ['method', 'ignored'],
    ['sample get', 'ignored'],
    ['sample post', 'ignored'],
    ['version', 'version'],
    ['permission', 'permission'],
    ['params', 'params'],
    ['parameters', 'params'],
    ['sample parameters', 'sampleParams'],
    ['success response', 'successResponse'],
    ['error response', 'errorResponse'],
]);

// ── Options ──────────────────────────────────────────────

export interface ParseOptions {
    /** Overrides for the ambiguous corners of the dialect */
    readonly policy?: PartialPolicy;
    /** Receives `section`, `parsed` and `error` events */
    readonly debug?: DebugObserverFn;
}

// ── Public API ───────────────────────────────────────────

/**
 * Parse one documentation file into a {@link Request}.
 *
 * @param text - Full markdown document
 * @param scope - Origin of the document (e.g. its API category), attached verbatim
 * @throws {DocParseError} On the first structural, parameter, response or
 *   unification failure; no partial request is returned
 */
export function parseRequest(text: string, scope: string, options: ParseOptions = {}): Request {
    const started = performance.now();
    const debug = options.debug;

    try {
        const request = parseDocument(text, scope, resolvePolicy(options.policy), debug);
        debug?.({
            type: 'parsed',
            scope,
            request: `${request.action}${request.resource}`,
            params: request.params.length,
            durationMs: performance.now() - started,
            timestamp: Date.now(),
        });
        return request;
    } catch (err) {
        if (!(err instanceof DocParseError)) throw err;

        const located = err.withContext({ scope });
        debug?.({
            type: 'error',
            scope,
            code: located.code,
            error: located.detail,
            durationMs: performance.now() - started,
            timestamp: Date.now(),
        });
        throw located;
    }
}

/**
 * Non-throwing variant of {@link parseRequest}.
 *
 * Only {@link DocParseError}s become failures; anything else still throws.
 */
export function safeParseRequest(text: string, scope: string, options: ParseOptions = {}): Result<Request> {
    try {
        return succeed(parseRequest(text, scope, options));
    } catch (err) {
        if (err instanceof DocParseError) return fail(err);
        throw err;
    }
}

/**
 * Split a title such as `getStudentDetails` at its first capital.
 *
 * @throws {DocParseError} `MalformedTitle` when there is no capital past
 *   the first character, or the title is not a single word
 */
export function parseTitle(title: string): { readonly action: string; readonly resource: string } {
    const name = title.replace(/\*/g, '').trim();
    const boundary = name.slice(1).search(/[A-Z]/);

    if (boundary === -1 || /\s/.test(name)) {
        throw new DocParseError('MalformedTitle', `expected a title like 'getResource': '${name}'`, { line: name });
    }

    return {
        action: name.slice(0, boundary + 1),
        resource: name.slice(boundary + 1),
    };
}

/**
 * Read the body of a `Version` section.
 *
 * @throws {DocParseError} `UnsupportedVersion` for version 1 or a version
 *   outside `acceptedVersions`; `UnknownVersion` for anything else
 */
export function parseVersion(text: string, acceptedVersions: readonly number[] = DEFAULT_POLICY.acceptedVersions): number {
    switch (text) {
        case '1':
            throw new DocParseError('UnsupportedVersion', 'v1 apis are not supported', { line: text });
        case '2':
        case '3': {
            const version = Number(text);
            if (!acceptedVersions.includes(version)) {
                throw new DocParseError('UnsupportedVersion', `v${version} apis are not accepted`, { line: text });
            }
            return version;
        }
        default:
            throw new DocParseError('UnknownVersion', `unknown api version: '${text}'`, { line: text });
    }
}

// ── Internal ─────────────────────────────────────────────

/** Sections collected so far; validated once the document ends */
interface RequestDraft {
    version?: number;
    permissions?: string;
    params?: Parameter[];
    sampleParams?: string;
    successResponse?: Response;
    errorResponse?: Response;
}

function parseDocument(
    source: string,
    scope: string,
    policy: ParserPolicy,
    debug: DebugObserverFn | undefined,
): Request {
    const text = source.replace(/\r\n?/g, '\n');

    const delimiterAt = text.indexOf(TITLE_DELIMITER);
    if (delimiterAt === -1) {
        throw new DocParseError('MissingTitleDelimiter', `could not find title delimiter '${TITLE_DELIMITER}'`);
    }

    const { action, resource } = parseTitle(text.slice(0, delimiterAt));

    // Longer underlines (`--------`) belong to the delimiter too
    const rest = text.slice(delimiterAt).replace(/^-+/, '');
    const [preamble = '', ...sections] = rest.split(SECTION_HEADER);
    const doc = preamble.trim();
    if (doc.length === 0 || doc.includes(EMPTY_DOC_MARKER)) {
        throw new DocParseError('MissingDocumentation', 'request has no documentation');
    }

    const draft: RequestDraft = {};

    for (const section of sections) {
        const headerEnd = section.indexOf(HEADER_END);
        if (headerEnd === -1) {
            throw new DocParseError(
                'MalformedSectionHeader',
                `expected '${HEADER_END}' to close the section header`,
                { line: firstLine(section) },
            );
        }

        const header = section.slice(0, headerEnd).trim().toLowerCase();
        const body = section.slice(headerEnd + HEADER_END.length).trim();

        debug?.({ type: 'section', scope, section: header, timestamp: Date.now() });

        try {
            applySection(draft, header, body, policy);
        } catch (err) {
            throw err instanceof DocParseError ? err.withContext({ section: header }) : err;
        }
    }

    const version = requireSection(draft.version, 'version');
    if (draft.permissions === undefined && version >= policy.permissionsRequiredFrom) {
        throw new DocParseError('MissingSection', `v${version} request has no 'permission' section`, { section: 'permission' });
    }

    return {
        action,
        resource,
        doc,
        scope,
        version,
        ...(draft.permissions !== undefined ? { permissions: draft.permissions } : {}),
        params: requireSection(draft.params, 'params'),
        sampleParams: requireSection(draft.sampleParams, 'sample parameters'),
        successResponse: requireSection(draft.successResponse, 'success response'),
        errorResponse: requireSection(draft.errorResponse, 'error response'),
    };
}

function applySection(draft: RequestDraft, header: string, body: string, policy: ParserPolicy): void {
    const kind = SECTION_KINDS.get(header);
    if (kind === undefined) {
        throw new DocParseError('UnknownSectionHeader', `unknown header: '${header}'`, {}, {
            details: { code: 'UnknownSectionHeader', header },
        });
    }

    switch (kind) {
        case 'ignored':
            return;
        case 'version':
            draft.version = parseVersion(body, policy.acceptedVersions);
            return;
        case 'permission':
            draft.permissions = body;
            return;
        case 'params':
            draft.params = parseParams(body, policy);
            return;
        case 'sampleParams':
            draft.sampleParams = body;
            return;
        case 'successResponse':
            draft.successResponse = parseSuccessResponse(body, policy);
            return;
        case 'errorResponse':
            draft.errorResponse = parseErrorResponse(body, policy);
            return;
        default:
            return assertNever(kind);
    }
}

function requireSection<T>(value: T | undefined, section: string): T {
    if (value === undefined) {
        throw new DocParseError('MissingSection', `request has no '${section}' section`, { section });
    }
    return value;
}

function firstLine(text: string): string {
    return text.trim().split('\n', 1)[0] ?? '';
}

function assertNever(value: never): never {
    throw new Error(`Unhandled section kind: ${String(value)}`);
}
