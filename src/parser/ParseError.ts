/**
 * DocParseError — Typed Failures of the Markdown Request Parser
 *
 * Every failure carries a closed {@link ParseErrorCode}, the category
 * derived from it, and the location context (document scope, section,
 * offending line) needed to find the fault in the source document.
 *
 * Failures are terminal for the document being parsed: no partial
 * `Request` is ever returned.
 *
 * @example
 * ```typescript
 * try {
 *     parseRequest(text, 'student-details');
 * } catch (e) {
 *     if (e instanceof DocParseError) {
 *         console.log(e.code);     // "UnknownType"
 *         console.log(e.category); // "parameter"
 *         console.log(e.message);  // "[student-details › params] unknown type: 'long'"
 *     }
 * }
 * ```
 *
 * @module
 */

import type { FieldKind } from './types.js';

// ── Codes ────────────────────────────────────────────────

/** Document does not conform to the dialect's section grammar */
export type StructuralErrorCode =
    | 'MissingTitleDelimiter'
    | 'MalformedTitle'
    | 'MissingDocumentation'
    | 'MalformedSectionHeader'
    | 'UnknownSectionHeader'
    | 'MissingSection'
    | 'UnknownVersion'
    | 'UnsupportedVersion';

/** A parameter declaration cannot be decoded */
export type ParameterErrorCode =
    | 'MalformedParameterLine'
    | 'UnknownPresence'
    | 'MissingPresenceContext'
    | 'UnknownType';

/** An embedded example payload cannot be turned into a schema */
export type ResponseErrorCode =
    | 'NoCodeBlockFound'
    | 'UnterminatedCodeBlock'
    | 'EmptyCodeBlock'
    | 'UnsupportedRootShape'
    | 'HeterogeneousArray'
    | 'InvalidJson';

/** Two samples disagree irreconcilably on a field's shape */
export type UnificationErrorCode = 'ConflictingFieldType';

export type ParseErrorCode =
    | StructuralErrorCode
    | ParameterErrorCode
    | ResponseErrorCode
    | UnificationErrorCode;

export type ParseErrorCategory = 'structural' | 'parameter' | 'response' | 'unification';

const CATEGORY_BY_CODE: Readonly<Record<ParseErrorCode, ParseErrorCategory>> = {
    MissingTitleDelimiter: 'structural',
    MalformedTitle: 'structural',
    MissingDocumentation: 'structural',
    MalformedSectionHeader: 'structural',
    UnknownSectionHeader: 'structural',
    MissingSection: 'structural',
    UnknownVersion: 'structural',
    UnsupportedVersion: 'structural',
    MalformedParameterLine: 'parameter',
    UnknownPresence: 'parameter',
    MissingPresenceContext: 'parameter',
    UnknownType: 'parameter',
    NoCodeBlockFound: 'response',
    UnterminatedCodeBlock: 'response',
    EmptyCodeBlock: 'response',
    UnsupportedRootShape: 'response',
    HeterogeneousArray: 'response',
    InvalidJson: 'response',
    ConflictingFieldType: 'unification',
};

// ── Context ──────────────────────────────────────────────

/** Where in the input a failure happened */
export interface ParseErrorContext {
    /** Path of the source file, when parsed from disk */
    readonly file?: string;
    /** Scope of the document (caller-supplied) */
    readonly scope?: string;
    /** Lower-cased section header, e.g. `error response` */
    readonly section?: string;
    /** The offending line or fragment */
    readonly line?: string;
}

// ── Details ──────────────────────────────────────────────

/**
 * Values carried by the failures callers most often match on.
 * Discriminated by the same `code` as the error.
 *
 * @example
 * ```typescript
 * if (err.details?.code === 'UnknownType') {
 *     suggestAlias(err.details.token);
 * }
 * ```
 */
export type ParseErrorDetails =
    | {
        readonly code: 'ConflictingFieldType';
        /** Dotted path of the field, e.g. `data.rows` */
        readonly key: string;
        readonly kinds: readonly [FieldKind, FieldKind];
    }
    | { readonly code: 'UnknownType'; readonly token: string }
    | { readonly code: 'UnknownSectionHeader'; readonly header: string }
    | { readonly code: 'UnknownPresence'; readonly category: string };

export interface ParseErrorOptions {
    readonly cause?: unknown;
    readonly details?: ParseErrorDetails;
}

// ── Error ────────────────────────────────────────────────

export class DocParseError extends Error {
    readonly code: ParseErrorCode;
    readonly category: ParseErrorCategory;
    /** Message without the location prefix */
    readonly detail: string;
    readonly context: ParseErrorContext;
    readonly details: ParseErrorDetails | undefined;

    constructor(
        code: ParseErrorCode,
        detail: string,
        context: ParseErrorContext = {},
        options: ParseErrorOptions = {},
    ) {
        super(formatMessage(detail, context), options.cause !== undefined ? { cause: options.cause } : undefined);
        this.name = 'DocParseError';
        this.code = code;
        this.category = CATEGORY_BY_CODE[code];
        this.detail = detail;
        this.context = context;
        this.details = options.details;
    }

    /**
     * Copy of this error with more location context.
     * Fields already set keep their value.
     */
    withContext(context: ParseErrorContext): DocParseError {
        return new DocParseError(
            this.code,
            this.detail,
            { ...context, ...this.context },
            {
                ...(this.cause !== undefined ? { cause: this.cause } : {}),
                ...(this.details !== undefined ? { details: this.details } : {}),
            },
        );
    }
}

function formatMessage(detail: string, context: ParseErrorContext): string {
    const where = [context.scope, context.section].filter((p): p is string => p !== undefined);
    return where.length > 0 ? `[${where.join(' › ')}] ${detail}` : detail;
}

/** Type guard for a specific failure code */
export function isParseError(value: unknown, code?: ParseErrorCode): value is DocParseError {
    return value instanceof DocParseError && (code === undefined || value.code === code);
}
