/**
 * BatchParser — Many Documents, One Report
 *
 * Documents are parsed independently. With `failFast` the first failure
 * aborts the batch; otherwise failures are collected alongside the
 * requests that did parse.
 *
 * @module
 */
import type { SourceDocument } from '../discovery/FileDiscovery.js';
import { DocParseError } from './ParseError.js';
import { parseRequest, type ParseOptions } from './RequestParser.js';
import type { Request } from './types.js';

export interface BatchOptions extends ParseOptions {
    /** Re-throw the first failure instead of collecting it (default: false) */
    readonly failFast?: boolean;
}

/** A document that failed to parse */
export interface DocumentFailure {
    readonly path: string;
    readonly error: DocParseError;
}

export interface BatchResult {
    readonly requests: readonly Request[];
    readonly failures: readonly DocumentFailure[];
}

/**
 * Parse every document in order.
 *
 * @throws {DocParseError} The first failure (with its `file` context), when `failFast` is set
 */
export function parseDocuments(documents: readonly SourceDocument[], options: BatchOptions = {}): BatchResult {
    const requests: Request[] = [];
    const failures: DocumentFailure[] = [];

    for (const document of documents) {
        try {
            requests.push(parseRequest(document.text, document.scope, options));
        } catch (err) {
            if (!(err instanceof DocParseError)) throw err;

            const located = err.withContext({ file: document.path });
            if (options.failFast) throw located;
            failures.push({ path: document.path, error: located });
        }
    }

    return { requests, failures };
}
