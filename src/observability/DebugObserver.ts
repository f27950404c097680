/**
 * DebugObserver — Opt-In Parse Tracing
 *
 * Structured, typed debug events emitted while documents are discovered
 * and parsed. Nothing is emitted unless an observer is passed in.
 *
 * @example
 * ```typescript
 * import { createDebugObserver, parseRequest } from 'md-api-schema';
 *
 * // Default: compact console.debug output
 * const debug = createDebugObserver();
 *
 * // Custom handler (e.g. collect for a report)
 * const events: DebugEvent[] = [];
 * const collect = createDebugObserver((event) => events.push(event));
 *
 * parseRequest(text, 'student-details', { debug });
 * ```
 *
 * @module
 */
import type { ParseErrorCode } from '../parser/ParseError.js';

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/** Emitted once a directory walk has produced its document list */
export interface DiscoverEvent {
    readonly type: 'discover';
    readonly root: string;
    readonly documents: number;
    readonly timestamp: number;
}

/** Emitted before a section body is handed to its sub-parser */
export interface SectionEvent {
    readonly type: 'section';
    readonly scope: string;
    /** Lower-cased header, e.g. `success response` */
    readonly section: string;
    readonly timestamp: number;
}

/** Emitted after a document parsed into a request */
export interface ParsedEvent {
    readonly type: 'parsed';
    readonly scope: string;
    /** `action` + `resource`, e.g. `getStudentDetails` */
    readonly request: string;
    readonly params: number;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Emitted when a document fails to parse */
export interface ErrorEvent {
    readonly type: 'error';
    readonly scope: string;
    readonly code: ParseErrorCode;
    readonly error: string;
    readonly durationMs: number;
    readonly timestamp: number;
}

export type DebugEvent =
    | DiscoverEvent
    | SectionEvent
    | ParsedEvent
    | ErrorEvent;

/** Observer function that receives debug events */
export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer with compact console output:
 *
 * ```
 * [md-api-schema] discover  repos (12 documents)
 * [md-api-schema] section   student-details › params
 * [md-api-schema] parsed    student-details › getStudentDetails ✓ 3 params 0.4ms
 * [md-api-schema] ERROR     student-details [UnknownType] unknown type: 'long'
 * ```
 *
 * @param handler - Optional custom event handler. If omitted, uses `console.debug`.
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        const prefix = '[md-api-schema]';

        switch (event.type) {
            case 'discover':
                console.debug(`${prefix} discover  ${event.root} (${event.documents} documents)`);
                break;

            case 'section':
                console.debug(`${prefix} section   ${event.scope} › ${event.section}`);
                break;

            case 'parsed':
                console.debug(`${prefix} parsed    ${event.scope} › ${event.request} ✓ ${event.params} params ${event.durationMs.toFixed(1)}ms`);
                break;

            case 'error':
                console.debug(`${prefix} ERROR     ${event.scope} [${event.code}] ${event.error}`);
                break;
        }
    };
}
