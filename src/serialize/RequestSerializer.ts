/**
 * RequestSerializer — Request IR → Plain Data / Text
 *
 * `toPlainRequest` produces the key-ordered, JSON-ready structure the
 * CLI prints; `formatRequest` an indented human-readable rendering.
 *
 * @module
 */
import type { FieldKind, Parameter, Presence, Request, Response, ResponseField, TypeTag } from '../parser/types.js';

// ── Plain Shapes ─────────────────────────────────────────

export interface PlainParameter {
    readonly name: string;
    readonly type: TypeTag | '';
    readonly doc: string;
    readonly presence: Presence;
}

export interface PlainField {
    readonly key: string;
    readonly kind: FieldKind;
    readonly nested: PlainResponse | null;
}

/** Fields in first-seen order */
export interface PlainResponse {
    readonly fields: readonly PlainField[];
}

export interface PlainRequest {
    readonly action: string;
    readonly resource: string;
    readonly doc: string;
    readonly scope: string;
    readonly version: number;
    readonly permissions: string | null;
    readonly params: readonly PlainParameter[];
    readonly sample_params: string;
    readonly success_response: PlainResponse;
    readonly error_response: PlainResponse;
}

// ── Plain Conversion ─────────────────────────────────────

/** Convert a request to plain data, fields in declaration order */
export function toPlainRequest(request: Request): PlainRequest {
    return {
        action: request.action,
        resource: request.resource,
        doc: request.doc,
        scope: request.scope,
        version: request.version,
        permissions: request.permissions ?? null,
        params: request.params.map(toPlainParameter),
        sample_params: request.sampleParams,
        success_response: toPlainResponse(request.successResponse),
        error_response: toPlainResponse(request.errorResponse),
    };
}

export function toPlainParameter(param: Parameter): PlainParameter {
    return { name: param.name, type: param.type, doc: param.doc, presence: param.presence };
}

export function toPlainResponse(response: Response): PlainResponse {
    return {
        fields: [...response.values()].map(toPlainField),
    };
}

function toPlainField(field: ResponseField): PlainField {
    return {
        key: field.key,
        kind: field.kind,
        nested: field.kind !== 'primitive' && field.nested !== undefined ? toPlainResponse(field.nested) : null,
    };
}

// ── Text Rendering ───────────────────────────────────────

/**
 * Render a request for reading in a terminal.
 *
 * @example
 * ```
 * getStudentDetails (student-details, v3)
 * doc: Returns the details of one student.
 * permissions: Student Details: Read
 * params:
 *   required studentId [int] - the student's id
 * sample_params: {"studentId": 1}
 * success_response:
 *   name [primitive]
 * error_response:
 *   __invalid [primitive]
 * ```
 */
export function formatRequest(request: Request): string {
    const lines = [
        `${request.action}${request.resource} (${request.scope}, v${request.version})`,
        `doc: ${request.doc}`,
    ];

    if (request.permissions !== undefined) {
        lines.push(`permissions: ${request.permissions}`);
    }

    lines.push('params:');
    for (const param of request.params) {
        lines.push(`  ${formatParameter(param)}`);
    }

    lines.push(`sample_params: ${request.sampleParams}`);
    lines.push('success_response:', ...formatResponse(request.successResponse, 2));
    lines.push('error_response:', ...formatResponse(request.errorResponse, 2));

    return lines.join('\n');
}

export function formatParameter(param: Parameter): string {
    if (param.presence === 'conditional') {
        return `conditional ${param.doc}`;
    }
    const type = param.type ? ` [${param.type}]` : '';
    const doc = param.doc ? ` - ${param.doc}` : '';
    return `${param.presence} ${param.name}${type}${doc}`;
}

export function formatResponse(response: Response, indent = 0): string[] {
    const pad = ' '.repeat(indent);
    const lines: string[] = [];
    for (const field of response.values()) {
        lines.push(`${pad}${field.key} [${field.kind}]`);
        if (field.kind !== 'primitive' && field.nested !== undefined) {
            lines.push(...formatResponse(field.nested, indent + 2));
        }
    }
    return lines;
}
