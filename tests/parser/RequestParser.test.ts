import { describe, it, expect } from 'vitest';
import { parseRequest, safeParseRequest, parseTitle, parseVersion } from '../../src/parser/RequestParser.js';
import { DocParseError } from '../../src/parser/ParseError.js';
import type { DebugEvent } from '../../src/observability/DebugObserver.js';
import type { ParseOptions } from '../../src/parser/RequestParser.js';

// ============================================================================
// Fixtures
// ============================================================================

const STUDENT_DETAILS = `**getStudentDetails**
----
Returns the details of one student.

* **Version History:**

  Added in 2019.

* **Version:**

  3

* **Permission:**

  Student Details: Read

* **Method:**

  GET

* **Params:**

  **Required:**

  \`studentId [number]\` - the student's id

  **Optional:**

  \`includePhoto [boolean]\` - include the photo

  **Conditional:**

  None

* **Sample Parameters:**

  \`{"studentId": 1001}\`

* **Success Response:**

  \`\`\`javascript
  {
    "name": "Test Student",
    "houses": [],
    "contacts": [{"type": "email"}, {"type": "phone", "primary": true}]
  }
  \`\`\`

* **Error Response:**

  \`\`\`javascript
  {__invalid: "Student not found"}
  \`\`\`

  \`\`\`json
  "success": false
  \`\`\`

* **Sample GET:**

  \`/api/v3/students?studentId=1001\`
`;

type Section = readonly [header: string, body: string];

const BASE_SECTIONS: readonly Section[] = [
    ['Version', '3'],
    ['Permission', 'Student Details: Read'],
    ['Params', '**Required:**\n\n  `studentId [number]` - the student\'s id'],
    ['Sample Parameters', '`{"studentId": 1001}`'],
    ['Success Response', '```json\n  {"name": "Test Student"}\n  ```'],
    ['Error Response', '```json\n  {"__invalid": "Student not found"}\n  ```'],
];

function makeDoc(
    sections: readonly Section[] = BASE_SECTIONS,
    title = '**getStudentDetails**',
    description = 'Returns the details of one student.',
): string {
    const body = sections.map(([header, text]) => `* **${header}:**\n\n  ${text}\n`).join('\n');
    return `${title}\n----\n${description}\n\n${body}`;
}

function withSection(header: string, text: string): Section[] {
    return BASE_SECTIONS.map(([h, b]): Section => (h === header ? [h, text] : [h, b]));
}

function without(header: string): Section[] {
    return BASE_SECTIONS.filter(([h]) => h !== header);
}

function errorOf(text: string, options?: ParseOptions): DocParseError {
    try {
        parseRequest(text, 'student-details', options);
    } catch (e) {
        if (e instanceof DocParseError) return e;
        throw e;
    }
    throw new Error('expected a DocParseError');
}

// ============================================================================
// RequestParser Tests
// ============================================================================

describe('RequestParser', () => {
    // ── Full Document ──

    describe('parseRequest()', () => {
        const request = parseRequest(STUDENT_DETAILS, 'student-details');

        it('should split the title into action and resource', () => {
            expect(request.action).toBe('get');
            expect(request.resource).toBe('StudentDetails');
        });

        it('should carry documentation, scope, version and permissions', () => {
            expect(request.doc).toBe('Returns the details of one student.');
            expect(request.scope).toBe('student-details');
            expect(request.version).toBe(3);
            expect(request.permissions).toBe('Student Details: Read');
        });

        it('should parse the parameters', () => {
            expect(request.params).toEqual([
                { name: 'studentId', type: 'int', doc: "the student's id", presence: 'required' },
                { name: 'includePhoto', type: 'bool', doc: 'include the photo', presence: 'optional' },
            ]);
        });

        it('should keep the sample parameters verbatim', () => {
            expect(request.sampleParams).toBe('`{"studentId": 1001}`');
        });

        it('should infer the success response schema', () => {
            const schema = request.successResponse;
            expect([...schema.keys()]).toEqual(['name', 'houses', 'contacts']);
            expect(schema.get('houses')).toEqual({ key: 'houses', kind: 'array' });

            const contacts = schema.get('contacts');
            expect(contacts?.kind).toBe('array');
            if (contacts?.kind !== 'array') return;
            expect([...(contacts.nested?.keys() ?? [])]).toEqual(['type', 'primary']);
        });

        it('should unify the repaired error samples', () => {
            expect([...request.errorResponse.keys()]).toEqual(['__invalid', 'success']);
        });

        it('should accept CRLF line endings', () => {
            const crlf = parseRequest(STUDENT_DETAILS.replace(/\n/g, '\r\n'), 'student-details');
            expect(crlf.params).toEqual(request.params);
            expect([...crlf.errorResponse.keys()]).toEqual(['__invalid', 'success']);
        });

        it('should accept a longer title underline', () => {
            const doc = makeDoc().replace('\n----\n', '\n--------\n');
            expect(parseRequest(doc, 'student-details').doc).toBe('Returns the details of one student.');
        });

        it('should accept "Parameters" as a params header', () => {
            const sections = BASE_SECTIONS.map(([h, b]): Section => (h === 'Params' ? ['Parameters', b] : [h, b]));
            expect(parseRequest(makeDoc(sections), 'student-details').params).toHaveLength(1);
        });

        it('should let a repeated section overwrite the earlier one', () => {
            const doc = makeDoc([...BASE_SECTIONS, ['Sample Parameters', '`{"studentId": 2002}`']]);
            expect(parseRequest(doc, 'student-details').sampleParams).toBe('`{"studentId": 2002}`');
        });
    });

    // ── Title & Documentation ──

    describe('title and documentation', () => {
        it('should reject a document without the delimiter', () => {
            const err = errorOf('**getStudentDetails**\nReturns a student.');
            expect(err.code).toBe('MissingTitleDelimiter');
            expect(err.context.scope).toBe('student-details');
            expect(err.message).toBe("[student-details] could not find title delimiter '----'");
        });

        it('should reject a title without a capital', () => {
            expect(errorOf(makeDoc(BASE_SECTIONS, '**students**')).code).toBe('MalformedTitle');
        });

        it('should reject an empty description', () => {
            expect(errorOf(makeDoc(BASE_SECTIONS, '**getStudentDetails**', '')).code).toBe('MissingDocumentation');
        });

        it('should reject a placeholder description', () => {
            expect(errorOf(makeDoc(BASE_SECTIONS, '**getStudentDetails**', '**:')).code).toBe('MissingDocumentation');
        });
    });

    describe('parseTitle()', () => {
        it('should split at the first capital after the first character', () => {
            expect(parseTitle('**getStudentDetails**\n')).toEqual({ action: 'get', resource: 'StudentDetails' });
            expect(parseTitle('GetStudent')).toEqual({ action: 'Get', resource: 'Student' });
        });

        it('should reject titles that are not a single camel-case word', () => {
            expect(() => parseTitle('get')).toThrow(DocParseError);
            expect(() => parseTitle('get Student')).toThrow(DocParseError);
        });
    });

    // ── Sections ──

    describe('sections', () => {
        it('should reject an unknown header and name it', () => {
            const err = errorOf(makeDoc([...BASE_SECTIONS, ['Rate Limit', '10 per second']]));
            expect(err.code).toBe('UnknownSectionHeader');
            expect(err.context.section).toBe('rate limit');
            expect(err.message).toBe("[student-details › rate limit] unknown header: 'rate limit'");
            expect(err.details).toEqual({ code: 'UnknownSectionHeader', header: 'rate limit' });
        });

        it('should reject a header without its closing marker', () => {
            const doc = makeDoc() + '\n* **Notes\n\n  nothing to add\n';
            expect(errorOf(doc).code).toBe('MalformedSectionHeader');
        });

        it('should attach the section to sub-parser failures', () => {
            const err = errorOf(makeDoc(withSection('Params', '**Required:**\n\n  `studentId [long]` - id')));
            expect(err.code).toBe('UnknownType');
            expect(err.category).toBe('parameter');
            expect(err.context).toEqual({
                scope: 'student-details',
                section: 'params',
                line: '`studentId [long]` - id',
            });
        });

        it.each([
            ['Params', 'params'],
            ['Sample Parameters', 'sample parameters'],
            ['Success Response', 'success response'],
            ['Error Response', 'error response'],
            ['Version', 'version'],
        ])('should reject a document without %s', (header, section) => {
            const err = errorOf(makeDoc(without(header)));
            expect(err.code).toBe('MissingSection');
            expect(err.detail).toBe(`request has no '${section}' section`);
        });

        it('should reject a success section without a sample', () => {
            const err = errorOf(makeDoc(withSection('Success Response', 'Nothing is returned.')));
            expect(err.code).toBe('NoCodeBlockFound');
            expect(err.context.section).toBe('success response');
        });
    });

    // ── Versions & Permissions ──

    describe('versions', () => {
        it('should reject version 1', () => {
            expect(errorOf(makeDoc(withSection('Version', '1'))).code).toBe('UnsupportedVersion');
        });

        it('should reject unknown versions', () => {
            const err = errorOf(makeDoc(withSection('Version', '4')));
            expect(err.code).toBe('UnknownVersion');
            expect(err.detail).toBe("unknown api version: '4'");
        });

        it('should accept version 2 without a permission section', () => {
            const sections = without('Permission').map(([h, b]): Section => (h === 'Version' ? [h, '2'] : [h, b]));
            const request = parseRequest(makeDoc(sections), 'student-details');
            expect(request.version).toBe(2);
            expect(request.permissions).toBeUndefined();
        });

        it('should require permissions from version 3', () => {
            const err = errorOf(makeDoc(without('Permission')));
            expect(err.code).toBe('MissingSection');
            expect(err.detail).toBe("v3 request has no 'permission' section");
        });

        it('should honour the accepted versions policy', () => {
            const doc = makeDoc(withSection('Version', '2'));
            expect(errorOf(doc, { policy: { acceptedVersions: [3] } }).code).toBe('UnsupportedVersion');
        });

        it('should honour the permissions policy', () => {
            const doc = makeDoc(without('Permission'));
            expect(parseRequest(doc, 'student-details', { policy: { permissionsRequiredFrom: 4 } }).version).toBe(3);
        });
    });

    describe('parseVersion()', () => {
        it('should parse accepted versions', () => {
            expect(parseVersion('2')).toBe(2);
            expect(parseVersion('3')).toBe(3);
        });

        it('should distinguish unsupported from unknown', () => {
            expect(() => parseVersion('1')).toThrow('v1 apis are not supported');
            expect(() => parseVersion('3', [2])).toThrow('v3 apis are not accepted');
            expect(() => parseVersion('v3')).toThrow("unknown api version: 'v3'");
        });
    });

    // ── Policy ──

    describe('policy', () => {
        it('should apply the strict separator policy to parameters', () => {
            const doc = makeDoc(withSection('Params', '**Required:**\n\n  `studentId [number]`'));
            expect(parseRequest(doc, 'student-details').params[0]?.doc).toBe('');
            expect(errorOf(doc, { policy: { strictDescriptionSeparator: true } }).code).toBe('MalformedParameterLine');
        });

        it('should apply the null element policy to samples', () => {
            const doc = makeDoc(withSection('Success Response', '```json\n  {"tags": ["a", null]}\n  ```'));
            expect(errorOf(doc).code).toBe('HeterogeneousArray');
            const request = parseRequest(doc, 'student-details', { policy: { allowNullArrayElements: true } });
            expect(request.successResponse.get('tags')).toEqual({ key: 'tags', kind: 'array' });
        });
    });

    // ── Result & Debug ──

    describe('safeParseRequest()', () => {
        it('should return the request on success', () => {
            const result = safeParseRequest(makeDoc(), 'student-details');
            expect(result.ok).toBe(true);
            if (result.ok) expect(result.value.resource).toBe('StudentDetails');
        });

        it('should return the error on failure', () => {
            const result = safeParseRequest('no delimiter', 'student-details');
            expect(result.ok).toBe(false);
            if (!result.ok) expect(result.error.code).toBe('MissingTitleDelimiter');
        });
    });

    describe('debug events', () => {
        it('should emit one event per section, then parsed', () => {
            const events: DebugEvent[] = [];
            parseRequest(makeDoc(), 'student-details', { debug: e => events.push(e) });

            expect(events.map(e => e.type)).toEqual([
                'section', 'section', 'section', 'section', 'section', 'section', 'parsed',
            ]);
            const last = events[events.length - 1];
            expect(last?.type === 'parsed' && last.request).toBe('getStudentDetails');
            expect(last?.type === 'parsed' && last.params).toBe(1);
        });

        it('should emit an error event on failure', () => {
            const events: DebugEvent[] = [];
            expect(() => parseRequest(makeDoc(withSection('Version', '4')), 'student-details', {
                debug: e => events.push(e),
            })).toThrow(DocParseError);

            const last = events[events.length - 1];
            expect(last?.type).toBe('error');
            if (last?.type !== 'error') return;
            expect(last.code).toBe('UnknownVersion');
            expect(last.scope).toBe('student-details');
        });
    });
});
