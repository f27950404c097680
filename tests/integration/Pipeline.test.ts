/**
 * Directory of documents → discovery → batch parse → JSON output.
 */
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { discoverDocuments } from '../../src/discovery/FileDiscovery.js';
import { parseDocuments } from '../../src/parser/BatchParser.js';
import { toPlainRequest, type PlainRequest } from '../../src/serialize/RequestSerializer.js';
import type { DebugEvent } from '../../src/observability/DebugObserver.js';

const HOUSE_LIST = `**listHouses**
----
Lists every house.

* **Version:**

  3

* **Permission:**

  Houses: Read

* **Params:**

  **Required:**

  None

  **Optional:**

  \`active [boolean]\` - only active houses

* **Sample Parameters:**

  \`{}\`

* **Success Response:**

  \`\`\`json
  [
    {"id": 1, "name": "Red"},
    {"id": 2, "name": "Blue", "tutors": [{"name": "Test Tutor"}]}
  ]
  \`\`\`

* **Error Response:**

  \`\`\`json
  {"__invalid": "Not permitted"}
  \`\`\`
`;

const BROKEN = `**listRooms**
----
Lists rooms.

* **Version:**

  7
`;

describe('Pipeline', () => {
    let root: string;

    beforeAll(() => {
        root = mkdtempSync(join(tmpdir(), 'md-api-schema-pipeline-'));
        mkdirSync(join(root, 'houses'));
        mkdirSync(join(root, 'rooms'));
        writeFileSync(join(root, 'houses', 'listHouses.md'), HOUSE_LIST);
        writeFileSync(join(root, 'rooms', 'listRooms.md'), BROKEN);
    });

    afterAll(() => {
        rmSync(root, { recursive: true, force: true });
    });

    it('should turn a documentation tree into JSON requests', () => {
        const events: DebugEvent[] = [];
        const result = parseDocuments(discoverDocuments(root), { debug: e => events.push(e) });

        const output: PlainRequest[] = JSON.parse(JSON.stringify(result.requests.map(toPlainRequest)));
        expect(output).toEqual([{
            action: 'list',
            resource: 'Houses',
            doc: 'Lists every house.',
            scope: 'houses',
            version: 3,
            permissions: 'Houses: Read',
            params: [{ name: 'active', type: 'bool', doc: 'only active houses', presence: 'optional' }],
            sample_params: '`{}`',
            success_response: {
                fields: [
                    { key: 'id', kind: 'primitive', nested: null },
                    { key: 'name', kind: 'primitive', nested: null },
                    {
                        key: 'tutors',
                        kind: 'array',
                        nested: { fields: [{ key: 'name', kind: 'primitive', nested: null }] },
                    },
                ],
            },
            error_response: {
                fields: [{ key: '__invalid', kind: 'primitive', nested: null }],
            },
        }]);

        expect(result.failures).toHaveLength(1);
        expect(result.failures[0]?.error.message).toBe("[rooms › version] unknown api version: '7'");
        expect(result.failures[0]?.error.context.file).toBe(join(root, 'rooms', 'listRooms.md'));

        expect(events.filter(e => e.type === 'parsed')).toHaveLength(1);
        expect(events.filter(e => e.type === 'error')).toHaveLength(1);
    });
});
