/**
 * ParameterParser — `Params` Section → Parameter List
 *
 * A parameters section is a sequence of blank-line separated entries,
 * grouped under bolded presence markers:
 *
 * ```markdown
 * **Required:**
 *
 * `studentId [number]` - the student's id
 *
 * **Optional:**
 *
 * None
 *
 * **Conditional:**
 *
 * One of `code` or `studentId` must be supplied.
 * ```
 *
 * @module
 */
import { DEFAULT_POLICY, type ParserPolicy } from '../config/ParserConfig.js';
import { DocParseError } from './ParseError.js';
import { parseBracketedType } from './TypeTagger.js';
import type { Parameter, Presence, TypeTag } from './types.js';

// ── Grammar ──────────────────────────────────────────────

const BLANK_LINE = /\n\s*\n/;
const DESCRIPTION_SEPARATOR = '` - ';
const NO_PARAMETERS = 'none';

const PRESENCES: ReadonlySet<string> = new Set<Presence>(['required', 'optional', 'conditional']);

function isPresence(value: string): value is Presence {
    return PRESENCES.has(value);
}

// ── Block Parser ─────────────────────────────────────────

/**
 * Parse a parameters section body into parameters, in document order.
 *
 * @throws {DocParseError} `MissingPresenceContext` for an entry before any marker,
 *   plus everything {@link parsePresenceMarker} and {@link parseParamLine} throw
 */
export function parseParams(
    body: string,
    policy: Pick<ParserPolicy, 'strictDescriptionSeparator'> = DEFAULT_POLICY,
): Parameter[] {
    const params: Parameter[] = [];
    let presence: Presence | undefined;

    for (const block of body.split(BLANK_LINE)) {
        let lines = block.split('\n').map(line => line.trim()).filter(line => line.length > 0);

        // A marker may share its block with the first entries
        const first = lines[0];
        if (first?.startsWith('**')) {
            presence = parsePresenceMarker(first);
            lines = lines.slice(1);
        }

        lines = lines.filter(line => line.toLowerCase() !== NO_PARAMETERS);
        if (lines.length === 0) continue;

        if (presence === undefined) {
            throw new DocParseError(
                'MissingPresenceContext',
                `parameter declared before any presence marker: '${lines[0] ?? ''}'`,
                { line: lines[0] ?? '' },
            );
        }

        params.push(...parseBlockEntries(lines, presence, policy));
    }

    return params;
}

/**
 * Group a block's lines into entries and parse each one.
 *
 * Every line opening with a backtick starts a declaration; other lines
 * continue the description of the declaration above. A conditional
 * block is one prose entry.
 */
function parseBlockEntries(
    lines: readonly string[],
    presence: Presence,
    policy: Pick<ParserPolicy, 'strictDescriptionSeparator'>,
): Parameter[] {
    if (presence === 'conditional') {
        return [parseParamLine(lines.join(' '), presence, policy)];
    }

    const entries: string[][] = [];
    for (const line of lines) {
        const current = entries[entries.length - 1];
        if (current === undefined || line.startsWith('`')) {
            entries.push([line]);
        } else {
            current.push(line);
        }
    }

    return entries.map(([declaration = '', ...wrapped]) => {
        const param = parseParamLine(declaration, presence, policy);
        if (wrapped.length === 0) return param;
        return { ...param, doc: [param.doc, ...wrapped].filter(part => part.length > 0).join(' ') };
    });
}

/**
 * Read a bolded presence marker such as `**Required:**`.
 *
 * @throws {DocParseError} `UnknownPresence` for any other category
 */
export function parsePresenceMarker(marker: string): Presence {
    const category = marker.replace(/[*:]/g, '').trim().toLowerCase();
    if (!isPresence(category)) {
        throw new DocParseError('UnknownPresence', `unknown presence: '${category}'`, { line: marker }, {
            details: { code: 'UnknownPresence', category },
        });
    }
    return category;
}

// ── Line Parser ──────────────────────────────────────────

/**
 * Parse one parameter declaration.
 *
 * Required and optional lines look like `` `name [type]` - description ``;
 * conditional lines are free prose.
 *
 * @throws {DocParseError} `MalformedParameterLine` when the code span is missing,
 *   unnamed, badly typed, or (under a strict policy) has no description separator;
 *   `UnknownType` for an unknown `[type]`
 */
export function parseParamLine(
    line: string,
    presence: Presence,
    policy: Pick<ParserPolicy, 'strictDescriptionSeparator'> = DEFAULT_POLICY,
): Parameter {
    if (presence === 'conditional') {
        return { name: '', type: '', doc: line, presence };
    }

    if (!line.startsWith('`')) {
        throw new DocParseError(
            'MalformedParameterLine',
            `expected parameter line to start with a backtick: '${line}'`,
            { line },
        );
    }

    const rest = line.slice(1);
    const separatorAt = rest.indexOf(DESCRIPTION_SEPARATOR);
    if (separatorAt === -1 && policy.strictDescriptionSeparator) {
        throw new DocParseError(
            'MalformedParameterLine',
            `expected '${DESCRIPTION_SEPARATOR.trim()}' between parameter and description: '${line}'`,
            { line },
        );
    }

    const definition = separatorAt === -1 ? rest : rest.slice(0, separatorAt);
    const doc = separatorAt === -1 ? '' : rest.slice(separatorAt + DESCRIPTION_SEPARATOR.length);

    const span = definition.replace(/`/g, '');
    const spaceAt = span.indexOf(' ');
    const name = spaceAt === -1 ? span : span.slice(0, spaceAt);
    if (name.length === 0) {
        throw new DocParseError('MalformedParameterLine', `parameter has no name: '${line}'`, { line });
    }

    let type: TypeTag | '' = '';
    if (spaceAt !== -1) {
        try {
            type = parseBracketedType(span.slice(spaceAt + 1).trim());
        } catch (err) {
            throw err instanceof DocParseError ? err.withContext({ line }) : err;
        }
    }

    return { name, type, doc, presence };
}
