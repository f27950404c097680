#!/usr/bin/env node
/**
 * CLI Entry Point — md-api-schema
 *
 * Usage:
 *   md-api-schema parse -i <docsDir> [-o <out.json>] [--config <config.yaml>] [--format json|text]
 *
 * @module
 */
import { writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { loadConfig, applyCliOverrides, type CliOverrides } from './config/ConfigLoader.js';
import type { ToolConfig } from './config/ParserConfig.js';
import { discoverDocuments } from './discovery/FileDiscovery.js';
import { createDebugObserver } from './observability/DebugObserver.js';
import { parseDocuments, type BatchResult } from './parser/BatchParser.js';
import { DocParseError } from './parser/ParseError.js';
import { formatRequest, toPlainRequest } from './serialize/RequestSerializer.js';

// ── Arg Parsing ──────────────────────────────────────────

interface RawCliArgs {
    command: string;
    input?: string;
    output?: string;
    config?: string;
    format?: string;
    strict?: boolean;
    keepGoing?: boolean;
    debug?: boolean;
}

function parseArgs(argv: string[]): RawCliArgs {
    const args = argv.slice(2);
    const command = args[0] ?? '';

    const result: Record<string, string | undefined> = {};
    const flags = new Set<string>();

    for (let i = 1; i < args.length; i++) {
        const arg = args[i];
        switch (arg) {
            case '-i':
            case '--input':
                result['input'] = args[++i];
                break;
            case '-o':
            case '--output':
                result['output'] = args[++i];
                break;
            case '-c':
            case '--config':
                result['config'] = args[++i];
                break;
            case '-f':
            case '--format':
                result['format'] = args[++i];
                break;
            case '--strict':
                flags.add('strict');
                break;
            case '--keep-going':
                flags.add('keepGoing');
                break;
            case '--debug':
                flags.add('debug');
                break;
        }
    }

    return {
        command,
        ...(result['input'] !== undefined ? { input: result['input'] } : {}),
        ...(result['output'] !== undefined ? { output: result['output'] } : {}),
        ...(result['config'] !== undefined ? { config: result['config'] } : {}),
        ...(result['format'] !== undefined ? { format: result['format'] } : {}),
        ...(flags.has('strict') ? { strict: true } : {}),
        ...(flags.has('keepGoing') ? { keepGoing: true } : {}),
        ...(flags.has('debug') ? { debug: true } : {}),
    };
}

function toFormat(value: string | undefined): 'json' | 'text' | undefined {
    if (value === undefined || value === 'json' || value === 'text') return value;
    console.error(`Error: unknown --format "${value}" (expected json or text).`);
    process.exit(1);
}

// ── Commands ─────────────────────────────────────────────

function runParse(rawArgs: RawCliArgs): void {
    // Load config (YAML file → defaults → CLI overrides)
    const baseConfig = loadConfig(rawArgs.config);

    const format = toFormat(rawArgs.format);
    const overrides: CliOverrides = {
        ...(rawArgs.input !== undefined ? { input: rawArgs.input } : {}),
        ...(rawArgs.output !== undefined ? { output: rawArgs.output } : {}),
        ...(format !== undefined ? { format } : {}),
        ...(rawArgs.keepGoing ? { failFast: false } : {}),
        ...(rawArgs.strict ? { strict: true } : {}),
    };

    const config: ToolConfig = applyCliOverrides(baseConfig, overrides);

    if (!config.input) {
        console.error('Error: --input (-i) is required (or set `input` in config file).');
        console.error('Usage: md-api-schema parse -i <docsDir> [-o <out.json>]');
        process.exit(1);
    }

    const root = resolve(config.input);
    const debug = rawArgs.debug ? createDebugObserver() : undefined;

    const documents = discoverDocuments(root, config.discovery);
    debug?.({ type: 'discover', root, documents: documents.length, timestamp: Date.now() });

    let result: BatchResult;
    try {
        result = parseDocuments(documents, {
            policy: config.policy,
            failFast: config.failFast,
            ...(debug ? { debug } : {}),
        });
    } catch (err) {
        if (!(err instanceof DocParseError)) throw err;
        console.error(`Error: failed to parse ${err.context.file ?? 'document'}`);
        console.error(`  ${err.code}: ${err.message}`);
        process.exit(1);
    }

    const rendered = config.format === 'json'
        ? JSON.stringify(result.requests.map(toPlainRequest), null, 2)
        : result.requests.map(formatRequest).join('\n\n');

    if (config.output) {
        const outPath = resolve(config.output);
        writeFileSync(outPath, rendered + '\n', 'utf-8');
        console.error(`Wrote ${result.requests.length} requests to ${outPath}`);
    } else {
        console.log(rendered);
    }

    for (const failure of result.failures) {
        console.error(`Error: failed to parse ${failure.path}`);
        console.error(`  ${failure.error.code}: ${failure.error.message}`);
    }

    if (result.failures.length > 0) {
        console.error(`${result.failures.length} of ${documents.length} documents failed.`);
        process.exit(1);
    }
}

function printHelp(): void {
    console.log(`
md-api-schema — Markdown API documentation → request schemas

USAGE:
  md-api-schema parse -i <docsDir> [options]

COMMANDS:
  parse       Parse every document under <docsDir> and print the requests

OPTIONS:
  -i, --input <dir>          Directory of markdown documents
  -o, --output <file>        Write the result here instead of stdout
  -c, --config <file>        Config file (default: auto-detect md-api-schema.yaml)
  -f, --format <json|text>   Output format (default: json)
  --strict                   Reject parameter lines without a description
  --keep-going               Report failing documents instead of stopping at the first
  --debug                    Trace discovery and parsing on stderr
  --help                     Show this help message

CONFIG FILE (md-api-schema.yaml):
  input: ./repos
  output: ./requests.json
  format: json
  failFast: true
  policy:
    strictDescriptionSeparator: false
    acceptedVersions: [2, 3]
    permissionsRequiredFrom: 3
    allowNullArrayElements: false
  discovery:
    skipDirectories: [version]
    skipFiles: [README.md]
    extensions: [.md]

EXAMPLES:
  md-api-schema parse -i ./repos
  md-api-schema parse -i ./repos -o requests.json --keep-going
  md-api-schema parse -i ./repos/student-details --format text --debug
`);
}

// ── Main ─────────────────────────────────────────────────

const cliArgs = parseArgs(process.argv);

switch (cliArgs.command) {
    case 'parse':
        runParse(cliArgs);
        break;
    case '--help':
    case 'help':
    case '':
        printHelp();
        break;
    default:
        console.error(`Unknown command: "${cliArgs.command}". Use --help for usage.`);
        process.exit(1);
}
