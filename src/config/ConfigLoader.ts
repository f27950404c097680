/**
 * ConfigLoader — YAML Configuration File Reader
 *
 * Reads `md-api-schema.yaml` (or `.yml`, `.json`), validates it with
 * zod and fills the gaps from the defaults. CLI args override file values.
 *
 * @module
 */
import { readFileSync, existsSync } from 'node:fs';
import { extname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z, type ZodError } from 'zod';
import { mergeConfig, type ToolConfig, type PartialConfig } from './ParserConfig.js';

// ── Filename Conventions ─────────────────────────────────

/** Looked up in this order when no path is given */
export const CONFIG_FILENAMES: readonly string[] = [
    'md-api-schema.yaml',
    'md-api-schema.yml',
    'md-api-schema.json',
];

// ── File Schema ──────────────────────────────────────────

const stringList = z.array(z.string());

const policySchema = z.object({
    strictDescriptionSeparator: z.boolean(),
    acceptedVersions: z.array(z.number().int().min(2)),
    permissionsRequiredFrom: z.number().int(),
    allowNullArrayElements: z.boolean(),
}).partial().strict();

const discoverySchema = z.object({
    skipDirectories: stringList,
    skipFiles: stringList,
    extensions: stringList,
}).partial().strict();

const configFileSchema = z.object({
    input: z.string(),
    output: z.string(),
    format: z.enum(['json', 'text']),
    failFast: z.boolean(),
    policy: policySchema,
    discovery: discoverySchema,
}).partial().strict();

// ── Errors ───────────────────────────────────────────────

/**
 * Thrown when a config file does not match the expected structure.
 *
 * The message lists every offending path; `cause` holds the `ZodError`.
 */
export class ConfigValidationError extends Error {
    readonly filePath: string;

    constructor(filePath: string, zodError: ZodError) {
        const issues = zodError.issues
            .map(issue => {
                const path = issue.path.length > 0
                    ? `'${issue.path.join('.')}'`
                    : '(root)';
                return `  • ${path}: ${issue.message}`;
            })
            .join('\n');

        super(`Invalid config file "${filePath}":\n${issues}`, { cause: zodError });
        this.name = 'ConfigValidationError';
        this.filePath = filePath;
    }
}

// ── Public API ───────────────────────────────────────────

/**
 * Load, validate and merge the tool configuration.
 *
 * An explicit `configPath` is resolved against `cwd` and must exist.
 * Otherwise the first of {@link CONFIG_FILENAMES} present in `cwd` is
 * read, and with none of them every setting keeps its default.
 *
 * @throws If an explicit file is missing, or a file fails validation
 */
export function loadConfig(configPath?: string, cwd: string = process.cwd()): ToolConfig {
    const filePath = configPath
        ? resolve(cwd, configPath)
        : CONFIG_FILENAMES.map(name => join(cwd, name)).find(candidate => existsSync(candidate));

    if (filePath === undefined) {
        return mergeConfig({});
    }
    if (!existsSync(filePath)) {
        throw new Error(`Config file not found: "${filePath}"`);
    }
    return mergeConfig(readConfigFile(filePath));
}

/**
 * Merge a loaded config with CLI argument overrides.
 *
 * CLI args take precedence over file values.
 */
export function applyCliOverrides(config: ToolConfig, cli: CliOverrides): ToolConfig {
    return {
        ...config,
        ...(cli.input !== undefined ? { input: cli.input } : {}),
        ...(cli.output !== undefined ? { output: cli.output } : {}),
        ...(cli.format !== undefined ? { format: cli.format } : {}),
        ...(cli.failFast !== undefined ? { failFast: cli.failFast } : {}),
        policy: {
            ...config.policy,
            ...(cli.strict !== undefined ? { strictDescriptionSeparator: cli.strict } : {}),
        },
    };
}

/** CLI arguments that can override config file values */
export interface CliOverrides {
    readonly input?: string;
    readonly output?: string;
    readonly format?: 'json' | 'text';
    readonly failFast?: boolean;
    readonly strict?: boolean;
}

// ── Internal ─────────────────────────────────────────────

/** Parse a YAML or JSON file and validate it against the file schema */
function readConfigFile(filePath: string): PartialConfig {
    const content = readFileSync(filePath, 'utf-8');
    const raw: unknown = extname(filePath) === '.json' ? JSON.parse(content) : parseYaml(content);

    // An empty YAML document parses to null
    const parsed = configFileSchema.safeParse(raw ?? {});
    if (!parsed.success) {
        throw new ConfigValidationError(filePath, parsed.error);
    }
    return parsed.data;
}
