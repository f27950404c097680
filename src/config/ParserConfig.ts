/**
 * ParserConfig — Parsing Policy and Tool Configuration
 *
 * The documentation dialect is not fully consistent across the vendor's
 * repositories. Where behaviour could go either way, the choice is a
 * {@link ParserPolicy} flag rather than a hard-coded assumption.
 *
 * Can be loaded from a YAML file (`md-api-schema.yaml`) or passed programmatically.
 *
 * @module
 */

// ── Parser Policy ────────────────────────────────────────

/**
 * Switches for the ambiguous corners of the dialect.
 * Defaults are the tolerant reading.
 */
export interface ParserPolicy {
    /** Reject parameter lines without the `` ` - `` description separator (default: tolerate with empty doc) */
    readonly strictDescriptionSeparator: boolean;
    /** API versions accepted by the `Version` section. Version 1 is never accepted. */
    readonly acceptedVersions: readonly number[];
    /** Lowest version whose documents must carry a `Permission` section */
    readonly permissionsRequiredFrom: number;
    /** Ignore `null` elements when classifying array samples */
    readonly allowNullArrayElements: boolean;
}

// ── Discovery Config ─────────────────────────────────────

/** Controls which files the CLI picks up under its input directory */
export interface DiscoveryConfig {
    /** Skip any directory whose path contains one of these segments */
    readonly skipDirectories: readonly string[];
    /** Skip files with these exact names */
    readonly skipFiles: readonly string[];
    /** Only read files ending in one of these extensions */
    readonly extensions: readonly string[];
}

// ── Full Config ──────────────────────────────────────────

/**
 * Complete tool configuration.
 *
 * All fields have defaults — see {@link DEFAULT_CONFIG}.
 */
export interface ToolConfig {
    /** Directory of markdown documents */
    readonly input?: string;
    /** File to write the JSON result to (default: stdout) */
    readonly output?: string;
    /** Output rendering */
    readonly format: 'json' | 'text';
    /** Abort the batch on the first failing document */
    readonly failFast: boolean;
    readonly policy: ParserPolicy;
    readonly discovery: DiscoveryConfig;
}

// ── Defaults ─────────────────────────────────────────────

export const DEFAULT_POLICY: ParserPolicy = {
    strictDescriptionSeparator: false,
    acceptedVersions: [2, 3],
    permissionsRequiredFrom: 3,
    allowNullArrayElements: false,
};

export const DEFAULT_CONFIG: ToolConfig = {
    format: 'json',
    failFast: true,
    policy: DEFAULT_POLICY,
    discovery: {
        skipDirectories: ['version'],
        skipFiles: ['README.md'],
        extensions: ['.md'],
    },
};

// ── Merge Helpers ────────────────────────────────────────

/** Policy overrides; unset or `undefined` entries keep their default */
export type PartialPolicy = { readonly [K in keyof ParserPolicy]?: ParserPolicy[K] | undefined };

/** Fill a partial policy with defaults */
export function resolvePolicy(partial: PartialPolicy = {}): ParserPolicy {
    return {
        strictDescriptionSeparator: partial.strictDescriptionSeparator ?? DEFAULT_POLICY.strictDescriptionSeparator,
        acceptedVersions: partial.acceptedVersions ?? DEFAULT_POLICY.acceptedVersions,
        permissionsRequiredFrom: partial.permissionsRequiredFrom ?? DEFAULT_POLICY.permissionsRequiredFrom,
        allowNullArrayElements: partial.allowNullArrayElements ?? DEFAULT_POLICY.allowNullArrayElements,
    };
}

/**
 * Deep-merge a partial config with defaults.
 * Partial values override defaults at each level.
 */
export function mergeConfig(partial: PartialConfig): ToolConfig {
    const discovery = partial.discovery ?? {};

    return {
        ...(partial.input !== undefined ? { input: partial.input } : {}),
        ...(partial.output !== undefined ? { output: partial.output } : {}),
        format: partial.format ?? DEFAULT_CONFIG.format,
        failFast: partial.failFast ?? DEFAULT_CONFIG.failFast,
        policy: resolvePolicy(partial.policy),
        discovery: {
            skipDirectories: discovery.skipDirectories ?? DEFAULT_CONFIG.discovery.skipDirectories,
            skipFiles: discovery.skipFiles ?? DEFAULT_CONFIG.discovery.skipFiles,
            extensions: discovery.extensions ?? DEFAULT_CONFIG.discovery.extensions,
        },
    };
}

/** Partial config shape for merging; `undefined` entries keep their default */
export interface PartialConfig {
    readonly input?: string | undefined;
    readonly output?: string | undefined;
    readonly format?: 'json' | 'text' | undefined;
    readonly failFast?: boolean | undefined;
    readonly policy?: PartialPolicy | undefined;
    readonly discovery?: { readonly [K in keyof DiscoveryConfig]?: DiscoveryConfig[K] | undefined } | undefined;
}
