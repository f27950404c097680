/**
 * FileDiscovery — Directory Tree → Documents to Parse
 *
 * Each markdown file becomes one document whose scope is the name of
 * the directory holding it (the API category, e.g. `student-details`).
 *
 * @module
 */
import { readdirSync, readFileSync } from 'node:fs';
import { basename, dirname, join, relative, sep } from 'node:path';
import { DEFAULT_CONFIG, type DiscoveryConfig } from '../config/ParserConfig.js';

/** A documentation file ready for parsing */
export interface SourceDocument {
    readonly path: string;
    /** Name of the containing directory */
    readonly scope: string;
    readonly text: string;
}

/**
 * Collect every document under `root`, sorted by path.
 *
 * Skips directories whose relative path contains a `skipDirectories`
 * segment, files named in `skipFiles`, and files without an accepted
 * extension.
 */
export function discoverDocuments(root: string, config: DiscoveryConfig = DEFAULT_CONFIG.discovery): SourceDocument[] {
    return listDocumentPaths(root, config).map(path => ({
        path,
        scope: basename(dirname(path)),
        text: readFileSync(path, 'utf-8'),
    }));
}

/** Paths {@link discoverDocuments} would read, sorted */
export function listDocumentPaths(root: string, config: DiscoveryConfig = DEFAULT_CONFIG.discovery): string[] {
    const paths: string[] = [];
    walk(root, root, config, paths);
    return paths.sort();
}

// ── Internal ─────────────────────────────────────────────

function walk(root: string, dir: string, config: DiscoveryConfig, out: string[]): void {
    for (const entry of readdirSync(dir, { withFileTypes: true })) {
        const path = join(dir, entry.name);

        if (entry.isDirectory()) {
            if (!isSkippedDirectory(relative(root, path), config)) {
                walk(root, path, config, out);
            }
        } else if (entry.isFile() && isDocument(entry.name, config)) {
            out.push(path);
        }
    }
}

function isSkippedDirectory(relativePath: string, config: DiscoveryConfig): boolean {
    return relativePath.split(sep).some(segment => config.skipDirectories.some(skip => segment.includes(skip)));
}

function isDocument(name: string, config: DiscoveryConfig): boolean {
    return !config.skipFiles.includes(name) && config.extensions.some(ext => name.endsWith(ext));
}
