/**
 * File discovery module.
 *
 * Finds VSS trees to validate from glob patterns. Only the JSON export of
 * a tree is read; other JSON files matched by a broad pattern are skipped.
 */

import fastGlob from 'fast-glob';
import * as path from 'node:path';
import * as fs from 'node:fs/promises';
import { isRecord } from './tree.js';

const SUPPORTED_EXTENSIONS = ['.json'];

export interface DiscoveryOptions {
    /** Base directory for resolving relative patterns */
    basePath: string;

    /** Patterns to exclude from results */
    exclude?: string[];

    followSymlinks?: boolean;
}

/**
 * Discover VSS tree files matching the given patterns.
 *
 * Patterns may be absolute or relative to `basePath` and may contain glob
 * wildcards. Results are absolute, deduplicated and sorted.
 */
export async function discoverFiles(
    patterns: string[],
    options: DiscoveryOptions
): Promise<string[]> {
    const { basePath, exclude = [], followSymlinks = false } = options;

    const files = await fastGlob(patterns, {
        cwd: basePath,
        absolute: true,
        followSymbolicLinks: followSymlinks,
        ignore: [
            ...exclude,
            '**/node_modules/**',
            '**/.git/**',
        ],
        onlyFiles: true,
        unique: true,
    });

    const candidates = files.filter(file =>
        SUPPORTED_EXTENSIONS.includes(path.extname(file).toLowerCase())
    );

    const trees: string[] = [];
    for (const file of candidates) {
        if (await looksLikeVssTree(file)) {
            trees.push(file);
        }
    }

    // Sort for deterministic output
    trees.sort((a, b) => a.localeCompare(b));

    return trees;
}

/**
 * Heuristic check that a JSON file holds a VSS tree: an object with at
 * least one top-level branch that has children. Full validation is the
 * engines' job; unreadable or unparsable files are simply not trees.
 */
export async function looksLikeVssTree(filePath: string): Promise<boolean> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    } catch {
        return false;
    }

    if (!isRecord(parsed)) {
        return false;
    }
    return Object.values(parsed).some(domain =>
        isRecord(domain) && domain.type === 'branch' && isRecord(domain.children)
    );
}
