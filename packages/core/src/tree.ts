/**
 * Loader for VSS trees in their JSON export form.
 */

import { readFileSync } from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { TreeNotFoundError, VssSpecError } from './errors.js';

/**
 * A deserialized VSS tree: top-level domains (e.g. "Vehicle") mapped to
 * nodes. Nodes stay `unknown` until a walker or lookup checks them.
 */
export type VssTree = Readonly<Record<string, unknown>>;

/** A node that has been checked to be a JSON object. */
export type VssNode = Readonly<Record<string, unknown>>;

export const DEFAULT_TREE_FILE = 'vss_sample.json';

/** Environment variable naming the tree to use when none is given. */
export const TREE_ENV_VAR = 'VSS_TREE';

const DATA_DIR = fileURLToPath(new URL('../data/', import.meta.url));

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Declared type of a node; nodes without one are branches. */
export function nodeType(node: VssNode): unknown {
    return node.type ?? 'branch';
}

/** Absolute path of a tree bundled with this package. */
export function bundledTreePath(name: string = DEFAULT_TREE_FILE): string {
    return path.join(DATA_DIR, name);
}

/**
 * Resolve which file `loadTree(name)` reads.
 *
 * Absolute paths are used as given; other names refer to trees bundled
 * with this package. Without a name, VSS_TREE is consulted before falling
 * back to the bundled sample.
 */
export function resolveTreePath(name?: string): string {
    const requested = name ?? process.env[TREE_ENV_VAR];
    if (!requested) {
        return bundledTreePath();
    }
    return path.isAbsolute(requested) ? requested : bundledTreePath(requested);
}

/**
 * Load a VSS tree from a JSON file.
 *
 * @param name - name of a bundled tree or an absolute path to any tree
 * @throws TreeNotFoundError if the file cannot be read
 * @throws VssSpecError if the file is not a JSON object
 */
export function loadTree(name?: string): VssTree {
    const filePath = resolveTreePath(name);

    let text: string;
    try {
        text = readFileSync(filePath, 'utf-8');
    } catch (error) {
        throw new TreeNotFoundError(`failed to open VSS tree from ${name ?? filePath}`, { cause: error });
    }

    return parseTree(text);
}

/**
 * Parse the text of a VSS JSON tree.
 *
 * @throws VssSpecError if the text is not a JSON object
 */
export function parseTree(text: string): VssTree {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        throw new VssSpecError('invalid VSS tree JSON', { cause: error });
    }

    if (!isRecord(parsed)) {
        throw new VssSpecError('invalid VSS tree JSON: root must be an object');
    }
    return parsed;
}
