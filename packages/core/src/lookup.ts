/**
 * Signal lookup by VSS path.
 */

import { SignalNameError, VssBranchError, VssSpecError } from './errors.js';
import { consumeInstances } from './instances.js';
import { Signal } from './signal.js';
import { isRecord, loadTree, nodeType, type VssNode, type VssTree } from './tree.js';
import { registry as defaultRegistry, type UnitRegistry } from './units.js';

/** A signal path: dot-delimited, or already split into keys. */
export type SignalName = string | readonly string[];

let defaultTree: VssTree | undefined;

/** The tree `findSignal` uses when none is given, loaded once. */
export function getDefaultTree(): VssTree {
    defaultTree ??= loadTree();
    return defaultTree;
}

/** Forget the memoised default tree, e.g. after VSS_TREE changes. */
export function resetDefaultTree(): void {
    defaultTree = undefined;
}

/**
 * Split and check a signal name.
 *
 * @throws TypeError if `name` is neither a string nor an array of strings
 * @throws SignalNameError if the name is empty or has an empty key
 */
export function parseSignalName(name: SignalName): string[] {
    const raw: unknown = name;
    if (typeof raw !== 'string' && !Array.isArray(raw)) {
        throw new TypeError(`name must be a string or an array of strings, got ${raw === null ? 'null' : typeof raw}`);
    }
    if (name.length === 0) {
        throw new SignalNameError('namespace must contain at least one key');
    }

    const keys: unknown[] = typeof name === 'string' ? name.split('.') : [...name];
    const checked: string[] = [];
    for (const key of keys) {
        if (typeof key !== 'string') {
            throw new TypeError(`name must be a string or an array of strings, got element ${typeof key}`);
        }
        if (key.length === 0) {
            throw new SignalNameError('namespace cannot contain an empty key');
        }
        checked.push(key);
    }
    return checked;
}

/**
 * Look up a VSS signal.
 *
 * @param name - path to the signal, dot-delimited or as an array of keys
 * @param tree - tree to search, or the default tree (VSS_TREE, then the bundled sample)
 * @param registry - unit registry used to parse the signal's unit
 * @throws TreeNotFoundError if no tree is given and the default cannot be loaded
 * @throws VssSpecError if the tree is invalid along the path
 * @throws SignalNameError if the name is empty or has an empty key
 * @throws VssBranchError if the named signal does not exist
 */
export function findSignal(
    name: SignalName,
    tree?: VssTree,
    registry: UnitRegistry = defaultRegistry
): Signal {
    const namespace = parseSignalName(name);
    const source = tree ?? getDefaultTree();

    const domain = namespace[0];
    if (!Object.hasOwn(source, domain)) {
        throw new VssBranchError(`no such domain '${domain}'`);
    }

    return findInNode(registry, source[domain], namespace, 1);
}

function pathAt(namespace: readonly string[], idx: number): string {
    return namespace.slice(0, idx).join('.');
}

function findInNode(registry: UnitRegistry, value: unknown, namespace: readonly string[], start: number): Signal {
    if (!isRecord(value)) {
        throw new VssSpecError(`invalid VSS tree structure at '${pathAt(namespace, start)}'`);
    }
    const node: VssNode = value;

    let idx = start;
    if (node.instances !== undefined) {
        idx = consumeInstances(node.instances, namespace, idx);
    }

    if (idx === namespace.length) {
        if (nodeType(node) === 'branch') {
            throw new VssBranchError(`node '${pathAt(namespace, idx)}' is a branch, not a signal`);
        }

        try {
            return Signal.fromNode(namespace, node, registry);
        } catch (error) {
            throw new VssSpecError(`malformed sensor specification for '${pathAt(namespace, idx)}'`, { cause: error });
        }
    }

    const children = node.children;
    if (children === undefined) {
        throw new VssBranchError(
            `attempted to follow branch '${namespace.slice(idx).join('.')}' from leaf node '${pathAt(namespace, idx)}'`
        );
    }
    if (!isRecord(children)) {
        throw new VssSpecError(`invalid VSS tree structure at '${pathAt(namespace, idx)}'`);
    }

    const key = namespace[idx];
    if (!Object.hasOwn(children, key)) {
        throw new VssBranchError(`branch '${pathAt(namespace, idx)}' has no such child '${key}'`);
    }

    return findInNode(registry, children[key], namespace, idx + 1);
}
