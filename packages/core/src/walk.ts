/**
 * Depth-first traversal of VSS trees.
 */

import { expandInstances } from './instances.js';
import { isRecord, nodeType, type VssNode, type VssTree } from './tree.js';

/** One node reached by walkNodes. */
export interface NodeVisit {
    /** Key of the node in its parent (or the domain name at the root) */
    name: string;
    /** Declared path, without instance segments */
    path: readonly string[];
    /** RFC 6901 pointer to the node inside the tree JSON */
    pointer: string;
    /** The raw node; not necessarily an object */
    node: unknown;
    /** The enclosing node, undefined for domains */
    parent: VssNode | undefined;
}

/** Return false to skip a node's children. */
export type NodeVisitor = (visit: NodeVisit) => void | boolean;

/** Escape one JSON pointer reference token (RFC 6901). */
export function escapePointerToken(token: string): string {
    return token.replace(/~/g, '~0').replace(/\//g, '~1');
}

/**
 * Visit every node in key order. Instances are not expanded, so each
 * declared node is visited exactly once. Children of non-object nodes and
 * non-object `children` values are not descended into.
 */
export function walkNodes(tree: VssTree, visitor: NodeVisitor): void {
    for (const name of Object.keys(tree)) {
        visit(tree[name], name, [name], `/${escapePointerToken(name)}`, undefined, visitor);
    }
}

function visit(
    node: unknown,
    name: string,
    path: readonly string[],
    pointer: string,
    parent: VssNode | undefined,
    visitor: NodeVisitor
): void {
    const descend = visitor({ name, path, pointer, node, parent });
    if (descend === false || !isRecord(node)) {
        return;
    }

    const children = node.children;
    if (!isRecord(children)) {
        return;
    }
    for (const childName of Object.keys(children)) {
        visit(
            children[childName],
            childName,
            [...path, childName],
            `${pointer}/children/${escapePointerToken(childName)}`,
            node,
            visitor
        );
    }
}

/**
 * Every concrete signal path in a tree, with instances expanded, in tree
 * order. Nodes with malformed instances are skipped along with their
 * subtree.
 *
 * @param prefix - keep only paths equal to or below this dotted path
 */
export function listSignals(tree: VssTree, prefix?: string): string[] {
    const signals: string[] = [];
    for (const domain of Object.keys(tree)) {
        collect(tree[domain], [domain], signals);
    }

    if (!prefix) {
        return signals;
    }
    return signals.filter(signal => signal === prefix || signal.startsWith(`${prefix}.`));
}

function collect(node: unknown, path: readonly string[], out: string[]): void {
    if (!isRecord(node)) {
        return;
    }

    let paths: (readonly string[])[] = [path];
    if (node.instances !== undefined) {
        let combinations: string[][];
        try {
            combinations = expandInstances(node.instances, path);
        } catch {
            return;
        }
        paths = combinations.map(combination => [...path, ...combination]);
    }

    if (nodeType(node) !== 'branch') {
        out.push(...paths.map(concrete => concrete.join('.')));
        return;
    }

    const children = node.children;
    if (!isRecord(children)) {
        return;
    }
    for (const concrete of paths) {
        for (const childName of Object.keys(children)) {
            collect(children[childName], [...concrete, childName], out);
        }
    }
}
