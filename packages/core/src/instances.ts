/**
 * VSS instance declarations.
 *
 * A branch with `instances` is multiplied over named positions, each of
 * which adds a path segment below the branch:
 *
 *   "Row[1,4]"                      -> Row1 | Row2 | Row3 | Row4
 *   ["Left", "Right"]               -> Left | Right
 *   ["Row[1,2]", ["Left", "Right"]] -> (Row1 | Row2) then (Left | Right)
 */

import { VssBranchError, VssSpecError } from './errors.js';

const RANGE = /^(.*)\[(\d+),(\d+)\]$/;

function describePath(namespace: readonly string[], idx: number): string {
    return `'${namespace.slice(0, idx).join('.')}'`;
}

function listOf(names: readonly string[]): string {
    return `[${names.join(', ')}]`;
}

/**
 * Expand a condensed range such as "Row[1,4]". Bounds are inclusive.
 *
 * @throws VssSpecError if the text is not a range or the range is empty
 */
export function expandRange(spec: string, namespace: readonly string[], idx: number): string[] {
    const match = RANGE.exec(spec);
    if (match === null) {
        throw new VssSpecError(`malformed instance '${spec}' on ${describePath(namespace, idx)}`);
    }

    const [, name, lowText, highText] = match;
    const lower = Number.parseInt(lowText, 10);
    const upper = Number.parseInt(highText, 10);
    if (upper <= lower) {
        throw new VssSpecError(
            `empty range [${lower},${upper}] on instance '${name}' for ${describePath(namespace, idx)}`
        );
    }

    const names: string[] = [];
    for (let i = lower; i <= upper; i++) {
        names.push(`${name}${i}`);
    }
    return names;
}

/** Expand every string element as a range, or return undefined if one is not a range. */
function expandAllRanges(
    elements: readonly unknown[],
    namespace: readonly string[],
    idx: number
): unknown[] | undefined {
    const expanded: unknown[] = [];
    for (const element of elements) {
        if (typeof element !== 'string') {
            expanded.push(element);
            continue;
        }
        if (!RANGE.test(element)) {
            return undefined;
        }
        try {
            expanded.push(expandRange(element, namespace, idx));
        } catch (error) {
            if (error instanceof VssSpecError) {
                return undefined;
            }
            throw error;
        }
    }
    return expanded;
}

/**
 * Turn an instance declaration into ordered groups of names. Each group
 * consumes one path segment.
 *
 * @param spec - the raw `instances` value of a node
 * @param namespace - path being resolved, used in messages
 * @param idx - index of the first segment below the node
 * @throws VssSpecError if the declaration is malformed
 */
export function normalizeInstances(spec: unknown, namespace: readonly string[], idx: number): string[][] {
    if (typeof spec === 'string') {
        return [expandRange(spec, namespace, idx)];
    }

    if (!Array.isArray(spec)) {
        throw new VssSpecError(`malformed instances ${JSON.stringify(spec)} for ${describePath(namespace, idx)}`);
    }
    if (spec.length === 0) {
        throw new VssSpecError(`empty instances array on ${describePath(namespace, idx)}`);
    }

    const elements: readonly unknown[] = expandAllRanges(spec, namespace, idx) ?? spec;

    if (elements.every((element): element is string => typeof element === 'string')) {
        return [[...elements]];
    }

    if (elements.every(element => Array.isArray(element))) {
        return elements.map((group, pos) => {
            const names: string[] = [];
            for (const name of Array.isArray(group) ? group : []) {
                if (typeof name !== 'string') {
                    throw new VssSpecError(
                        `illegal nested instance[${pos}][${JSON.stringify(name)}] on ${describePath(namespace, idx)}`
                    );
                }
                names.push(name);
            }
            return names;
        });
    }

    throw new VssSpecError(`malformed instances ${JSON.stringify(spec)} for ${describePath(namespace, idx)}`);
}

/**
 * Match the segments at `namespace[idx...]` against a node's instances.
 *
 * @returns index of the first segment after the instances
 * @throws VssSpecError if the declaration is malformed
 * @throws VssBranchError if the path does not name a declared instance
 */
export function consumeInstances(spec: unknown, namespace: readonly string[], idx: number): number {
    let next = idx;
    for (const group of normalizeInstances(spec, namespace, idx)) {
        if (next >= namespace.length) {
            throw new VssBranchError(
                `node ${describePath(namespace, next)} has instances, expected one of ${listOf(group)} ` +
                `after ${namespace[next - 1]}`
            );
        }

        const name = namespace[next];
        if (!group.includes(name)) {
            throw new VssBranchError(
                `illegal instance of ${describePath(namespace, next)}, got '${name}' but must be one of ${listOf(group)}`
            );
        }
        next++;
    }
    return next;
}

/**
 * Every concrete segment combination an instance declaration allows, in
 * declaration order.
 *
 * @throws VssSpecError if the declaration is malformed
 */
export function expandInstances(spec: unknown, namespace: readonly string[]): string[][] {
    const groups = normalizeInstances(spec, namespace, namespace.length);
    let combinations: string[][] = [[]];
    for (const group of groups) {
        combinations = combinations.flatMap(prefix => group.map(name => [...prefix, name]));
    }
    return combinations;
}
