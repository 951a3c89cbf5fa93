/**
 * Structural validation engine.
 *
 * Walks every declared node of a tree and checks its shape: node types,
 * names, branch children, leaf fields and instance declarations. It does
 * not look at what a leaf means (bounds, units, defaults); that is the
 * signals engine's job.
 */

import * as path from 'node:path';
import type { ZodIssue } from 'zod';
import {
    BRANCH_KEYS,
    NODE_TYPES,
    VssSpecError,
    errorMessage,
    escapePointerToken,
    isNodeType,
    isRecord,
    leafSchema,
    nodeType,
    normalizeInstances,
    walkNodes,
    type Finding,
    type LintConfig,
    type Location,
    type NodeVisit,
    type Severity,
    type TreeDocument,
    type ValidationEngine,
    type VssNode,
} from '@vss-lint/core';

interface RuleFinding {
    rule: string;
    ruleName: string;
    severity: Severity;
    message: string;
    pointer?: string;
    details?: Record<string, unknown>;
}

export class SchemaEngine implements ValidationEngine {
    readonly name = 'vss-schema';
    readonly description = 'VSS tree structure (node types, names, fields, instances)';

    canValidate(filePath: string): boolean {
        return path.extname(filePath).toLowerCase() === '.json';
    }

    async validate(document: TreeDocument, _config: LintConfig): Promise<Finding[]> {
        const findings: Finding[] = [];

        walkNodes(document.tree, visit => {
            const location: Location = {
                filePath: document.filePath,
                jsonPointer: visit.pointer,
                signalPath: visit.path.join('.'),
            };
            for (const result of checkNode(visit)) {
                findings.push({
                    ruleId: `${this.name}/${result.rule}`,
                    ruleName: result.ruleName,
                    severity: result.severity,
                    message: result.message,
                    location: result.pointer ? { ...location, jsonPointer: result.pointer } : location,
                    source: this.name,
                    details: result.details,
                });
            }
        });

        return findings;
    }
}

function checkNode(visit: NodeVisit): RuleFinding[] {
    const results: RuleFinding[] = [];
    const where = visit.path.join('.');

    if (visit.name.length === 0 || visit.name.includes('.')) {
        results.push({
            rule: 'node/invalid-name',
            ruleName: 'Invalid Node Name',
            severity: 'error',
            message: `Node name '${visit.name}' under '${visit.path.slice(0, -1).join('.')}' must be non-empty and contain no '.'.`,
        });
    }

    if (!isRecord(visit.node)) {
        results.push({
            rule: 'node/not-object',
            ruleName: 'Node Not An Object',
            severity: 'error',
            message: `Node '${where}' must be an object, got ${visit.node === null ? 'null' : typeof visit.node}.`,
        });
        return results;
    }
    const node: VssNode = visit.node;

    const type = nodeType(node);
    if (!isNodeType(type)) {
        results.push({
            rule: 'node/unknown-type',
            ruleName: 'Unknown Node Type',
            severity: 'error',
            message: `Node '${where}' has type ${JSON.stringify(type)}; expected one of ${NODE_TYPES.join(', ')}.`,
        });
        return results;
    }

    if (node.instances !== undefined) {
        try {
            normalizeInstances(node.instances, visit.path, visit.path.length);
        } catch (error) {
            if (!(error instanceof VssSpecError)) {
                throw error;
            }
            results.push({
                rule: 'instances/malformed',
                ruleName: 'Malformed Instances',
                severity: 'error',
                message: `Node '${where}' has malformed instances: ${errorMessage(error)}.`,
                pointer: `${visit.pointer}/instances`,
                details: { instances: node.instances },
            });
        }
    }

    if (type === 'branch') {
        results.push(...checkBranch(node, visit));
    } else {
        results.push(...checkLeaf(node, visit));
    }

    return results;
}

function checkBranch(node: VssNode, visit: NodeVisit): RuleFinding[] {
    const results: RuleFinding[] = [];
    const where = visit.path.join('.');

    for (const key of Object.keys(node)) {
        if (!BRANCH_KEYS.has(key)) {
            results.push({
                rule: 'branch/unknown-key',
                ruleName: 'Unknown Branch Key',
                severity: 'warning',
                message: `Branch '${where}' has unexpected key '${key}'.`,
                pointer: `${visit.pointer}/${escapePointerToken(key)}`,
            });
        }
    }

    const children = node.children;
    if (children !== undefined && !isRecord(children)) {
        results.push({
            rule: 'branch/invalid-children',
            ruleName: 'Invalid Branch Children',
            severity: 'error',
            message: `Branch '${where}' has children that are not an object.`,
            pointer: `${visit.pointer}/children`,
        });
    } else if (!isRecord(children) || Object.keys(children).length === 0) {
        results.push({
            rule: 'branch/empty',
            ruleName: 'Empty Branch',
            severity: 'warning',
            message: `Branch '${where}' has no children.`,
        });
    }

    return results;
}

function checkLeaf(node: VssNode, visit: NodeVisit): RuleFinding[] {
    const results: RuleFinding[] = [];
    const where = visit.path.join('.');

    if (node.children !== undefined) {
        results.push({
            rule: 'leaf/has-children',
            ruleName: 'Leaf With Children',
            severity: 'error',
            message: `Leaf '${where}' of type ${String(node.type)} cannot have children.`,
            pointer: `${visit.pointer}/children`,
        });
    }

    // `children` is reported above and `instances` in checkNode.
    const { children: _children, instances: _instances, ...fields } = node;
    const parsed = leafSchema.safeParse(fields);
    if (!parsed.success) {
        for (const issue of parsed.error.issues) {
            results.push(leafIssue(issue, visit));
        }
    }

    return results;
}

function leafIssue(issue: ZodIssue, visit: NodeVisit): RuleFinding {
    const where = visit.path.join('.');
    const field = issue.path.map(String).join('.');
    const pointer = issue.path.length > 0
        ? `${visit.pointer}/${issue.path.map(segment => escapePointerToken(String(segment))).join('/')}`
        : undefined;

    return {
        rule: 'leaf/invalid-field',
        ruleName: 'Invalid Leaf Field',
        severity: 'error',
        message: field ? `Leaf '${where}' field '${field}': ${issue.message}.` : `Leaf '${where}': ${issue.message}.`,
        pointer,
        details: { code: issue.code },
    };
}
