/**
 * Signal definition engine.
 *
 * Builds every well-formed leaf as a Signal, so a tree that passes this
 * engine can serve any lookup: datatypes are known, bounds and defaults
 * fit, and units parse. Also flags reused UUIDs and deprecated signals.
 * Leaves that do not match the leaf schema are left to the schema engine.
 */

import * as path from 'node:path';
import {
    Signal,
    SignalDefinitionError,
    UnitError,
    isRecord,
    leafSchema,
    nodeType,
    registry as defaultRegistry,
    walkNodes,
    type Finding,
    type LintConfig,
    type Location,
    type TreeDocument,
    type UnitRegistry,
    type ValidationEngine,
} from '@vss-lint/core';

export interface SignalsEngineOptions {
    /** Registry used to parse units; defaults to the shared VSS registry */
    registry?: UnitRegistry;
}

export class SignalsEngine implements ValidationEngine {
    readonly name = 'vss-signals';
    readonly description = 'VSS signal definitions (datatypes, bounds, defaults, units, UUIDs)';

    private readonly registry: UnitRegistry;

    constructor(options: SignalsEngineOptions = {}) {
        this.registry = options.registry ?? defaultRegistry;
    }

    canValidate(filePath: string): boolean {
        return path.extname(filePath).toLowerCase() === '.json';
    }

    async validate(document: TreeDocument, _config: LintConfig): Promise<Finding[]> {
        const findings: Finding[] = [];
        const uuids = new Map<string, string>();

        walkNodes(document.tree, visit => {
            if (!isRecord(visit.node) || nodeType(visit.node) === 'branch') {
                return;
            }

            const { instances: _instances, ...fields } = visit.node;
            const parsed = leafSchema.safeParse(fields);
            if (!parsed.success) {
                return;
            }
            const leaf = parsed.data;
            const signalPath = visit.path.join('.');
            const location: Location = {
                filePath: document.filePath,
                jsonPointer: visit.pointer,
                signalPath,
            };

            try {
                Signal.fromNode(visit.path, leaf, this.registry);
            } catch (error) {
                if (!(error instanceof SignalDefinitionError)) {
                    throw error;
                }
                findings.push(this.definitionFinding(error, signalPath, location));
            }

            const firstUse = uuids.get(leaf.uuid);
            if (firstUse === undefined) {
                uuids.set(leaf.uuid, signalPath);
            } else {
                findings.push({
                    ruleId: `${this.name}/uuid/duplicate`,
                    ruleName: 'Duplicate UUID',
                    severity: 'warning',
                    message: `Signal '${signalPath}' reuses UUID ${leaf.uuid} of '${firstUse}'.`,
                    location: { ...location, jsonPointer: `${visit.pointer}/uuid` },
                    source: this.name,
                    details: { uuid: leaf.uuid, firstUse },
                });
            }

            if (leaf.deprecation !== undefined) {
                findings.push({
                    ruleId: `${this.name}/deprecated`,
                    ruleName: 'Deprecated Signal',
                    severity: 'note',
                    message: `Signal '${signalPath}' is deprecated: ${leaf.deprecation}`,
                    location,
                    source: this.name,
                });
            }

            if (leaf.description.trim().length === 0) {
                findings.push({
                    ruleId: `${this.name}/description/empty`,
                    ruleName: 'Empty Description',
                    severity: 'note',
                    message: `Signal '${signalPath}' has an empty description.`,
                    location: { ...location, jsonPointer: `${visit.pointer}/description` },
                    source: this.name,
                });
            }
        });

        return findings;
    }

    private definitionFinding(error: SignalDefinitionError, signalPath: string, location: Location): Finding {
        if (error.cause instanceof UnitError) {
            return {
                ruleId: `${this.name}/unit/illegal`,
                ruleName: 'Illegal Unit',
                severity: 'error',
                message: `Signal '${signalPath}': ${error.message}.`,
                location: { ...location, jsonPointer: `${location.jsonPointer}/unit` },
                source: this.name,
            };
        }

        return {
            ruleId: `${this.name}/definition/invalid`,
            ruleName: 'Invalid Signal Definition',
            severity: 'error',
            message: `Signal '${signalPath}': ${error.message}.`,
            location,
            source: this.name,
        };
    }
}
