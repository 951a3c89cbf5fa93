/**
 * Validation orchestrator.
 *
 * Coordinates file discovery, tree loading, engine invocation and result
 * aggregation.
 */

import { discoverFiles, type DiscoveryOptions } from './discovery.js';
import { errorMessage } from './errors.js';
import { loadTree, type VssTree } from './tree.js';
import type {
    Finding,
    LintConfig,
    LintResult,
    Severity,
    TreeDocument,
    ValidationEngine,
} from './types.js';

export const VERSION = '1.1.0';

const LOADER = 'vss-lint';

/**
 * The orchestrator keeps a registry of validation engines and runs them
 * over every discovered tree. Engines run in parallel per file; findings
 * are sorted afterwards so output is deterministic.
 */
export class Orchestrator {
    private engines: ValidationEngine[] = [];

    /**
     * Register a validation engine. Register engines before calling lint().
     */
    registerEngine(engine: ValidationEngine): void {
        this.engines.push(engine);
    }

    /**
     * Run validation according to the provided configuration:
     * 1. Discover files matching the configured patterns
     * 2. Load each file as a VSS tree
     * 3. Invoke each enabled engine on applicable trees
     * 4. Sort and deduplicate findings, then summarise
     */
    async lint(config: LintConfig): Promise<LintResult> {
        const startTime = new Date();

        const basePath = config.basePath ?? process.cwd();

        const discoveryOptions: DiscoveryOptions = {
            basePath,
            exclude: config.exclude,
        };
        const files = await discoverFiles(config.paths, discoveryOptions);

        const activeEngines = this.engines.filter(engine => {
            const engineConfig: Record<string, boolean | undefined> = config.engines ?? {};
            // Default: all engines enabled
            return engineConfig[engine.name] !== false;
        });

        const allFindings: Finding[] = [];
        for (const file of files) {
            allFindings.push(...await this.validateFile(file, activeEngines, config));
        }

        const findings = normalizeFindings(allFindings);
        const summary = computeSummary(findings, files);

        const endTime = new Date();
        return {
            findings,
            summary,
            metadata: {
                startTime: startTime.toISOString(),
                durationMs: endTime.getTime() - startTime.getTime(),
                version: VERSION,
                config,
            },
        };
    }

    /**
     * Load one file and validate it with all applicable engines.
     */
    private async validateFile(
        filePath: string,
        engines: ValidationEngine[],
        config: LintConfig
    ): Promise<Finding[]> {
        let tree: VssTree;
        try {
            tree = loadTree(filePath);
        } catch (error) {
            return [{
                ruleId: `${LOADER}/load/invalid-tree`,
                ruleName: 'Invalid Tree',
                severity: 'error',
                message: `Cannot load VSS tree: ${errorMessage(error)}`,
                location: { filePath },
                source: LOADER,
            }];
        }

        const document: TreeDocument = { filePath, tree };
        const applicableEngines = engines.filter(e => e.canValidate(filePath));

        const results = await Promise.all(
            applicableEngines.map(async (engine): Promise<Finding[]> => {
                try {
                    return await engine.validate(document, config);
                } catch (error) {
                    return [{
                        ruleId: `${engine.name}/internal/engine-error`,
                        ruleName: 'Engine Error',
                        severity: 'error',
                        message: `Validation engine "${engine.name}" failed: ${errorMessage(error)}`,
                        location: { filePath },
                        source: engine.name,
                    }];
                }
            })
        );

        return results.flat();
    }
}

/**
 * File, then JSON pointer, then rule ID. Findings without a pointer
 * (whole-file problems) come first within their file.
 */
function compareFindings(a: Finding, b: Finding): number {
    return a.location.filePath.localeCompare(b.location.filePath)
        || (a.location.jsonPointer ?? '').localeCompare(b.location.jsonPointer ?? '')
        || a.ruleId.localeCompare(b.ruleId);
}

/** Sort, keeping one finding per file, pointer, rule and message. */
function normalizeFindings(findings: Finding[]): Finding[] {
    const unique = new Map<string, Finding>();
    for (const finding of [...findings].sort(compareFindings)) {
        const { filePath, jsonPointer = null } = finding.location;
        const key = JSON.stringify([filePath, jsonPointer, finding.ruleId, finding.message]);
        if (!unique.has(key)) {
            unique.set(key, finding);
        }
    }
    return [...unique.values()];
}

function computeSummary(findings: Finding[], filesScanned: string[]): LintResult['summary'] {
    const counts: Record<Severity, number> = { error: 0, warning: 0, note: 0 };
    for (const { severity } of findings) {
        counts[severity]++;
    }
    return {
        errors: counts.error,
        warnings: counts.warning,
        notes: counts.note,
        filesScanned: filesScanned.length,
        filesWithFindings: new Set(findings.map(f => f.location.filePath)).size,
    };
}
