/**
 * SARIF (Static Analysis Results Interchange Format) generator.
 *
 * SARIF v2.1.0 is the standard format for static analysis tools and is
 * read by GitHub code scanning. VSS trees are JSON, so results carry no
 * line regions; each result names the signal path (or JSON pointer) as
 * its logical location instead.
 *
 * Specification: https://docs.oasis-open.org/sarif/sarif/v2.1.0/sarif-v2.1.0.html
 */

import { createHash } from 'node:crypto';
import * as path from 'node:path';
import type { Finding, LintResult, Severity } from '@vss-lint/core';

/**
 * SARIF v2.1.0 type definitions, covering only what we emit.
 */
interface SarifLog {
    $schema: string;
    version: string;
    runs: SarifRun[];
}

interface SarifRun {
    tool: {
        driver: {
            name: string;
            version: string;
            informationUri?: string;
            rules: SarifRule[];
        };
    };
    results: SarifResult[];
    invocations?: SarifInvocation[];
}

interface SarifRule {
    id: string;
    name: string;
    shortDescription: { text: string };
    defaultConfiguration: { level: SarifLevel };
}

interface SarifResult {
    ruleId: string;
    level: SarifLevel;
    message: { text: string };
    locations: SarifLocation[];
    partialFingerprints: Record<string, string>;
}

interface SarifLocation {
    physicalLocation: {
        artifactLocation: {
            uri: string;
            uriBaseId: string;
        };
    };
    logicalLocations?: Array<{
        fullyQualifiedName: string;
        kind: string;
    }>;
}

interface SarifInvocation {
    executionSuccessful: boolean;
    startTimeUtc: string;
}

type SarifLevel = 'error' | 'warning' | 'note';

const SARIF_LEVELS: Record<Severity, SarifLevel> = {
    error: 'error',
    warning: 'warning',
    note: 'note',
};

export const SARIF_SCHEMA =
    'https://raw.githubusercontent.com/oasis-tcs/sarif-spec/main/sarif-2.1/schema/sarif-schema-2.1.0.json';

export const TOOL_NAME = 'vss-lint';

/**
 * Options for SARIF generation.
 */
export interface SarifOptions {
    /**
     * Base path for artifact URIs.
     * Paths in the SARIF file will be relative to this directory.
     */
    basePath?: string;

    /** URL for the tool's homepage; omitted from the log when unset */
    informationUri?: string;
}

/**
 * Generate a SARIF log from lint results.
 *
 * @returns SARIF log as JSON with 2-space indentation
 */
export function generateSarif(
    result: LintResult,
    options: SarifOptions = {}
): string {
    const { basePath = process.cwd(), informationUri } = options;

    const sarifLog: SarifLog = {
        $schema: SARIF_SCHEMA,
        version: '2.1.0',
        runs: [
            {
                tool: {
                    driver: {
                        name: TOOL_NAME,
                        version: result.metadata.version,
                        ...(informationUri === undefined ? {} : { informationUri }),
                        rules: extractRules(result.findings),
                    },
                },
                results: result.findings.map(finding => findingToSarifResult(finding, basePath)),
                invocations: [
                    {
                        executionSuccessful: true,
                        startTimeUtc: result.metadata.startTime,
                    },
                ],
            },
        ],
    };

    return JSON.stringify(sarifLog, null, 2);
}

/**
 * One rule per distinct rule ID, sorted by ID. The first finding of a rule
 * decides its name and default level.
 */
function extractRules(findings: Finding[]): SarifRule[] {
    // Reversed so the first finding of each rule is the last one written.
    const firstByRule = new Map(findings.map(finding => [finding.ruleId, finding] as const).reverse());

    return [...firstByRule.values()]
        .sort((a, b) => a.ruleId.localeCompare(b.ruleId))
        .map(({ ruleId, ruleName, severity }) => ({
            id: ruleId,
            name: ruleName,
            shortDescription: { text: ruleName },
            defaultConfiguration: { level: SARIF_LEVELS[severity] },
        }));
}

function findingToSarifResult(finding: Finding, basePath: string): SarifResult {
    let relativeUri = finding.location.filePath;
    if (path.isAbsolute(relativeUri)) {
        relativeUri = path.relative(basePath, relativeUri);
    }
    relativeUri = relativeUri.split(path.sep).join('/');

    const location: SarifLocation = {
        physicalLocation: {
            artifactLocation: {
                uri: relativeUri,
                uriBaseId: '%SRCROOT%',
            },
        },
    };

    const { signalPath, jsonPointer } = finding.location;
    if (signalPath) {
        location.logicalLocations = [{ fullyQualifiedName: signalPath, kind: 'member' }];
    } else if (jsonPointer) {
        location.logicalLocations = [{ fullyQualifiedName: jsonPointer, kind: 'object' }];
    }

    return {
        ruleId: finding.ruleId,
        level: SARIF_LEVELS[finding.severity],
        message: { text: finding.message },
        locations: [location],
        partialFingerprints: {
            primaryLocationLineHash: fingerprint(finding),
        },
    };
}

/**
 * Fingerprint of a finding's rule, position in the tree and message.
 * The file path is not part of it.
 */
export function fingerprint(finding: Finding): string {
    const where = finding.location.jsonPointer ?? finding.location.signalPath ?? '';
    return createHash('sha256')
        .update([finding.ruleId, where, finding.message].join('\0'))
        .digest('hex')
        .slice(0, 16);
}
