/**
 * Core type definitions for VSS linting.
 *
 * These types describe validation findings, lint configuration and the
 * interface that validation engines implement. Every finding points back to
 * a file, a JSON pointer inside the tree and, where one exists, the dotted
 * signal path.
 */

import type { VssTree } from './tree.js';

/**
 * Severity levels for validation findings.
 * These map to SARIF levels.
 *
 * - error: the tree is unusable at this location; lookups will fail
 * - warning: the tree loads, but the node is suspicious
 * - note: informational, e.g. deprecations
 */
export type Severity = 'error' | 'warning' | 'note';

export const SEVERITIES: readonly Severity[] = ['error', 'warning', 'note'];

/**
 * Where a finding was detected.
 *
 * VSS trees are JSON, so positions are logical: a JSON pointer (RFC 6901)
 * to the offending node, e.g. "/Vehicle/children/Cabin", plus the dotted
 * signal path when the node has one.
 */
export interface Location {
    /** Absolute path to the file on disk */
    filePath: string;

    /** JSON pointer to the element inside the tree */
    jsonPointer?: string;

    /** Dotted VSS path, e.g. "Vehicle.Cabin.HVAC" */
    signalPath?: string;
}

/**
 * A single validation finding produced by any validation engine.
 */
export interface Finding {
    /**
     * Identifier for the kind of issue.
     * Format: "{engine}/{category}/{code}", e.g. "vss-schema/leaf/invalid-field"
     */
    ruleId: string;

    /** Human-readable name for the rule */
    ruleName: string;

    severity: Severity;

    message: string;

    location: Location;

    /** Which validation engine produced this finding */
    source: string;

    /** Extra context such as the offending value */
    details?: Record<string, unknown>;
}

/**
 * Configuration for a validation run. Serializable, so it can be echoed in
 * the result metadata.
 */
export interface LintConfig {
    /** Glob patterns for files to validate */
    paths: string[];

    /** Glob patterns to exclude */
    exclude?: string[];

    /** Which severity levels cause the process to exit non-zero */
    failOn: Severity[];

    /**
     * Base directory for resolving relative patterns.
     * Defaults to current working directory.
     */
    basePath?: string;

    /**
     * Enable or disable specific validation engines.
     * By default, all registered engines run.
     */
    engines?: {
        'vss-schema'?: boolean;
        'vss-signals'?: boolean;
    };
}

/**
 * Result of a complete validation run.
 */
export interface LintResult {
    /** All findings from all engines, sorted and deduplicated */
    findings: Finding[];

    summary: {
        errors: number;
        warnings: number;
        notes: number;
        filesScanned: number;
        filesWithFindings: number;
    };

    metadata: {
        /** ISO 8601 timestamp when validation started */
        startTime: string;
        durationMs: number;
        version: string;
        config: LintConfig;
    };
}

/** A loaded tree handed to engines. */
export interface TreeDocument {
    /** Absolute path the tree was loaded from */
    filePath: string;
    tree: VssTree;
}

/**
 * Interface that all validation engines implement.
 *
 * Engines report problems as findings rather than throwing; the
 * orchestrator turns an unexpected exception into an engine-error finding.
 */
export interface ValidationEngine {
    /** Unique identifier, also the key under LintConfig.engines */
    readonly name: string;

    readonly description: string;

    /**
     * Called before validate() to allow early filtering.
     *
     * @param filePath - Absolute path to the file
     */
    canValidate(filePath: string): boolean;

    /**
     * Validate a single loaded tree.
     *
     * @returns Findings, empty if the tree is valid
     */
    validate(document: TreeDocument, config: LintConfig): Promise<Finding[]>;
}
