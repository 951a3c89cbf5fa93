/**
 * @vss-lint/sarif
 *
 * SARIF v2.1.0 output for VSS lint results.
 */

export { generateSarif, fingerprint, SARIF_SCHEMA, TOOL_NAME, type SarifOptions } from './generator.js';
