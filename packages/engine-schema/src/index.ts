/**
 * @vss-lint/engine-schema
 *
 * Structural validation engine for VSS trees.
 */

export { SchemaEngine } from './engine.js';
