/**
 * @vss-lint/core
 *
 * Vehicle Signal Specification model and lint orchestration.
 *
 * This package provides:
 * - Signal definitions with datatype bounds and unit parsing
 * - Signal lookup by path, including instance resolution
 * - Tree loading and traversal
 * - File discovery and validation orchestration for lint engines
 *
 * @example
 * ```typescript
 * import { findSignal } from '@vss-lint/core';
 *
 * const speed = findSignal('Vehicle.AverageSpeed');
 * speed.convert(36, 'm/s'); // 10
 * ```
 */

export * from './types.js';
export * from './errors.js';
export * from './datatypes.js';
export * from './units.js';
export * from './schema.js';
export * from './signal.js';
export * from './tree.js';
export * from './instances.js';
export * from './lookup.js';
export * from './walk.js';
export * from './discovery.js';
export { Orchestrator, VERSION } from './orchestrator.js';
