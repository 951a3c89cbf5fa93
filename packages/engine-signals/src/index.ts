/**
 * @vss-lint/engine-signals
 *
 * Signal definition engine for VSS trees: datatypes, bounds, defaults,
 * units and UUIDs.
 */

export { SignalsEngine, type SignalsEngineOptions } from './engine.js';
