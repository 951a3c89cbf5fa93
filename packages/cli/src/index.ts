/**
 * @vss-lint/cli
 *
 * Command-line interface for VSS signal lookup and linting.
 *
 * This package provides the `vss` command. `runCli` runs it in-process,
 * writing to the given streams instead of the process's.
 *
 * @example
 * ```bash
 * # Show a signal, then convert a value of it
 * vss find Vehicle.Speed
 * vss convert Vehicle.Speed 36 m/s
 *
 * # Lint trees with SARIF output
 * vss lint --sarif results.sarif 'trees/*.json'
 * ```
 */

export { createProgram, processStreams, runCli, type CliStreams, type RunOptions } from './program.js';
