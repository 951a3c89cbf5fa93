#!/usr/bin/env -S node --import tsx
/**
 * VSS command-line interface.
 *
 * Usage:
 *   vss <command> [options]
 *
 * Examples:
 *   vss find Vehicle.Cabin.Door.Row1.Left.IsOpen
 *   vss convert Vehicle.Speed 100 mph
 *   vss lint --fail-on error,warning trees/
 */

import * as fs from 'node:fs/promises';
import { VERSION, isRecord } from '@vss-lint/core';
import { runCli } from './program.js';

// Read version from package.json
const packageJson: unknown = JSON.parse(await fs.readFile(new URL('../package.json', import.meta.url), 'utf-8'));
const version = isRecord(packageJson) && typeof packageJson.version === 'string' ? packageJson.version : VERSION;

process.exitCode = await runCli(process.argv.slice(2), { version });
