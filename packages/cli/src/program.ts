/**
 * The `vss` command.
 *
 * Usage:
 *   vss find Vehicle.Speed
 *   vss list Vehicle.Cabin --json
 *   vss convert Vehicle.Speed 36 m/s
 *   vss lint --sarif results.sarif 'trees/**\/*.json'
 *
 * Results go to stdout, progress and errors to stderr. Exit codes:
 * 0 = success, 1 = lint findings at a fail-on severity or no such signal,
 * 2 = any other error (including usage errors).
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import {
    Orchestrator,
    SEVERITIES,
    SignalNameError,
    SignalValueError,
    VERSION,
    VssBranchError,
    errorMessage,
    findSignal,
    getDefaultTree,
    listSignals,
    loadTree,
    type LintConfig,
    type LintResult,
    type Severity,
    type Signal,
    type SignalValue,
    type VssTree,
} from '@vss-lint/core';
import { SchemaEngine } from '@vss-lint/engine-schema';
import { SignalsEngine } from '@vss-lint/engine-signals';
import { generateSarif } from '@vss-lint/sarif';

/** Where the CLI writes. Each call receives complete lines. */
export interface CliStreams {
    stdout(text: string): void;
    stderr(text: string): void;
}

export const processStreams: CliStreams = {
    stdout: text => {
        process.stdout.write(text);
    },
    stderr: text => {
        process.stderr.write(text);
    },
};

export interface RunOptions {
    streams?: CliStreams;
    version?: string;
}

type Style = (text: string) => string;

interface Styler {
    bold: Style;
    dim: Style;
    underline: Style;
    red: Style;
    yellow: Style;
    blue: Style;
    green: Style;
}

const identity: Style = text => text;

const plain: Styler = {
    bold: identity,
    dim: identity,
    underline: identity,
    red: identity,
    yellow: identity,
    blue: identity,
    green: identity,
};

interface TreeOptions {
    tree?: string;
    color: boolean;
}

interface JsonOptions extends TreeOptions {
    json?: boolean;
}

interface LintOptions {
    sarif?: string;
    json?: boolean;
    failOn: Severity[];
    exclude?: string;
    basePath: string;
    schema: boolean;
    signals: boolean;
    color: boolean;
}

const LABEL_WIDTH = 12;

/**
 * Run the CLI with user arguments (no node or script path).
 *
 * @returns the process exit code
 */
export async function runCli(argv: string[], options: RunOptions = {}): Promise<number> {
    const streams = options.streams ?? processStreams;
    const c = argv.includes('--no-color') ? plain : chalk;

    let exitCode = 0;
    const program = createProgram(options.version ?? VERSION, streams, code => {
        exitCode = code;
    });

    try {
        await program.parseAsync(argv, { from: 'user' });
    } catch (error) {
        if (error instanceof CommanderError) {
            // Commander has already printed help, the version or the usage error.
            return error.exitCode === 0 ? 0 : 2;
        }
        streams.stderr(`${c.red('Error:')} ${errorMessage(error)}\n`);
        return error instanceof VssBranchError || error instanceof SignalNameError ? 1 : 2;
    }

    return exitCode;
}

/**
 * Build the command tree. Commands report their exit code through
 * `setExitCode`; thrown errors are left to the caller.
 */
export function createProgram(
    version: string,
    streams: CliStreams,
    setExitCode: (code: number) => void
): Command {
    const out = (line = ''): void => streams.stdout(`${line}\n`);
    const err = (line = ''): void => streams.stderr(`${line}\n`);

    const program = new Command();

    program
        .name('vss')
        .description('Look up, convert and lint Vehicle Signal Specification signals')
        .version(version)
        .exitOverride()
        .configureOutput({
            writeOut: text => streams.stdout(text),
            writeErr: text => streams.stderr(text),
        });

    program
        .command('find')
        .description('Show the definition of one signal')
        .argument('<name>', 'Dot-delimited signal path, e.g. Vehicle.Speed')
        .option('--json', 'Output the signal as JSON')
        .option('--tree <path>', 'VSS tree JSON file (default: $VSS_TREE or the bundled sample)')
        .option('--no-color', 'Disable colored output')
        .action((name: string, options: JsonOptions) => {
            const signal = findSignal(name, readTree(options.tree));
            if (options.json) {
                out(JSON.stringify(signal.toJSON(), null, 2));
                return;
            }
            const c = options.color ? chalk : plain;
            for (const [label, value] of describeSignal(signal)) {
                out(`${c.bold(label.padEnd(LABEL_WIDTH))}${value}`);
            }
        });

    program
        .command('list')
        .description('List concrete signal paths, with instances expanded')
        .argument('[prefix]', 'Only list signals at or below this path')
        .option('--json', 'Output the paths as a JSON array')
        .option('--tree <path>', 'VSS tree JSON file (default: $VSS_TREE or the bundled sample)')
        .option('--no-color', 'Disable colored output')
        .action((prefix: string | undefined, options: JsonOptions) => {
            const signals = listSignals(readTree(options.tree), prefix);
            if (prefix !== undefined && signals.length === 0) {
                throw new VssBranchError(`no signals at or below '${prefix}'`);
            }
            if (options.json) {
                out(JSON.stringify(signals, null, 2));
                return;
            }
            for (const signal of signals) {
                out(signal);
            }
        });

    program
        .command('convert')
        .description('Validate a value of a signal and convert it to another unit')
        .argument('<name>', 'Dot-delimited signal path')
        .argument('<value>', 'Value in the signal\'s unit')
        .argument('<unit>', 'Target unit, e.g. m/s')
        .option('--json', 'Output the conversion as JSON')
        .option('--tree <path>', 'VSS tree JSON file (default: $VSS_TREE or the bundled sample)')
        .option('--no-color', 'Disable colored output')
        .action((name: string, value: string, unit: string, options: JsonOptions) => {
            const signal = findSignal(name, readTree(options.tree));
            const parsed = signal.validate(parseValue(signal, value));
            if (typeof parsed !== 'number') {
                throw new SignalValueError(`${signal.path} is a ${signal.datatype} signal and has no unit to convert`);
            }
            const converted = signal.convert(parsed, unit);
            if (options.json) {
                out(JSON.stringify({ signal: signal.path, value: parsed, from: signal.unit, to: unit, result: converted }, null, 2));
                return;
            }
            const c = options.color ? chalk : plain;
            out(`${parsed} ${signal.unit} = ${c.bold(String(converted))} ${unit}`);
        });

    program
        .command('lint')
        .description('Validate VSS tree files with CI-friendly output')
        .argument('[paths...]', 'File paths or glob patterns to validate', ['**/*.json'])
        .option('--sarif <file>', 'Write SARIF output to file')
        .option('--json', 'Output results as JSON')
        .option('--fail-on <severities>', 'Fail on these severities (comma-separated)', parseSeverities, ['error'])
        .option('--exclude <patterns>', 'Exclude patterns (comma-separated)')
        .option('--base-path <dir>', 'Base directory for resolving paths', process.cwd())
        .option('--no-schema', 'Disable tree structure checks')
        .option('--no-signals', 'Disable signal definition checks')
        .option('--no-color', 'Disable colored output')
        .action(async (paths: string[], options: LintOptions) => {
            setExitCode(await lint(paths, options, out, err));
        });

    return program;
}

/**
 * Run the linter and report.
 * Returns exit code: 0 = success, 1 = findings at fail-on level
 */
async function lint(
    paths: string[],
    options: LintOptions,
    out: (line?: string) => void,
    err: (line?: string) => void
): Promise<number> {
    const c = options.color ? chalk : plain;
    const basePath = path.resolve(options.basePath);

    const config: LintConfig = {
        paths,
        exclude: options.exclude?.split(',').map(s => s.trim()),
        failOn: options.failOn,
        basePath,
        engines: {
            'vss-schema': options.schema,
            'vss-signals': options.signals,
        },
    };

    const orchestrator = new Orchestrator();
    orchestrator.registerEngine(new SchemaEngine());
    orchestrator.registerEngine(new SignalsEngine());

    err(c.blue('🔍 Discovering VSS trees...'));
    const result = await orchestrator.lint(config);

    err(c.blue(`📊 Scanned ${result.summary.filesScanned} files in ${result.metadata.durationMs}ms`));
    if (result.findings.length === 0) {
        err(c.green('✅ No issues found!'));
    } else {
        err(c.yellow(
            `⚠️  Found ${result.summary.errors} errors, ${result.summary.warnings} warnings, ${result.summary.notes} notes`
        ));
    }

    if (options.json) {
        out(JSON.stringify(result, null, 2));
    } else if (!options.sarif) {
        printHumanReadable(result, basePath, c, out);
    }

    if (options.sarif) {
        await fs.writeFile(options.sarif, generateSarif(result, { basePath }));
        err(c.blue(`📝 SARIF written to ${options.sarif}`));
    }

    return result.findings.some(f => options.failOn.includes(f.severity)) ? 1 : 0;
}

function printHumanReadable(
    result: LintResult,
    basePath: string,
    c: Styler,
    out: (line?: string) => void
): void {
    const byFile = new Map<string, LintResult['findings']>();
    for (const finding of result.findings) {
        const file = finding.location.filePath;
        const findings = byFile.get(file) ?? [];
        findings.push(finding);
        byFile.set(file, findings);
    }

    const severityColor: Record<Severity, Style> = {
        error: c.red,
        warning: c.yellow,
        note: c.blue,
    };

    for (const [filePath, findings] of byFile) {
        out();
        out(c.underline(path.relative(basePath, filePath)));

        for (const finding of findings) {
            const location = finding.location.signalPath ?? finding.location.jsonPointer ?? '-';
            out(`  ${c.dim(location.padEnd(30))} ${severityColor[finding.severity](finding.severity.padEnd(8))} ${finding.message}`);
            out(`  ${' '.repeat(30)} ${c.dim(finding.ruleId)}`);
        }
    }

    if (byFile.size > 0) {
        out();
    }
}

/** An explicit `--tree` is read relative to the working directory. */
function readTree(tree: string | undefined): VssTree {
    return tree === undefined ? getDefaultTree() : loadTree(path.resolve(tree));
}

function describeSignal(signal: Signal): [string, string][] {
    const rows: [string, string | undefined][] = [
        ['Path', signal.path],
        ['Type', signal.type],
        ['Datatype', signal.datatype],
        ['Unit', signal.unit],
        ['Min', signal.min?.toString()],
        ['Max', signal.max?.toString()],
        ['Default', signal.default === undefined ? undefined : JSON.stringify(signal.default)],
        ['Allowed', signal.enum === undefined ? undefined : [...signal.enum].join(', ')],
        ['Description', signal.description],
        ['Comment', signal.comment],
        ['Deprecation', signal.deprecation],
        ['UUID', signal.uuid],
    ];
    return rows.flatMap(([label, value]): [string, string][] => (value === undefined ? [] : [[label, value]]));
}

/** Read a command-line value the way the signal's datatype expects it. */
function parseValue(signal: Signal, text: string): SignalValue {
    switch (signal.datatype) {
        case 'string':
            return text;
        case 'boolean':
            if (text === 'true' || text === 'false') {
                return text === 'true';
            }
            throw new SignalValueError(`${signal.path} expects true or false, got '${text}'`);
        default:
            return text.trim() === '' ? Number.NaN : Number(text);
    }
}

function parseSeverities(text: string): Severity[] {
    return text
        .split(',')
        .map(s => s.trim())
        .filter(s => s.length > 0)
        .map(s => {
            const severity = SEVERITIES.find(known => known === s);
            if (severity === undefined) {
                throw new InvalidArgumentError(`unknown severity '${s}'; expected ${SEVERITIES.join(', ')}`);
            }
            return severity;
        });
}
