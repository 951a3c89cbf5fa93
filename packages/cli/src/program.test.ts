import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { bundledTreePath } from '@vss-lint/core';
import { runCli } from './program.js';

const TREE = bundledTreePath();

interface Run {
    code: number;
    stdout: string;
    stderr: string;
}

async function vss(...args: string[]): Promise<Run> {
    let stdout = '';
    let stderr = '';
    const code = await runCli(args, {
        version: '9.9.9',
        streams: {
            stdout: text => {
                stdout += text;
            },
            stderr: text => {
                stderr += text;
            },
        },
    });
    return { code, stdout, stderr };
}

function lines(text: string): string[] {
    return text.split('\n').slice(0, -1);
}

describe('vss', () => {
    it('prints its version', async () => {
        const run = await vss('--version');
        assert.equal(run.code, 0);
        assert.equal(run.stdout, '9.9.9\n');
    });

    it('exits with 2 on usage errors', async () => {
        const run = await vss('find');
        assert.equal(run.code, 2);
        assert.match(run.stderr, /missing required argument 'name'/);
    });
});

describe('vss find', () => {
    it('prints a field table', async () => {
        const run = await vss('find', 'Vehicle.Speed', '--tree', TREE, '--no-color');

        assert.equal(run.code, 0);
        assert.deepEqual(lines(run.stdout), [
            'Path        Vehicle.Speed',
            'Type        sensor',
            'Datatype    float',
            'Unit        km/h',
            'Min         -250',
            'Max         250',
            'Description Vehicle speed.',
            'UUID        3b19ef1b5a93107c1f0e3ccc8b2fae86',
        ]);
    });

    it('prints JSON', async () => {
        const run = await vss('find', 'Vehicle.VehicleIdentification.BodyType', '--tree', TREE, '--json');

        assert.equal(run.code, 0);
        assert.deepEqual(JSON.parse(run.stdout), {
            path: 'Vehicle.VehicleIdentification.BodyType',
            namespace: ['Vehicle', 'VehicleIdentification', 'BodyType'],
            type: 'attribute',
            datatype: 'string',
            unit: 'dimensionless',
            description: 'Body type of the vehicle.',
            uuid: '532f2283c5e0b945e93e82321c4df15e',
            default: 'Sedan',
            enum: ['Hatchback', 'Sedan', 'Van', 'Wagon'],
        });
    });

    it('resolves instances', async () => {
        const run = await vss('find', 'Vehicle.Cabin.Door.Row2.Left.IsOpen', '--tree', TREE, '--json');

        assert.equal(run.code, 0);
        const signal: { path: string; datatype: string } = JSON.parse(run.stdout);
        assert.equal(signal.path, 'Vehicle.Cabin.Door.Row2.Left.IsOpen');
        assert.equal(signal.datatype, 'boolean');
    });

    it('exits with 1 for unknown signals', async () => {
        const run = await vss('find', 'Vehicle.Nope', '--tree', TREE, '--no-color');

        assert.equal(run.code, 1);
        assert.equal(run.stdout, '');
        assert.equal(run.stderr, `Error: branch 'Vehicle' has no such child 'Nope'\n`);
    });

    it('exits with 1 for empty names', async () => {
        const run = await vss('find', '', '--tree', TREE, '--no-color');

        assert.equal(run.code, 1);
        assert.equal(run.stderr, 'Error: namespace must contain at least one key\n');
    });

    it('exits with 2 when the tree cannot be read', async () => {
        const run = await vss('find', 'Vehicle.Speed', '--tree', path.join(os.tmpdir(), 'vss-missing', 'tree.json'), '--no-color');

        assert.equal(run.code, 2);
        assert.match(run.stderr, /^Error: failed to open VSS tree from /);
    });
});

describe('vss list', () => {
    it('lists instance paths below a prefix', async () => {
        const run = await vss('list', 'Vehicle.Cabin.Door', '--tree', TREE);

        assert.equal(run.code, 0);
        assert.deepEqual(lines(run.stdout), [
            'Vehicle.Cabin.Door.Row1.Left.IsOpen',
            'Vehicle.Cabin.Door.Row1.Right.IsOpen',
            'Vehicle.Cabin.Door.Row2.Left.IsOpen',
            'Vehicle.Cabin.Door.Row2.Right.IsOpen',
        ]);
    });

    it('lists every signal as JSON', async () => {
        const run = await vss('list', '--tree', TREE, '--json');

        assert.equal(run.code, 0);
        const paths: string[] = JSON.parse(run.stdout);
        assert.equal(paths.length, 43);
        assert.equal(paths[0], 'Vehicle.AverageSpeed');
        assert.equal(paths[paths.length - 1], 'Vehicle.Body.Trunk.IsOpen');
    });

    it('exits with 1 when nothing matches the prefix', async () => {
        const run = await vss('list', 'Vehicle.Nope', '--tree', TREE, '--no-color');

        assert.equal(run.code, 1);
        assert.equal(run.stderr, `Error: no signals at or below 'Vehicle.Nope'\n`);
    });
});

describe('vss convert', () => {
    it('converts between physical units', async () => {
        const run = await vss('convert', 'Vehicle.Speed', '36', 'm/s', '--tree', TREE, '--json');

        assert.equal(run.code, 0);
        const conversion: { signal: string; value: number; from: string; to: string; result: number } = JSON.parse(run.stdout);
        assert.equal(conversion.signal, 'Vehicle.Speed');
        assert.equal(conversion.value, 36);
        assert.equal(conversion.from, 'km/h');
        assert.equal(conversion.to, 'm/s');
        assert.ok(Math.abs(conversion.result - 10) < 1e-9, `expected 10, got ${conversion.result}`);
    });

    it('converts between dimensionless units', async () => {
        const run = await vss('convert', 'Vehicle.Powertrain.FuelSystem.Level', '50', 'ratio', '--tree', TREE, '--no-color');

        assert.equal(run.code, 0);
        assert.equal(run.stdout, '50 % = 0.5 ratio\n');
    });

    it('rejects values outside the signal bounds', async () => {
        const run = await vss('convert', 'Vehicle.Speed', '300', 'm/s', '--tree', TREE, '--no-color');

        assert.equal(run.code, 2);
        assert.equal(run.stderr, 'Error: Vehicle.Speed value 300 is outside [-250, 250]\n');
    });

    it('rejects values that are not numbers', async () => {
        const run = await vss('convert', 'Vehicle.Speed', 'fast', 'm/s', '--tree', TREE, '--no-color');

        assert.equal(run.code, 2);
        assert.equal(run.stderr, 'Error: Vehicle.Speed expects a finite number, got number NaN\n');
    });

    it('rejects incompatible units', async () => {
        const run = await vss('convert', 'Vehicle.Speed', '36', 'kg', '--tree', TREE, '--no-color');

        assert.equal(run.code, 2);
        assert.equal(run.stderr, `Error: cannot convert from 'km/h' to 'kg'\n`);
    });

    it('rejects non-numeric signals', async () => {
        const run = await vss('convert', 'Vehicle.Body.Trunk.IsOpen', 'true', 'm/s', '--tree', TREE, '--no-color');

        assert.equal(run.code, 2);
        assert.equal(run.stderr, 'Error: Vehicle.Body.Trunk.IsOpen is a boolean signal and has no unit to convert\n');
    });

    it('rejects malformed booleans', async () => {
        const run = await vss('convert', 'Vehicle.Body.Trunk.IsOpen', 'yes', 'm/s', '--tree', TREE, '--no-color');

        assert.equal(run.code, 2);
        assert.equal(run.stderr, `Error: Vehicle.Body.Trunk.IsOpen expects true or false, got 'yes'\n`);
    });
});

describe('vss lint', () => {
    let tempDir: string;

    before(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'vss-cli-test-'));

        await fs.writeFile(path.join(tempDir, 'good.json'), JSON.stringify({
            Vehicle: {
                type: 'branch',
                description: 'Vehicle.',
                uuid: 'test-uuid-vehicle',
                children: {
                    Speed: { type: 'sensor', datatype: 'float', description: 'Speed.', uuid: 'test-uuid-speed', unit: 'km/h' },
                },
            },
        }));
        await fs.writeFile(path.join(tempDir, 'bad.json'), JSON.stringify({
            Vehicle: {
                type: 'branch',
                description: 'Vehicle.',
                uuid: 'test-uuid-vehicle',
                children: {
                    Speed: { type: 'sensor', datatype: 'float', description: 'Speed.', uuid: 'test-uuid-speed', unit: 'blorp' },
                    Old: { type: 'sensor', datatype: 'float', description: 'Old.', uuid: 'test-uuid-old', unit: 'km/h', deprecation: 'removed' },
                },
            },
        }));
    });

    after(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    interface JsonResult {
        findings: Array<{ ruleId: string; severity: string; location: { filePath: string; jsonPointer?: string } }>;
        summary: { errors: number; warnings: number; notes: number; filesScanned: number; filesWithFindings: number };
        metadata: { config: { failOn: string[]; engines: Record<string, boolean> } };
    }

    it('reports findings as JSON and fails on errors', async () => {
        const run = await vss('lint', '--base-path', tempDir, '--json', '--no-color', '*.json');

        assert.equal(run.code, 1);
        const result: JsonResult = JSON.parse(run.stdout);
        assert.deepEqual(result.findings.map(f => [path.basename(f.location.filePath), f.location.jsonPointer, f.ruleId]), [
            ['bad.json', '/Vehicle/children/Old', 'vss-signals/deprecated'],
            ['bad.json', '/Vehicle/children/Speed/unit', 'vss-signals/unit/illegal'],
        ]);
        assert.deepEqual(result.summary, { errors: 1, warnings: 0, notes: 1, filesScanned: 2, filesWithFindings: 1 });
        assert.deepEqual(result.metadata.config.failOn, ['error']);
        assert.deepEqual(result.metadata.config.engines, { 'vss-schema': true, 'vss-signals': true });
        assert.match(run.stderr, /Found 1 errors, 0 warnings, 1 notes/);
    });

    it('passes when no finding reaches the fail-on severities', async () => {
        const run = await vss('lint', '--base-path', tempDir, '--json', '--fail-on', 'warning', '*.json');

        assert.equal(run.code, 0);
    });

    it('skips disabled engines', async () => {
        const run = await vss('lint', '--base-path', tempDir, '--json', '--fail-on', 'note', '--no-signals', '*.json');

        assert.equal(run.code, 0);
        const result: JsonResult = JSON.parse(run.stdout);
        assert.deepEqual(result.findings, []);
        assert.deepEqual(result.metadata.config.engines, { 'vss-schema': true, 'vss-signals': false });
    });

    it('rejects unknown severities', async () => {
        const run = await vss('lint', '--base-path', tempDir, '--fail-on', 'fatal', '*.json');

        assert.equal(run.code, 2);
        assert.match(run.stderr, /unknown severity 'fatal'/);
    });

    it('prints findings grouped by file', async () => {
        const run = await vss('lint', '--base-path', tempDir, '--no-color', 'bad.json');

        assert.equal(run.code, 1);
        assert.deepEqual(lines(run.stdout), [
            '',
            'bad.json',
            `  ${'Vehicle.Old'.padEnd(30)} ${'note'.padEnd(8)} Signal 'Vehicle.Old' is deprecated: removed`,
            `  ${' '.repeat(30)} vss-signals/deprecated`,
            `  ${'Vehicle.Speed'.padEnd(30)} ${'error'.padEnd(8)} Signal 'Vehicle.Speed': illegal unit 'blorp'.`,
            `  ${' '.repeat(30)} vss-signals/unit/illegal`,
            '',
        ]);
    });

    it('writes SARIF', async () => {
        const sarifPath = path.join(tempDir, 'results.sarif');
        const run = await vss('lint', '--base-path', tempDir, '--sarif', sarifPath, '--no-color', '*.json');

        assert.equal(run.code, 1);
        assert.equal(run.stdout, '');
        const sarif: { version: string; runs: Array<{ results: Array<{ ruleId: string }> }> } =
            JSON.parse(await fs.readFile(sarifPath, 'utf-8'));
        assert.equal(sarif.version, '2.1.0');
        assert.deepEqual(sarif.runs[0].results.map(r => r.ruleId), ['vss-signals/deprecated', 'vss-signals/unit/illegal']);
    });

    it('succeeds when no trees are found', async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vss-cli-empty-'));
        try {
            const run = await vss('lint', '--base-path', dir, '--json', '*.json');

            assert.equal(run.code, 0);
            const result: JsonResult = JSON.parse(run.stdout);
            assert.equal(result.summary.filesScanned, 0);
            assert.match(run.stderr, /No issues found!/);
        } finally {
            await fs.rm(dir, { recursive: true, force: true });
        }
    });
});
