import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { discoverFiles, looksLikeVssTree } from './discovery.js';

const TREE = { Vehicle: { type: 'branch', description: 'Root.', children: {} } };

describe('discoverFiles', () => {
    let tempDir: string;

    before(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'vss-lint-'));

        await fs.writeFile(path.join(tempDir, 'valid.json'), JSON.stringify(TREE));
        await fs.writeFile(path.join(tempDir, 'not-vss.json'), JSON.stringify({ foo: 'bar' }));
        await fs.writeFile(path.join(tempDir, 'broken.json'), '{ "Vehicle": ');
        await fs.writeFile(path.join(tempDir, 'tree.yaml'), 'Vehicle:\n  type: branch\n');
        await fs.mkdir(path.join(tempDir, 'subdir'));
        await fs.writeFile(path.join(tempDir, 'subdir', 'nested.json'), JSON.stringify(TREE));
    });

    after(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('discovers VSS tree files', async () => {
        const files = await discoverFiles(['**/*'], { basePath: tempDir });
        const filenames = files.map(file => path.basename(file));
        assert.deepEqual(filenames, ['nested.json', 'valid.json']);
    });

    it('returns absolute paths', async () => {
        const files = await discoverFiles(['valid.json'], { basePath: tempDir });
        assert.deepEqual(files, [path.join(tempDir, 'valid.json')]);
    });

    it('respects exclude patterns', async () => {
        const files = await discoverFiles(['**/*.json'], {
            basePath: tempDir,
            exclude: ['**/subdir/**'],
        });
        const filenames = files.map(file => path.basename(file));
        assert.deepEqual(filenames, ['valid.json']);
    });

    it('returns sorted, unique results', async () => {
        const files = await discoverFiles(['**/*.json', '*.json'], { basePath: tempDir });
        const sorted = [...new Set(files)].sort((a, b) => a.localeCompare(b));
        assert.deepEqual(files, sorted);
    });
});

describe('looksLikeVssTree', () => {
    let tempDir: string;

    before(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'vss-lint-'));
    });

    after(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('requires a top-level branch with children', async () => {
        const check = async (content: unknown): Promise<boolean> => {
            const file = path.join(tempDir, 'candidate.json');
            await fs.writeFile(file, JSON.stringify(content));
            return looksLikeVssTree(file);
        };

        assert.equal(await check(TREE), true);
        assert.equal(await check({ Vehicle: { type: 'branch' } }), false);
        assert.equal(await check({ Vehicle: { type: 'sensor', children: {} } }), false);
        assert.equal(await check([TREE]), false);
    });

    it('treats unreadable files as non-trees', async () => {
        assert.equal(await looksLikeVssTree(path.join(tempDir, 'missing.json')), false);
    });
});
