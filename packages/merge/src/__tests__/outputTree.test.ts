import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, mkdir, readdir, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createLogger } from '@pack-merger/utils';
import { DryRunOutputTree, FsOutputTree } from '../outputTree.js';

const log = createLogger({ test: 'output-tree' });
let work: string;

beforeEach(async () => {
  work = await mkdtemp(join(tmpdir(), 'output-tree-'));
});

afterEach(async () => {
  await rm(work, { recursive: true, force: true });
});

describe('FsOutputTree', () => {
  it('writes JSON with a trailing newline and reads it back', async () => {
    const tree = new FsOutputTree(work, log);

    await tree.writeJson('assets/ns/lang/en_us.json', { a: 'b' }, { kind: 'create', target: 'assets/ns/lang/en_us.json' });

    expect(await tree.readText('assets/ns/lang/en_us.json')).toBe('{\n  "a": "b"\n}\n');
    expect(await tree.exists('assets/ns/lang/en_us.json')).toBe(true);
    expect(await readdir(join(work, 'assets', 'ns', 'lang'))).toEqual(['en_us.json']);
  });

  it('leaves no temp file behind when a write fails', async () => {
    const tree = new FsOutputTree(work, log);
    await mkdir(join(work, 'assets', 'blocked'), { recursive: true });
    await writeFile(join(work, 'assets', 'blocked', 'inner.txt'), 'x');

    await expect(
      tree.writeJson('assets/blocked', { a: 1 }, { kind: 'create', target: 'assets/blocked' })
    ).rejects.toThrow();

    expect((await readdir(join(work, 'assets'))).sort()).toEqual(['blocked']);
    expect(await readdir(join(work, 'assets', 'blocked'))).toEqual(['inner.txt']);
  });
});

describe('DryRunOutputTree', () => {
  it('keeps planned writes in memory only', async () => {
    const tree = new DryRunOutputTree(join(work, 'out'), log);
    await tree.prepare(false);

    await tree.writeJson('a.json', { x: 1 }, { kind: 'create', target: 'a.json' });

    expect(await tree.exists('a.json')).toBe(true);
    expect(await tree.readText('a.json')).toBe('{\n  "x": 1\n}\n');
    expect(tree.plannedActions).toEqual([{ kind: 'create', target: 'a.json' }]);
    expect(await readdir(work)).toEqual([]);
  });
});
