import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { mkdtemp, rm, mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { strToU8, zipSync } from 'fflate';
import { createLogger, pathExists } from '@pack-merger/utils';
import { mergeCommand, type CommandContext, type MergeCommandOptions } from '../commands/merge.js';

const LANG = 'assets/minecraft/lang/en_us.json';

let work: string;
let context: CommandContext;
let logSpy: MockInstance<typeof console.log>;
let errorSpy: MockInstance<typeof console.error>;

async function writePack(name: string, files: Record<string, string>): Promise<void> {
  const all = { 'pack.mcmeta': JSON.stringify({ pack: { pack_format: 15, description: name } }), ...files };
  for (const [relativePath, content] of Object.entries(all)) {
    const target = join(work, name, ...relativePath.split('/'));
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content);
  }
}

function options(overrides: Partial<MergeCommandOptions> = {}): MergeCommandOptions {
  return { output: 'merged_pack', exclude: [], ...overrides };
}

function printed(): string[] {
  return logSpy.mock.calls.map((call) => call.map(String).join(' '));
}

beforeEach(async () => {
  work = await mkdtemp(join(tmpdir(), 'cli-'));
  context = { cwd: work, logger: createLogger({ test: 'cli' }) };
  logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(work, { recursive: true, force: true });
});

describe('mergeCommand', () => {
  it('exits with 2 when a named input is missing', async () => {
    const code = await mergeCommand(['nope'], options(), context);

    expect(code).toBe(2);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(String(errorSpy.mock.calls[0]?.[1])).toBe(`Pack paths do not exist: ${join(work, 'nope')}`);
    expect(await pathExists(join(work, 'merged_pack'))).toBe(false);
  });

  it('exits with 2 when nothing is autodetected', async () => {
    expect(await mergeCommand([], options(), context)).toBe(2);
  });

  it('autodetects packs and merges them alphabetically', async () => {
    await writePack('b_pack', { [LANG]: JSON.stringify({ k: 'b' }) });
    await writePack('A_pack', { [LANG]: JSON.stringify({ k: 'a', only: 'a' }) });

    const code = await mergeCommand([], options({ json: true }), context);

    expect(code).toBe(0);
    const output = JSON.parse(printed()[0] ?? '');
    expect(output.packs).toEqual(['A_pack', 'b_pack']);
    expect(output.stats).toEqual({ copied: 1, overwritten: 0, mergedJson: 1, skipped: 0, errors: 0 });
    expect(JSON.parse(await readFile(join(work, 'merged_pack', ...LANG.split('/')), 'utf8'))).toEqual({
      k: 'b',
      only: 'a',
    });
  });

  it('applies an explicit ordering by name', async () => {
    await writePack('a', { [LANG]: JSON.stringify({ k: 'a' }) });
    await writePack('b', { [LANG]: JSON.stringify({ k: 'b' }) });

    await mergeCommand([], options({ json: true, order: ['b', 'ghost'] }), context);

    expect(JSON.parse(printed()[0] ?? '').packs).toEqual(['b', 'a']);
    expect(JSON.parse(await readFile(join(work, 'merged_pack', ...LANG.split('/')), 'utf8'))).toEqual({ k: 'a' });
  });

  it('keeps the order of explicit inputs', async () => {
    await writePack('zz', {});
    await writePack('aa', {});

    await mergeCommand(['zz', 'aa'], options({ json: true, output: 'out' }), context);

    const output = JSON.parse(printed()[0] ?? '');
    expect(output.packs).toEqual(['zz', 'aa']);
    expect(output.descriptor).toEqual({ pack: { pack_format: 15, description: 'Merged: zz + aa' } });
  });

  it('prints planned actions on a dry run and writes nothing', async () => {
    await writePack('p', { 'assets/ns/a.txt': 'a' });

    const code = await mergeCommand(['p'], options({ dryRun: true, output: 'out' }), context);

    expect(code).toBe(0);
    const out = join(work, 'out');
    expect(printed()).toContain(`[dry-run] Would copy assets/ns/a.txt (from ${join(work, 'p', 'assets', 'ns', 'a.txt')})`);
    expect(printed()).toContain('[dry-run] Would write-descriptor pack.mcmeta');
    expect(await pathExists(out)).toBe(false);
  });

  it('creates a zip beside the output when asked', async () => {
    await writePack('p', { 'assets/ns/a.txt': 'a' });

    const code = await mergeCommand(['p'], options({ zip: true, json: true }), context);

    expect(code).toBe(0);
    expect(JSON.parse(printed()[0] ?? '').archive).toMatchObject({
      success: true,
      archivePath: join(work, 'merged_pack.zip'),
      fileCount: 2,
    });
    expect(await pathExists(join(work, 'merged_pack.zip'))).toBe(true);
  });

  it('does not zip on a dry run', async () => {
    await writePack('p', {});

    await mergeCommand(['p'], options({ zip: true, dryRun: true, json: true }), context);

    expect(await pathExists(join(work, 'merged_pack.zip'))).toBe(false);
  });

  it('exits with 0 even when some files fail to merge', async () => {
    await writePack('a', { [LANG]: JSON.stringify({ k: 'a' }) });
    await writePack('b', { [LANG]: '{ broken' });

    const code = await mergeCommand([], options({ json: true }), context);

    expect(code).toBe(0);
    expect(JSON.parse(printed()[0] ?? '').stats.errors).toBe(1);
  });

  it('exits with 1 for an invalid option value', async () => {
    await writePack('p', {});

    expect(await mergeCommand(['p'], options({ packFormat: -1, json: true }), context)).toBe(1);
  });

  it('expands zip inputs into the given scratch directory', async () => {
    await writeFile(
      join(work, 'zipped.zip'),
      zipSync({ 'pack.mcmeta': strToU8(JSON.stringify({ pack: { pack_format: 18 } })) })
    );

    await mergeCommand(['zipped.zip'], options({ json: true, scratch: 'scratch' }), context);

    const output = JSON.parse(printed()[0] ?? '');
    expect(output.packs).toEqual(['zipped']);
    expect(output.descriptor.pack.pack_format).toBe(18);
    const expanded = await readdir(join(work, 'scratch'));
    expect(expanded).toEqual([expect.stringMatching(/^zipped-[A-Za-z0-9]{6}$/)]);
    expect(await pathExists(join(work, 'scratch', expanded[0] ?? '', 'pack.mcmeta'))).toBe(true);
  });
});
