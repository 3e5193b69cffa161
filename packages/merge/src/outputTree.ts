/**
 * Output Tree
 *
 * Where a run writes its result. `FsOutputTree` writes to disk;
 * `DryRunOutputTree` records what would be written and keeps an in-memory
 * overlay so later packs see earlier planned writes.
 */

import { readFile, rename, rm, copyFile as fsCopyFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import {
  ensureDir,
  pathExists,
  removeDir,
  safeReadFile,
  safeWriteFile,
  stringifyJson,
  toSegments,
  type JsonValue,
  type Logger,
} from '@pack-merger/utils';

export type PlannedActionKind =
  | 'remove-output'
  | 'write-descriptor'
  | 'copy-icon'
  | 'create'
  | 'merge'
  | 'copy'
  | 'overwrite';

export interface PlannedAction {
  kind: PlannedActionKind;
  /** Path relative to the output root; empty for the root itself */
  target: string;
  /** Absolute path of the contributing file */
  source?: string;
}

export interface OutputTree {
  readonly root: string;
  /** Wipe the tree first when `clean` is set, then make sure the root exists */
  prepare(clean: boolean): Promise<void>;
  exists(relativePath: string): Promise<boolean>;
  readText(relativePath: string): Promise<string | null>;
  writeJson(relativePath: string, document: JsonValue, action: PlannedAction): Promise<void>;
  copyFrom(relativePath: string, sourcePath: string, action: PlannedAction): Promise<void>;
}

function absolutePath(root: string, relativePath: string): string {
  return join(root, ...toSegments(relativePath));
}

let tempCounter = 0;

function tempPathFor(target: string): string {
  tempCounter += 1;
  return `${target}.${process.pid}-${tempCounter}.tmp`;
}

/**
 * Writes go to a sibling temp file first, so a failed write leaves the
 * previous content in place.
 */
export class FsOutputTree implements OutputTree {
  constructor(
    public readonly root: string,
    private readonly log: Logger
  ) {}

  async prepare(clean: boolean): Promise<void> {
    if (clean && (await pathExists(this.root))) {
      this.log.info({ output: this.root }, 'Removing output directory');
      await removeDir(this.root);
    }
    await ensureDir(this.root);
  }

  async exists(relativePath: string): Promise<boolean> {
    return pathExists(absolutePath(this.root, relativePath));
  }

  async readText(relativePath: string): Promise<string | null> {
    return safeReadFile(absolutePath(this.root, relativePath));
  }

  async writeJson(relativePath: string, document: JsonValue, action: PlannedAction): Promise<void> {
    const target = absolutePath(this.root, relativePath);
    await this.replace(target, (temp) => safeWriteFile(temp, stringifyJson(document)));
    this.log.debug(action, 'Wrote structured file');
  }

  async copyFrom(relativePath: string, sourcePath: string, action: PlannedAction): Promise<void> {
    const target = absolutePath(this.root, relativePath);
    await this.replace(target, (temp) => fsCopyFile(sourcePath, temp));
    this.log.debug(action, 'Copied file');
  }

  private async replace(target: string, write: (temp: string) => Promise<void>): Promise<void> {
    await ensureDir(dirname(target));
    const temp = tempPathFor(target);
    try {
      await write(temp);
      await rename(temp, target);
    } catch (error) {
      await rm(temp, { force: true });
      throw error;
    }
  }
}

type OverlayEntry =
  | { kind: 'json'; text: string }
  | { kind: 'file'; source: string };

/**
 * Touches nothing on disk. Reads fall through to the existing output tree
 * unless a clean was requested, in which case it is treated as empty.
 */
export class DryRunOutputTree implements OutputTree {
  private readonly overlay = new Map<string, OverlayEntry>();
  private readonly actions: PlannedAction[] = [];
  private baseVisible = true;

  constructor(
    public readonly root: string,
    private readonly log: Logger
  ) {}

  get plannedActions(): readonly PlannedAction[] {
    return this.actions;
  }

  async prepare(clean: boolean): Promise<void> {
    if (clean && (await pathExists(this.root))) {
      this.record({ kind: 'remove-output', target: '' });
    }
    this.baseVisible = !clean;
  }

  async exists(relativePath: string): Promise<boolean> {
    if (this.overlay.has(this.key(relativePath))) return true;
    if (!this.baseVisible) return false;
    return pathExists(absolutePath(this.root, relativePath));
  }

  async readText(relativePath: string): Promise<string | null> {
    const entry = this.overlay.get(this.key(relativePath));
    if (entry?.kind === 'json') return entry.text;
    if (entry?.kind === 'file') return readFile(entry.source, 'utf8');
    if (!this.baseVisible) return null;
    return safeReadFile(absolutePath(this.root, relativePath));
  }

  async writeJson(relativePath: string, document: JsonValue, action: PlannedAction): Promise<void> {
    this.overlay.set(this.key(relativePath), { kind: 'json', text: stringifyJson(document) });
    this.record(action);
  }

  async copyFrom(relativePath: string, sourcePath: string, action: PlannedAction): Promise<void> {
    this.overlay.set(this.key(relativePath), { kind: 'file', source: sourcePath });
    this.record(action);
  }

  private key(relativePath: string): string {
    return toSegments(relativePath).join('/');
  }

  private record(action: PlannedAction): void {
    this.actions.push(action);
    this.log.debug({ dryRun: true, ...action }, `Would ${action.kind} ${action.target || this.root}`);
  }
}
