/**
 * Merge Engine
 *
 * Applies packs to the output tree from lowest to highest priority, one file
 * at a time. That ordering is what resolves conflicts, so nothing here runs
 * in parallel. A file that fails is counted and logged; the run carries on.
 * There is no rollback: re-run with `clean` to recover from an interrupted run.
 */

import { join } from 'node:path';
import { Minimatch } from 'minimatch';
import {
  createLogger,
  isDirectory,
  isFile,
  listFilesRecursive,
  parseJsonText,
  safeReadFile,
  toSegments,
  type JsonValue,
  type Logger,
} from '@pack-merger/utils';
import {
  MergeFileError,
  NAMESPACE_ROOTS,
  NoPackagesError,
  createMergeStats,
  err,
  ok,
  toError,
  type MergeConfig,
  type MergeOutcome,
  type MergeStats,
  type PackDescriptor,
  type PackInfo,
  type Result,
} from '@pack-merger/core';
import { classifyPath, type PathCategory, type StructuredCategory } from './classifier.js';
import { COMBINATORS } from './strategies.js';
import { synthesizeMetadata, writeMetadata } from './metadata.js';
import {
  DryRunOutputTree,
  FsOutputTree,
  type OutputTree,
  type PlannedAction,
} from './outputTree.js';

export interface MergeResult {
  outputRoot: string;
  stats: Readonly<MergeStats>;
  descriptor: PackDescriptor;
  /** Name of the pack the icon came from */
  iconFrom?: string;
  /** Everything a dry run would have done; empty for real runs */
  plannedActions: readonly PlannedAction[];
}

interface PayloadFile {
  relativePath: string;
  sourcePath: string;
  pack: PackInfo;
}

/**
 * Every file under a pack's namespace roots, as `/`-separated relative paths
 */
export async function listPayloadFiles(packRoot: string): Promise<string[]> {
  const files: string[] = [];
  for (const root of NAMESPACE_ROOTS) {
    const dir = join(packRoot, root);
    if (!(await isDirectory(dir))) continue;
    const nested = await listFilesRecursive(dir);
    files.push(...nested.map((path) => `${root}/${path}`));
  }
  return files;
}

// Stands in for `/` on both sides of an exclusion match, so minimatch sees one
// segment and `*`, `?` and `[...]` match across directory boundaries.
const SEPARATOR_STAND_IN = '\u001f';

/**
 * Compile a shell-style exclusion pattern matched against the whole
 * `/`-separated relative path, where wildcards also span `/`
 */
export function compileExcludePattern(pattern: string): (relativePath: string) => boolean {
  const matcher = new Minimatch(pattern.split('/').join(SEPARATOR_STAND_IN), {
    dot: true,
    nobrace: true,
    noext: true,
    nocomment: true,
    nonegate: true,
  });
  return (relativePath) => matcher.match(toSegments(relativePath).join(SEPARATOR_STAND_IN));
}

export class MergeEngine {
  private readonly log: Logger;
  private readonly tree: OutputTree;
  private readonly excludeMatchers: Array<(relativePath: string) => boolean>;
  private readonly defaultExcludes: ReadonlySet<string>;
  private stats: MergeStats = createMergeStats();

  constructor(
    private readonly config: MergeConfig,
    logger?: Logger,
    tree?: OutputTree
  ) {
    this.log = logger ?? createLogger({ component: 'merge-engine' });
    this.tree = tree ?? (config.dryRun
      ? new DryRunOutputTree(config.outputRoot, this.log)
      : new FsOutputTree(config.outputRoot, this.log));
    this.excludeMatchers = config.excludePatterns.map(compileExcludePattern);
    this.defaultExcludes = new Set(config.defaultExcludes);
  }

  async run(packages: readonly PackInfo[]): Promise<MergeResult> {
    if (packages.length === 0) {
      throw new NoPackagesError();
    }

    this.stats = createMergeStats();
    await this.tree.prepare(this.config.clean);

    const metadata = synthesizeMetadata(packages, this.config);
    for (const outcome of await writeMetadata(this.tree, metadata)) {
      if (!outcome.ok) {
        this.count('errors');
        this.log.error({ err: outcome.error.message }, 'Failed to write metadata');
      }
    }

    for (const pack of packages) {
      await this.mergePack(pack);
    }

    const stats = Object.freeze({ ...this.stats });
    this.log.info({ output: this.config.outputRoot, ...stats }, 'Merge complete');

    return {
      outputRoot: this.config.outputRoot,
      stats,
      descriptor: metadata.descriptor,
      iconFrom: metadata.iconSource?.name,
      plannedActions: this.tree instanceof DryRunOutputTree ? [...this.tree.plannedActions] : [],
    };
  }

  isExcluded(relativePath: string): boolean {
    const segments = toSegments(relativePath);
    const name = segments[segments.length - 1] ?? '';
    if (this.defaultExcludes.has(name)) return true;
    return this.excludeMatchers.some((matches) => matches(relativePath));
  }

  private async mergePack(pack: PackInfo): Promise<void> {
    const log = this.log.child({ pack: pack.name });
    const files = await listPayloadFiles(pack.path);
    log.debug({ files: files.length }, 'Merging pack');

    for (const relativePath of files) {
      if (this.isExcluded(relativePath)) {
        this.count('skipped');
        continue;
      }

      const category = classifyPath(relativePath);
      if (category === null) continue;

      const file: PayloadFile = {
        relativePath,
        sourcePath: join(pack.path, ...toSegments(relativePath)),
        pack,
      };

      const outcome = await this.dispatch(category, file);
      if (outcome.ok) {
        this.count(outcome.value);
      } else {
        this.count('errors');
        log.error({ path: relativePath, err: outcome.error.message }, 'Failed to merge file');
      }
    }
  }

  private dispatch(category: PathCategory, file: PayloadFile): Promise<Result<MergeOutcome, MergeFileError>> {
    return category === 'opaque'
      ? this.copyLastWins(file)
      : this.mergeStructured(category, file);
  }

  /**
   * Load both documents; write the source as-is when the destination is new,
   * otherwise write the category's combination of the two.
   */
  private async mergeStructured(
    category: StructuredCategory,
    file: PayloadFile
  ): Promise<Result<MergeOutcome, MergeFileError>> {
    const { relativePath, sourcePath, pack } = file;

    try {
      const sourceText = await safeReadFile(sourcePath);
      if (sourceText === null) return ok('skipped');
      const source = parseJsonText(sourceText);

      const destinationText = await this.tree.readText(relativePath);
      if (destinationText === null) {
        await this.tree.writeJson(relativePath, source, { kind: 'create', target: relativePath, source: sourcePath });
        return ok('copied');
      }

      const destination: JsonValue = parseJsonText(destinationText);
      const merged = COMBINATORS[category](destination, source);
      await this.tree.writeJson(relativePath, merged, { kind: 'merge', target: relativePath, source: sourcePath });
      return ok('mergedJson');
    } catch (error) {
      return err(new MergeFileError(relativePath, pack.name, toError(error)));
    }
  }

  /**
   * Opaque files: the later (higher-priority) pack always replaces the earlier
   */
  private async copyLastWins(file: PayloadFile): Promise<Result<MergeOutcome, MergeFileError>> {
    const { relativePath, sourcePath, pack } = file;

    try {
      if (!(await isFile(sourcePath))) return ok('skipped');

      const overwrite = await this.tree.exists(relativePath);
      const kind = overwrite ? 'overwrite' : 'copy';
      await this.tree.copyFrom(relativePath, sourcePath, { kind, target: relativePath, source: sourcePath });
      return ok(overwrite ? 'overwritten' : 'copied');
    } catch (error) {
      return err(new MergeFileError(relativePath, pack.name, toError(error)));
    }
  }

  private count(outcome: MergeOutcome): void {
    this.stats[outcome] += 1;
  }
}
