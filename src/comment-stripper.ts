import type { Stats } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { TextDecoder } from 'node:util';

import { glob } from 'glob';

import type { CommentTrimConfig } from './config';
import { isErrnoException, resolveConfig } from './config';
import { transformSource } from './line-transformer';
import type { FileResult } from './run-summary';
import { RunStatistics } from './run-summary';
import type { Logger } from './utils/logger';
import { createLogger } from './utils/logger';

/**
 * Options of a {@link CommentStripper}
 */
export interface CommentStripperOptions {
  /** Overrides of the default configuration */
  config?: Partial<CommentTrimConfig>;
  /** Report the changes without writing them, default `false` */
  dryRun?: boolean;
  /**
   * Warn about paths that do not exist instead of failing the run,
   * default `false`
   */
  skipMissing?: boolean;
  logger?: Logger;
}

/**
 * Files selected for a run
 */
export interface CollectedFiles {
  files: string[];
  /** Paths passed in that were skipped, with the reason */
  skipped: { path: string; reason: string }[];
}

export interface ProgressInfo {
  description: string;
  current: number;
  total: number;
}
export type OnProgressCallback = (progress: ProgressInfo) => void;
export type OnFileCallback = (result: FileResult) => void;

export interface RunHooks {
  /** Called after each file, in processing order */
  onFile?: OnFileCallback;
  /** Called once before the first file and after each file */
  onProgress?: OnProgressCallback;
}

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Finds source files below a set of paths and strips removable comments
 * from them, one file at a time.
 */
export class CommentStripper {
  public readonly config: CommentTrimConfig;
  public readonly dryRun: boolean;
  private readonly skipMissing: boolean;
  private readonly logger: Logger;

  constructor(opts?: CommentStripperOptions) {
    const { config = {}, dryRun = false, skipMissing = false } = opts ?? {};
    this.config = resolveConfig(config);
    this.dryRun = dryRun;
    this.skipMissing = skipMissing;
    this.logger = opts?.logger ?? createLogger('silent');
  }

  private hasTargetExtension(filePath: string): boolean {
    return this.config.extensions.includes(path.extname(filePath));
  }

  private isExcluded(filePath: string): boolean {
    return this.config.exclude.some((pattern) => filePath.includes(pattern));
  }

  /**
   * Lists every source file below a directory, sorted by path
   */
  private async listDirectory(dir: string): Promise<string[]> {
    const entries = await glob('**/*', { cwd: dir, nodir: true });
    return entries
      .filter((entry) => this.hasTargetExtension(entry))
      .map((entry) => path.join(dir, entry))
      .sort();
  }

  /**
   * Resolves the given paths to the files a run will process.
   *
   * Nothing is read or written here, so a missing path aborts the run
   * before any file is touched.
   *
   * @throws Error if a path does not exist or is neither a file nor a
   * directory, unless `skipMissing` is set
   */
  public async collectFiles(paths: string[]): Promise<CollectedFiles> {
    const files: string[] = [];
    const skipped: CollectedFiles['skipped'] = [];
    const seen = new Set<string>();

    const skip = (target: string, reason: string) => {
      this.logger.warn(`Skipping ${target}: ${reason}`);
      skipped.push({ path: target, reason });
    };

    for (const target of paths) {
      let stats: Stats | undefined;
      try {
        stats = await fs.stat(target);
      } catch (error) {
        if (
          !isErrnoException(error) ||
          (error.code !== 'ENOENT' && error.code !== 'ENOTDIR')
        ) {
          throw error;
        }
      }

      let candidates: string[];
      if (stats?.isFile()) {
        if (!this.hasTargetExtension(target)) {
          skip(
            target,
            `extension is not one of ${this.config.extensions.join(', ')}`,
          );
          continue;
        }
        candidates = [target];
      } else if (stats?.isDirectory()) {
        candidates = await this.listDirectory(target);
      } else {
        const reason = stats
          ? 'not a file or directory'
          : 'path does not exist';
        if (!this.skipMissing) {
          throw new Error(`${target}: ${reason}`);
        }
        skip(target, reason);
        continue;
      }

      for (const file of candidates) {
        if (this.isExcluded(file)) {
          this.logger.debug(`Excluded ${file}`);
          continue;
        }
        if (seen.has(file)) {
          continue;
        }
        seen.add(file);
        files.push(file);
      }
    }

    return { files, skipped };
  }

  private fail(filePath: string, action: string, error: unknown): FileResult {
    const message = describeError(error);
    this.logger.error(`Error ${action} ${filePath}: ${message}`);
    return {
      path: filePath,
      status: 'failed',
      removedComments: 0,
      linesRemoved: 0,
      error: message,
    };
  }

  /**
   * Strips one file. Read and write errors are logged and reported as a
   * `failed` result; they never reject.
   */
  public async processFile(filePath: string): Promise<FileResult> {
    let content: string;
    try {
      content = utf8.decode(await fs.readFile(filePath));
    } catch (error) {
      return this.fail(filePath, 'reading', error);
    }

    const result = transformSource(content, this.config);
    if (!result.changed) {
      return {
        path: filePath,
        status: 'unchanged',
        removedComments: 0,
        linesRemoved: 0,
      };
    }

    if (!this.dryRun) {
      try {
        await fs.writeFile(filePath, result.content, 'utf-8');
      } catch (error) {
        return this.fail(filePath, 'writing', error);
      }
    }

    return {
      path: filePath,
      status: 'modified',
      removedComments: result.removedComments,
      linesRemoved: result.linesRemoved,
    };
  }

  /**
   * Processes files sequentially, in the given order
   */
  public async processFiles(
    files: string[],
    hooks: RunHooks = {},
  ): Promise<RunStatistics> {
    const { onFile, onProgress } = hooks;
    const stats = new RunStatistics(this.dryRun);
    const description = this.dryRun ? 'Checking files' : 'Stripping comments';

    onProgress?.({ description, current: 0, total: files.length });
    for (const [index, file] of files.entries()) {
      const result = await this.processFile(file);
      stats.record(result);
      onFile?.(result);
      onProgress?.({ description, current: index + 1, total: files.length });
    }

    return stats;
  }

  /**
   * Collects the files below `paths` and processes them
   */
  public async run(
    paths: string[],
    hooks: RunHooks = {},
  ): Promise<RunStatistics> {
    const { files } = await this.collectFiles(paths);
    return this.processFiles(files, hooks);
  }
}
