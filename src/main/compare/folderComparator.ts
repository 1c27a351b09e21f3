import fs from 'fs/promises';
import path from 'path';
import type { ClassifiedEntry, ComparisonResult, PathIndex } from '../../types/comparison';
import { compareLogger, type ComparisonReporter, type IndexSide } from '../../utils/compareLogger';
import { sha256File, type ContentHasher } from './contentHasher';
import { classifyEntry } from './entryClassifier';
import { InvalidPathError, throwIfCancelled } from './errors';
import { indexDirectory } from './pathIndexer';
import { assembleTree, summarizeEntries } from './treeAssembler';

export interface FolderComparatorOptions {
  ignorePatterns?: readonly string[];
  hashFile?: ContentHasher;
  /** Files hashed at the same time during a deep scan */
  hashConcurrency?: number;
  reporter?: ComparisonReporter;
}

export interface CompareOptions {
  deepScan?: boolean;
  signal?: AbortSignal;
}

const DEFAULT_HASH_CONCURRENCY = 4;

/**
 * Resolves `rootPath` and checks that it names an existing directory.
 */
export const assertDirectory = async (rootPath: string): Promise<string> => {
  const resolved = path.resolve(rootPath);
  let isDirectory: boolean;
  try {
    isDirectory = (await fs.stat(resolved)).isDirectory();
  } catch {
    throw new InvalidPathError(resolved, 'missing');
  }
  if (!isDirectory) {
    throw new InvalidPathError(resolved, 'not_directory');
  }
  return resolved;
};

const mapWithConcurrency = async <T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T) => Promise<R>,
): Promise<R[]> => {
  const results = new Array<R>(items.length);
  let next = 0;
  const runners = Array.from({ length: Math.min(limit, items.length) }, async () => {
    while (next < items.length) {
      const index = next;
      next += 1;
      results[index] = await worker(items[index]);
    }
  });
  await Promise.all(runners);
  return results;
};

export class FolderComparator {
  private readonly ignorePatterns: readonly string[];

  private readonly hashFile: ContentHasher;

  private readonly hashConcurrency: number;

  private readonly reporter: ComparisonReporter;

  constructor(options: FolderComparatorOptions = {}) {
    this.ignorePatterns = options.ignorePatterns ?? [];
    this.hashFile = options.hashFile ?? sha256File;
    this.hashConcurrency = Math.max(1, options.hashConcurrency ?? DEFAULT_HASH_CONCURRENCY);
    this.reporter = options.reporter ?? compareLogger;
  }

  /**
   * Indexes both roots, classifies the union of their relative paths and
   * assembles the diff tree. Every call builds a new result.
   */
  async compareDirectories(
    sourceRoot: string,
    targetRoot: string,
    { deepScan = false, signal }: CompareOptions = {},
  ): Promise<ComparisonResult> {
    const [source, target] = await Promise.all([
      assertDirectory(sourceRoot),
      assertDirectory(targetRoot),
    ]);
    const startInfo = { sourceRoot: source, targetRoot: target, deepScan };
    const startedAt = Date.now();
    this.reporter.comparisonStarted(startInfo);

    try {
      const [sourceIndex, targetIndex] = await Promise.all([
        this.indexSide('source', source, signal),
        this.indexSide('target', target, signal),
      ]);

      const entries = await this.classifyAll(sourceIndex, targetIndex, deepScan, signal);
      const summary = summarizeEntries(entries);
      const result: ComparisonResult = {
        sourceRoot: source,
        targetRoot: target,
        rootNodes: assembleTree(entries),
        summary,
        usedContentHash: deepScan,
      };

      this.reporter.comparisonCompleted({
        sourceRoot: source,
        targetRoot: target,
        entryCount: entries.length,
        summary,
        durationMs: Date.now() - startedAt,
      });
      return result;
    } catch (error) {
      this.reporter.comparisonFailed(error, startInfo);
      throw error;
    }
  }

  private async indexSide(side: IndexSide, rootPath: string, signal?: AbortSignal) {
    const startedAt = Date.now();
    const index = await indexDirectory(rootPath, { ignorePatterns: this.ignorePatterns, signal });
    this.reporter.indexCompleted({
      side,
      rootPath,
      entryCount: index.size,
      durationMs: Date.now() - startedAt,
    });
    return index;
  }

  private async classifyAll(
    sourceIndex: PathIndex,
    targetIndex: PathIndex,
    deepScan: boolean,
    signal?: AbortSignal,
  ): Promise<ClassifiedEntry[]> {
    const relativePaths = [...new Set([...sourceIndex.keys(), ...targetIndex.keys()])];
    const stats = { filesHashed: 0, unavailable: 0 };
    const hashFile: ContentHasher = async (absolutePath) => {
      throwIfCancelled(signal);
      const digest = await this.hashFile(absolutePath);
      stats.filesHashed += 1;
      if (digest === null) {
        stats.unavailable += 1;
      }
      return digest;
    };

    const startedAt = Date.now();
    const entries = await mapWithConcurrency(relativePaths, this.hashConcurrency, (relativePath) =>
      classifyEntry(relativePath, sourceIndex.get(relativePath), targetIndex.get(relativePath), {
        deepScan,
        hashFile,
      }),
    );
    throwIfCancelled(signal);

    if (deepScan) {
      this.reporter.hashingCompleted({ ...stats, durationMs: Date.now() - startedAt });
    }
    return entries;
  }
}

export const compareDirectories = (
  sourceRoot: string,
  targetRoot: string,
  options: CompareOptions & FolderComparatorOptions = {},
): Promise<ComparisonResult> => {
  const { deepScan, signal, ...comparatorOptions } = options;
  return new FolderComparator(comparatorOptions).compareDirectories(sourceRoot, targetRoot, {
    deepScan,
    signal,
  });
};
