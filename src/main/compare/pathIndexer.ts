import fs from 'fs/promises';
import type { Dirent, Stats } from 'fs';
import path from 'path';
import type { PathEntryMetadata, PathIndex } from '../../types/comparison';
import { createLogger } from '../../utils/log';
import { throwIfCancelled } from './errors';
import { createIgnoreMatcher, normaliseRelativePath, type IgnoreMatcher } from './ignoreList';

export interface IndexOptions {
  ignorePatterns?: readonly string[];
  signal?: AbortSignal;
}

interface WalkOptions {
  /**
   * Index being filled. Each walk owns its own map, so source and target
   * passes can run side by side.
   */
  index: PathIndex;
  rootPath: string;
  isIgnored: IgnoreMatcher;
  signal?: AbortSignal;
}

const logger = createLogger('path-indexer');

const buildEntryMetadata = (absolutePath: string, stats: Stats): PathEntryMetadata => {
  const isDirectory = stats.isDirectory();
  return {
    absolutePath,
    sizeBytes: isDirectory ? 0 : stats.size,
    modifiedAt: stats.mtime,
    modifiedAtMs: stats.mtimeMs,
    isDirectory,
  };
};

const readEntries = async (directoryPath: string): Promise<Dirent[]> => {
  try {
    return await fs.readdir(directoryPath, { withFileTypes: true });
  } catch (error) {
    logger.debug(`Skipping unreadable directory ${directoryPath}`, error);
    return [];
  }
};

const statEntry = async (entryPath: string): Promise<Stats | null> => {
  try {
    return await fs.stat(entryPath);
  } catch (error) {
    logger.debug(`Skipping unreadable entry ${entryPath}`, error);
    return null;
  }
};

const walkDirectory = async (currentPath: string, options: WalkOptions): Promise<void> => {
  throwIfCancelled(options.signal);
  const entries = await readEntries(currentPath);

  await Promise.all(
    entries.map(async (entry) => {
      const entryPath = path.join(currentPath, entry.name);

      if (options.isIgnored(entryPath)) {
        return;
      }

      const isLink = entry.isSymbolicLink();
      if (!isLink && !entry.isDirectory() && !entry.isFile()) {
        return;
      }

      // stat follows the link; linked directories are never entered.
      const stats = await statEntry(entryPath);
      if (!stats || (isLink && !stats.isFile())) {
        return;
      }

      const relativePath = normaliseRelativePath(options.rootPath, entryPath);
      options.index.set(relativePath, buildEntryMetadata(entryPath, stats));

      if (stats.isDirectory()) {
        await walkDirectory(entryPath, options);
      }
    }),
  );
};

/**
 * Walks every file and directory under `rootPath`, keyed by forward-slash
 * relative path. Ignored subtrees are pruned before they are read; entries that
 * fail to stat are left out. Symbolic links to files are indexed with the
 * linked file's metadata, links to directories are skipped. The root itself is
 * not part of the index.
 */
export const indexDirectory = async (
  rootPath: string,
  { ignorePatterns = [], signal }: IndexOptions = {},
): Promise<PathIndex> => {
  const absoluteRoot = path.resolve(rootPath);
  const index: PathIndex = new Map();

  await walkDirectory(absoluteRoot, {
    index,
    rootPath: absoluteRoot,
    isIgnored: createIgnoreMatcher(ignorePatterns, absoluteRoot),
    signal,
  });

  return index;
};
