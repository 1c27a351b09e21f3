import type { ClassifiedEntry, PathEntryMetadata } from '../../types/comparison';
import type { ContentHasher } from './contentHasher';

export interface ClassifyOptions {
  deepScan: boolean;
  hashFile: ContentHasher;
}

const hashBoth = async (
  source: PathEntryMetadata,
  target: PathEntryMetadata,
  hashFile: ContentHasher,
) => {
  const [sourceDigest, targetDigest] = await Promise.all([
    hashFile(source.absolutePath),
    hashFile(target.absolutePath),
  ]);
  return { sourceDigest, targetDigest };
};

const optionalDigest = (digest: string | null) => digest ?? undefined;

/**
 * Decides the status of one relative path from the metadata of each side.
 *
 * Hashing only runs when deep scan is on and the metadata is ambiguous:
 * - timestamps differ: equal digests upgrade the entry to identical, anything
 *   else (including an unreadable side) keeps it modified;
 * - size and timestamp agree: differing digests downgrade it to modified, an
 *   unreadable side keeps it identical.
 *
 * Folders present on both sides come back identical; their final status is
 * derived from their descendants when the tree is assembled. A path that is a
 * file on one side and a folder on the other becomes a modified folder.
 */
export const classifyEntry = async (
  relativePath: string,
  source: PathEntryMetadata | undefined,
  target: PathEntryMetadata | undefined,
  { deepScan, hashFile }: ClassifyOptions,
): Promise<ClassifiedEntry> => {
  const kind = source?.isDirectory || target?.isDirectory ? 'folder' : 'file';
  const base = { relativePath, kind, source, target } as const;

  if (!source && !target) {
    throw new Error(`No metadata on either side for ${relativePath}`);
  }
  if (!target) {
    return { ...base, status: 'missing_from_target' };
  }
  if (!source) {
    return { ...base, status: 'extra_in_target' };
  }
  if (kind === 'folder') {
    return { ...base, status: source.isDirectory === target.isDirectory ? 'identical' : 'modified' };
  }

  if (source.sizeBytes !== target.sizeBytes) {
    return { ...base, status: 'modified' };
  }

  const sameTimestamp = source.modifiedAtMs === target.modifiedAtMs;
  if (!deepScan) {
    return { ...base, status: sameTimestamp ? 'identical' : 'modified' };
  }

  const { sourceDigest, targetDigest } = await hashBoth(source, target, hashFile);
  const digests = {
    sourceDigest: optionalDigest(sourceDigest),
    targetDigest: optionalDigest(targetDigest),
  };
  const bothReadable = sourceDigest !== null && targetDigest !== null;

  if (!sameTimestamp) {
    const confirmed = bothReadable && sourceDigest === targetDigest;
    return { ...base, ...digests, status: confirmed ? 'identical' : 'modified' };
  }

  const corrupted = bothReadable && sourceDigest !== targetDigest;
  return { ...base, ...digests, status: corrupted ? 'modified' : 'identical' };
};
