import type {
  ClassifiedEntry,
  ComparisonNode,
  ComparisonSummary,
  PathEntryMetadata,
} from '../../types/comparison';
import { lastSegment, parentRelativePath } from './ignoreList';

interface ArenaSlot {
  node: ComparisonNode;
  depth: number;
  parent: number | null;
}

const depthOf = (relativePath: string) => relativePath.split('/').length;

const byRelativePath = (a: { relativePath: string }, b: { relativePath: string }) =>
  a.relativePath.localeCompare(b.relativePath);

// Folders weigh nothing, even when the other side held a file at that path.
const sizeOf = (entry: ClassifiedEntry, side: PathEntryMetadata | undefined) =>
  side && (entry.kind === 'folder' ? 0 : side.sizeBytes);

// A clash between a file and a folder still counts as a differing file.
const holdsFile = (entry: ClassifiedEntry) =>
  entry.kind === 'file' || entry.source?.isDirectory === false || entry.target?.isDirectory === false;

const createNode = (entry: ClassifiedEntry): ComparisonNode => {
  const common = {
    name: lastSegment(entry.relativePath),
    relativePath: entry.relativePath,
    status: entry.status,
    sourceSize: sizeOf(entry, entry.source),
    targetSize: sizeOf(entry, entry.target),
    sourceModifiedAt: entry.source?.modifiedAt,
    targetModifiedAt: entry.target?.modifiedAt,
    sourceDigest: entry.sourceDigest,
    targetDigest: entry.targetDigest,
    differenceCount: 0,
  };
  return entry.kind === 'folder'
    ? { ...common, kind: 'folder', children: [] }
    : { ...common, kind: 'file' };
};

const isNonTrivial = (node: ComparisonNode) =>
  node.status !== 'identical' || node.differenceCount > 0;

/**
 * Builds the comparison forest from the flat classified set.
 *
 * Pass one places every entry in an arena and links it to its parent slot (or
 * the root list when the parent path is not part of the set). Pass two walks
 * the arena deepest-first, so each folder has its final count before its own
 * contribution reaches the next level up.
 */
export const assembleTree = (entries: readonly ClassifiedEntry[]): ComparisonNode[] => {
  const ordered = [...entries].sort(byRelativePath);
  const arena: ArenaSlot[] = [];
  const slotByPath = new Map<string, number>();

  ordered.forEach((entry) => {
    if (slotByPath.has(entry.relativePath)) {
      throw new Error(`Duplicate relative path in comparison: ${entry.relativePath}`);
    }
    slotByPath.set(entry.relativePath, arena.length);
    arena.push({ node: createNode(entry), depth: depthOf(entry.relativePath), parent: null });
  });

  const rootNodes: ComparisonNode[] = [];
  arena.forEach((slot) => {
    const parentIndex = slotByPath.get(parentRelativePath(slot.node.relativePath));
    const parent = parentIndex === undefined ? undefined : arena[parentIndex];
    if (parent && parent.node.kind === 'folder') {
      slot.parent = parentIndex ?? null;
      parent.node.children.push(slot.node);
    } else {
      rootNodes.push(slot.node);
    }
  });

  const deepestFirst = [...arena].sort((a, b) => b.depth - a.depth);
  deepestFirst.forEach((slot) => {
    if (slot.parent === null || !isNonTrivial(slot.node)) {
      return;
    }
    const parent = arena[slot.parent].node;
    parent.differenceCount += 1 + slot.node.differenceCount;
    if (parent.status === 'identical') {
      parent.status = 'modified';
    }
  });

  return rootNodes;
};

/**
 * Status counts cover files only, including a file whose counterpart is a
 * folder; byte totals cover every entry, folders contributing 0.
 */
export const summarizeEntries = (entries: readonly ClassifiedEntry[]): ComparisonSummary => {
  const summary: ComparisonSummary = {
    identicalCount: 0,
    modifiedCount: 0,
    missingFromTargetCount: 0,
    extraInTargetCount: 0,
    totalSourceBytes: 0,
    totalTargetBytes: 0,
  };

  entries.forEach((entry) => {
    summary.totalSourceBytes += sizeOf(entry, entry.source) ?? 0;
    summary.totalTargetBytes += sizeOf(entry, entry.target) ?? 0;
    if (!holdsFile(entry)) {
      return;
    }
    switch (entry.status) {
      case 'identical':
        summary.identicalCount += 1;
        break;
      case 'modified':
        summary.modifiedCount += 1;
        break;
      case 'missing_from_target':
        summary.missingFromTargetCount += 1;
        break;
      case 'extra_in_target':
        summary.extraInTargetCount += 1;
        break;
      default: {
        const exhaustive: never = entry.status;
        throw new Error(`Unknown comparison status ${String(exhaustive)}`);
      }
    }
  });

  return summary;
};
