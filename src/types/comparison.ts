export type ComparisonStatus =
  | 'identical'
  | 'modified'
  | 'missing_from_target'
  | 'extra_in_target';

export type ComparisonItemType = 'file' | 'folder';

/**
 * Metadata captured for one entry of one side during an index pass.
 */
export interface PathEntryMetadata {
  /** Absolute path on disk */
  absolutePath: string;
  /** File size in bytes; always 0 for directories */
  sizeBytes: number;
  /** Last modification time as reported by stat */
  modifiedAt: Date;
  /** Same instant with stat's sub-millisecond fraction kept; used for equality */
  modifiedAtMs: number;
  isDirectory: boolean;
}

/** Relative path (forward-slash joined) to metadata for one side of a comparison. */
export type PathIndex = Map<string, PathEntryMetadata>;

/**
 * One relative path after classification, before it is placed in the tree.
 */
export interface ClassifiedEntry {
  relativePath: string;
  kind: ComparisonItemType;
  status: ComparisonStatus;
  source?: PathEntryMetadata;
  target?: PathEntryMetadata;
  sourceDigest?: string;
  targetDigest?: string;
}

interface ComparisonNodeBase {
  name: string;
  /** Unique within one comparison; the join key between source and target */
  relativePath: string;
  status: ComparisonStatus;
  sourceSize?: number;
  targetSize?: number;
  sourceModifiedAt?: Date;
  targetModifiedAt?: Date;
  sourceDigest?: string;
  targetDigest?: string;
  /** Non-identical descendants, not counting the node itself. Always 0 on files. */
  differenceCount: number;
}

export interface FileComparisonNode extends ComparisonNodeBase {
  kind: 'file';
}

export interface FolderComparisonNode extends ComparisonNodeBase {
  kind: 'folder';
  /** Ordered by relative path */
  children: ComparisonNode[];
}

export type ComparisonNode = FileComparisonNode | FolderComparisonNode;

export interface ComparisonSummary {
  identicalCount: number;
  modifiedCount: number;
  missingFromTargetCount: number;
  extraInTargetCount: number;
  totalSourceBytes: number;
  totalTargetBytes: number;
}

export interface ComparisonResult {
  sourceRoot: string;
  targetRoot: string;
  rootNodes: ComparisonNode[];
  summary: ComparisonSummary;
  usedContentHash: boolean;
}

// Transport shapes, as serialised by the boundary layer.

export interface ComparisonReportSummary {
  identical: number;
  modified: number;
  missingFromTarget: number;
  extraInTarget: number;
  totalSourceSize: number;
  totalTargetSize: number;
}

export interface ComparisonReportItem {
  name: string;
  relativePath: string;
  itemType: ComparisonItemType;
  status: ComparisonStatus;
  sourceSize: number | null;
  targetSize: number | null;
  /** ISO timestamp */
  sourceModified: string | null;
  /** ISO timestamp */
  targetModified: string | null;
  sourceHash: string | null;
  targetHash: string | null;
  /** MIME type inferred from the file name (files only) */
  mimeType: string | null;
  differenceCount: number;
  /** Present on folders only */
  children?: ComparisonReportItem[];
}

export interface ComparisonReport {
  comparisonId: string;
  sourcePath: string;
  targetPath: string;
  summary: ComparisonReportSummary;
  tree: ComparisonReportItem[];
  deepScan: boolean;
  completedAt: string;
}
