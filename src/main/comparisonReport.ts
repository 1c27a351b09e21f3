import mime from 'mime-types';
import type {
  ComparisonNode,
  ComparisonReport,
  ComparisonReportItem,
  ComparisonReportSummary,
  ComparisonResult,
  ComparisonSummary,
} from '../types/comparison';

export interface ReportStamp {
  /** Opaque identifier chosen by the caller */
  comparisonId: string;
  completedAt: Date;
}

const toIsoString = (date: Date | undefined) => (date ? date.toISOString() : null);

export const toReportSummary = (summary: ComparisonSummary): ComparisonReportSummary => ({
  identical: summary.identicalCount,
  modified: summary.modifiedCount,
  missingFromTarget: summary.missingFromTargetCount,
  extraInTarget: summary.extraInTargetCount,
  totalSourceSize: summary.totalSourceBytes,
  totalTargetSize: summary.totalTargetBytes,
});

export const toReportItem = (node: ComparisonNode): ComparisonReportItem => {
  const item: ComparisonReportItem = {
    name: node.name,
    relativePath: node.relativePath,
    itemType: node.kind,
    status: node.status,
    sourceSize: node.sourceSize ?? null,
    targetSize: node.targetSize ?? null,
    sourceModified: toIsoString(node.sourceModifiedAt),
    targetModified: toIsoString(node.targetModifiedAt),
    sourceHash: node.sourceDigest ?? null,
    targetHash: node.targetDigest ?? null,
    mimeType: node.kind === 'file' ? mime.lookup(node.name) || null : null,
    differenceCount: node.differenceCount,
  };
  if (node.kind === 'folder') {
    item.children = node.children.map(toReportItem);
  }
  return item;
};

/**
 * Transport form of a comparison result. Absent values become null; only
 * folders carry `children`.
 */
export const buildComparisonReport = (
  result: ComparisonResult,
  { comparisonId, completedAt }: ReportStamp,
): ComparisonReport => ({
  comparisonId,
  sourcePath: result.sourceRoot,
  targetPath: result.targetRoot,
  summary: toReportSummary(result.summary),
  tree: result.rootNodes.map(toReportItem),
  deepScan: result.usedContentHash,
  completedAt: completedAt.toISOString(),
});
