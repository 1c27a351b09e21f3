import { createColors, isColorSupported } from 'colorette';
import type {
  ComparisonReport,
  ComparisonReportItem,
  ComparisonReportSummary,
  ComparisonStatus,
} from '../types/comparison';
import type { ComparisonSnapshot } from '../types/snapshot';

export interface RenderOptions {
  /** Include identical entries */
  showAll?: boolean;
  useColor?: boolean;
}

type Palette = ReturnType<typeof createColors>;

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

export const formatBytes = (bytes: number) => {
  if (bytes === 0) return '0 B';
  const exponent = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), BYTE_UNITS.length - 1);
  const value = bytes / 1024 ** exponent;
  return `${exponent === 0 ? value : value.toFixed(1)} ${BYTE_UNITS[exponent]}`;
};

const statusGlyph = (status: ComparisonStatus, colors: Palette) => {
  switch (status) {
    case 'identical':
      return colors.dim('=');
    case 'modified':
      return colors.yellow('≠');
    case 'missing_from_target':
      return colors.red('+');
    case 'extra_in_target':
      return colors.cyan('−');
    default: {
      const exhaustive: never = status;
      return String(exhaustive);
    }
  }
};

export const describeItem = (item: ComparisonReportItem): string => {
  if (item.status === 'modified' && item.itemType === 'folder') {
    if (item.differenceCount === 0) return 'File on one side, folder on the other';
    return `${item.differenceCount} ${item.differenceCount === 1 ? 'difference' : 'differences'}`;
  }
  if (item.status === 'modified') {
    if (item.sourceModified && item.targetModified) {
      const source = Date.parse(item.sourceModified);
      const target = Date.parse(item.targetModified);
      if (source > target) return 'Newer in source';
      if (target > source) return 'Newer in target';
    }
    return item.sourceSize !== item.targetSize ? 'Size differs' : 'Content differs';
  }
  switch (item.status) {
    case 'identical':
      return 'Identical';
    case 'missing_from_target':
      return 'Missing from target';
    case 'extra_in_target':
      return 'Only in target';
    default:
      return item.status;
  }
};

const isHidden = (item: ComparisonReportItem, showAll: boolean) =>
  !showAll && item.status === 'identical' && item.differenceCount === 0;

export const renderTree = (
  items: ComparisonReportItem[],
  { showAll = false, useColor = isColorSupported }: RenderOptions = {},
): string[] => {
  const colors = createColors({ useColor });
  const lines: string[] = [];
  const visit = (item: ComparisonReportItem, depth: number) => {
    if (isHidden(item, showAll)) return;
    const name = item.itemType === 'folder' ? colors.bold(`${item.name}/`) : item.name;
    lines.push(
      `${'  '.repeat(depth)}${statusGlyph(item.status, colors)} ${name} ${colors.dim(`(${describeItem(item)})`)}`,
    );
    item.children?.forEach((child) => visit(child, depth + 1));
  };
  items.forEach((item) => visit(item, 0));
  return lines;
};

export const renderSummary = (
  summary: ComparisonReportSummary,
  { useColor = isColorSupported }: RenderOptions = {},
): string[] => {
  const colors = createColors({ useColor });
  return [
    `${colors.dim('=')} Identical:           ${summary.identical}`,
    `${colors.yellow('≠')} Modified:            ${summary.modified}`,
    `${colors.red('+')} Missing from target: ${summary.missingFromTarget}`,
    `${colors.cyan('−')} Extra in target:     ${summary.extraInTarget}`,
    `  Source size: ${formatBytes(summary.totalSourceSize)}  Target size: ${formatBytes(summary.totalTargetSize)}`,
  ];
};

export const renderReport = (report: ComparisonReport, options: RenderOptions = {}): string[] => {
  const tree = renderTree(report.tree, options);
  return [
    `Source: ${report.sourcePath}`,
    `Target: ${report.targetPath}${report.deepScan ? ' (deep scan)' : ''}`,
    '',
    ...(tree.length ? tree : ['No differences found.']),
    '',
    ...renderSummary(report.summary, options),
  ];
};

export const renderSnapshotList = (snapshots: ComparisonSnapshot[]): string[] => {
  if (snapshots.length === 0) {
    return ['No saved comparisons.'];
  }
  return snapshots.map((snapshot) => {
    const { summary } = snapshot.report;
    const differences = summary.modified + summary.missingFromTarget + summary.extraInTarget;
    return `${snapshot.id}  ${snapshot.savedAt}  ${snapshot.sourcePath} ↔ ${snapshot.targetPath}  ${summary.identical} identical, ${differences} different`;
  });
};
