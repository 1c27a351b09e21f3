import crypto from 'crypto';
import type { ComparisonReport } from '../types/comparison';
import type { ComparisonSnapshot } from '../types/snapshot';
import type { ComparisonReporter } from '../utils/compareLogger';
import { configureLogTransports, createLogger } from '../utils/log';
import type { ContentHasher } from './compare/contentHasher';
import { FolderComparator } from './compare/folderComparator';
import { buildComparisonReport } from './comparisonReport';
import { resolveCompareConfig, type CompareConfig } from './config';
import { ComparisonSnapshotStore } from './snapshotStore';

export interface ComparisonRequest {
  sourcePath: string;
  targetPath: string;
  deepScan?: boolean;
  /** Appended to the configured ignore list for this run only */
  extraIgnorePatterns?: string[];
  signal?: AbortSignal;
}

export interface ComparisonServiceOptions {
  config: CompareConfig;
  store?: ComparisonSnapshotStore;
  hashFile?: ContentHasher;
  reporter?: ComparisonReporter;
  createComparisonId?: () => string;
  now?: () => Date;
}

const logger = createLogger('comparison-service');

/**
 * Boundary between callers (CLI, tests) and the comparator: stamps each result
 * with an id and completion time and handles saved comparisons.
 */
export class ComparisonService {
  readonly store: ComparisonSnapshotStore;

  private readonly config: CompareConfig;

  private readonly hashFile?: ContentHasher;

  private readonly reporter?: ComparisonReporter;

  private readonly createComparisonId: () => string;

  private readonly now: () => Date;

  constructor(options: ComparisonServiceOptions) {
    this.config = options.config;
    this.now = options.now ?? (() => new Date());
    this.store = options.store ?? new ComparisonSnapshotStore(options.config.snapshotDirectory, this.now);
    this.hashFile = options.hashFile;
    this.reporter = options.reporter;
    this.createComparisonId = options.createComparisonId ?? (() => `comparison-${crypto.randomUUID()}`);
  }

  async runComparison({
    sourcePath,
    targetPath,
    deepScan = false,
    extraIgnorePatterns = [],
    signal,
  }: ComparisonRequest): Promise<ComparisonReport> {
    const comparator = new FolderComparator({
      ignorePatterns: [...this.config.ignorePatterns, ...extraIgnorePatterns],
      hashConcurrency: this.config.hashConcurrency,
      hashFile: this.hashFile,
      reporter: this.reporter,
    });
    const result = await comparator.compareDirectories(sourcePath, targetPath, { deepScan, signal });
    const report = buildComparisonReport(result, {
      comparisonId: this.createComparisonId(),
      completedAt: this.now(),
    });
    logger.info(
      `Compared ${report.sourcePath} with ${report.targetPath}: ${report.summary.modified} modified, ` +
        `${report.summary.missingFromTarget} missing, ${report.summary.extraInTarget} extra`,
    );
    return report;
  }

  saveSnapshot(report: ComparisonReport): Promise<ComparisonSnapshot> {
    return this.store.save(report);
  }

  listSnapshots(): Promise<ComparisonSnapshot[]> {
    return this.store.list();
  }

  getSnapshot(snapshotId: string): Promise<ComparisonSnapshot> {
    return this.store.get(snapshotId);
  }

  /**
   * Compares the stored roots again and overwrites the saved report.
   */
  async refreshSnapshot(snapshotId: string, signal?: AbortSignal): Promise<ComparisonSnapshot> {
    const existing = await this.store.get(snapshotId);
    const report = await this.runComparison({
      sourcePath: existing.sourcePath,
      targetPath: existing.targetPath,
      deepScan: existing.deepScan,
      signal,
    });
    return this.store.replace(snapshotId, report);
  }

  deleteSnapshot(snapshotId: string): Promise<void> {
    return this.store.delete(snapshotId);
  }
}

export const createComparisonService = (
  overrides?: Parameters<typeof resolveCompareConfig>[0],
): ComparisonService => {
  const config = resolveCompareConfig(overrides);
  configureLogTransports(config);
  return new ComparisonService({ config });
};

export { FolderComparator, compareDirectories } from './compare/folderComparator';
export { InvalidPathError, ComparisonCancelledError } from './compare/errors';
export { SnapshotNotFoundError, InvalidSnapshotError } from './snapshotStore';
export type {
  ComparisonNode,
  ComparisonReport,
  ComparisonReportItem,
  ComparisonResult,
  ComparisonStatus,
  ComparisonSummary,
} from '../types/comparison';
