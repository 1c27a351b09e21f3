import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { ComparisonReport, ComparisonReportItem } from '../types/comparison';
import type { ComparisonSnapshot } from '../types/snapshot';
import { createLogger } from '../utils/log';

export class SnapshotNotFoundError extends Error {
  readonly code = 'SNAPSHOT_NOT_FOUND';

  constructor(readonly snapshotId: string) {
    super(`Snapshot not found: ${snapshotId}`);
    this.name = 'SnapshotNotFoundError';
  }
}

export class InvalidSnapshotError extends Error {
  readonly code = 'INVALID_SNAPSHOT';

  constructor(readonly filePath: string, detail: string) {
    super(`Snapshot file ${filePath} is invalid: ${detail}`);
    this.name = 'InvalidSnapshotError';
  }
}

const logger = createLogger('snapshot-store');

const SNAPSHOT_ID_PATTERN = /^[A-Za-z0-9-]+$/;

const statusSchema = z.enum(['identical', 'modified', 'missing_from_target', 'extra_in_target']);

const reportItemSchema: z.ZodType<ComparisonReportItem> = z.lazy(() =>
  z.object({
    name: z.string(),
    relativePath: z.string(),
    itemType: z.enum(['file', 'folder']),
    status: statusSchema,
    sourceSize: z.number().int().nonnegative().nullable(),
    targetSize: z.number().int().nonnegative().nullable(),
    sourceModified: z.string().nullable(),
    targetModified: z.string().nullable(),
    sourceHash: z.string().nullable(),
    targetHash: z.string().nullable(),
    mimeType: z.string().nullable(),
    differenceCount: z.number().int().nonnegative(),
    children: z.array(reportItemSchema).optional(),
  }),
);

const reportSchema: z.ZodType<ComparisonReport> = z.object({
  comparisonId: z.string(),
  sourcePath: z.string(),
  targetPath: z.string(),
  summary: z.object({
    identical: z.number().int().nonnegative(),
    modified: z.number().int().nonnegative(),
    missingFromTarget: z.number().int().nonnegative(),
    extraInTarget: z.number().int().nonnegative(),
    totalSourceSize: z.number().int().nonnegative(),
    totalTargetSize: z.number().int().nonnegative(),
  }),
  tree: z.array(reportItemSchema),
  deepScan: z.boolean(),
  completedAt: z.string(),
});

const snapshotSchema: z.ZodType<ComparisonSnapshot> = z.object({
  id: z.string().regex(SNAPSHOT_ID_PATTERN),
  snapshotType: z.literal('comparison'),
  savedAt: z.string(),
  sourcePath: z.string(),
  targetPath: z.string(),
  deepScan: z.boolean(),
  report: reportSchema,
});

const isMissingFileError = (error: unknown) =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

/**
 * Keeps one JSON file per saved comparison under `directory`.
 */
export class ComparisonSnapshotStore {
  constructor(
    readonly directory: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async save(report: ComparisonReport): Promise<ComparisonSnapshot> {
    const snapshot = this.createRecord(`snapshot-${crypto.randomUUID()}`, report);
    await this.write(snapshot);
    return snapshot;
  }

  async get(snapshotId: string): Promise<ComparisonSnapshot> {
    const filePath = this.filePathFor(snapshotId);
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new SnapshotNotFoundError(snapshotId);
      }
      throw error;
    }
    return this.parse(filePath, raw);
  }

  /** Newest first. Files that fail to load are skipped. */
  async list(): Promise<ComparisonSnapshot[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.directory);
    } catch (error) {
      if (isMissingFileError(error)) {
        return [];
      }
      throw error;
    }

    const snapshots: ComparisonSnapshot[] = [];
    for (const name of names.filter((entry) => entry.endsWith('.json'))) {
      const filePath = path.join(this.directory, name);
      try {
        snapshots.push(this.parse(filePath, await fs.readFile(filePath, 'utf8')));
      } catch (error) {
        logger.warn(`Skipping unreadable snapshot ${filePath}`, error);
      }
    }
    return snapshots.sort((a, b) => b.savedAt.localeCompare(a.savedAt));
  }

  /** Overwrites the stored report, keeping the id. */
  async replace(snapshotId: string, report: ComparisonReport): Promise<ComparisonSnapshot> {
    await this.get(snapshotId);
    const snapshot = this.createRecord(snapshotId, report);
    await this.write(snapshot);
    return snapshot;
  }

  async delete(snapshotId: string): Promise<void> {
    try {
      await fs.rm(this.filePathFor(snapshotId));
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new SnapshotNotFoundError(snapshotId);
      }
      throw error;
    }
  }

  private createRecord(id: string, report: ComparisonReport): ComparisonSnapshot {
    return {
      id,
      snapshotType: 'comparison',
      savedAt: this.now().toISOString(),
      sourcePath: report.sourcePath,
      targetPath: report.targetPath,
      deepScan: report.deepScan,
      report,
    };
  }

  private async write(snapshot: ComparisonSnapshot) {
    await fs.mkdir(this.directory, { recursive: true });
    await fs.writeFile(
      this.filePathFor(snapshot.id),
      JSON.stringify(snapshot, null, 2),
      'utf8',
    );
  }

  private filePathFor(snapshotId: string) {
    if (!SNAPSHOT_ID_PATTERN.test(snapshotId)) {
      throw new SnapshotNotFoundError(snapshotId);
    }
    return path.join(this.directory, `${snapshotId}.json`);
  }

  private parse(filePath: string, raw: string): ComparisonSnapshot {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new InvalidSnapshotError(filePath, error instanceof Error ? error.message : 'not JSON');
    }
    const parsed = snapshotSchema.safeParse(json);
    if (!parsed.success) {
      throw new InvalidSnapshotError(filePath, parsed.error.issues[0]?.message ?? 'schema mismatch');
    }
    return parsed.data;
  }
}
