import type { ComparisonReport } from './comparison';

export type SnapshotType = 'comparison';

/**
 * A saved comparison. `report` is stored and returned unchanged.
 */
export interface ComparisonSnapshot {
  id: string;
  snapshotType: SnapshotType;
  /** ISO timestamp of the last save */
  savedAt: string;
  sourcePath: string;
  targetPath: string;
  deepScan: boolean;
  report: ComparisonReport;
}
