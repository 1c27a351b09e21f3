import { bold, cyan, dim, green, red, yellow } from 'colorette';
import type { ComparisonSummary } from '../types/comparison';

export type IndexSide = 'source' | 'target';

export interface ComparisonStartInfo {
  sourceRoot: string;
  targetRoot: string;
  deepScan: boolean;
}

export interface IndexCompleteInfo {
  side: IndexSide;
  rootPath: string;
  entryCount: number;
  durationMs: number;
}

export interface HashingCompleteInfo {
  filesHashed: number;
  unavailable: number;
  durationMs: number;
}

export interface ComparisonCompleteInfo {
  sourceRoot: string;
  targetRoot: string;
  entryCount: number;
  summary: ComparisonSummary;
  durationMs: number;
}

/**
 * Progress hooks a comparison run reports through.
 */
export interface ComparisonReporter {
  comparisonStarted(info: ComparisonStartInfo): void;
  indexCompleted(info: IndexCompleteInfo): void;
  hashingCompleted(info: HashingCompleteInfo): void;
  comparisonCompleted(info: ComparisonCompleteInfo): void;
  comparisonFailed(error: unknown, info: ComparisonStartInfo): void;
}

const numberFormatter = new Intl.NumberFormat('en-US');

const coerceBoolean = (value: unknown): boolean => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const normalised = value.trim().toLowerCase();
    return ['1', 'true', 't', 'yes', 'y', 'on'].includes(normalised);
  }
  return false;
};

const isVerboseEnabled = () => coerceBoolean(process.env.BACKUP_VERIFY_VERBOSE);

const timestamp = () => dim(new Date().toISOString());

export const formatDuration = (durationMs: number) =>
  `${(durationMs / 1000).toFixed(durationMs >= 10000 ? 1 : 2)} s`;

export const formatNumber = (value: number | undefined) =>
  typeof value === 'number' && Number.isFinite(value) ? numberFormatter.format(value) : '—';

const prefix = cyan('🗂  [Compare]');

const emit = (header: string, details: string[] = []) => {
  console.log(`${timestamp()} ${header}`);
  details.forEach((detail) => console.log(`   ${detail}`));
};

const emitError = (header: string, details: string[] = []) => {
  const lines = [`${timestamp()} ${header}`];
  details.forEach((detail) => {
    lines.push(...detail.split('\n').map((line) => `   ${line}`));
  });
  lines.forEach((line) => console.error(line));
};

export const logComparisonStart = (info: ComparisonStartInfo) => {
  if (!isVerboseEnabled()) return;
  emit(`${prefix} ${bold('Comparing')} ${info.sourceRoot} ${dim('→')} ${info.targetRoot}`, [
    `Deep scan: ${info.deepScan ? green('on') : dim('off')}`,
  ]);
};

export const logIndexComplete = (info: IndexCompleteInfo) => {
  if (!isVerboseEnabled()) return;
  emit(`${prefix} Indexed ${info.side} ${dim(`(${info.rootPath})`)}`, [
    `Entries: ${formatNumber(info.entryCount)}`,
    `Duration: ${formatDuration(info.durationMs)}`,
  ]);
};

export const logHashingComplete = (info: HashingCompleteInfo) => {
  if (!isVerboseEnabled()) return;
  const header =
    info.unavailable > 0
      ? yellow(`Hashed with ${formatNumber(info.unavailable)} unreadable files`)
      : green('Hashed files');
  emit(`${prefix} ${header}`, [
    `Files hashed: ${formatNumber(info.filesHashed)}`,
    `Duration: ${formatDuration(info.durationMs)}`,
  ]);
};

export const logComparisonComplete = (info: ComparisonCompleteInfo) => {
  if (!isVerboseEnabled()) return;
  const { summary } = info;
  const differences =
    summary.modifiedCount + summary.missingFromTargetCount + summary.extraInTargetCount;
  const header =
    differences === 0
      ? green('Trees match')
      : yellow(`${formatNumber(differences)} differing files`);
  emit(`${prefix} ${header} ${dim(`(${formatNumber(info.entryCount)} entries)`)}`, [
    `Identical: ${formatNumber(summary.identicalCount)}`,
    `Modified: ${formatNumber(summary.modifiedCount)}`,
    `Missing from target: ${formatNumber(summary.missingFromTargetCount)}`,
    `Extra in target: ${formatNumber(summary.extraInTargetCount)}`,
    `Duration: ${formatDuration(info.durationMs)}`,
  ]);
};

export const logComparisonError = (error: unknown, info: ComparisonStartInfo) => {
  const err =
    error instanceof Error ? error : new Error(typeof error === 'string' ? error : 'Unknown comparison error');
  emitError(`${red('☠️ [Compare]')} ${red('Comparison failed')}`, [
    `Source: ${info.sourceRoot}`,
    `Target: ${info.targetRoot}`,
    err.stack ?? err.message,
  ]);
};

export const compareLogger: ComparisonReporter = {
  comparisonStarted: logComparisonStart,
  indexCompleted: logIndexComplete,
  hashingCompleted: logHashingComplete,
  comparisonCompleted: logComparisonComplete,
  comparisonFailed: logComparisonError,
};
