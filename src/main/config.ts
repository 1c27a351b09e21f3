import os from 'os';
import path from 'path';
import { DEFAULT_IGNORE_PATTERNS } from './compare/ignoreList';
import { createLogger, type LogLevelSetting } from '../utils/log';

export interface CompareConfig {
  ignorePatterns: string[];
  hashConcurrency: number;
  snapshotDirectory: string;
  logLevel: LogLevelSetting;
  logFile: string | null;
}

const logger = createLogger('compare-config');

const DEFAULT_HASH_CONCURRENCY = 4;
const LOG_LEVELS: readonly LogLevelSetting[] = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'];

const IGNORE_ENV = process.env.BACKUP_VERIFY_IGNORE;
const HASH_CONCURRENCY_ENV = process.env.BACKUP_VERIFY_HASH_CONCURRENCY;
const SNAPSHOT_DIR_ENV = process.env.BACKUP_VERIFY_SNAPSHOT_DIR;
const LOG_LEVEL_ENV = process.env.BACKUP_VERIFY_LOG_LEVEL;
const LOG_FILE_ENV = process.env.BACKUP_VERIFY_LOG_FILE;
const IS_TEST = process.env.NODE_ENV === 'test';

export const parsePatternList = (value: string | undefined): string[] =>
  (value ?? '')
    .split(',')
    .map((pattern) => pattern.trim())
    .filter(Boolean);

const parseConcurrency = (value: string | undefined): number => {
  if (value === undefined || value === '') {
    return DEFAULT_HASH_CONCURRENCY;
  }
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    logger.warn(`Ignoring invalid BACKUP_VERIFY_HASH_CONCURRENCY value "${value}".`);
    return DEFAULT_HASH_CONCURRENCY;
  }
  return parsed;
};

const parseLogLevel = (value: string | undefined): LogLevelSetting => {
  if (!value) {
    return IS_TEST ? false : 'info';
  }
  const normalised = value.trim().toLowerCase();
  if (['off', 'false', 'none', '0'].includes(normalised)) {
    return false;
  }
  const match = LOG_LEVELS.find((level) => level === normalised);
  return match ?? 'info';
};

const DEFAULT_CONFIG: CompareConfig = {
  ignorePatterns: [...DEFAULT_IGNORE_PATTERNS, ...parsePatternList(IGNORE_ENV)],
  hashConcurrency: parseConcurrency(HASH_CONCURRENCY_ENV),
  snapshotDirectory: SNAPSHOT_DIR_ENV
    ? path.resolve(SNAPSHOT_DIR_ENV)
    : path.join(os.homedir(), '.backup-verify', 'snapshots'),
  logLevel: parseLogLevel(LOG_LEVEL_ENV),
  logFile: LOG_FILE_ENV ? path.resolve(LOG_FILE_ENV) : null,
};

/**
 * Environment defaults merged with explicit overrides. Extra ignore patterns
 * are appended to the configured list rather than replacing it.
 */
export const resolveCompareConfig = (
  overrides?: Partial<CompareConfig> & { extraIgnorePatterns?: string[] },
): CompareConfig => {
  const { extraIgnorePatterns, ...rest } = overrides ?? {};
  const merged: CompareConfig = { ...DEFAULT_CONFIG, ...rest };
  merged.ignorePatterns = [...merged.ignorePatterns, ...(extraIgnorePatterns ?? [])];
  if (!Number.isInteger(merged.hashConcurrency) || merged.hashConcurrency <= 0) {
    merged.hashConcurrency = DEFAULT_HASH_CONCURRENCY;
  }
  return merged;
};
