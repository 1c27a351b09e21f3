import type { ComparisonSummary } from '../types/comparison';

const summary: ComparisonSummary = {
  identicalCount: 1200,
  modifiedCount: 2,
  missingFromTargetCount: 1,
  extraInTargetCount: 0,
  totalSourceBytes: 4096,
  totalTargetBytes: 2048,
};

const startInfo = { sourceRoot: '/data/photos', targetRoot: '/backup/photos', deepScan: true };

describe('compareLogger', () => {
  const originalEnv = { ...process.env };

  afterEach(() => {
    jest.resetModules();
    jest.restoreAllMocks();
    process.env = { ...originalEnv };
  });

  const captureLog = () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    return () => logSpy.mock.calls.map((call) => call.join(' ')).join('\n');
  };

  it('prints run progress when BACKUP_VERIFY_VERBOSE is enabled', async () => {
    process.env.BACKUP_VERIFY_VERBOSE = 'yes';
    const { compareLogger } = await import('../utils/compareLogger');
    const output = captureLog();

    compareLogger.comparisonStarted(startInfo);
    compareLogger.indexCompleted({ side: 'target', rootPath: '/backup/photos', entryCount: 1203, durationMs: 250 });
    compareLogger.comparisonCompleted({
      sourceRoot: '/data/photos',
      targetRoot: '/backup/photos',
      entryCount: 1204,
      summary,
      durationMs: 12500,
    });

    const text = output();
    expect(text).toContain('/data/photos');
    expect(text).toContain('Deep scan:');
    expect(text).toContain('Indexed target');
    expect(text).toContain('Entries: 1,203');
    expect(text).toContain('Duration: 0.25 s');
    expect(text).toContain('3 differing files');
    expect(text).toContain('Identical: 1,200');
    expect(text).toContain('Duration: 12.5 s');
  });

  it('flags unreadable files after hashing', async () => {
    process.env.BACKUP_VERIFY_VERBOSE = '1';
    const { logHashingComplete } = await import('../utils/compareLogger');
    const output = captureLog();

    logHashingComplete({ filesHashed: 10, unavailable: 2, durationMs: 40 });

    expect(output()).toContain('Hashed with 2 unreadable files');
  });

  it('stays quiet without the verbose toggle but still prints failures', async () => {
    delete process.env.BACKUP_VERIFY_VERBOSE;
    const { compareLogger } = await import('../utils/compareLogger');
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});

    compareLogger.comparisonStarted(startInfo);
    compareLogger.hashingCompleted({ filesHashed: 1, unavailable: 0, durationMs: 1 });
    compareLogger.comparisonFailed(new Error('disk went away'), startInfo);

    expect(logSpy).not.toHaveBeenCalled();
    const errors = errorSpy.mock.calls.map((call) => call.join(' ')).join('\n');
    expect(errors).toContain('Comparison failed');
    expect(errors).toContain('Source: /data/photos');
    expect(errors).toContain('disk went away');
  });

  it('formats durations and counts', async () => {
    const { formatDuration, formatNumber } = await import('../utils/compareLogger');

    expect(formatDuration(1234)).toBe('1.23 s');
    expect(formatDuration(12345)).toBe('12.3 s');
    expect(formatNumber(12345)).toBe('12,345');
    expect(formatNumber(undefined)).toBe('—');
  });
});
