import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ComparisonCancelledError } from '../main/compare/errors';
import { indexDirectory } from '../main/compare/pathIndexer';

describe('indexDirectory', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'path-indexer-'));
    await fs.mkdir(path.join(tempDir, 'docs', 'nested'), { recursive: true });
    await fs.mkdir(path.join(tempDir, 'empty'));
    await fs.mkdir(path.join(tempDir, '$Recycle.Bin', 'S-1-5-21'), { recursive: true });
    await fs.writeFile(path.join(tempDir, 'root.txt'), 'root file');
    await fs.writeFile(path.join(tempDir, 'docs', 'a.txt'), 'a'.repeat(100));
    await fs.writeFile(path.join(tempDir, 'docs', 'nested', 'b.txt'), 'b'.repeat(50));
    await fs.writeFile(path.join(tempDir, '$Recycle.Bin', 'S-1-5-21', 'deleted.txt'), 'gone');
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('indexes every file and directory under the root by relative path', async () => {
    const index = await indexDirectory(tempDir);

    expect([...index.keys()].sort()).toEqual([
      '$Recycle.Bin',
      '$Recycle.Bin/S-1-5-21',
      '$Recycle.Bin/S-1-5-21/deleted.txt',
      'docs',
      'docs/a.txt',
      'docs/nested',
      'docs/nested/b.txt',
      'empty',
      'root.txt',
    ]);
  });

  it('records file sizes and gives directories a size of zero', async () => {
    const index = await indexDirectory(tempDir);

    expect(index.get('docs/a.txt')).toMatchObject({
      absolutePath: path.join(path.resolve(tempDir), 'docs', 'a.txt'),
      sizeBytes: 100,
      isDirectory: false,
    });
    expect(index.get('docs/a.txt')?.modifiedAt.getTime()).toEqual(expect.any(Number));
    expect(index.get('docs/a.txt')?.modifiedAtMs).toEqual(expect.any(Number));
    expect(index.get('docs')).toMatchObject({ sizeBytes: 0, isDirectory: true });
    expect(index.get('empty')).toMatchObject({ sizeBytes: 0, isDirectory: true });
  });

  it('prunes ignored subtrees before walking them', async () => {
    const readdirSpy = jest.spyOn(fs, 'readdir');
    try {
      const index = await indexDirectory(tempDir, { ignorePatterns: ['$recycle.bin'] });

      expect([...index.keys()].some((key) => key.startsWith('$Recycle.Bin'))).toBe(false);
      expect(index.has('docs/nested/b.txt')).toBe(true);
      const walked = readdirSpy.mock.calls.map((call) => String(call[0]));
      expect(walked.some((dir) => dir.includes('$Recycle.Bin'))).toBe(false);
    } finally {
      readdirSpy.mockRestore();
    }
  });

  it('skips entries that fail to stat and keeps walking', async () => {
    const realStat = fs.stat.bind(fs);
    const statSpy = jest.spyOn(fs, 'stat').mockImplementation(async (target) => {
      if (String(target).endsWith(path.join('docs', 'a.txt'))) {
        throw Object.assign(new Error('permission denied'), { code: 'EACCES' });
      }
      return realStat(target);
    });
    try {
      const index = await indexDirectory(tempDir);

      expect(index.has('docs/a.txt')).toBe(false);
      expect(index.has('docs/nested/b.txt')).toBe(true);
      expect(index.has('root.txt')).toBe(true);
    } finally {
      statSpy.mockRestore();
    }
  });

  it('indexes symbolic links to files but never enters linked directories', async () => {
    const dirLink = path.join(tempDir, 'docs-link');
    const fileLink = path.join(tempDir, 'root-link.txt');
    await fs.symlink(path.join(tempDir, 'docs'), dirLink);
    await fs.symlink(path.join(tempDir, 'root.txt'), fileLink);
    try {
      const index = await indexDirectory(tempDir);
      expect(index.has('docs-link')).toBe(false);
      expect(index.has('docs-link/a.txt')).toBe(false);
      expect(index.get('root-link.txt')).toMatchObject({
        absolutePath: path.join(path.resolve(tempDir), 'root-link.txt'),
        sizeBytes: 'root file'.length,
        isDirectory: false,
      });
    } finally {
      await fs.rm(dirLink, { force: true });
      await fs.rm(fileLink, { force: true });
    }
  });

  it('skips broken symbolic links', async () => {
    const linkPath = path.join(tempDir, 'dangling.txt');
    await fs.symlink(path.join(tempDir, 'nowhere.txt'), linkPath);
    try {
      const index = await indexDirectory(tempDir);
      expect(index.has('dangling.txt')).toBe(false);
    } finally {
      await fs.rm(linkPath, { force: true });
    }
  });

  it('does not prune the walk when a pattern only matches the root path', async () => {
    const index = await indexDirectory(tempDir, { ignorePatterns: [path.basename(tempDir)] });

    expect(index.has('docs/nested/b.txt')).toBe(true);
  });

  it('fails with a cancellation error when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(indexDirectory(tempDir, { signal: controller.signal })).rejects.toBeInstanceOf(
      ComparisonCancelledError,
    );
  });
});
