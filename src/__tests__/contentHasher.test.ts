import crypto from 'crypto';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { sha256File } from '../main/compare/contentHasher';

describe('sha256File', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'content-hasher-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('returns the hex SHA-256 of the file contents', async () => {
    const filePath = path.join(tempDir, 'hello.txt');
    await fs.writeFile(filePath, 'hello');

    await expect(sha256File(filePath)).resolves.toBe(
      '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824',
    );
  });

  it('hashes files larger than one read chunk', async () => {
    const filePath = path.join(tempDir, 'large.bin');
    const data = Buffer.alloc(3 * 1024 * 1024 + 17, 7);
    await fs.writeFile(filePath, data);

    const expected = crypto.createHash('sha256').update(data).digest('hex');
    await expect(sha256File(filePath)).resolves.toBe(expected);
  });

  it('hashes an empty file', async () => {
    const filePath = path.join(tempDir, 'empty.txt');
    await fs.writeFile(filePath, '');

    await expect(sha256File(filePath)).resolves.toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
    );
  });

  it('resolves to null instead of rejecting when the file cannot be read', async () => {
    await expect(sha256File(path.join(tempDir, 'does-not-exist.txt'))).resolves.toBeNull();
    await expect(sha256File(tempDir)).resolves.toBeNull();
  });
});
