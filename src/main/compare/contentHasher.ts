import crypto from 'crypto';
import { createReadStream } from 'fs';
import { createLogger } from '../../utils/log';

/** Resolves to a hex digest, or null when the file cannot be read. */
export type ContentHasher = (absolutePath: string) => Promise<string | null>;

const HASH_CHUNK_BYTES = 1024 * 1024;

const logger = createLogger('content-hasher');

/**
 * SHA-256 of a file's bytes, streamed in fixed-size chunks. Never rejects.
 */
export const sha256File: ContentHasher = async (absolutePath) => {
  const hash = crypto.createHash('sha256');
  const stream = createReadStream(absolutePath, { highWaterMark: HASH_CHUNK_BYTES });

  try {
    for await (const chunk of stream) {
      hash.update(chunk);
    }
    return hash.digest('hex');
  } catch (error) {
    logger.debug(`Hash unavailable for ${absolutePath}`, error);
    return null;
  } finally {
    stream.destroy();
  }
};
