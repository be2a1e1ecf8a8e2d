import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { HashError, errorMessage } from './logger.js';

export const DEFAULT_HASH_CHUNK_BYTES = 64 * 1024;

export interface HashOptions {
  chunkBytes?: number;
}

export type FileHasher = (filePath: string, options?: HashOptions) => Promise<string>;

/**
 * SHA-256 of a file's content, read in chunks of at most `chunkBytes`
 */
export const hashFile: FileHasher = (filePath, options = {}) => {
  const chunkBytes = options.chunkBytes ?? DEFAULT_HASH_CHUNK_BYTES;

  return new Promise<string>((resolve, reject) => {
    const digest = createHash('sha256');
    const stream = createReadStream(filePath, { highWaterMark: chunkBytes });

    stream.on('error', error => reject(new HashError(filePath, errorMessage(error))));
    stream.on('data', chunk => digest.update(chunk));
    stream.on('end', () => resolve(digest.digest('hex')));
  });
};
