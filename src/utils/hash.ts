import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { IOError } from '../errors.js';

export type ContentId = string;

const CHUNK_BYTES = 64 * 1024;
const CONTENT_ID_LENGTH = 10;

export const CONTENT_ID_PATTERN = /^[0-9a-f]{10}$/;

/**
 * SHA-256 of the file's bytes, truncated to the last 10 hex characters.
 * Good enough to dedupe a local pool; not meant to resist crafted collisions.
 */
export async function hashFile(filePath: string): Promise<ContentId> {
  const hash = createHash('sha256');
  try {
    for await (const chunk of createReadStream(filePath, { highWaterMark: CHUNK_BYTES })) {
      hash.update(chunk);
    }
  } catch (err) {
    throw new IOError(`Unable to read ${filePath}`, filePath, { cause: err });
  }
  return hash.digest('hex').slice(-CONTENT_ID_LENGTH);
}
