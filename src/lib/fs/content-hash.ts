import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { IngestError, describeError } from '@/lib/errors';

/** Hex SHA-256 of a file's full byte content; the sole deduplication key. */
export type Fingerprint = string;

/**
 * Fingerprint a file by streaming its bytes through SHA-256.
 * Read failures surface as a 'hashing' IngestError.
 */
export async function hashFile(filePath: string): Promise<Fingerprint> {
  const hash = createHash('sha256');
  try {
    for await (const chunk of createReadStream(filePath)) {
      hash.update(chunk);
    }
  } catch (error) {
    throw new IngestError('hashing', `Could not hash ${filePath}: ${describeError(error)}`, {
      cause: error,
      filePath,
    });
  }
  return hash.digest('hex');
}
