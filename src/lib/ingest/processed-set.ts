/**
 * Processed Set
 * Fingerprints of every audio file already in the attachment store.
 *
 * Rebuilt from disk each run; the attachment store itself is the durable index.
 * A file that cannot be hashed is left out, so the set never claims more than is
 * really stored: the worst case is reprocessing a duplicate, never skipping a new memo.
 */

import fs from 'fs/promises';
import path from 'path';
import type { Dirent } from 'fs';
import type { Fingerprint } from '@/lib/fs/content-hash';
import { describeError, hasErrorCode } from '@/lib/errors';
import type { Logger } from '@/lib/log/logger';

export type FileHasher = (filePath: string) => Promise<Fingerprint>;

export function hasExtension(fileName: string, extension: string): boolean {
  return path.extname(fileName).toLowerCase() === extension;
}

export class ProcessedSet {
  private readonly fingerprints = new Set<Fingerprint>();

  constructor(initial: Iterable<Fingerprint> = []) {
    for (const fingerprint of initial) {
      this.fingerprints.add(fingerprint);
    }
  }

  has(fingerprint: Fingerprint): boolean {
    return this.fingerprints.has(fingerprint);
  }

  add(fingerprint: Fingerprint): void {
    this.fingerprints.add(fingerprint);
  }

  get size(): number {
    return this.fingerprints.size;
  }

  /**
   * Hash every audio file directly inside directory (non-recursive).
   */
  static async build(
    directory: string,
    extension: string,
    hasher: FileHasher,
    log: Logger
  ): Promise<ProcessedSet> {
    const set = new ProcessedSet();

    let entries: Dirent[];
    try {
      entries = await fs.readdir(directory, { withFileTypes: true });
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        log.info({ directory }, 'attachment store does not exist yet');
        return set;
      }
      throw error;
    }

    for (const entry of entries) {
      if (!entry.isFile() || !hasExtension(entry.name, extension)) {
        continue;
      }
      const filePath = path.join(directory, entry.name);
      try {
        set.add(await hasher(filePath));
      } catch (error) {
        log.warn({ filePath, error: describeError(error) }, 'could not hash stored audio file');
      }
    }

    log.info({ count: set.size, directory }, 'found existing audio files in attachments folder');
    return set;
  }
}
