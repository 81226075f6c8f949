/**
 * Memo Selector
 * Builds the work list for a run from the source directory.
 */

import fs from 'fs/promises';
import path from 'path';
import { toIngestError } from '@/lib/errors';
import type { IngestContext } from './context';
import { hasExtension } from './processed-set';
import type { MemoFile, MemoSelection } from './types';

/**
 * Enumerate memos in directory order (unspecified; callers must not rely on it).
 *
 * Per file: drop it if it was created before the date floor (without hashing it),
 * otherwise hash it and drop it if the fingerprint is already processed.
 * Files that cannot be read are reported as excluded, never treated as new or duplicate.
 */
export async function selectMemos(ctx: IngestContext): Promise<MemoSelection> {
  const { source, log } = ctx;
  const entries = await fs.readdir(source.path, { withFileTypes: true });

  const candidates: MemoFile[] = [];
  const excluded: MemoSelection['excluded'] = [];

  for (const entry of entries) {
    if (!entry.isFile() || !hasExtension(entry.name, source.extension)) {
      continue;
    }
    const filePath = path.join(source.path, entry.name);

    let createdAt: Date;
    try {
      createdAt = await ctx.files.readCreationTime(filePath);
    } catch (error) {
      const err = toIngestError(error, 'hashing', filePath);
      log.warn({ filePath, error: err.message }, 'could not read memo timestamps');
      excluded.push({ path: filePath, error: err });
      continue;
    }

    if (source.processAfter && createdAt < source.processAfter) {
      log.debug({ filePath, createdAt }, 'memo created before cutoff date, skipping');
      continue;
    }

    let fingerprint: string;
    try {
      fingerprint = await ctx.files.hashFile(filePath);
    } catch (error) {
      const err = toIngestError(error, 'hashing', filePath);
      log.warn({ filePath, error: err.message }, 'could not hash memo');
      excluded.push({ path: filePath, error: err });
      continue;
    }

    if (ctx.processed.has(fingerprint)) {
      log.debug({ filePath }, 'memo already processed');
      continue;
    }

    candidates.push({ path: filePath, name: entry.name, createdAt, fingerprint });
  }

  return { candidates, excluded };
}
