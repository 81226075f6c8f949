import fs from 'fs/promises';
import type { Stats } from 'fs';

export type CreationTimeStats = Pick<Stats, 'birthtime' | 'birthtimeMs' | 'mtime'>;

/**
 * Best creation timestamp the platform offers.
 * Filesystems without birth time support report 0 (the epoch); fall back to mtime there.
 */
export function resolveCreationTime(stats: CreationTimeStats): Date {
  if (Number.isFinite(stats.birthtimeMs) && stats.birthtimeMs > 0) {
    return stats.birthtime;
  }
  return stats.mtime;
}

export async function readCreationTime(filePath: string): Promise<Date> {
  const stats = await fs.stat(filePath);
  return resolveCreationTime(stats);
}
