// Collision-free file creation (macOS/Linux naming style)
import fs from 'fs/promises';
import { constants } from 'fs';
import path from 'path';
import { hasErrorCode } from '@/lib/errors';

const MAX_NAME_ATTEMPTS = 1000;

/**
 * Candidate names for a file, following the macOS/Linux convention:
 * file.txt -> file 2.txt -> file 3.txt
 */
export function candidateFilename(filename: string, attempt: number): string {
  if (attempt <= 1) {
    return filename;
  }
  const ext = path.extname(filename);
  const base = path.basename(filename, ext);
  return `${base} ${attempt}${ext}`;
}

/**
 * Run an exclusive-create operation against successive candidate names until one
 * succeeds. The operation must fail with EEXIST when the target already exists,
 * so an existing file is never overwritten.
 *
 * @returns Absolute path of the file that was created
 */
async function createWithUniqueName(
  directory: string,
  filename: string,
  create: (targetPath: string) => Promise<void>
): Promise<string> {
  for (let attempt = 1; attempt <= MAX_NAME_ATTEMPTS; attempt++) {
    const targetPath = path.join(directory, candidateFilename(filename, attempt));
    try {
      await create(targetPath);
      return targetPath;
    } catch (error) {
      if (!hasErrorCode(error, 'EEXIST')) {
        throw error;
      }
    }
  }
  throw new Error(`No free filename for ${filename} in ${directory}`);
}

/**
 * Copy a file into directory under filename (or the next free variant of it).
 *
 * @example
 * await copyToUniqueFile('/memos/a.m4a', '/vault/attachments', 'memo.m4a')
 * // '/vault/attachments/memo.m4a', or '/vault/attachments/memo 2.m4a' if taken
 */
export function copyToUniqueFile(
  sourcePath: string,
  directory: string,
  filename: string
): Promise<string> {
  return createWithUniqueName(directory, filename, (targetPath) =>
    fs.copyFile(sourcePath, targetPath, constants.COPYFILE_EXCL)
  );
}

/**
 * Write text into directory under filename (or the next free variant of it).
 */
export function writeUniqueFile(
  directory: string,
  filename: string,
  content: string
): Promise<string> {
  return createWithUniqueName(directory, filename, (targetPath) =>
    fs.writeFile(targetPath, content, { encoding: 'utf-8', flag: 'wx' })
  );
}
