/**
 * Daily Log Merger
 * One markdown file per calendar day, with a "Voice Memos" section of note links.
 *
 * Always a full read and a full rewrite. There is no dedup here: merging the same
 * link twice appends it twice. Reprocessing is prevented upstream by the processed set.
 */

import fs from 'fs/promises';
import path from 'path';
import { format } from 'date-fns';
import { writeFileAtomic } from '@/lib/fs/atomic-write';
import { hasErrorCode } from '@/lib/errors';

export const VOICE_MEMOS_HEADING = '## Voice Memos';

// A heading of level 1 or 2 ends the Voice Memos section
const SECTION_END = /^#{1,2}\s/;

export interface DailyLogMergeResult {
  path: string;
  created: boolean;
}

export function dailyLogFilename(date: Date): string {
  return `${format(date, 'yyyy-MM-dd')}.md`;
}

export function formatLinkLine(noteLink: string): string {
  return `- [[${noteLink}]]`;
}

export function renderDailyLog(date: Date, linkLine: string): string {
  return `# ${format(date, 'yyyy-MM-dd')}

${VOICE_MEMOS_HEADING}
${linkLine}
`;
}

/**
 * Insert linkLine at the end of the Voice Memos section, adding the section at the
 * end of the document when it is missing.
 */
export function appendLinkToDailyLog(content: string, linkLine: string): string {
  // Keep the file's own line endings
  const eol = content.includes('\r\n') ? '\r\n' : '\n';
  const lines = content.split(eol);
  const headingIndex = lines.findIndex((line) => line.trim() === VOICE_MEMOS_HEADING);

  if (headingIndex === -1) {
    return `${content.trimEnd()}${eol}${eol}${VOICE_MEMOS_HEADING}${eol}${linkLine}${eol}`;
  }

  let sectionEnd = lines.length;
  for (let i = headingIndex + 1; i < lines.length; i++) {
    if (SECTION_END.test(lines[i])) {
      sectionEnd = i;
      break;
    }
  }

  // Keep blank lines that separate the section from what follows
  let insertAt = sectionEnd;
  while (insertAt > headingIndex + 1 && lines[insertAt - 1].trim() === '') {
    insertAt--;
  }

  lines.splice(insertAt, 0, linkLine);
  const merged = lines.join(eol);
  return merged.endsWith(eol) ? merged : `${merged}${eol}`;
}

async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return null;
    }
    throw error;
  }
}

/**
 * @param noteLink Vault-relative note path without extension
 */
export async function mergeIntoDailyLog(
  diaryDir: string,
  date: Date,
  noteLink: string
): Promise<DailyLogMergeResult> {
  const logPath = path.join(diaryDir, dailyLogFilename(date));
  const linkLine = formatLinkLine(noteLink);
  const existing = await readIfExists(logPath);

  if (existing === null) {
    await writeFileAtomic(logPath, renderDailyLog(date, linkLine));
    return { path: logPath, created: true };
  }

  await writeFileAtomic(logPath, appendLinkToDailyLog(existing, linkLine));
  return { path: logPath, created: false };
}
