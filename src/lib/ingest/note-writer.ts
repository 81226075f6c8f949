/**
 * Note Writer
 * Copies the memo audio into the attachment store and writes the memo note.
 */

import path from 'path';
import { format } from 'date-fns';
import { copyToUniqueFile, writeUniqueFile } from '@/lib/fs/fileDeduplication';
import { toVaultLink } from '@/lib/fs/storage';
import type { SummaryResult } from '@/lib/ai/memo-summary';
import type { IngestContext } from './context';
import { sanitizeFilename } from './sanitize';
import type { MemoFile } from './types';

const FILENAME_TIMESTAMP = 'yyyyMMdd_HHmmss';

export interface NoteContent {
  title: string;
  createdAt: Date;
  audioLink: string; // vault-relative path of the stored audio
  summary: string;
  transcription: string;
}

export function renderNote(note: NoteContent): string {
  return `# ${note.title}

**Date:** ${format(note.createdAt, 'yyyy-MM-dd HH:mm:ss')}
**Audio:** [[${note.audioLink}]]

## Summary
${note.summary}

## Transcription
${note.transcription}

---
*Generated automatically from voice memo*
`;
}

/**
 * Stored audio is named after the ingestion time, not the memo's creation time.
 */
export function storedAudioFilename(ingestedAt: Date, shortSummary: string, extension: string): string {
  return `${format(ingestedAt, FILENAME_TIMESTAMP)}_${sanitizeFilename(shortSummary)}${extension}`;
}

export function noteFilename(createdAt: Date, title: string): string {
  return `${format(createdAt, FILENAME_TIMESTAMP)}_${sanitizeFilename(title)}.md`;
}

/**
 * @returns Absolute path of the stored copy
 */
export async function storeAudio(ctx: IngestContext, memo: MemoFile, shortSummary: string): Promise<string> {
  const extension = path.extname(memo.name).toLowerCase() || ctx.source.extension;
  const filename = storedAudioFilename(ctx.now(), shortSummary, extension);
  ctx.log.info({ filePath: memo.path, filename }, 'copying audio file');
  return copyToUniqueFile(memo.path, ctx.vault.attachments, filename);
}

/**
 * @returns Absolute path of the written note
 */
export async function writeNote(
  ctx: IngestContext,
  memo: MemoFile,
  summary: SummaryResult,
  transcription: string,
  audioPath: string
): Promise<string> {
  const content = renderNote({
    title: summary.title,
    createdAt: memo.createdAt,
    audioLink: toVaultLink(ctx.vault, audioPath),
    summary: summary.longSummary,
    transcription,
  });
  const filename = noteFilename(memo.createdAt, summary.title);
  ctx.log.info({ filename }, 'creating note');
  return writeUniqueFile(ctx.vault.notes, filename, content);
}
