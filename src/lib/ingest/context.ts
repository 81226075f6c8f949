/**
 * Ingest Context
 * Everything one run needs, constructed once and passed to every component.
 */

import type { MemoSourceSettings, VaultSettings } from '@/lib/config/settings';
import type { SummaryClient } from '@/lib/ai/memo-summary';
import type { TranscriptionClient } from '@/lib/ai/transcription';
import { hashFile } from '@/lib/fs/content-hash';
import { readCreationTime } from '@/lib/fs/file-times';
import { initializeVault, resolveVaultPaths } from '@/lib/fs/storage';
import type { VaultPaths } from '@/lib/fs/storage';
import { getLogger } from '@/lib/log/logger';
import type { Logger } from '@/lib/log/logger';
import { ProcessedSet } from './processed-set';
import type { FileHasher } from './processed-set';

/**
 * File-system capabilities the pipeline needs beyond plain reads and writes.
 */
export interface IngestFileSystem {
  hashFile: FileHasher;
  readCreationTime(filePath: string): Promise<Date>;
}

export interface IngestContext {
  vault: VaultPaths;
  source: MemoSourceSettings;
  transcriber: TranscriptionClient;
  summarizer: SummaryClient;
  processed: ProcessedSet;
  files: IngestFileSystem;
  now: () => Date;
  log: Logger;
}

export interface CreateIngestContextOptions {
  vault: VaultSettings;
  source: MemoSourceSettings;
  transcriber: TranscriptionClient;
  summarizer: SummaryClient;
  files?: Partial<IngestFileSystem>;
  now?: () => Date;
  log?: Logger;
  /** Leave the vault untouched: no folders are created */
  dryRun?: boolean;
}

export const defaultFileSystem: IngestFileSystem = {
  hashFile,
  readCreationTime,
};

/**
 * Create the vault folders if needed and build the processed set from the attachment store.
 * A missing attachment store (possible on a dry run) yields an empty set.
 */
export async function createIngestContext(options: CreateIngestContextOptions): Promise<IngestContext> {
  const log = options.log ?? getLogger({ module: 'IngestionPipeline' });
  const files: IngestFileSystem = { ...defaultFileSystem, ...options.files };
  const vault = resolveVaultPaths(options.vault);

  if (!options.dryRun) {
    await initializeVault(vault);
  }
  const processed = await ProcessedSet.build(
    vault.attachments,
    options.source.extension,
    files.hashFile,
    log
  );

  return {
    vault,
    source: options.source,
    transcriber: options.transcriber,
    summarizer: options.summarizer,
    processed,
    files,
    now: options.now ?? (() => new Date()),
    log,
  };
}
