/**
 * Core types for the memo ingestion pipeline
 */

import type { Fingerprint } from '@/lib/fs/content-hash';
import type { IngestError } from '@/lib/errors';

/**
 * A candidate memo in the source directory. Never mutated by the pipeline.
 */
export interface MemoFile {
  path: string;
  name: string;
  createdAt: Date;
  fingerprint: Fingerprint;
}

/**
 * Memo lifecycle: selected → transcribing → summarizing → persisting → linked
 *
 * - skipped: terminal non-error outcome (empty transcription, duplicate within the run)
 * - failed: terminal, reachable from any non-terminal stage
 */
export type MemoStage =
  | 'selected'
  | 'transcribing'
  | 'summarizing'
  | 'persisting'
  | 'linked'
  | 'skipped'
  | 'failed';

export type ActiveMemoStage = Exclude<MemoStage, 'linked' | 'skipped' | 'failed'>;

export type SkipReason = 'empty-transcription' | 'duplicate';

export interface LinkedOutcome {
  status: 'linked';
  memo: MemoFile;
  title: string;
  audioPath: string;
  notePath: string;
  dailyLogPath: string;
}

export interface SkippedOutcome {
  status: 'skipped';
  memo: MemoFile;
  reason: SkipReason;
}

export interface FailedOutcome {
  status: 'failed';
  memo: MemoFile;
  /** Last stage entered before the failure */
  stage: ActiveMemoStage;
  error: IngestError;
}

export type MemoOutcome = LinkedOutcome | SkippedOutcome | FailedOutcome;

/**
 * A source file left out of the work list because it could not be read.
 */
export interface ExcludedMemo {
  path: string;
  error: IngestError;
}

export interface MemoSelection {
  candidates: MemoFile[];
  excluded: ExcludedMemo[];
}

export interface IngestRunReport {
  selected: MemoFile[];
  outcomes: MemoOutcome[];
  excluded: ExcludedMemo[];
  /** True when the run stopped early because its signal was aborted */
  aborted: boolean;
  dryRun: boolean;
}
