/**
 * Ingestion Pipeline
 * Runs selected memos one at a time through transcribe → summarize → persist → link.
 */

import fs from 'fs/promises';
import { describeError, toIngestError } from '@/lib/errors';
import type { IngestErrorKind } from '@/lib/errors';
import { toVaultLink } from '@/lib/fs/storage';
import type { IngestContext } from './context';
import { mergeIntoDailyLog } from './daily-log';
import { selectMemos } from './memo-selector';
import { storeAudio, writeNote } from './note-writer';
import type {
  ActiveMemoStage,
  IngestRunReport,
  MemoFile,
  MemoOutcome,
} from './types';

// Kind given to untagged errors, by the stage they were thrown in
const FAILURE_KIND: Record<ActiveMemoStage, IngestErrorKind> = {
  selected: 'unexpected',
  transcribing: 'service-call',
  summarizing: 'service-call',
  persisting: 'persistence',
};

export interface IngestRunOptions {
  /** Checked before each memo; the in-flight memo fails through its service call */
  signal?: AbortSignal;
  /** Select only, no service calls and no vault writes */
  dryRun?: boolean;
}

export class IngestionPipeline {
  constructor(private readonly ctx: IngestContext) {}

  async run(options: IngestRunOptions = {}): Promise<IngestRunReport> {
    const { log } = this.ctx;
    const selection = await selectMemos(this.ctx);

    const report: IngestRunReport = {
      selected: selection.candidates,
      outcomes: [],
      excluded: selection.excluded,
      aborted: false,
      dryRun: options.dryRun ?? false,
    };

    if (selection.candidates.length === 0) {
      log.info('no new memos to process');
      return report;
    }

    log.info({ count: selection.candidates.length }, 'found unprocessed memos');
    if (report.dryRun) {
      return report;
    }

    for (const memo of selection.candidates) {
      if (options.signal?.aborted) {
        log.warn({ remaining: selection.candidates.length - report.outcomes.length }, 'run aborted');
        report.aborted = true;
        break;
      }
      report.outcomes.push(await this.processMemo(memo, options.signal));
    }

    return report;
  }

  /**
   * Drive one memo to a terminal state. Never throws: failures come back as a
   * 'failed' outcome, and the memo's fingerprint is only recorded on success.
   */
  async processMemo(memo: MemoFile, signal?: AbortSignal): Promise<MemoOutcome> {
    const { log, processed } = this.ctx;
    const memoLog = log.child({ memo: memo.name });

    // Two byte-identical memos in one run: the second becomes a duplicate once the first lands
    if (processed.has(memo.fingerprint)) {
      memoLog.info('identical memo already ingested in this run, skipping');
      return { status: 'skipped', memo, reason: 'duplicate' };
    }

    let stage: ActiveMemoStage = 'selected';
    const createdPaths: string[] = [];

    try {
      stage = 'transcribing';
      const bytes = await this.readMemo(memo);
      memoLog.info('transcribing');
      const transcription = await this.ctx.transcriber.transcribe({ fileName: memo.name, bytes }, signal);

      if (!transcription.trim()) {
        memoLog.info('empty transcription, skipping');
        return { status: 'skipped', memo, reason: 'empty-transcription' };
      }

      stage = 'summarizing';
      memoLog.info('generating summary and title');
      const summary = await this.ctx.summarizer.summarize(transcription, signal);

      stage = 'persisting';
      const audioPath = await storeAudio(this.ctx, memo, summary.shortSummary);
      createdPaths.push(audioPath);
      const notePath = await writeNote(this.ctx, memo, summary, transcription, audioPath);
      createdPaths.push(notePath);

      const dailyLog = await mergeIntoDailyLog(
        this.ctx.vault.diary,
        memo.createdAt,
        toVaultLink(this.ctx.vault, notePath, true)
      );
      memoLog.info({ dailyLog: dailyLog.path, created: dailyLog.created }, 'daily log updated');

      processed.add(memo.fingerprint);
      memoLog.info({ notePath }, 'successfully processed');

      return {
        status: 'linked',
        memo,
        title: summary.title,
        audioPath,
        notePath,
        dailyLogPath: dailyLog.path,
      };
    } catch (error) {
      const err = toIngestError(error, FAILURE_KIND[stage], memo.path);
      memoLog.error({ stage, kind: err.kind, error: err.message }, 'error processing memo');
      await this.rollback(createdPaths, memoLog);
      return { status: 'failed', memo, stage, error: err };
    }
  }

  private async readMemo(memo: MemoFile): Promise<Buffer> {
    try {
      return await fs.readFile(memo.path);
    } catch (error) {
      throw toIngestError(error, 'persistence', memo.path);
    }
  }

  /**
   * Remove what this attempt wrote. A leftover audio copy would mark the memo as
   * processed on the next run even though its note or log link is missing.
   */
  private async rollback(createdPaths: string[], memoLog: IngestContext['log']): Promise<void> {
    for (const filePath of createdPaths.reverse()) {
      try {
        await fs.rm(filePath, { force: true });
        memoLog.info({ filePath }, 'removed partial artifact');
      } catch (error) {
        memoLog.error({ filePath, error: describeError(error) }, 'failed to remove partial artifact');
      }
    }
  }
}
