/**
 * One ingest run from the command line: settings → context → pipeline → summary.
 */

import { format } from 'date-fns';
import { OpenAISummaryClient } from '@/lib/ai/memo-summary';
import type { SummaryClient } from '@/lib/ai/memo-summary';
import { OpenAITranscriptionClient } from '@/lib/ai/transcription';
import type { TranscriptionClient } from '@/lib/ai/transcription';
import { assertRequiredPaths, loadSettings } from '@/lib/config/env';
import type { SettingsEnv } from '@/lib/config/env';
import type { OpenAISettings } from '@/lib/config/settings';
import { describeError, isIngestError, toIngestError } from '@/lib/errors';
import { createIngestContext } from '@/lib/ingest/context';
import type { IngestFileSystem } from '@/lib/ingest/context';
import { IngestionPipeline } from '@/lib/ingest/pipeline';
import type { IngestRunReport, MemoOutcome } from '@/lib/ingest/types';
import { getLogger } from '@/lib/log/logger';
import { createOpenAIClient } from '@/lib/vendors/openai';
import { USAGE, parseCliArgs } from './args';
import type { CliArgs } from './args';

const log = getLogger({ module: 'Cli' });

export const EXIT_CODES = {
  ok: 0,
  failed: 1,
  configuration: 2,
} as const;

export interface ServiceClients {
  transcriber: TranscriptionClient;
  summarizer: SummaryClient;
}

export interface RunIngestDeps {
  env?: SettingsEnv;
  signal?: AbortSignal;
  createClients?: (settings: OpenAISettings) => ServiceClients;
  files?: Partial<IngestFileSystem>;
  /** Where usage and configuration errors go */
  print?: (text: string) => void;
}

export function createOpenAIClients(settings: OpenAISettings): ServiceClients {
  const client = createOpenAIClient(settings);
  return {
    transcriber: new OpenAITranscriptionClient(client, settings.transcriptionModel),
    summarizer: new OpenAISummaryClient(client, settings.model),
  };
}

export interface RunSummary {
  selected: number;
  linked: number;
  skipped: number;
  failed: number;
  excluded: number;
}

export function summarizeReport(report: IngestRunReport): RunSummary {
  const count = (status: MemoOutcome['status']) => report.outcomes.filter((o) => o.status === status).length;
  return {
    selected: report.selected.length,
    linked: count('linked'),
    skipped: count('skipped'),
    failed: count('failed'),
    excluded: report.excluded.length,
  };
}

function logReport(report: IngestRunReport): void {
  if (report.dryRun) {
    for (const memo of report.selected) {
      log.info({ memo: memo.name, createdAt: format(memo.createdAt, 'yyyy-MM-dd HH:mm:ss') }, 'would process');
    }
    return;
  }

  for (const outcome of report.outcomes) {
    switch (outcome.status) {
      case 'linked':
        log.info({ memo: outcome.memo.name, note: outcome.notePath }, '✓ linked');
        break;
      case 'skipped':
        log.info({ memo: outcome.memo.name, reason: outcome.reason }, '- skipped');
        break;
      case 'failed':
        log.error(
          { memo: outcome.memo.name, stage: outcome.stage, kind: outcome.error.kind, error: outcome.error.message },
          '✗ failed'
        );
        break;
    }
  }
  for (const excluded of report.excluded) {
    log.warn({ filePath: excluded.path, error: excluded.error.message }, 'excluded');
  }
  log.info(summarizeReport(report), 'processing complete');
}

export async function runIngest(argv: string[], deps: RunIngestDeps = {}): Promise<number> {
  const print = deps.print ?? ((text: string) => console.error(text));

  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    print(describeError(error));
    return EXIT_CODES.configuration;
  }

  if (args.help) {
    (deps.print ?? ((text: string) => console.log(text)))(USAGE);
    return EXIT_CODES.ok;
  }

  const env: SettingsEnv = { ...(deps.env ?? process.env) };
  if (args.after) {
    env.PROCESS_FILES_AFTER_DATE = args.after;
  }

  try {
    const settings = loadSettings(env);
    await assertRequiredPaths(settings);

    const clients = (deps.createClients ?? createOpenAIClients)(settings.openai);
    const ctx = await createIngestContext({
      vault: settings.vault,
      source: settings.memos,
      transcriber: clients.transcriber,
      summarizer: clients.summarizer,
      files: deps.files,
      dryRun: args.dryRun,
    });

    const report = await new IngestionPipeline(ctx).run({ signal: deps.signal, dryRun: args.dryRun });
    logReport(report);

    const summary = summarizeReport(report);
    return summary.failed > 0 || report.aborted ? EXIT_CODES.failed : EXIT_CODES.ok;
  } catch (error) {
    if (isIngestError(error) && error.kind === 'configuration') {
      print(`Configuration error: ${error.message}`);
      return EXIT_CODES.configuration;
    }
    const err = toIngestError(error, 'unexpected');
    log.error({ err: error, kind: err.kind }, `unexpected error: ${err.message}`);
    return EXIT_CODES.failed;
  }
}
