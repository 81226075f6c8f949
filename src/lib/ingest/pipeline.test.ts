import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createIngestContext } from './context';
import { IngestionPipeline } from './pipeline';
import {
  FakeSummarizer,
  FakeTranscriber,
  createTempWorkspace,
  creationTimes,
  listDir,
  silentLogger,
} from './test-utils';
import type { TempWorkspace } from './test-utils';
import type { LinkedOutcome, MemoOutcome } from './types';

const times = {
  'a.m4a': new Date(2024, 4, 1, 9, 0, 0),
  'b.m4a': new Date(2024, 4, 1, 10, 0, 0),
  'c.m4a': new Date(2024, 4, 1, 11, 0, 0),
  'a-copy.m4a': new Date(2024, 4, 1, 12, 0, 0),
};

function isLinked(outcome: MemoOutcome): outcome is LinkedOutcome {
  return outcome.status === 'linked';
}

describe('IngestionPipeline', () => {
  let ws: TempWorkspace;
  let attachmentsDir: string;
  let notesDir: string;
  let diaryDir: string;

  beforeEach(async () => {
    ws = await createTempWorkspace();
    attachmentsDir = path.join(ws.vaultDir, 'attachments');
    notesDir = path.join(ws.vaultDir, 'notes', 'memos');
    diaryDir = path.join(ws.vaultDir, 'diary');
    await fs.writeFile(path.join(ws.memosDir, 'a.m4a'), 'audio a');
    await fs.writeFile(path.join(ws.memosDir, 'b.m4a'), 'audio b');
    await fs.writeFile(path.join(ws.memosDir, 'c.m4a'), 'audio c');
  });

  afterEach(async () => {
    await ws.cleanup();
  });

  async function pipelineWith(
    transcriber = new FakeTranscriber(),
    summarizer = new FakeSummarizer(),
    dryRun = false
  ) {
    const ctx = await createIngestContext({
      dryRun,
      vault: ws.vault,
      source: ws.source,
      transcriber,
      summarizer,
      files: { readCreationTime: creationTimes(times) },
      now: () => new Date(2024, 5, 1, 12, 0, 0),
      log: silentLogger,
    });
    return { ctx, pipeline: new IngestionPipeline(ctx) };
  }

  it('ingests every new memo into notes, attachments and the daily log', async () => {
    const { pipeline } = await pipelineWith();

    const report = await pipeline.run();

    expect(report.selected).toHaveLength(3);
    expect(report.outcomes.map((o) => o.status)).toEqual(['linked', 'linked', 'linked']);
    expect(await listDir(attachmentsDir)).toEqual([
      '20240601_120000_short a.m4a',
      '20240601_120000_short b.m4a',
      '20240601_120000_short c.m4a',
    ]);
    expect(await listDir(notesDir)).toEqual([
      '20240501_090000_Memo a.md',
      '20240501_100000_Memo b.md',
      '20240501_110000_Memo c.md',
    ]);

    // Links follow processing order, whatever order the directory listing gave
    const expectedLinks = report.outcomes
      .filter(isLinked)
      .map((o) => `- [[notes/memos/${path.basename(o.notePath, '.md')}]]`);
    expect(await fs.readFile(path.join(diaryDir, '2024-05-01.md'), 'utf-8')).toBe(
      `# 2024-05-01\n\n## Voice Memos\n${expectedLinks.join('\n')}\n`
    );
  });

  it('writes the note body from the summary and transcription', async () => {
    const { pipeline } = await pipelineWith();

    await pipeline.run();

    const note = await fs.readFile(path.join(notesDir, '20240501_090000_Memo a.md'), 'utf-8');
    expect(note).toBe(
      '# Memo a\n\n' +
        '**Date:** 2024-05-01 09:00:00\n' +
        '**Audio:** [[attachments/20240601_120000_short a.m4a]]\n\n' +
        '## Summary\nlong a\n\n' +
        '## Transcription\ntranscript of a.m4a\n\n' +
        '---\n*Generated automatically from voice memo*\n'
    );
  });

  it('processes nothing on a second run against the same vault', async () => {
    const first = await pipelineWith();
    await first.pipeline.run();

    const transcriber = new FakeTranscriber();
    const second = await pipelineWith(transcriber);
    const report = await second.pipeline.run();

    expect(second.ctx.processed.size).toBe(3);
    expect(report.selected).toEqual([]);
    expect(report.outcomes).toEqual([]);
    expect(transcriber.calls).toEqual([]);
  });

  it('records fingerprints in memory as memos succeed', async () => {
    const { ctx, pipeline } = await pipelineWith();

    const report = await pipeline.run();

    for (const memo of report.selected) {
      expect(ctx.processed.has(memo.fingerprint)).toBe(true);
    }
    expect((await pipeline.run()).selected).toEqual([]);
  });

  it('skips an empty transcription without writing anything for it', async () => {
    const { ctx, pipeline } = await pipelineWith(new FakeTranscriber({ 'b.m4a': '  \n ' }));

    const report = await pipeline.run();

    const skipped = report.outcomes.find((o) => o.memo.name === 'b.m4a');
    expect(skipped).toMatchObject({ status: 'skipped', reason: 'empty-transcription' });
    expect(skipped && ctx.processed.has(skipped.memo.fingerprint)).toBe(false);
    expect(await listDir(attachmentsDir)).toEqual([
      '20240601_120000_short a.m4a',
      '20240601_120000_short c.m4a',
    ]);
    expect(await listDir(notesDir)).toEqual(['20240501_090000_Memo a.md', '20240501_110000_Memo c.md']);
    const dailyLog = await fs.readFile(path.join(diaryDir, '2024-05-01.md'), 'utf-8');
    expect(dailyLog).not.toContain('Memo b');
  });

  it('keeps going when one memo fails to summarize, leaving nothing behind for it', async () => {
    const { ctx, pipeline } = await pipelineWith(undefined, new FakeSummarizer(['transcript of b.m4a']));

    const report = await pipeline.run();

    const byName = new Map(report.outcomes.map((o) => [o.memo.name, o]));
    expect(byName.get('a.m4a')?.status).toBe('linked');
    expect(byName.get('c.m4a')?.status).toBe('linked');

    const failed = byName.get('b.m4a');
    expect(failed?.status).toBe('failed');
    if (failed?.status !== 'failed') return;
    expect(failed.stage).toBe('summarizing');
    expect(failed.error.kind).toBe('service-call');
    expect(failed.error.message).toBe('summary service unavailable');
    expect(ctx.processed.has(failed.memo.fingerprint)).toBe(false);

    expect(await listDir(attachmentsDir)).toEqual([
      '20240601_120000_short a.m4a',
      '20240601_120000_short c.m4a',
    ]);
    expect(await listDir(notesDir)).toEqual(['20240501_090000_Memo a.md', '20240501_110000_Memo c.md']);
  });

  it('reports a transcription failure as a service-call failure', async () => {
    const { pipeline } = await pipelineWith(new FakeTranscriber({ 'c.m4a': new Error('upstream 503') }));

    const report = await pipeline.run();

    const failed = report.outcomes.find((o) => o.memo.name === 'c.m4a');
    expect(failed).toMatchObject({ status: 'failed', stage: 'transcribing' });
    if (failed?.status !== 'failed') return;
    expect(failed.error.kind).toBe('service-call');
  });

  it('retries a failed memo on the next run', async () => {
    const first = await pipelineWith(undefined, new FakeSummarizer(['transcript of b.m4a']));
    await first.pipeline.run();

    const second = await pipelineWith();
    const report = await second.pipeline.run();

    expect(report.selected.map((memo) => memo.name)).toEqual(['b.m4a']);
    expect(report.outcomes.map((o) => o.status)).toEqual(['linked']);
  });

  it('removes the audio copy and note when the daily log cannot be written', async () => {
    // A directory where the log file should be makes the read fail
    await fs.mkdir(path.join(diaryDir, '2024-05-01.md'), { recursive: true });
    const { ctx, pipeline } = await pipelineWith();

    const report = await pipeline.run();

    expect(report.outcomes.map((o) => o.status)).toEqual(['failed', 'failed', 'failed']);
    for (const outcome of report.outcomes) {
      expect(outcome).toMatchObject({ status: 'failed', stage: 'persisting' });
      if (outcome.status === 'failed') {
        expect(outcome.error.kind).toBe('persistence');
      }
    }
    expect(ctx.processed.size).toBe(0);
    expect(await listDir(attachmentsDir)).toEqual([]);
    expect(await listDir(notesDir)).toEqual([]);
  });

  it('ingests byte-identical memos only once per run', async () => {
    await fs.writeFile(path.join(ws.memosDir, 'a-copy.m4a'), 'audio a');
    const { pipeline } = await pipelineWith();

    const report = await pipeline.run();

    const statuses = report.outcomes
      .filter((o) => o.memo.name === 'a.m4a' || o.memo.name === 'a-copy.m4a')
      .map((o) => o.status)
      .sort();
    expect(statuses).toEqual(['linked', 'skipped']);
    expect(report.outcomes.find((o) => o.status === 'skipped')).toMatchObject({ reason: 'duplicate' });
    expect(await listDir(attachmentsDir)).toHaveLength(3);
  });

  it('stops before the next memo once aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const transcriber = new FakeTranscriber();
    const { pipeline } = await pipelineWith(transcriber);

    const report = await pipeline.run({ signal: controller.signal });

    expect(report.aborted).toBe(true);
    expect(report.selected).toHaveLength(3);
    expect(report.outcomes).toEqual([]);
    expect(transcriber.calls).toEqual([]);
  });

  it('only lists candidates on a dry run', async () => {
    const transcriber = new FakeTranscriber();
    const { pipeline } = await pipelineWith(transcriber, undefined, true);

    const report = await pipeline.run({ dryRun: true });

    expect(report.dryRun).toBe(true);
    expect(report.selected.map((memo) => memo.name).sort()).toEqual(['a.m4a', 'b.m4a', 'c.m4a']);
    expect(report.outcomes).toEqual([]);
    expect(transcriber.calls).toEqual([]);
    expect(await listDir(ws.vaultDir)).toEqual([]);
  });
});
