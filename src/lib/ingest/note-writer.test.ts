import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createIngestContext } from './context';
import type { IngestContext } from './context';
import {
  noteFilename,
  renderNote,
  storeAudio,
  storedAudioFilename,
  writeNote,
} from './note-writer';
import {
  FakeSummarizer,
  FakeTranscriber,
  createTempWorkspace,
  listDir,
  silentLogger,
} from './test-utils';
import type { TempWorkspace } from './test-utils';
import type { MemoFile } from './types';

describe('renderNote', () => {
  it('renders title, date, audio, summary and transcription in order', () => {
    const text = renderNote({
      title: 'Weekend plans',
      createdAt: new Date(2024, 4, 1, 9, 30, 15),
      audioLink: 'attachments/20240601_120000_weekend.m4a',
      summary: 'Plans for the weekend.',
      transcription: 'So this weekend I want to...',
    });

    expect(text).toBe(
      '# Weekend plans\n' +
        '\n' +
        '**Date:** 2024-05-01 09:30:15\n' +
        '**Audio:** [[attachments/20240601_120000_weekend.m4a]]\n' +
        '\n' +
        '## Summary\n' +
        'Plans for the weekend.\n' +
        '\n' +
        '## Transcription\n' +
        'So this weekend I want to...\n' +
        '\n' +
        '---\n' +
        '*Generated automatically from voice memo*\n'
    );
  });
});

describe('filenames', () => {
  it('names stored audio after the ingestion time and the sanitized short summary', () => {
    expect(storedAudioFilename(new Date(2024, 5, 1, 12, 0, 5), 'Call: mom?', '.m4a')).toBe(
      '20240601_120005_Call mom.m4a'
    );
  });

  it('names notes after the memo creation time and the sanitized title', () => {
    expect(noteFilename(new Date(2024, 4, 1, 9, 30, 0), 'My/Note:"Title"')).toBe(
      '20240501_093000_MyNoteTitle.md'
    );
  });
});

describe('storeAudio / writeNote', () => {
  let ws: TempWorkspace;
  let ctx: IngestContext;
  let memo: MemoFile;

  beforeEach(async () => {
    ws = await createTempWorkspace();
    const memoPath = path.join(ws.memosDir, 'rec.m4a');
    await fs.writeFile(memoPath, 'audio bytes');
    memo = {
      path: memoPath,
      name: 'rec.m4a',
      createdAt: new Date(2024, 4, 1, 9, 30, 0),
      fingerprint: 'f1',
    };
    ctx = await createIngestContext({
      vault: ws.vault,
      source: ws.source,
      transcriber: new FakeTranscriber(),
      summarizer: new FakeSummarizer(),
      now: () => new Date(2024, 5, 1, 12, 0, 0),
      log: silentLogger,
    });
  });

  afterEach(async () => {
    await ws.cleanup();
  });

  it('copies the audio without touching an existing attachment of the same name', async () => {
    const existing = path.join(ws.vaultDir, 'attachments', '20240601_120000_groceries.m4a');
    await fs.writeFile(existing, 'older audio');

    const stored = await storeAudio(ctx, memo, 'groceries');

    expect(stored).toBe(path.join(ws.vaultDir, 'attachments', '20240601_120000_groceries 2.m4a'));
    expect(await fs.readFile(stored, 'utf-8')).toBe('audio bytes');
    expect(await fs.readFile(existing, 'utf-8')).toBe('older audio');
  });

  it('writes the note with a vault-relative audio link', async () => {
    const stored = await storeAudio(ctx, memo, 'groceries');
    const notePath = await writeNote(
      ctx,
      memo,
      { title: 'Groceries', shortSummary: 'groceries', longSummary: 'Buy milk.' },
      'we need milk',
      stored
    );

    expect(notePath).toBe(path.join(ws.vaultDir, 'notes', 'memos', '20240501_093000_Groceries.md'));
    const text = await fs.readFile(notePath, 'utf-8');
    expect(text).toContain('**Audio:** [[attachments/20240601_120000_groceries.m4a]]\n');
    expect(text).toContain('## Summary\nBuy milk.\n');
    expect(await listDir(path.join(ws.vaultDir, 'notes', 'memos'))).toEqual(['20240501_093000_Groceries.md']);
  });
});
