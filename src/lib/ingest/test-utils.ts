// Shared fixtures for ingest tests: temp vault/memo folders and fake service clients
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import pino from 'pino';
import type { MemoAudio, TranscriptionClient } from '@/lib/ai/transcription';
import type { SummaryClient, SummaryResult } from '@/lib/ai/memo-summary';
import type { MemoSourceSettings, VaultSettings } from '@/lib/config/settings';

export const silentLogger = pino({ level: 'silent' });

export interface TempWorkspace {
  root: string;
  vaultDir: string;
  memosDir: string;
  vault: VaultSettings;
  source: MemoSourceSettings;
  cleanup(): Promise<void>;
}

export async function createTempWorkspace(processAfter: Date | null = null): Promise<TempWorkspace> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'memo-ingest-'));
  const vaultDir = path.join(root, 'vault');
  const memosDir = path.join(root, 'memos');
  await fs.mkdir(vaultDir, { recursive: true });
  await fs.mkdir(memosDir, { recursive: true });

  return {
    root,
    vaultDir,
    memosDir,
    vault: {
      rootPath: vaultDir,
      attachmentsFolder: 'attachments',
      diaryFolder: 'diary',
      notesFolder: 'notes/memos',
    },
    source: {
      path: memosDir,
      extension: '.m4a',
      processAfter,
    },
    cleanup: () => fs.rm(root, { recursive: true, force: true }),
  };
}

export async function listDir(dir: string): Promise<string[]> {
  try {
    return (await fs.readdir(dir)).sort();
  } catch {
    return [];
  }
}

/**
 * Creation times keyed by file name; unknown names fail like an unreadable file.
 */
export function creationTimes(times: Record<string, Date>) {
  return async (filePath: string): Promise<Date> => {
    const time = times[path.basename(filePath)];
    if (!time) {
      throw new Error(`ENOENT: no such file ${filePath}`);
    }
    return time;
  };
}

/**
 * Returns "transcript of <file name>" unless a response is configured for that file.
 */
export class FakeTranscriber implements TranscriptionClient {
  readonly calls: string[] = [];

  constructor(private readonly responses: Record<string, string | Error> = {}) {}

  async transcribe(audio: MemoAudio): Promise<string> {
    this.calls.push(audio.fileName);
    const response = this.responses[audio.fileName];
    if (response instanceof Error) {
      throw response;
    }
    return response ?? `transcript of ${audio.fileName}`;
  }
}

/**
 * For "transcript of x.m4a" returns title "Memo x", short "short x", long "long x".
 * Transcripts listed in failFor throw.
 */
export class FakeSummarizer implements SummaryClient {
  readonly calls: string[] = [];

  constructor(private readonly failFor: string[] = []) {}

  async summarize(transcript: string): Promise<SummaryResult> {
    this.calls.push(transcript);
    if (this.failFor.includes(transcript)) {
      throw new Error('summary service unavailable');
    }
    const name = transcript.replace(/^transcript of /, '').replace(/\.m4a$/, '');
    return {
      title: `Memo ${name}`,
      shortSummary: `short ${name}`,
      longSummary: `long ${name}`,
    };
  }
}
