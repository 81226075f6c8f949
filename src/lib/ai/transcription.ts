/**
 * Transcription client
 * Raw audio bytes in, transcript text out. No partial or streaming results.
 */

import { callOpenAITranscription } from '@/lib/vendors/openai';
import type { OpenAIClient } from '@/lib/vendors/openai';
import { IngestError, describeError } from '@/lib/errors';

export interface MemoAudio {
  fileName: string;
  bytes: Buffer;
}

export interface TranscriptionClient {
  transcribe(audio: MemoAudio, signal?: AbortSignal): Promise<string>;
}

export class OpenAITranscriptionClient implements TranscriptionClient {
  constructor(
    private readonly client: OpenAIClient,
    private readonly model: string
  ) {}

  async transcribe(audio: MemoAudio, signal?: AbortSignal): Promise<string> {
    try {
      return await callOpenAITranscription(this.client, {
        audio: audio.bytes,
        fileName: audio.fileName,
        model: this.model,
        signal,
      });
    } catch (error) {
      throw new IngestError('service-call', `Transcription failed: ${describeError(error)}`, {
        cause: error,
      });
    }
  }
}
