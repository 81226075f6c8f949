/**
 * Memo summary client
 * Turns a transcript into a title, a filename-sized summary and a prose summary.
 */

import { z } from 'zod';
import { callOpenAICompletion } from '@/lib/vendors/openai';
import type { OpenAIClient } from '@/lib/vendors/openai';
import { IngestError, describeError, isIngestError } from '@/lib/errors';

export interface SummaryResult {
  title: string;
  shortSummary: string; // one line, used in the stored audio filename
  longSummary: string; // 2-3 sentences, used in the note body
}

export interface SummaryClient {
  summarize(transcript: string, signal?: AbortSignal): Promise<SummaryResult>;
}

const SYSTEM_PROMPT =
  'You are a helpful assistant that creates concise summaries and titles for voice memos.';

const summaryResponseSchema = z.object({
  filename_summary: z.string().trim().min(1),
  summary: z.string().trim().min(1),
  title: z.string().trim().min(1),
});

const SUMMARY_JSON_SCHEMA: Record<string, unknown> = {
  type: 'object',
  properties: {
    filename_summary: { type: 'string' },
    summary: { type: 'string' },
    title: { type: 'string' },
  },
  required: ['filename_summary', 'summary', 'title'],
  additionalProperties: false,
};

export function buildSummaryPrompt(transcript: string): string {
  return `Based on this transcription, provide:
1. A one-line summary (max 50 characters, suitable for a filename)
2. A longer summary (2-3 sentences)
3. A title for the note

Transcription:
${transcript}

Please respond in JSON format with keys: "filename_summary", "summary", "title".`;
}

/**
 * Validate the raw model output. Anything other than a JSON object with the three
 * non-empty string fields is a service-call error.
 */
export function parseSummaryResponse(content: string): SummaryResult {
  if (!content.trim()) {
    throw new IngestError('service-call', 'No content in summary response');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new IngestError('service-call', `Summary response is not valid JSON: ${describeError(error)}`, {
      cause: error,
    });
  }

  const parsed = summaryResponseSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.') || '(root)');
    throw new IngestError('service-call', `Summary response is missing fields: ${fields.join(', ')}`);
  }

  return {
    title: parsed.data.title,
    shortSummary: parsed.data.filename_summary,
    longSummary: parsed.data.summary,
  };
}

export class OpenAISummaryClient implements SummaryClient {
  constructor(
    private readonly client: OpenAIClient,
    private readonly model: string
  ) {}

  async summarize(transcript: string, signal?: AbortSignal): Promise<SummaryResult> {
    try {
      const res = await callOpenAICompletion(this.client, {
        model: this.model,
        systemPrompt: SYSTEM_PROMPT,
        prompt: buildSummaryPrompt(transcript),
        jsonSchema: SUMMARY_JSON_SCHEMA,
        signal,
      });
      return parseSummaryResponse(res.content);
    } catch (error) {
      if (isIngestError(error)) {
        throw error;
      }
      throw new IngestError('service-call', `Summary generation failed: ${describeError(error)}`, {
        cause: error,
      });
    }
  }
}
