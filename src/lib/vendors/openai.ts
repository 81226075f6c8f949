/**
 * OpenAI API wrapper
 * Provides audio transcription and structured JSON completion
 */

import OpenAI, { toFile } from 'openai';
import type { OpenAISettings } from '@/lib/config/settings';
import { getLogger } from '@/lib/log/logger';

const log = getLogger({ module: 'VendorOpenAI' });

type AudioUpload = Awaited<ReturnType<typeof toFile>>;

interface RequestOptions {
  signal?: AbortSignal;
}

/**
 * The parts of the OpenAI client these calls use. A real `OpenAI` instance satisfies it.
 */
export interface OpenAIClient {
  audio: {
    transcriptions: {
      create(
        body: { model: string; file: AudioUpload },
        options?: RequestOptions
      ): Promise<{ text: string }>;
    };
  };
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
        options?: RequestOptions
      ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export interface OpenAICompletionOptions {
  prompt: string;
  systemPrompt?: string;
  model: string;
  jsonSchema: Record<string, unknown>; // JSON Schema for structured output
  signal?: AbortSignal;
}

export interface OpenAICompletionResponse {
  content: string;
}

export interface OpenAITranscriptionOptions {
  audio: Buffer;
  fileName: string;
  model: string;
  signal?: AbortSignal;
}

/**
 * One client per run, built from the resolved settings.
 */
export function createOpenAIClient(settings: OpenAISettings): OpenAI {
  return new OpenAI({
    baseURL: settings.baseUrl,
    apiKey: settings.apiKey,
  });
}

/**
 * Transcribe audio bytes; the file name only tells the API which container format to expect.
 * The default JSON response carries the transcript in `text`.
 */
export async function callOpenAITranscription(
  client: OpenAIClient,
  options: OpenAITranscriptionOptions
): Promise<string> {
  const file = await toFile(options.audio, options.fileName);
  try {
    const transcription = await client.audio.transcriptions.create(
      { model: options.model, file },
      { signal: options.signal }
    );
    return transcription.text;
  } catch (error) {
    log.error(
      {
        error: error instanceof Error ? error.message : String(error),
        model: options.model,
        fileName: options.fileName,
        bytes: options.audio.length,
      },
      'openai transcription call failed'
    );
    throw error;
  }
}

/**
 * Call OpenAI completion API and get structured JSON output
 *
 * @example
 * const result = await callOpenAICompletion(client, {
 *   model: 'gpt-4o-mini',
 *   systemPrompt: 'You create concise summaries and titles for voice memos.',
 *   prompt: buildSummaryPrompt(transcript),
 *   jsonSchema: {
 *     type: 'object',
 *     properties: { filename_summary: { type: 'string' }, summary: { type: 'string' }, title: { type: 'string' } },
 *     required: ['filename_summary', 'summary', 'title'],
 *     additionalProperties: false,
 *   },
 * });
 * // result.content: '{"filename_summary":"Grocery run","summary":"…","title":"Groceries"}'
 */
export async function callOpenAICompletion(
  client: OpenAIClient,
  options: OpenAICompletionOptions
): Promise<OpenAICompletionResponse> {
  const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];

  if (options.systemPrompt) {
    messages.push({
      role: 'system',
      content: options.systemPrompt,
    });
  }

  messages.push({
    role: 'user',
    content: options.prompt,
  });

  const requestParams: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
    model: options.model,
    messages,
    response_format: {
      type: 'json_schema',
      json_schema: {
        name: 'response',
        strict: true,
        schema: options.jsonSchema,
      },
    },
  };

  try {
    const response = await client.chat.completions.create(requestParams, { signal: options.signal });
    return { content: response.choices[0]?.message.content || '' };
  } catch (error) {
    log.error(
      {
        error: error instanceof Error ? error.message : String(error),
        model: options.model,
        promptLength: options.prompt.length,
      },
      'openai api call failed'
    );
    throw error;
  }
}
