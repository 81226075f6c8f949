// Settings and configuration for the voice memo ingester

export interface OpenAISettings {
  apiKey: string;
  baseUrl: string; // e.g., "https://api.openai.com/v1"
  model: string; // summary model, e.g., "gpt-4o-mini"
  transcriptionModel: string; // e.g., "whisper-1"
}

export interface VaultSettings {
  rootPath: string; // absolute
  attachmentsFolder: string; // relative to rootPath
  diaryFolder: string;
  notesFolder: string;
}

export interface MemoSourceSettings {
  path: string; // absolute, read-only to the pipeline
  extension: string; // lower-case, with leading dot
  processAfter: Date | null; // local midnight of the configured day
}

export interface IngestSettings {
  openai: OpenAISettings;
  vault: VaultSettings;
  memos: MemoSourceSettings;
}

export const DEFAULT_SETTINGS = {
  openai: {
    baseUrl: 'https://api.openai.com/v1',
    model: 'gpt-4o-mini',
    transcriptionModel: 'whisper-1',
  },
  vault: {
    attachmentsFolder: 'attachments',
    diaryFolder: 'diary',
    notesFolder: 'notes/memos',
  },
  memos: {
    extension: '.m4a',
  },
} as const;

export const CONFIGURATION_HINT = [
  'Please ensure the following environment variables are set:',
  '  - OPENAI_API_KEY',
  '  - OBSIDIAN_VAULT_PATH',
  '  - VOICE_MEMOS_PATH',
  '  - OBSIDIAN_ATTACHMENTS_FOLDER (optional, default: attachments)',
  '  - OBSIDIAN_DIARY_FOLDER (optional, default: diary)',
  '  - OBSIDIAN_NOTES_FOLDER (optional, default: notes/memos)',
  '  - VOICE_MEMO_EXTENSION (optional, default: .m4a)',
  '  - PROCESS_FILES_AFTER_DATE (optional, format: YYYY-MM-DD)',
  '  - OPENAI_BASE_URL, OPENAI_MODEL, OPENAI_TRANSCRIPTION_MODEL (optional)',
].join('\n');
