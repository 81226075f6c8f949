// Settings loading from environment variables, validated with zod
import fs from 'fs/promises';
import path from 'path';
import { format, isValid, parse } from 'date-fns';
import { z } from 'zod';
import { IngestError } from '@/lib/errors';
import { getLogger } from '@/lib/log/logger';
import { CONFIGURATION_HINT, DEFAULT_SETTINGS } from './settings';
import type { IngestSettings } from './settings';

const log = getLogger({ module: 'SettingsEnv' });

const DATE_FLOOR_FORMAT = 'yyyy-MM-dd';

// Unset and blank variables are treated the same
const optionalText = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
);

const requiredText = (name: string) =>
  z.preprocess(
    (value) => (typeof value === 'string' ? value.trim() : value),
    z.string({ required_error: `${name} environment variable is not set` })
      .min(1, `${name} environment variable is not set`)
  );

const envSchema = z.object({
  OPENAI_API_KEY: requiredText('OPENAI_API_KEY'),
  OPENAI_BASE_URL: optionalText.pipe(z.string().url('OPENAI_BASE_URL must be a URL').optional()),
  OPENAI_MODEL: optionalText,
  OPENAI_TRANSCRIPTION_MODEL: optionalText,
  OBSIDIAN_VAULT_PATH: requiredText('OBSIDIAN_VAULT_PATH'),
  OBSIDIAN_ATTACHMENTS_FOLDER: optionalText,
  OBSIDIAN_DIARY_FOLDER: optionalText,
  OBSIDIAN_NOTES_FOLDER: optionalText,
  VOICE_MEMOS_PATH: requiredText('VOICE_MEMOS_PATH'),
  VOICE_MEMO_EXTENSION: optionalText,
  PROCESS_FILES_AFTER_DATE: optionalText,
});

export type SettingsEnv = Record<string, string | undefined>;

/**
 * Parse a strict YYYY-MM-DD date into local midnight of that day.
 * Returns null for anything else (including impossible dates like 2024-02-30).
 */
export function parseDateFloor(value: string): Date | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return null;
  }
  const parsed = parse(value, DATE_FLOOR_FORMAT, new Date(0));
  if (!isValid(parsed) || format(parsed, DATE_FLOOR_FORMAT) !== value) {
    return null;
  }
  return parsed;
}

export function normalizeExtension(value: string): string {
  const lower = value.trim().toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

function configurationError(problems: string[]): IngestError {
  return new IngestError(
    'configuration',
    `${problems.join('\n')}\n\n${CONFIGURATION_HINT}`
  );
}

/**
 * Build settings from environment variables.
 * Throws a configuration IngestError listing every problem found.
 */
export function loadSettings(env: SettingsEnv = process.env): IngestSettings {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw configurationError(result.error.issues.map((issue) => issue.message));
  }
  const vars = result.data;

  let processAfter: Date | null = null;
  if (vars.PROCESS_FILES_AFTER_DATE) {
    processAfter = parseDateFloor(vars.PROCESS_FILES_AFTER_DATE);
    if (!processAfter) {
      throw configurationError([
        `PROCESS_FILES_AFTER_DATE '${vars.PROCESS_FILES_AFTER_DATE}' must be in YYYY-MM-DD format`,
      ]);
    }
  }

  const settings: IngestSettings = {
    openai: {
      apiKey: vars.OPENAI_API_KEY,
      baseUrl: vars.OPENAI_BASE_URL || DEFAULT_SETTINGS.openai.baseUrl,
      model: vars.OPENAI_MODEL || DEFAULT_SETTINGS.openai.model,
      transcriptionModel: vars.OPENAI_TRANSCRIPTION_MODEL || DEFAULT_SETTINGS.openai.transcriptionModel,
    },
    vault: {
      rootPath: path.resolve(vars.OBSIDIAN_VAULT_PATH),
      attachmentsFolder: vars.OBSIDIAN_ATTACHMENTS_FOLDER || DEFAULT_SETTINGS.vault.attachmentsFolder,
      diaryFolder: vars.OBSIDIAN_DIARY_FOLDER || DEFAULT_SETTINGS.vault.diaryFolder,
      notesFolder: vars.OBSIDIAN_NOTES_FOLDER || DEFAULT_SETTINGS.vault.notesFolder,
    },
    memos: {
      path: path.resolve(vars.VOICE_MEMOS_PATH),
      extension: normalizeExtension(vars.VOICE_MEMO_EXTENSION || DEFAULT_SETTINGS.memos.extension),
      processAfter,
    },
  };

  if (processAfter) {
    log.info({ processAfter: format(processAfter, DATE_FLOOR_FORMAT) }, 'processing files created on or after date');
  }

  return settings;
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(dirPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Vault root and memo source must exist before anything else touches the disk.
 */
export async function assertRequiredPaths(settings: IngestSettings): Promise<void> {
  const problems: string[] = [];
  if (!(await isDirectory(settings.vault.rootPath))) {
    problems.push(`OBSIDIAN_VAULT_PATH '${settings.vault.rootPath}' does not exist`);
  }
  if (!(await isDirectory(settings.memos.path))) {
    problems.push(`Voice memos path '${settings.memos.path}' does not exist`);
  }
  if (problems.length > 0) {
    throw configurationError(problems);
  }
}
