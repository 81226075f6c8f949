/**
 * Ingest Errors - tagged failure causes
 *
 * Kinds:
 * - configuration: missing credentials or required directories (fatal, before any memo is touched)
 * - hashing: a file could not be fingerprinted (file excluded, run continues)
 * - service-call: transcription/summary call failed or returned something unusable
 * - persistence: reading the memo or writing into the vault failed
 * - unexpected: anything else
 */
export type IngestErrorKind =
  | 'configuration'
  | 'hashing'
  | 'service-call'
  | 'persistence'
  | 'unexpected';

export interface IngestErrorOptions {
  cause?: unknown;
  filePath?: string;
}

export class IngestError extends Error {
  readonly kind: IngestErrorKind;
  readonly filePath?: string;

  constructor(kind: IngestErrorKind, message: string, options: IngestErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'IngestError';
    this.kind = kind;
    this.filePath = options.filePath;
  }
}

export function isIngestError(error: unknown): error is IngestError {
  return error instanceof IngestError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an arbitrary thrown value; an IngestError passes through untouched.
 */
export function toIngestError(
  error: unknown,
  fallbackKind: IngestErrorKind,
  filePath?: string
): IngestError {
  if (isIngestError(error)) {
    return error;
  }
  return new IngestError(fallbackKind, describeError(error), { cause: error, filePath });
}

/**
 * Node errno errors (ENOENT, EEXIST, ...) carry a string code.
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
