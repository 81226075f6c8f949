export interface CliArgs {
  after: string | null;
  dryRun: boolean;
  help: boolean;
}

export const USAGE = `Usage: memo-ingest [options]

Transcribe and summarize new voice memos into the vault.

Options:
  --after YYYY-MM-DD  Only process memos created on or after this date
                      (overrides PROCESS_FILES_AFTER_DATE)
  --dry-run           List the memos that would be processed, then stop
  -h, --help          Show this help`;

function requireValue(argv: string[], index: number, flag: string): string {
  if (index >= argv.length || argv[index].startsWith('--')) {
    throw new Error(`Option ${flag} requires a value.`);
  }
  return argv[index];
}

export function parseCliArgs(argv: string[]): CliArgs {
  const result: CliArgs = {
    after: null,
    dryRun: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token.startsWith('--after=')) {
      result.after = token.slice('--after='.length);
      continue;
    }
    switch (token) {
      case '--after':
        result.after = requireValue(argv, ++i, token);
        break;
      case '--dry-run':
        result.dryRun = true;
        break;
      case '-h':
      case '--help':
        result.help = true;
        break;
      default:
        throw new Error(`Unknown option "${token}". Run with --help for usage.`);
    }
  }

  return result;
}
