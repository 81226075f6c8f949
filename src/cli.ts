#!/usr/bin/env tsx
// Command line entry: memo-ingest [--after YYYY-MM-DD] [--dry-run]

import dotenv from 'dotenv';
import findConfig from 'find-config';

const envPath = findConfig('.env');
if (envPath) {
  dotenv.config({ path: envPath });
}

const { runIngest } = await import('@/lib/cli/run');

const controller = new AbortController();
process.once('SIGINT', () => controller.abort());

process.exitCode = await runIngest(process.argv.slice(2), { signal: controller.signal });
