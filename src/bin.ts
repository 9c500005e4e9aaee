#!/usr/bin/env node
/**
 * ocr-compare CLI entry point
 *
 * Loads .env, wires Ctrl-C to cancellation and hands off to runCli.
 *
 * @module bin
 */

import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';
import { runCli } from './cli.js';

// Load .env from the first candidate that exists:
// 1. OCR_COMPARE_ENV_FILE (explicit override)
// 2. CWD/.env
// 3. Package root/.env
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const envCandidates = [
  process.env.OCR_COMPARE_ENV_FILE,
  path.resolve(process.cwd(), '.env'),
  path.resolve(__dirname, '..', '.env'),
].filter((p): p is string => typeof p === 'string');

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath, quiet: true });
    break;
  }
}

const controller = new AbortController();
process.once('SIGINT', () => {
  console.error('[CLI] Interrupted, cancelling in-flight requests');
  controller.abort();
});

runCli(process.argv.slice(2), undefined, { signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('[CLI] Fatal error:', error);
    process.exitCode = 1;
  });
