/**
 * Command line interface
 *
 *   ocr-compare <file> [--providers textract,mistral,landing-ai] [--compare <model>]
 *               [--segmented] [--json] [--sequential]
 *   ocr-compare list <dir>
 *
 * Results go to stdout; logs go to stderr. Exit code 0 when the run
 * completes, even if some providers failed; 1 on usage or validation
 * errors and on cancellation.
 *
 * @module cli
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { parseArgs } from 'util';
import type { ComparisonReport } from './models/comparison.js';
import { PROVIDER_IDS, type ProviderRunReport } from './models/provider.js';
import { summarizeAgreement } from './services/comparison/diff-service.js';
import { ComparisonService } from './services/llm/comparison.js';
import { COMPARISON_MODEL_NAMES } from './services/llm/config.js';
import type { MultiPageCoordinator } from './services/ocr/coordinator.js';
import { ConfigurationError, RequestCancelledError } from './services/ocr/errors.js';
import { createCoordinator } from './services/ocr/index.js';
import { runProviders } from './services/ocr/runner.js';
import { loadConfig, type AppConfig } from './utils/config.js';
import {
  CompareCommandInput,
  ListCommandInput,
  ValidationError,
  validateInput,
} from './utils/validation.js';

/** Extensions offered by `list`; every provider accepts these */
const LISTABLE_EXTENSIONS = new Set(['.pdf', '.jpg', '.jpeg', '.png']);

export const USAGE = `Usage:
  ocr-compare <file> [options]
  ocr-compare list <dir>

Options:
  --providers <ids>   Comma-separated providers (default: ${PROVIDER_IDS.join(',')})
  --compare <model>   Evaluate the results with ${COMPARISON_MODEL_NAMES.map((m) => `"${m}"`).join(' or ')}
  --segmented         Send the results to the model in several turns
  --json              Print the report as JSON
  --sequential        Run providers one at a time
  -h, --help          Show this help
`;

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

export interface CliDependencies {
  config?: AppConfig;
  coordinator?: MultiPageCoordinator;
  comparison?: ComparisonService;
  signal?: AbortSignal;
}

const processIO: CliIO = {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
};

type ComparisonOutcome =
  | { status: 'ok'; report: ComparisonReport }
  | { status: 'error'; modelName: string; message: string };

/**
 * Supported documents in dir, sorted by name
 */
export async function listDocuments(dir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (error) {
    throw new ValidationError(
      `Cannot read directory ${dir}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return entries.filter((name) => LISTABLE_EXTENSIONS.has(path.extname(name).toLowerCase())).sort();
}

function renderRun(report: ProviderRunReport): string {
  return report.outcomes.map((o) => `=== ${o.provider} ===\n${o.text}\n`).join('\n');
}

function renderComparison(outcome: ComparisonOutcome): string {
  if (outcome.status === 'error') {
    return `\n=== Comparison (${outcome.modelName}) ===\n${outcome.message}\n`;
  }
  const { report } = outcome;
  let out = `\n=== Comparison (${report.modelName}) ===\n${report.bodyMarkdown}\n`;
  if (report.agreement.length > 0) {
    out += `\nProvider agreement:\n${summarizeAgreement(report.agreement)}\n`;
  }
  return out;
}

async function runComparison(
  service: ComparisonService,
  report: ProviderRunReport,
  modelName: string,
  segmented: boolean,
  signal: AbortSignal | undefined
): Promise<ComparisonOutcome> {
  try {
    return {
      status: 'ok',
      report: await service.compare(report.summaries, modelName, { segmented, signal }),
    };
  } catch (error) {
    if (error instanceof RequestCancelledError) throw error;
    const message =
      error instanceof ConfigurationError
        ? `${modelName} not configured: ${error.message}`
        : `Error comparing OCR results with ${modelName}: ${error instanceof Error ? error.message : String(error)}`;
    console.error(`[CLI] ${message}`);
    return { status: 'error', modelName, message };
  }
}

async function runCompare(argv: string[], io: CliIO, deps: CliDependencies): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      providers: { type: 'string' },
      compare: { type: 'string' },
      segmented: { type: 'boolean' },
      json: { type: 'boolean' },
      sequential: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (values.help) {
    io.out(USAGE);
    return 0;
  }
  if (positionals.length !== 1) {
    throw new ValidationError('Expected exactly one document path');
  }

  const command = validateInput(CompareCommandInput, {
    file: positionals[0],
    providers: values.providers,
    compare: values.compare,
    segmented: values.segmented,
    json: values.json,
    sequential: values.sequential,
  });

  const config = deps.config ?? loadConfig();
  const coordinator = deps.coordinator ?? createCoordinator(config);
  const report = await runProviders(coordinator, command.file, command.providers, {
    signal: deps.signal,
    sequential: command.sequential,
  });

  let comparison: ComparisonOutcome | undefined;
  if (command.compare) {
    const service = deps.comparison ?? new ComparisonService(config.llm);
    comparison = await runComparison(
      service,
      report,
      command.compare,
      command.segmented,
      deps.signal
    );
  }

  if (command.json) {
    io.out(`${JSON.stringify({ ...report, comparison }, null, 2)}\n`);
  } else {
    io.out(renderRun(report));
    if (comparison) io.out(renderComparison(comparison));
  }
  return 0;
}

async function runList(argv: string[], io: CliIO): Promise<number> {
  const { directory } = validateInput(ListCommandInput, { directory: argv[0] });
  const files = await listDocuments(directory);
  if (files.length === 0) {
    io.err(`No PDF or image files found in ${directory}\n`);
    return 0;
  }
  io.out(files.map((f) => `${f}\n`).join(''));
  return 0;
}

/**
 * Run the CLI with the given arguments (without node and script path)
 *
 * @returns process exit code
 */
export async function runCli(
  argv: string[],
  io: CliIO = processIO,
  deps: CliDependencies = {}
): Promise<number> {
  try {
    if (argv[0] === 'list') {
      return await runList(argv.slice(1), io);
    }
    return await runCompare(argv, io, deps);
  } catch (error) {
    if (error instanceof RequestCancelledError) {
      io.err('Cancelled\n');
      return 1;
    }
    const message = error instanceof Error ? error.message : String(error);
    io.err(`Error: ${message}\n`);
    if (error instanceof ValidationError || (error instanceof TypeError && 'code' in error)) {
      io.err(`\n${USAGE}`);
    }
    return 1;
  }
}
