/**
 * Batch runner
 *
 * Runs several providers over one document and collects one outcome per
 * provider. A provider's failure becomes its outcome text; it never stops
 * the others. Only caller cancellation rejects the whole run.
 *
 * @module services/ocr/runner
 */

import { v4 as uuidv4 } from 'uuid';
import type { Document } from '../../models/document.js';
import {
  PROVIDER_NAMES,
  type ProviderId,
  type ProviderOutcome,
  type ProviderRunReport,
} from '../../models/provider.js';
import { toDocument } from '../../utils/validation.js';
import type { MultiPageCoordinator } from './coordinator.js';
import { categoryOf, describeError, RequestCancelledError } from './errors.js';

export interface RunProvidersOptions {
  signal?: AbortSignal;
  /** One provider at a time instead of all at once */
  sequential?: boolean;
  pageConcurrency?: number;
}

async function runOne(
  coordinator: MultiPageCoordinator,
  document: Document,
  providerId: ProviderId,
  options: RunProvidersOptions
): Promise<ProviderOutcome> {
  const provider = PROVIDER_NAMES[providerId];
  const start = Date.now();
  try {
    const result = await coordinator.run(document, providerId, {
      signal: options.signal,
      pageConcurrency: options.pageConcurrency,
    });
    const durationMs = Date.now() - start;
    console.error(`[Runner] ${provider} completed in ${durationMs}ms`);
    return {
      status: 'ok',
      providerId,
      provider,
      result,
      text: result.rawSummaryText,
      durationMs,
    };
  } catch (error) {
    const durationMs = Date.now() - start;
    const category = categoryOf(error);
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[Runner] ${provider} failed after ${durationMs}ms [${category}]: ${message}`);
    return {
      status: 'error',
      providerId,
      provider,
      category,
      message,
      text: describeError(provider, error),
      durationMs,
    };
  }
}

/**
 * Run the providers over the document at documentPath.
 *
 * @throws ValidationError when the path is missing or of an unsupported type
 * @throws RequestCancelledError when options.signal aborts (no partial report)
 */
export async function runProviders(
  coordinator: MultiPageCoordinator,
  documentPath: string,
  providerIds: readonly ProviderId[],
  options: RunProvidersOptions = {}
): Promise<ProviderRunReport> {
  const requestId = uuidv4();
  const document = toDocument(documentPath);

  if (options.signal?.aborted) {
    throw new RequestCancelledError();
  }

  console.error(
    `[Runner] ${requestId}: ${document.fileName} with ${providerIds.join(', ')} (${options.sequential ? 'sequential' : 'parallel'})`
  );

  let outcomes: ProviderOutcome[];
  if (options.sequential) {
    outcomes = [];
    for (const providerId of providerIds) {
      if (options.signal?.aborted) break;
      outcomes.push(await runOne(coordinator, document, providerId, options));
    }
  } else {
    outcomes = await Promise.all(
      providerIds.map((providerId) => runOne(coordinator, document, providerId, options))
    );
  }

  if (options.signal?.aborted) {
    throw new RequestCancelledError();
  }

  const summaries: Record<string, string> = {};
  for (const outcome of outcomes) {
    summaries[outcome.provider] = outcome.text;
  }

  return { requestId, documentPath, outcomes, summaries };
}
