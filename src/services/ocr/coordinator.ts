/**
 * Multi-page coordinator
 *
 * Decides how a document reaches a provider: whole, or rasterized page by
 * page when the provider's primary API only takes images. Per-page results
 * are merged in page order, whatever order the calls finish in.
 *
 * @module services/ocr/coordinator
 */

import * as fs from 'fs/promises';
import type { Document, Page } from '../../models/document.js';
import type { ExtractionResult, PageExtraction } from '../../models/extraction.js';
import type { ProviderId } from '../../models/provider.js';
import { withDeadline } from '../../utils/abort.js';
import { mapWithConcurrency } from '../../utils/concurrency.js';
import { categoryOf, OCRError } from './errors.js';
import { finalizeResult } from './formatter.js';
import type { OCRProvider, ProviderInput } from './providers/types.js';
import type { Rasterizer } from './rasterizer.js';

/** Per-page failures that the whole-document fallback may recover from */
const FALLBACK_CATEGORIES = new Set(['TRANSPORT_ERROR', 'PARSE_ERROR', 'TIMEOUT']);

export interface CoordinatorOptions {
  /** Parallel page calls per provider (1 = sequential) */
  pageConcurrency?: number;
}

export interface CoordinatorRunOptions {
  signal?: AbortSignal;
  pageConcurrency?: number;
}

export interface PageResult {
  page: Page;
  result: ExtractionResult;
}

/**
 * Merge per-page results into one result.
 * Each page's content is renumbered to the page it came from.
 */
export function mergePageResults(pageResults: readonly PageResult[]): ExtractionResult {
  if (pageResults.length === 0) {
    throw new OCRError('No page results to merge', 'PARSE_ERROR');
  }
  const [first] = pageResults;

  const pages: PageExtraction[] = pageResults
    .map(({ page, result }) => ({
      pageIndex: page.index,
      documents: result.pages.flatMap((p) => p.documents),
      text: result.pages.map((p) => p.text).join(''),
      textLabel: result.pages.find((p) => p.textLabel !== undefined)?.textLabel,
    }))
    .sort((a, b) => a.pageIndex - b.pageIndex);

  return finalizeResult({
    providerName: first.result.providerName,
    api: first.result.api,
    pages,
    opaque: first.result.opaque,
  });
}

function isFallbackEligible(error: unknown): boolean {
  return FALLBACK_CATEGORIES.has(categoryOf(error));
}

export class MultiPageCoordinator {
  private readonly providers: ReadonlyMap<ProviderId, OCRProvider>;
  private readonly rasterizer: Rasterizer;
  private readonly pageConcurrency: number;

  constructor(
    providers: ReadonlyMap<ProviderId, OCRProvider>,
    rasterizer: Rasterizer,
    options: CoordinatorOptions = {}
  ) {
    this.providers = providers;
    this.rasterizer = rasterizer;
    this.pageConcurrency = options.pageConcurrency ?? 1;
  }

  provider(providerId: ProviderId): OCRProvider {
    const provider = this.providers.get(providerId);
    if (!provider) {
      throw new OCRError(`Provider not registered: ${providerId}`, 'CONFIGURATION_ERROR');
    }
    return provider;
  }

  /**
   * Run one provider over one document.
   *
   * @throws ConfigurationError / UnsupportedFileError before any I/O
   * @throws RasterizationError when a required page split fails
   * @throws the per-page error when no fallback applies, or the fallback's own error
   */
  async run(
    document: Document,
    providerId: ProviderId,
    options: CoordinatorRunOptions = {}
  ): Promise<ExtractionResult> {
    const provider = this.provider(providerId);
    provider.assertReady(document);

    if (document.kind === 'pdf' && provider.requiresRasterizedPdf(document)) {
      return this.runPerPage(provider, document, options);
    }

    const bytes = await fs.readFile(document.path);
    return this.call(provider, { document, bytes }, options.signal, provider.analyze.bind(provider));
  }

  private async runPerPage(
    provider: OCRProvider,
    document: Document,
    options: CoordinatorRunOptions
  ): Promise<ExtractionResult> {
    const pages = await this.rasterizer.rasterize(document, { signal: options.signal });
    const concurrency = options.pageConcurrency ?? this.pageConcurrency;
    let completed = 0;

    try {
      const pageResults = await mapWithConcurrency(pages, concurrency, async (page) => {
        const result = await this.call(
          provider,
          { document, bytes: page.imageBytes, page },
          options.signal,
          provider.analyze.bind(provider)
        );
        completed++;
        return { page, result };
      });
      console.error(
        `[Coordinator] ${provider.name}: ${pageResults.length} page(s) of ${document.fileName} analyzed`
      );
      return mergePageResults(pageResults);
    } catch (error) {
      const analyzeFallback = provider.analyzeFallback?.bind(provider);
      if (!analyzeFallback || !isFallbackEligible(error) || options.signal?.aborted) {
        throw error;
      }

      const reason = error instanceof Error ? error.message : String(error);
      console.error(
        `[Coordinator] ${provider.name} per-page run failed (${reason}); discarding ${completed} completed page(s) and falling back to whole-document text detection`
      );

      const bytes = await fs.readFile(document.path);
      const fallback = await this.call(provider, { document, bytes }, options.signal, analyzeFallback);
      return { ...fallback, fallback: { reason, discardedPages: completed } };
    }
  }

  private call(
    provider: OCRProvider,
    input: ProviderInput,
    signal: AbortSignal | undefined,
    fn: OCRProvider['analyze']
  ): Promise<ExtractionResult> {
    return withDeadline(provider.name, provider.timeoutMs, signal, (callSignal) =>
      fn(input, { signal: callSignal })
    );
  }
}
