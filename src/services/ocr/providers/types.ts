/**
 * Provider contract
 *
 * A provider couples one vendor transport with the sanitizer and the
 * adapter for that vendor's payload. The coordinator decides how often a
 * provider is called; the provider only knows how to make one call.
 */

import type { Document, Page } from '../../../models/document.js';
import type { ExtractionResult } from '../../../models/extraction.js';
import type { ProviderId } from '../../../models/provider.js';
import { UnsupportedFileError } from '../errors.js';

export interface ProviderInput {
  document: Document;
  /** Whole document, or the page image when page is set */
  bytes: Buffer;
  page?: Page;
}

export interface CallContext {
  /** Fires on the per-call deadline or on caller cancellation */
  signal: AbortSignal;
}

export interface OCRProvider {
  readonly id: ProviderId;
  readonly name: string;
  /** Per-call deadline */
  readonly timeoutMs: number;

  /**
   * Fail fast, before any file or network work: missing credentials
   * (ConfigurationError) or an extension this vendor rejects (UnsupportedFileError).
   */
  assertReady(document: Document): void;

  /** True when the primary API cannot take this document in one call */
  requiresRasterizedPdf(document: Document): boolean;

  analyze(input: ProviderInput, context: CallContext): Promise<ExtractionResult>;

  /** Whole-document plain-text extraction, tried once if the per-page run fails */
  analyzeFallback?(input: ProviderInput, context: CallContext): Promise<ExtractionResult>;
}

/**
 * Throw UnsupportedFileError unless the document's extension is accepted
 */
export function assertExtension(
  provider: string,
  document: Document,
  accepted: readonly string[]
): void {
  if (!accepted.includes(document.extension)) {
    throw new UnsupportedFileError(provider, document.extension, accepted);
  }
}
