/**
 * Mistral OCR provider
 *
 * One JSON request per document: PDFs go as base64 documents, images as
 * data URLs. The answer lists markdown per page, so nothing is rasterized.
 */

import type { Document } from '../../../models/document.js';
import type { ExtractionResult } from '../../../models/extraction.js';
import { PROVIDER_NAMES } from '../../../models/provider.js';
import type { MistralConfig } from '../../../utils/config.js';
import { createMarkdownPageAdapter } from '../adapters/markdown-pages.js';
import type { ProviderAdapter } from '../adapters/types.js';
import { ConfigurationError } from '../errors.js';
import { sanitizeWithTelemetry } from '../sanitizer.js';
import { postJson } from './http.js';
import { assertExtension, type CallContext, type OCRProvider, type ProviderInput } from './types.js';

const PROVIDER = PROVIDER_NAMES.mistral;

const ACCEPTED_EXTENSIONS = ['pdf', 'jpg', 'jpeg', 'png'] as const;

type MistralDocument =
  | { type: 'document_base64'; document_base64: string; document_name: string }
  | { type: 'image_url'; image_url: string };

function mimeTypeOf(extension: string): string {
  return extension === 'jpg' ? 'image/jpeg' : `image/${extension}`;
}

export function buildMistralDocument(document: Document, bytes: Buffer): MistralDocument {
  const encoded = bytes.toString('base64');
  if (document.kind === 'pdf') {
    return { type: 'document_base64', document_base64: encoded, document_name: document.fileName };
  }
  return { type: 'image_url', image_url: `data:${mimeTypeOf(document.extension)};base64,${encoded}` };
}

export class MistralProvider implements OCRProvider {
  readonly id = 'mistral';
  readonly name = PROVIDER;
  readonly timeoutMs: number;

  private readonly config: MistralConfig;
  private readonly adapter: ProviderAdapter;

  constructor(config: MistralConfig) {
    this.config = config;
    this.timeoutMs = config.timeoutMs;
    this.adapter = createMarkdownPageAdapter({
      providerName: PROVIDER,
      includeFullResponse: config.includeFullResponse,
    });
  }

  assertReady(document: Document): void {
    this.apiKey();
    assertExtension(this.name, document, ACCEPTED_EXTENSIONS);
  }

  requiresRasterizedPdf(): boolean {
    return false;
  }

  async analyze(input: ProviderInput, context: CallContext): Promise<ExtractionResult> {
    const raw = await postJson({
      provider: PROVIDER,
      url: this.config.endpoint,
      headers: {
        Authorization: `Bearer ${this.apiKey()}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: this.config.model,
        document: buildMistralDocument(input.document, input.bytes),
      }),
      signal: context.signal,
    });
    return this.adapter.extract(input.document, sanitizeWithTelemetry('Mistral', raw));
  }

  private apiKey(): string {
    if (!this.config.apiKey) {
      throw new ConfigurationError(PROVIDER, 'MISTRAL_API_KEY not set in .env', ['MISTRAL_API_KEY']);
    }
    return this.config.apiKey;
  }
}
