/**
 * Landing AI provider (agentic document analysis)
 *
 * Multipart upload under a "pdf" or "image" field. The vendor's JSON is shown
 * as-is, pretty-printed, without geometry cleaning.
 */

import type { Document } from '../../../models/document.js';
import type { ExtractionResult } from '../../../models/extraction.js';
import { PROVIDER_NAMES } from '../../../models/provider.js';
import type { LandingAIConfig } from '../../../utils/config.js';
import { createPassThroughAdapter } from '../adapters/pass-through.js';
import { ConfigurationError } from '../errors.js';
import { postJson } from './http.js';
import { assertExtension, type CallContext, type OCRProvider, type ProviderInput } from './types.js';

const PROVIDER = PROVIDER_NAMES['landing-ai'];

const ACCEPTED_EXTENSIONS = ['pdf', 'jpg', 'jpeg', 'png'] as const;

export function buildLandingForm(document: Document, bytes: Buffer): FormData {
  const form = new FormData();
  const field = document.kind === 'pdf' ? 'pdf' : 'image';
  form.append(field, new Blob([new Uint8Array(bytes)]), document.fileName);
  return form;
}

export class LandingAIProvider implements OCRProvider {
  readonly id = 'landing-ai';
  readonly name = PROVIDER;
  readonly timeoutMs: number;

  private readonly config: LandingAIConfig;
  private readonly adapter = createPassThroughAdapter(PROVIDER);

  constructor(config: LandingAIConfig) {
    this.config = config;
    this.timeoutMs = config.timeoutMs;
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
      headers: { Authorization: `Basic ${this.apiKey()}` },
      body: buildLandingForm(input.document, input.bytes),
      signal: context.signal,
    });
    return this.adapter.extract(input.document, raw);
  }

  private apiKey(): string {
    if (!this.config.apiKey) {
      throw new ConfigurationError(PROVIDER, 'LANDING_AI_API_KEY not set in .env', [
        'LANDING_AI_API_KEY',
      ]);
    }
    return this.config.apiKey;
  }
}
