/**
 * AWS Textract provider
 *
 * Primary API: AnalyzeExpense, which only takes single images, so PDFs are
 * rasterized and sent page by page. Fallback: DetectDocumentText on the
 * whole file, read by the plain-text adapter.
 */

import {
  AnalyzeExpenseCommand,
  DetectDocumentTextCommand,
  TextractClient,
  TextractServiceException,
} from '@aws-sdk/client-textract';
import type { Document } from '../../../models/document.js';
import type { ExtractionResult, JsonValue } from '../../../models/extraction.js';
import { PROVIDER_NAMES } from '../../../models/provider.js';
import type { TextractConfig } from '../../../utils/config.js';
import { createDetectTextAdapter } from '../adapters/detect-text.js';
import { createExpenseAdapter } from '../adapters/expense.js';
import { ConfigurationError, TransportError, mapHttpError } from '../errors.js';
import { sanitizeWithTelemetry, toJsonValue } from '../sanitizer.js';
import { assertExtension, type CallContext, type OCRProvider, type ProviderInput } from './types.js';

const PROVIDER = PROVIDER_NAMES.textract;

const ACCEPTED_EXTENSIONS = ['pdf', 'png', 'jpg', 'jpeg', 'tif', 'tiff'] as const;

/**
 * The two Textract calls, returning plain JSON without $metadata
 */
export interface TextractTransport {
  analyzeExpense(bytes: Buffer, signal: AbortSignal): Promise<JsonValue>;
  detectDocumentText(bytes: Buffer, signal: AbortSignal): Promise<JsonValue>;
}

export interface TextractCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}

function toProviderError(error: unknown): unknown {
  if (error instanceof TextractServiceException) {
    return mapHttpError(
      PROVIDER,
      error.$metadata.httpStatusCode ?? 500,
      `${error.name}: ${error.message}`
    );
  }
  // Aborts are mapped to timeout/cancellation by the caller's deadline
  if (error instanceof Error && error.name === 'AbortError') {
    return error;
  }
  return new TransportError(
    PROVIDER,
    `Textract request failed: ${error instanceof Error ? error.message : String(error)}`,
    undefined,
    { cause: error }
  );
}

export function createSdkTextractTransport(
  credentials: TextractCredentials,
  region: string
): TextractTransport {
  const client = new TextractClient({ region, credentials });

  return {
    async analyzeExpense(bytes, signal) {
      try {
        const { $metadata, ...body } = await client.send(
          new AnalyzeExpenseCommand({ Document: { Bytes: bytes } }),
          { abortSignal: signal }
        );
        console.error(`[Textract] AnalyzeExpense completed (request ${$metadata.requestId ?? 'n/a'})`);
        return toJsonValue(body);
      } catch (error) {
        throw toProviderError(error);
      }
    },

    async detectDocumentText(bytes, signal) {
      try {
        const { $metadata, ...body } = await client.send(
          new DetectDocumentTextCommand({ Document: { Bytes: bytes } }),
          { abortSignal: signal }
        );
        console.error(
          `[Textract] DetectDocumentText completed (request ${$metadata.requestId ?? 'n/a'})`
        );
        return toJsonValue(body);
      } catch (error) {
        throw toProviderError(error);
      }
    },
  };
}

export class TextractProvider implements OCRProvider {
  readonly id = 'textract';
  readonly name = PROVIDER;
  readonly timeoutMs: number;

  private readonly config: TextractConfig;
  private transport: TextractTransport | null;
  private readonly expense = createExpenseAdapter(PROVIDER);
  private readonly detectText = createDetectTextAdapter(PROVIDER);

  /**
   * @param transport - Replaces the AWS SDK client (tests, custom endpoints)
   */
  constructor(config: TextractConfig, transport?: TextractTransport) {
    this.config = config;
    this.timeoutMs = config.timeoutMs;
    this.transport = transport ?? null;
  }

  assertReady(document: Document): void {
    this.credentials();
    assertExtension(this.name, document, ACCEPTED_EXTENSIONS);
  }

  requiresRasterizedPdf(document: Document): boolean {
    return document.kind === 'pdf';
  }

  async analyze(input: ProviderInput, context: CallContext): Promise<ExtractionResult> {
    const raw = await this.getTransport().analyzeExpense(input.bytes, context.signal);
    return this.expense.extract(input.document, sanitizeWithTelemetry('Textract', raw));
  }

  async analyzeFallback(input: ProviderInput, context: CallContext): Promise<ExtractionResult> {
    const raw = await this.getTransport().detectDocumentText(input.bytes, context.signal);
    return this.detectText.extract(input.document, sanitizeWithTelemetry('Textract', raw));
  }

  private credentials(): TextractCredentials {
    const { accessKeyId, secretAccessKey, sessionToken } = this.config;
    const missing: string[] = [];
    if (!accessKeyId) missing.push('AWS_ACCESS_KEY_ID');
    if (!secretAccessKey) missing.push('AWS_SECRET_ACCESS_KEY');
    if (!accessKeyId || !secretAccessKey) {
      throw new ConfigurationError(PROVIDER, `${missing.join(' and ')} not set in .env`, missing);
    }
    return { accessKeyId, secretAccessKey, sessionToken };
  }

  private getTransport(): TextractTransport {
    if (!this.transport) {
      this.transport = createSdkTextractTransport(this.credentials(), this.config.region);
    }
    return this.transport;
  }
}
