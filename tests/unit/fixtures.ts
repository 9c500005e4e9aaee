/**
 * Shared test fixtures: vendor payloads, documents and temp files
 */

import { mkdtempSync, readFileSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import type { Document, Page, SupportedExtension } from '../../src/models/document.js';
import type { ExtractionResult, JsonValue } from '../../src/models/extraction.js';
import type { ProviderId } from '../../src/models/provider.js';
import type { CallContext, OCRProvider, ProviderInput } from '../../src/services/ocr/providers/types.js';
import type { Rasterizer } from '../../src/services/ocr/rasterizer.js';
import { finalizeResult } from '../../src/services/ocr/formatter.js';

const FIXTURE_DIR = resolve(dirname(fileURLToPath(import.meta.url)), '..', 'fixtures');

export type PayloadFixture = 'expense-invoice' | 'detect-text' | 'mistral-pages' | 'landing-ai';

export function loadPayload(name: PayloadFixture): JsonValue {
  const value: JsonValue = JSON.parse(readFileSync(join(FIXTURE_DIR, `${name}.json`), 'utf-8'));
  return value;
}

export function loadPayloadText(name: PayloadFixture): string {
  return readFileSync(join(FIXTURE_DIR, `${name}.json`), 'utf-8');
}

export function makeDocument(extension: SupportedExtension, filePath = `/tmp/sample.${extension}`): Document {
  return {
    path: filePath,
    fileName: filePath.split('/').pop() ?? filePath,
    extension,
    kind: extension === 'pdf' ? 'pdf' : 'image',
  };
}

export function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'ocr-compare-test-'));
}

/**
 * Write a file into a fresh temp dir and return its path
 */
export function writeTempFile(name: string, content: string | Buffer = 'test-bytes'): string {
  const filePath = join(createTempDir(), name);
  writeFileSync(filePath, content);
  return filePath;
}

export function makePages(count: number): Page[] {
  return Array.from({ length: count }, (_, i) => ({
    index: i + 1,
    imageBytes: Buffer.from(`page-${i + 1}`),
  }));
}

export class FakeRasterizer implements Rasterizer {
  calls = 0;

  constructor(private readonly pages: Page[] | Error) {}

  async rasterize(): Promise<Page[]> {
    this.calls++;
    if (this.pages instanceof Error) throw this.pages;
    return this.pages;
  }
}

/**
 * Text-only result for a page, as a per-page provider would return it
 */
export function textResult(providerName: string, text: string, api = 'FakeAPI'): ExtractionResult {
  return finalizeResult({ providerName, api, pages: [{ pageIndex: 1, documents: [], text }] });
}

export interface FakeProviderOptions {
  id?: ProviderId;
  name?: string;
  timeoutMs?: number;
  perPage?: boolean;
  analyze?: (input: ProviderInput, context: CallContext) => Promise<ExtractionResult>;
  analyzeFallback?: (input: ProviderInput, context: CallContext) => Promise<ExtractionResult>;
  assertReady?: (document: Document) => void;
}

export function fakeProvider(options: FakeProviderOptions = {}): OCRProvider {
  const name = options.name ?? 'Fake OCR';
  return {
    id: options.id ?? 'textract',
    name,
    timeoutMs: options.timeoutMs ?? 1000,
    assertReady: options.assertReady ?? (() => undefined),
    requiresRasterizedPdf: () => options.perPage ?? false,
    analyze:
      options.analyze ?? (async (input) => textResult(name, `text of ${input.page?.index ?? 'document'}`)),
    analyzeFallback: options.analyzeFallback,
  };
}
