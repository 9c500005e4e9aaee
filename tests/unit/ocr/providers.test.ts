/**
 * OCR Provider Unit Tests
 *
 * HTTP vendors run against a stubbed fetch; Textract against a fake
 * transport. Nothing leaves the process.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import type { JsonValue } from '../../../src/models/extraction.js';
import {
  AuthenticationError,
  ConfigurationError,
  ParseError,
  RateLimitError,
  TransportError,
  UnsupportedFileError,
} from '../../../src/services/ocr/errors.js';
import { createProviders } from '../../../src/services/ocr/providers/index.js';
import { LandingAIProvider } from '../../../src/services/ocr/providers/landing-ai.js';
import { MistralProvider } from '../../../src/services/ocr/providers/mistral.js';
import { TextractProvider, type TextractTransport } from '../../../src/services/ocr/providers/textract.js';
import {
  LandingAIConfigSchema,
  MistralConfigSchema,
  TextractConfigSchema,
  loadConfig,
} from '../../../src/utils/config.js';
import { loadPayload, loadPayloadText, makeDocument } from '../fixtures.js';

afterEach(() => {
  vi.unstubAllGlobals();
});

const context = () => ({ signal: new AbortController().signal });

function stubFetch(respond: () => Response | Promise<Response>) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => respond());
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function lastRequest(fetchMock: ReturnType<typeof stubFetch>) {
  const [url, init] = fetchMock.mock.calls[fetchMock.mock.calls.length - 1];
  return { url: String(url), init, headers: new Headers(init?.headers) };
}

function jsonBody(init: RequestInit | undefined): JsonValue {
  if (typeof init?.body !== 'string') throw new Error('expected a JSON string body');
  const body: JsonValue = JSON.parse(init.body);
  return body;
}

// ═══════════════════════════════════════════════════════════════════════════════
// MISTRAL OCR
// ═══════════════════════════════════════════════════════════════════════════════

describe('MistralProvider', () => {
  const config = MistralConfigSchema.parse({ apiKey: 'test-secret' });

  it('posts a PDF as document_base64 with bearer auth', async () => {
    const fetchMock = stubFetch(() => new Response(loadPayloadText('mistral-pages')));
    const provider = new MistralProvider(config);
    const document = makeDocument('pdf', '/tmp/invoice.pdf');

    const result = await provider.analyze({ document, bytes: Buffer.from('pdf-bytes') }, context());

    const { url, init, headers } = lastRequest(fetchMock);
    expect(url).toBe('https://api.mistral.ai/v1/ocr');
    expect(init?.method).toBe('POST');
    expect(headers.get('authorization')).toBe('Bearer test-secret');
    expect(jsonBody(init)).toEqual({
      model: 'mistral-ocr-latest',
      document: {
        type: 'document_base64',
        document_base64: 'cGRmLWJ5dGVz',
        document_name: 'invoice.pdf',
      },
    });
    expect(result.providerName).toBe('Mistral OCR');
    expect(result.pages).toHaveLength(2);
  });

  it('posts images as data URLs, jpg as image/jpeg', async () => {
    const fetchMock = stubFetch(() => new Response(loadPayloadText('mistral-pages')));
    const provider = new MistralProvider(config);

    await provider.analyze(
      { document: makeDocument('jpg', '/tmp/photo.jpg'), bytes: Buffer.from('jpg-bytes') },
      context()
    );

    expect(jsonBody(lastRequest(fetchMock).init)).toEqual({
      model: 'mistral-ocr-latest',
      document: { type: 'image_url', image_url: 'data:image/jpeg;base64,anBnLWJ5dGVz' },
    });
  });

  it('honours the full-response setting', async () => {
    stubFetch(() => new Response(loadPayloadText('mistral-pages')));
    const provider = new MistralProvider(
      MistralConfigSchema.parse({ apiKey: 'test-secret', includeFullResponse: false })
    );

    const result = await provider.analyze(
      { document: makeDocument('pdf'), bytes: Buffer.from('x') },
      context()
    );

    expect(result.appendix).toBeUndefined();
  });

  it('maps 401 to AuthenticationError', async () => {
    stubFetch(() => new Response('{"detail":"Unauthorized"}', { status: 401 }));
    const provider = new MistralProvider(config);

    await expect(
      provider.analyze({ document: makeDocument('pdf'), bytes: Buffer.from('x') }, context())
    ).rejects.toBeInstanceOf(AuthenticationError);
  });

  it('maps 429 to RateLimitError', async () => {
    stubFetch(() => new Response('busy', { status: 429, headers: { 'Retry-After': '7' } }));
    const provider = new MistralProvider(config);

    const error = await provider
      .analyze({ document: makeDocument('pdf'), bytes: Buffer.from('x') }, context())
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error instanceof RateLimitError && error.retryAfter).toBe(7);
  });

  it('maps 5xx to TransportError with status and body', async () => {
    stubFetch(() => new Response('upstream down', { status: 503 }));
    const provider = new MistralProvider(config);

    await expect(
      provider.analyze({ document: makeDocument('pdf'), bytes: Buffer.from('x') }, context())
    ).rejects.toThrow('Mistral OCR API error: 503 - upstream down');
  });

  it('maps network failures to TransportError', async () => {
    stubFetch(() => {
      throw new TypeError('fetch failed');
    });
    const provider = new MistralProvider(config);

    const error = await provider
      .analyze({ document: makeDocument('pdf'), bytes: Buffer.from('x') }, context())
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error instanceof TransportError && error.message).toBe('Mistral OCR request failed: fetch failed');
  });

  it('raises ParseError for a malformed body', async () => {
    stubFetch(() => new Response('<html>oops</html>'));
    const provider = new MistralProvider(config);

    await expect(
      provider.analyze({ document: makeDocument('pdf'), bytes: Buffer.from('x') }, context())
    ).rejects.toBeInstanceOf(ParseError);
  });

  it('requires an API key before any call', () => {
    const fetchMock = stubFetch(() => new Response('{}'));
    const provider = new MistralProvider(MistralConfigSchema.parse({}));

    expect(() => provider.assertReady(makeDocument('pdf'))).toThrow(ConfigurationError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('rejects TIFF documents', () => {
    const provider = new MistralProvider(config);
    expect(() => provider.assertReady(makeDocument('tiff'))).toThrow(UnsupportedFileError);
  });

  it('takes PDFs whole', () => {
    expect(new MistralProvider(config).requiresRasterizedPdf()).toBe(false);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// LANDING AI
// ═══════════════════════════════════════════════════════════════════════════════

describe('LandingAIProvider', () => {
  const config = LandingAIConfigSchema.parse({ apiKey: 'test-secret' });

  it('uploads a PDF under the pdf field with basic auth', async () => {
    const fetchMock = stubFetch(() => new Response(loadPayloadText('landing-ai')));
    const provider = new LandingAIProvider(config);

    await provider.analyze(
      { document: makeDocument('pdf', '/tmp/invoice.pdf'), bytes: Buffer.from('pdf-bytes') },
      context()
    );

    const { url, init, headers } = lastRequest(fetchMock);
    expect(url).toBe('https://api.va.landing.ai/v1/tools/agentic-document-analysis');
    expect(headers.get('authorization')).toBe('Basic test-secret');
    const form = init?.body;
    expect(form).toBeInstanceOf(FormData);
    if (form instanceof FormData) {
      const file = form.get('pdf');
      expect(file).toBeInstanceOf(Blob);
      if (file instanceof Blob) {
        expect(await file.text()).toBe('pdf-bytes');
      }
      expect(form.get('image')).toBeNull();
    }
  });

  it('uploads images under the image field', async () => {
    const fetchMock = stubFetch(() => new Response(loadPayloadText('landing-ai')));
    const provider = new LandingAIProvider(config);

    await provider.analyze({ document: makeDocument('png'), bytes: Buffer.from('png') }, context());

    const form = lastRequest(fetchMock).init?.body;
    expect(form instanceof FormData && form.has('image')).toBe(true);
  });

  it('returns the vendor JSON pretty-printed, geometry included', async () => {
    stubFetch(() => new Response(loadPayloadText('landing-ai')));
    const provider = new LandingAIProvider(config);

    const result = await provider.analyze(
      { document: makeDocument('pdf'), bytes: Buffer.from('x') },
      context()
    );

    expect(result.opaque).toBe(true);
    expect(result.rawSummaryText).toBe(JSON.stringify(loadPayload('landing-ai'), null, 2));
  });

  it('requires an API key', () => {
    const provider = new LandingAIProvider(LandingAIConfigSchema.parse({}));
    expect(() => provider.assertReady(makeDocument('pdf'))).toThrow('LANDING_AI_API_KEY not set in .env');
  });

  it('rejects TIFF documents', () => {
    const provider = new LandingAIProvider(config);
    expect(() => provider.assertReady(makeDocument('tif'))).toThrow(
      'Unsupported file type for Landing AI: .tif (supported: .pdf, .jpg, .jpeg, .png)'
    );
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// AWS TEXTRACT
// ═══════════════════════════════════════════════════════════════════════════════

describe('TextractProvider', () => {
  const config = TextractConfigSchema.parse({
    accessKeyId: 'test-access-key',
    secretAccessKey: 'test-secret',
  });

  function fakeTransport() {
    const analyzeExpense = vi.fn(
      async (_bytes: Buffer, _signal: AbortSignal): Promise<JsonValue> => loadPayload('expense-invoice')
    );
    const detectDocumentText = vi.fn(
      async (_bytes: Buffer, _signal: AbortSignal): Promise<JsonValue> => loadPayload('detect-text')
    );
    return { analyzeExpense, detectDocumentText } satisfies TextractTransport;
  }

  it('maps AnalyzeExpense output through the expense adapter', async () => {
    const transport = fakeTransport();
    const provider = new TextractProvider(config, transport);
    const bytes = Buffer.from('page-image');

    const result = await provider.analyze({ document: makeDocument('png'), bytes }, context());

    expect(transport.analyzeExpense).toHaveBeenCalledWith(bytes, expect.any(AbortSignal));
    expect(result.api).toBe('AnalyzeExpense');
    expect(result.pages[0].documents[0].summaryFields[0]).toEqual({
      fieldType: 'VENDOR_NAME',
      fieldValue: 'Acme',
    });
  });

  it('uses DetectDocumentText for the fallback', async () => {
    const transport = fakeTransport();
    const provider = new TextractProvider(config, transport);

    const result = await provider.analyzeFallback(
      { document: makeDocument('pdf'), bytes: Buffer.from('pdf') },
      context()
    );

    expect(transport.detectDocumentText).toHaveBeenCalledTimes(1);
    expect(result.pages[0].text).toBe('Hello\nWorld\n');
  });

  it('needs rasterized pages for PDFs only', () => {
    const provider = new TextractProvider(config, fakeTransport());

    expect(provider.requiresRasterizedPdf(makeDocument('pdf'))).toBe(true);
    expect(provider.requiresRasterizedPdf(makeDocument('png'))).toBe(false);
  });

  it('accepts TIFF', () => {
    const provider = new TextractProvider(config, fakeTransport());
    expect(() => provider.assertReady(makeDocument('tiff'))).not.toThrow();
  });

  it('lists every missing credential', () => {
    const provider = new TextractProvider(TextractConfigSchema.parse({ accessKeyId: 'test-access-key' }));

    try {
      provider.assertReady(makeDocument('pdf'));
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.missing).toEqual(['AWS_SECRET_ACCESS_KEY']);
        expect(error.message).toBe('AWS_SECRET_ACCESS_KEY not set in .env');
      }
    }
  });
});

describe('createProviders', () => {
  it('builds one provider per id', () => {
    const providers = createProviders(loadConfig({}, {}));

    expect([...providers.keys()]).toEqual(['textract', 'mistral', 'landing-ai']);
    expect(providers.get('landing-ai')?.name).toBe('Landing AI');
  });

  it('applies per-provider timeouts from configuration', () => {
    const providers = createProviders(
      loadConfig({}, { OCR_TIMEOUT_MS: '5000', MISTRAL_TIMEOUT_MS: '9000' })
    );

    expect(providers.get('textract')?.timeoutMs).toBe(5000);
    expect(providers.get('mistral')?.timeoutMs).toBe(9000);
  });
});
