/**
 * Configuration Unit Tests
 *
 * loadConfig always gets an explicit env so the host environment never leaks in.
 */

import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig } from '../../../src/utils/config.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({}, {});

    expect(config.textract).toEqual({ region: 'eu-west-1', timeoutMs: 120_000 });
    expect(config.mistral).toEqual({
      endpoint: 'https://api.mistral.ai/v1/ocr',
      model: 'mistral-ocr-latest',
      includeFullResponse: true,
      timeoutMs: 120_000,
    });
    expect(config.landingAi.endpoint).toBe('https://api.va.landing.ai/v1/tools/agentic-document-analysis');
    expect(config.raster).toEqual({ pdftoppmPath: 'pdftoppm', dpi: 200, timeoutMs: 120_000 });
    expect(config.pageConcurrency).toBe(1);
    expect(config.llm.temperature).toBe(0.7);
    expect(config.llm.maxTokens).toBe(4000);
    expect(config.llm.segmentChars).toBe(12_000);
    expect(config.llm.retry).toEqual({ maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 30_000 });
  });

  it('reads credentials and trims whitespace', () => {
    const config = loadConfig(
      {},
      {
        AWS_ACCESS_KEY_ID: ' test-access-key ',
        AWS_SECRET_ACCESS_KEY: 'test-secret',
        AWS_REGION: 'us-east-1',
        MISTRAL_API_KEY: 'test-secret',
        OPENAI_API_KEY: 'test-secret',
      }
    );

    expect(config.textract.accessKeyId).toBe('test-access-key');
    expect(config.textract.region).toBe('us-east-1');
    expect(config.mistral.apiKey).toBe('test-secret');
    expect(config.llm.openaiApiKey).toBe('test-secret');
    expect(config.llm.anthropicApiKey).toBeUndefined();
  });

  it('treats empty strings as unset', () => {
    const config = loadConfig({}, { LANDING_AI_API_KEY: '   ', AWS_REGION: '' });

    expect(config.landingAi.apiKey).toBeUndefined();
    expect(config.textract.region).toBe('eu-west-1');
  });

  it('uses OCR_TIMEOUT_MS for every provider unless a provider sets its own', () => {
    const config = loadConfig({}, { OCR_TIMEOUT_MS: '30000', MISTRAL_TIMEOUT_MS: '5000' });

    expect(config.textract.timeoutMs).toBe(30_000);
    expect(config.mistral.timeoutMs).toBe(5000);
    expect(config.landingAi.timeoutMs).toBe(30_000);
  });

  it('parses booleans and numbers', () => {
    const config = loadConfig(
      {},
      { MISTRAL_INCLUDE_FULL_RESPONSE: 'no', RASTER_DPI: '300', PAGE_CONCURRENCY: '4', LLM_TEMPERATURE: '0.2' }
    );

    expect(config.mistral.includeFullResponse).toBe(false);
    expect(config.raster.dpi).toBe(300);
    expect(config.pageConcurrency).toBe(4);
    expect(config.llm.temperature).toBe(0.2);
  });

  it('lets overrides win over the environment', () => {
    const config = loadConfig(
      { raster: { dpi: 150 }, pageConcurrency: 2, llm: { segmentChars: 2000 } },
      { RASTER_DPI: '300', PAGE_CONCURRENCY: '8' }
    );

    expect(config.raster.dpi).toBe(150);
    expect(config.pageConcurrency).toBe(2);
    expect(config.llm.segmentChars).toBe(2000);
  });

  it('names a malformed numeric variable', () => {
    expect(() => loadConfig({}, { RASTER_DPI: 'high' })).toThrow('Invalid numeric env var RASTER_DPI: "high"');
  });

  it('names a malformed boolean variable', () => {
    expect(() => loadConfig({}, { MISTRAL_INCLUDE_FULL_RESPONSE: 'maybe' })).toThrow(
      'Invalid boolean env var MISTRAL_INCLUDE_FULL_RESPONSE: "maybe"'
    );
  });

  it('rejects out-of-range values', () => {
    expect(() => loadConfig({}, { PAGE_CONCURRENCY: '0' })).toThrow(ZodError);
    expect(() => loadConfig({}, { MISTRAL_OCR_ENDPOINT: 'not a url' })).toThrow(ZodError);
  });
});
