/**
 * Configuration
 *
 * Every setting comes from the environment (loaded from .env by the CLI
 * entry point) and is validated by zod. Credentials are optional here:
 * a provider without one reports a ConfigurationError when it is used,
 * without stopping the other providers.
 *
 * Environment variables:
 *   AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY, AWS_SESSION_TOKEN, AWS_REGION (eu-west-1)
 *   MISTRAL_API_KEY, MISTRAL_OCR_ENDPOINT, MISTRAL_OCR_MODEL, MISTRAL_INCLUDE_FULL_RESPONSE (true)
 *   LANDING_AI_API_KEY, LANDING_AI_ENDPOINT
 *   OCR_TIMEOUT_MS (120000), TEXTRACT_TIMEOUT_MS, MISTRAL_TIMEOUT_MS, LANDING_AI_TIMEOUT_MS
 *   PDFTOPPM_PATH (pdftoppm), RASTER_DPI (200), RASTER_TIMEOUT_MS (120000), PAGE_CONCURRENCY (1)
 *   OPENAI_API_KEY, OPENAI_BASE_URL, ANTHROPIC_API_KEY, ANTHROPIC_BASE_URL
 *   LLM_TEMPERATURE (0.7), LLM_MAX_TOKENS (4000), LLM_TIMEOUT_MS (120000), LLM_SEGMENT_CHARS (12000)
 *
 * @module utils/config
 */

import { z } from 'zod';

export const DEFAULT_OCR_TIMEOUT_MS = 120_000;

export const TextractConfigSchema = z.object({
  accessKeyId: z.string().optional(),
  secretAccessKey: z.string().optional(),
  sessionToken: z.string().optional(),
  region: z.string().default('eu-west-1'),
  timeoutMs: z.number().int().positive().default(DEFAULT_OCR_TIMEOUT_MS),
});

export const MistralConfigSchema = z.object({
  apiKey: z.string().optional(),
  endpoint: z.string().url().default('https://api.mistral.ai/v1/ocr'),
  model: z.string().default('mistral-ocr-latest'),
  includeFullResponse: z.boolean().default(true),
  timeoutMs: z.number().int().positive().default(DEFAULT_OCR_TIMEOUT_MS),
});

export const LandingAIConfigSchema = z.object({
  apiKey: z.string().optional(),
  endpoint: z
    .string()
    .url()
    .default('https://api.va.landing.ai/v1/tools/agentic-document-analysis'),
  timeoutMs: z.number().int().positive().default(DEFAULT_OCR_TIMEOUT_MS),
});

export const RasterConfigSchema = z.object({
  pdftoppmPath: z.string().default('pdftoppm'),
  dpi: z.number().int().min(36).max(1200).default(200),
  timeoutMs: z.number().int().positive().default(120_000),
});

export const LLMConfigSchema = z.object({
  openaiApiKey: z.string().optional(),
  openaiBaseUrl: z.string().url().default('https://api.openai.com/v1'),
  anthropicApiKey: z.string().optional(),
  anthropicBaseUrl: z.string().url().default('https://api.anthropic.com/v1'),
  temperature: z.number().min(0).max(2).default(0.7),
  maxTokens: z.number().int().positive().default(4000),
  timeoutMs: z.number().int().positive().default(120_000),
  segmentChars: z.number().int().min(1000).default(12_000),
  retry: z
    .object({
      maxAttempts: z.number().int().min(1).default(3),
      baseDelayMs: z.number().int().min(0).default(1000),
      maxDelayMs: z.number().int().min(0).default(30_000),
    })
    .default({}),
});

export const AppConfigSchema = z.object({
  textract: TextractConfigSchema.default({}),
  mistral: MistralConfigSchema.default({}),
  landingAi: LandingAIConfigSchema.default({}),
  raster: RasterConfigSchema.default({}),
  pageConcurrency: z.number().int().min(1).max(16).default(1),
  llm: LLMConfigSchema.default({}),
});

export type TextractConfig = z.infer<typeof TextractConfigSchema>;
export type MistralConfig = z.infer<typeof MistralConfigSchema>;
export type LandingAIConfig = z.infer<typeof LandingAIConfigSchema>;
export type RasterConfig = z.infer<typeof RasterConfigSchema>;
export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Per-section partial overrides, applied over the environment
 */
export interface ConfigOverrides {
  textract?: Partial<TextractConfig>;
  mistral?: Partial<MistralConfig>;
  landingAi?: Partial<LandingAIConfig>;
  raster?: Partial<RasterConfig>;
  pageConcurrency?: number;
  llm?: Partial<LLMConfig>;
}

type Env = Record<string, string | undefined>;

/** Empty strings count as unset */
function envString(env: Env, name: string): string | undefined {
  const raw = env[name];
  return raw === undefined || raw.trim() === '' ? undefined : raw.trim();
}

function parseIntEnv(env: Env, name: string): number | undefined {
  const raw = envString(env, name);
  if (raw === undefined) return undefined;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

function parseFloatEnv(env: Env, name: string): number | undefined {
  const raw = envString(env, name);
  if (raw === undefined) return undefined;
  const parsed = parseFloat(raw);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

function parseBoolEnv(env: Env, name: string): boolean | undefined {
  const raw = envString(env, name);
  if (raw === undefined) return undefined;
  const normalized = raw.toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new Error(`Invalid boolean env var ${name}: "${raw}"`);
}

/**
 * Load configuration from the environment, then apply overrides.
 *
 * @throws Error naming the variable when a numeric or boolean var is malformed
 * @throws ZodError when a value is out of range
 */
export function loadConfig(overrides: ConfigOverrides = {}, env: Env = process.env): AppConfig {
  const ocrTimeout = parseIntEnv(env, 'OCR_TIMEOUT_MS');

  const fromEnv = {
    textract: {
      accessKeyId: envString(env, 'AWS_ACCESS_KEY_ID'),
      secretAccessKey: envString(env, 'AWS_SECRET_ACCESS_KEY'),
      sessionToken: envString(env, 'AWS_SESSION_TOKEN'),
      region: envString(env, 'AWS_REGION'),
      timeoutMs: parseIntEnv(env, 'TEXTRACT_TIMEOUT_MS') ?? ocrTimeout,
    },
    mistral: {
      apiKey: envString(env, 'MISTRAL_API_KEY'),
      endpoint: envString(env, 'MISTRAL_OCR_ENDPOINT'),
      model: envString(env, 'MISTRAL_OCR_MODEL'),
      includeFullResponse: parseBoolEnv(env, 'MISTRAL_INCLUDE_FULL_RESPONSE'),
      timeoutMs: parseIntEnv(env, 'MISTRAL_TIMEOUT_MS') ?? ocrTimeout,
    },
    landingAi: {
      apiKey: envString(env, 'LANDING_AI_API_KEY'),
      endpoint: envString(env, 'LANDING_AI_ENDPOINT'),
      timeoutMs: parseIntEnv(env, 'LANDING_AI_TIMEOUT_MS') ?? ocrTimeout,
    },
    raster: {
      pdftoppmPath: envString(env, 'PDFTOPPM_PATH'),
      dpi: parseIntEnv(env, 'RASTER_DPI'),
      timeoutMs: parseIntEnv(env, 'RASTER_TIMEOUT_MS'),
    },
    pageConcurrency: parseIntEnv(env, 'PAGE_CONCURRENCY'),
    llm: {
      openaiApiKey: envString(env, 'OPENAI_API_KEY'),
      openaiBaseUrl: envString(env, 'OPENAI_BASE_URL'),
      anthropicApiKey: envString(env, 'ANTHROPIC_API_KEY'),
      anthropicBaseUrl: envString(env, 'ANTHROPIC_BASE_URL'),
      temperature: parseFloatEnv(env, 'LLM_TEMPERATURE'),
      maxTokens: parseIntEnv(env, 'LLM_MAX_TOKENS'),
      timeoutMs: parseIntEnv(env, 'LLM_TIMEOUT_MS'),
      segmentChars: parseIntEnv(env, 'LLM_SEGMENT_CHARS'),
    },
  };

  return AppConfigSchema.parse({
    textract: { ...fromEnv.textract, ...overrides.textract },
    mistral: { ...fromEnv.mistral, ...overrides.mistral },
    landingAi: { ...fromEnv.landingAi, ...overrides.landingAi },
    raster: { ...fromEnv.raster, ...overrides.raster },
    pageConcurrency: overrides.pageConcurrency ?? fromEnv.pageConcurrency,
    llm: { ...fromEnv.llm, ...overrides.llm },
  });
}
