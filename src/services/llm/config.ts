/**
 * Comparison model catalogue
 *
 * Labels are what the operator picks; each maps to a vendor, a model id and
 * the credential it needs.
 */

import type { LLMConfig } from '../../utils/config.js';

export type ChatVendor = 'openai' | 'anthropic';

export interface ComparisonModelSpec {
  vendor: ChatVendor;
  model: string;
  /** Environment variable holding the credential */
  credentialEnv: string;
}

export const COMPARISON_MODELS = {
  'OpenAI GPT-4o': { vendor: 'openai', model: 'gpt-4o', credentialEnv: 'OPENAI_API_KEY' },
  'Claude Sonnet 3.5': {
    vendor: 'anthropic',
    model: 'claude-3-5-sonnet-20241022',
    credentialEnv: 'ANTHROPIC_API_KEY',
  },
} as const satisfies Record<string, ComparisonModelSpec>;

export type ComparisonModelName = keyof typeof COMPARISON_MODELS;

export const COMPARISON_MODEL_NAMES = ['OpenAI GPT-4o', 'Claude Sonnet 3.5'] as const satisfies readonly ComparisonModelName[];

export const DEFAULT_COMPARISON_MODEL: ComparisonModelName = 'OpenAI GPT-4o';

export function isComparisonModelName(value: string): value is ComparisonModelName {
  return COMPARISON_MODEL_NAMES.some((name) => name === value);
}

/**
 * Credential for a vendor, or undefined when not configured
 */
export function credentialFor(vendor: ChatVendor, config: LLMConfig): string | undefined {
  return vendor === 'openai' ? config.openaiApiKey : config.anthropicApiKey;
}
