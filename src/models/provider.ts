/**
 * Provider identities and per-provider run outcomes
 */

import type { ExtractionResult } from './extraction.js';

/**
 * Stable identifiers used on the command line and in configuration
 */
export const PROVIDER_IDS = ['textract', 'mistral', 'landing-ai'] as const;

export type ProviderId = (typeof PROVIDER_IDS)[number];

/**
 * Display names; these label results and comparison prompt sections
 */
export const PROVIDER_NAMES: Record<ProviderId, string> = {
  textract: 'AWS Textract',
  mistral: 'Mistral OCR',
  'landing-ai': 'Landing AI',
};

export function isProviderId(value: string): value is ProviderId {
  return PROVIDER_IDS.some((id) => id === value);
}

export interface ProviderSuccess {
  status: 'ok';
  providerId: ProviderId;
  provider: string;
  result: ExtractionResult;
  /** Display text: result.rawSummaryText */
  text: string;
  durationMs: number;
}

export interface ProviderFailure {
  status: 'error';
  providerId: ProviderId;
  provider: string;
  category: string;
  message: string;
  /** Display text shown in place of extracted text */
  text: string;
  durationMs: number;
}

export type ProviderOutcome = ProviderSuccess | ProviderFailure;

export interface ProviderRunReport {
  requestId: string;
  documentPath: string;
  /** In request order */
  outcomes: ProviderOutcome[];
  /** provider display name -> display text, in request order */
  summaries: Record<string, string>;
}
