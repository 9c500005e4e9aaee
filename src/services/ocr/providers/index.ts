/**
 * OCR providers
 */

import type { ProviderId } from '../../../models/provider.js';
import type { AppConfig } from '../../../utils/config.js';
import { LandingAIProvider } from './landing-ai.js';
import { MistralProvider } from './mistral.js';
import { TextractProvider, type TextractTransport } from './textract.js';
import type { OCRProvider } from './types.js';

export interface ProviderDependencies {
  textractTransport?: TextractTransport;
}

/**
 * One provider per id, built from configuration
 */
export function createProviders(
  config: AppConfig,
  deps: ProviderDependencies = {}
): Map<ProviderId, OCRProvider> {
  return new Map<ProviderId, OCRProvider>([
    ['textract', new TextractProvider(config.textract, deps.textractTransport)],
    ['mistral', new MistralProvider(config.mistral)],
    ['landing-ai', new LandingAIProvider(config.landingAi)],
  ]);
}

export type { CallContext, OCRProvider, ProviderInput } from './types.js';
export { assertExtension } from './types.js';
export { postJson, type HttpRequest } from './http.js';
export {
  TextractProvider,
  createSdkTextractTransport,
  type TextractCredentials,
  type TextractTransport,
} from './textract.js';
export { MistralProvider, buildMistralDocument } from './mistral.js';
export { LandingAIProvider, buildLandingForm } from './landing-ai.js';
