/**
 * ocr-compare
 *
 * Runs a document through several OCR providers, normalizes their answers
 * into one extraction model and renders comparable summaries, optionally
 * evaluated by a chat model.
 *
 * @module index
 */

// Models
export * from './models/index.js';

// OCR pipeline
export * from './services/ocr/index.js';

// Comparison
export * from './services/llm/index.js';
export {
  compareText,
  computeAgreement,
  summarizeAgreement,
} from './services/comparison/diff-service.js';

// Configuration and validation
export {
  loadConfig,
  AppConfigSchema,
  type AppConfig,
  type ConfigOverrides,
  type LandingAIConfig,
  type LLMConfig,
  type MistralConfig,
  type RasterConfig,
  type TextractConfig,
} from './utils/config.js';
export { ValidationError, validateInput, toDocument } from './utils/validation.js';
export { withDeadline } from './utils/abort.js';
export { withRetry, calculateBackoffDelay, type RetryOptions } from './utils/backoff.js';
export { mapWithConcurrency } from './utils/concurrency.js';

// CLI
export { runCli, type CliDependencies, type CliIO } from './cli.js';
