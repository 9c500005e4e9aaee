/**
 * OCR pipeline: providers, coordinator, runner and the pieces between
 */

import type { AppConfig } from '../../utils/config.js';
import { MultiPageCoordinator } from './coordinator.js';
import { createProviders, type ProviderDependencies } from './providers/index.js';
import { PopplerRasterizer, type Rasterizer } from './rasterizer.js';

export interface CoordinatorDependencies extends ProviderDependencies {
  rasterizer?: Rasterizer;
}

/**
 * Coordinator wired with every provider and the poppler rasterizer
 */
export function createCoordinator(
  config: AppConfig,
  deps: CoordinatorDependencies = {}
): MultiPageCoordinator {
  return new MultiPageCoordinator(
    createProviders(config, deps),
    deps.rasterizer ?? new PopplerRasterizer(config.raster),
    { pageConcurrency: config.pageConcurrency }
  );
}

// Coordination
export {
  MultiPageCoordinator,
  mergePageResults,
  type CoordinatorOptions,
  type CoordinatorRunOptions,
  type PageResult,
} from './coordinator.js';
export { runProviders, type RunProvidersOptions } from './runner.js';
export { PopplerRasterizer, type Rasterizer, type RasterizeOptions } from './rasterizer.js';

// Providers and adapters
export * from './providers/index.js';
export * from './adapters/index.js';

// Cleaning and rendering
export {
  sanitize,
  sanitizeWithTelemetry,
  measureReduction,
  toJsonValue,
  DEFAULT_NOISE_FIELDS,
  type SanitizeOptions,
  type SizeReduction,
} from './sanitizer.js';
export { formatResult, finalizeResult, type FormattableResult } from './formatter.js';

// Errors
export * from './errors.js';
