/**
 * Data models
 *
 * Barrel export for all model interfaces.
 */

// Document models
export * from './document.js';

// Extraction models
export * from './extraction.js';

// Provider models
export * from './provider.js';

// Comparison models
export * from './comparison.js';
