/**
 * Provider adapters: vendor payload -> canonical ExtractionResult
 */

export type { ProviderAdapter } from './types.js';
export { parseJsonText, parsePayload } from './types.js';

// AWS Textract AnalyzeExpense
export {
  createExpenseAdapter,
  expenseAdapter,
  UNKNOWN_FIELD_TYPE,
  MISSING_FIELD_VALUE,
} from './expense.js';

// AWS Textract DetectDocumentText
export { createDetectTextAdapter, detectTextAdapter } from './detect-text.js';

// Mistral OCR
export {
  createMarkdownPageAdapter,
  markdownPageAdapter,
  type MarkdownPageAdapterOptions,
} from './markdown-pages.js';

// Landing AI
export { createPassThroughAdapter, passThroughAdapter } from './pass-through.js';
