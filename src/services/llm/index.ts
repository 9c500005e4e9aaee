/**
 * LLM comparison step
 */

export {
  ComparisonService,
  type ChatClientFactory,
  type CompareOptions,
} from './comparison.js';

export {
  AnthropicChatClient,
  OpenAIChatClient,
  createChatClient,
  isRetryableChatError,
  type ChatClient,
  type ChatMessage,
  type ChatRequest,
} from './client.js';

export {
  COMPARISON_MODELS,
  COMPARISON_MODEL_NAMES,
  DEFAULT_COMPARISON_MODEL,
  credentialFor,
  isComparisonModelName,
  type ChatVendor,
  type ComparisonModelName,
  type ComparisonModelSpec,
} from './config.js';

export {
  SYSTEM_PROMPT,
  SECTION_SEPARATOR,
  buildComparisonPrompt,
  buildPromptSegments,
  formatSections,
  renderSegment,
  summarizeInputs,
  type ComparisonPrompt,
  type PromptSegment,
} from './prompts.js';
