/**
 * Comparison service
 *
 * Asks a chat model to evaluate provider summaries against each other.
 * Inputs are read, never modified. A missing credential is reported as a
 * ConfigurationError so callers can show "not configured" and carry on.
 *
 * @module services/llm/comparison
 */

import type { ComparisonReport } from '../../models/comparison.js';
import type { LLMConfig } from '../../utils/config.js';
import { ValidationError } from '../../utils/validation.js';
import { computeAgreement } from '../comparison/diff-service.js';
import { ConfigurationError } from '../ocr/errors.js';
import { createChatClient, type ChatClient, type ChatMessage } from './client.js';
import {
  COMPARISON_MODELS,
  COMPARISON_MODEL_NAMES,
  credentialFor,
  isComparisonModelName,
  type ChatVendor,
} from './config.js';
import { buildComparisonPrompt, buildPromptSegments, renderSegment, SYSTEM_PROMPT } from './prompts.js';

export interface CompareOptions {
  /** Feed the input turn by turn instead of in one message */
  segmented?: boolean;
  signal?: AbortSignal;
}

export type ChatClientFactory = (
  vendor: ChatVendor,
  model: string,
  apiKey: string,
  config: LLMConfig
) => ChatClient;

export class ComparisonService {
  constructor(
    private readonly config: LLMConfig,
    private readonly clientFactory: ChatClientFactory = createChatClient
  ) {}

  /**
   * @throws ValidationError for an unknown model label or no summaries
   * @throws ConfigurationError when the model's API key is not set
   */
  async compare(
    summaries: Record<string, string>,
    modelName: string,
    options: CompareOptions = {}
  ): Promise<ComparisonReport> {
    if (!isComparisonModelName(modelName)) {
      throw new ValidationError(
        `Unsupported model choice: ${modelName}. Available: ${COMPARISON_MODEL_NAMES.join(', ')}`
      );
    }
    if (Object.keys(summaries).length === 0) {
      throw new ValidationError('No OCR results to compare');
    }

    const spec = COMPARISON_MODELS[modelName];
    const apiKey = credentialFor(spec.vendor, this.config);
    if (!apiKey) {
      throw new ConfigurationError(modelName, `${spec.credentialEnv} not set in .env`, [
        spec.credentialEnv,
      ]);
    }

    const client = this.clientFactory(spec.vendor, spec.model, apiKey, this.config);
    const inputCharacters = Object.values(summaries).reduce((sum, text) => sum + text.length, 0);
    const start = Date.now();

    let bodyMarkdown: string;
    let segments: number;
    if (options.segmented) {
      ({ bodyMarkdown, segments } = await this.converse(client, summaries, options.signal));
    } else {
      const prompt = buildComparisonPrompt(summaries);
      bodyMarkdown = await client.complete({
        system: prompt.system,
        messages: [{ role: 'user', content: prompt.user }],
        signal: options.signal,
      });
      segments = 1;
    }

    console.error(
      `[Comparison] ${modelName}: ${inputCharacters} input chars in ${segments} segment(s), ${Date.now() - start}ms`
    );

    return {
      modelName,
      bodyMarkdown,
      inputCharacters,
      segments,
      agreement: computeAgreement(summaries),
    };
  }

  /**
   * One turn per segment; the reply to the last one is the report
   */
  private async converse(
    client: ChatClient,
    summaries: Record<string, string>,
    signal: AbortSignal | undefined
  ): Promise<{ bodyMarkdown: string; segments: number }> {
    const segments = buildPromptSegments(summaries, this.config.segmentChars);
    const messages: ChatMessage[] = [];
    let reply = '';

    for (const segment of segments) {
      messages.push({ role: 'user', content: renderSegment(segment) });
      reply = await client.complete({ system: SYSTEM_PROMPT, messages: [...messages], signal });
      messages.push({ role: 'assistant', content: reply });
    }

    return { bodyMarkdown: reply, segments: segments.length };
  }
}
