/**
 * Chat clients for the comparison models
 *
 * Thin fetch clients for the OpenAI Chat Completions and Anthropic Messages
 * APIs. Each call runs under a deadline and is retried with exponential
 * backoff on rate limits, 5xx responses, network failures and timeouts.
 *
 * @module services/llm/client
 */

import { z } from 'zod';
import type { JsonValue } from '../../models/extraction.js';
import { withDeadline } from '../../utils/abort.js';
import { withRetry } from '../../utils/backoff.js';
import type { LLMConfig } from '../../utils/config.js';
import { ParseError, ProviderTimeoutError, RateLimitError, TransportError, excerpt } from '../ocr/errors.js';
import { postJson } from '../ocr/providers/http.js';
import type { ChatVendor } from './config.js';

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChatRequest {
  system: string;
  messages: ChatMessage[];
  signal?: AbortSignal;
}

export interface ChatClient {
  readonly vendor: ChatVendor;
  readonly model: string;
  /** Text of the assistant's reply */
  complete(request: ChatRequest): Promise<string>;
}

const OpenAIResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
});

const AnthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
});

/**
 * Rate limits, server errors, network failures and timeouts
 */
export function isRetryableChatError(error: unknown): boolean {
  if (error instanceof RateLimitError || error instanceof ProviderTimeoutError) return true;
  if (error instanceof TransportError && error.category === 'TRANSPORT_ERROR') {
    return error.statusCode === undefined || error.statusCode >= 500;
  }
  return false;
}

function parseReply<S extends z.ZodTypeAny>(vendor: string, schema: S, raw: JsonValue): z.infer<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ParseError(
      vendor,
      `Unexpected ${vendor} response: ${result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ')}`,
      excerpt(JSON.stringify(raw))
    );
  }
  return result.data;
}

abstract class BaseChatClient implements ChatClient {
  abstract readonly vendor: ChatVendor;
  protected abstract readonly label: string;

  constructor(
    readonly model: string,
    protected readonly apiKey: string,
    protected readonly config: LLMConfig
  ) {}

  complete(request: ChatRequest): Promise<string> {
    const { retry, timeoutMs } = this.config;
    return withRetry(
      () => withDeadline(this.label, timeoutMs, request.signal, (signal) => this.send(request, signal)),
      isRetryableChatError,
      { ...retry, tag: `${this.label}Client`, signal: request.signal }
    );
  }

  protected abstract send(request: ChatRequest, signal: AbortSignal): Promise<string>;
}

export class OpenAIChatClient extends BaseChatClient {
  readonly vendor = 'openai';
  protected readonly label = 'OpenAI';

  protected async send(request: ChatRequest, signal: AbortSignal): Promise<string> {
    const raw = await postJson({
      provider: this.label,
      url: `${this.config.openaiBaseUrl}/chat/completions`,
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: this.model,
        temperature: this.config.temperature,
        max_tokens: this.config.maxTokens,
        messages: [{ role: 'system', content: request.system }, ...request.messages],
      }),
      signal,
    });
    const reply = parseReply(this.label, OpenAIResponseSchema, raw);
    return reply.choices[0].message.content ?? '';
  }
}

export class AnthropicChatClient extends BaseChatClient {
  readonly vendor = 'anthropic';
  protected readonly label = 'Anthropic';

  protected async send(request: ChatRequest, signal: AbortSignal): Promise<string> {
    const raw = await postJson({
      provider: this.label,
      url: `${this.config.anthropicBaseUrl}/messages`,
      headers: {
        'x-api-key': this.apiKey,
        'anthropic-version': '2023-06-01',
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: this.model,
        system: request.system,
        temperature: this.config.temperature,
        max_tokens: this.config.maxTokens,
        messages: request.messages,
      }),
      signal,
    });
    const reply = parseReply(this.label, AnthropicResponseSchema, raw);
    return reply.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('');
  }
}

export function createChatClient(
  vendor: ChatVendor,
  model: string,
  apiKey: string,
  config: LLMConfig
): ChatClient {
  return vendor === 'openai'
    ? new OpenAIChatClient(model, apiKey, config)
    : new AnthropicChatClient(model, apiKey, config);
}
