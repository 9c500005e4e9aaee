/**
 * Shared adapter plumbing.
 *
 * Vendors change their schemas, so adapters validate only the top-level
 * shape they cannot work without. Leaf fields are lenient and fall back to
 * placeholder text instead of failing.
 */

import { z } from 'zod';
import type { Document } from '../../../models/document.js';
import type { ExtractionResult, JsonValue, RawProviderPayload } from '../../../models/extraction.js';
import { ParseError, excerpt } from '../errors.js';

export interface ProviderAdapter {
  readonly providerName: string;
  /** Vendor API whose payload this adapter reads */
  readonly api: string;
  extract(document: Document, payload: RawProviderPayload): ExtractionResult;
}

/**
 * Optional string leaf: anything else becomes undefined
 */
export const lenientText = z.string().optional().catch(undefined);

/**
 * Optional number leaf: anything else becomes undefined
 */
export const lenientNumber = z.number().optional().catch(undefined);

/**
 * Parse a text payload as JSON.
 *
 * @throws ParseError carrying the raw text
 */
export function parseJsonText(provider: string, text: string): JsonValue {
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new ParseError(
      provider,
      `${provider} returned malformed JSON: ${error instanceof Error ? error.message : String(error)}`,
      text,
      { cause: error }
    );
  }
}

export function toJsonPayload(provider: string, payload: RawProviderPayload): JsonValue {
  return typeof payload === 'string' ? parseJsonText(provider, payload) : payload;
}

/**
 * Validate the payload's required shape.
 *
 * @throws ParseError listing the failing paths, with the raw payload attached
 */
export function parsePayload<S extends z.ZodTypeAny>(
  provider: string,
  document: Document,
  schema: S,
  payload: RawProviderPayload
): z.infer<S> {
  const value = toJsonPayload(provider, payload);
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ParseError(
      provider,
      `Unexpected ${provider} response for ${document.fileName}: ${issues.join('; ')}`,
      excerpt(JSON.stringify(value))
    );
  }
  return result.data;
}
