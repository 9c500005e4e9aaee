/**
 * fetch wrapper shared by the HTTP vendors.
 *
 * The signal comes from the coordinator's deadline; an aborted request is
 * rethrown untouched so the deadline can report timeout vs. cancellation.
 */

import type { JsonValue } from '../../../models/extraction.js';
import { TransportError, mapHttpError } from '../errors.js';
import { parseJsonText } from '../adapters/types.js';

export interface HttpRequest {
  provider: string;
  url: string;
  headers: Record<string, string>;
  body: string | FormData;
  signal: AbortSignal;
}

async function readBody(provider: string, response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    throw new TransportError(
      provider,
      `${provider} response body could not be read: ${error instanceof Error ? error.message : String(error)}`,
      response.status,
      { cause: error }
    );
  }
}

/**
 * POST and parse the JSON answer.
 *
 * @throws TransportError (or a subclass) for network failures and non-2xx statuses
 * @throws ParseError when a 2xx body is not JSON
 */
export async function postJson(request: HttpRequest): Promise<JsonValue> {
  const { provider, url, headers, body, signal } = request;

  let response: Response;
  try {
    response = await fetch(url, { method: 'POST', headers, body, signal });
  } catch (error) {
    if (signal.aborted) {
      throw error;
    }
    throw new TransportError(
      provider,
      `${provider} request failed: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      { cause: error }
    );
  }

  const text = await readBody(provider, response);
  if (!response.ok) {
    throw mapHttpError(provider, response.status, text, response.headers.get('retry-after'));
  }
  return parseJsonText(provider, text);
}
