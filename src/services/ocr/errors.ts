/**
 * OCR Error Classes
 *
 * Every failure inside the pipeline is one of these. The runner turns them
 * into per-provider result text, so one provider failing never hides the
 * others.
 */

export type OCRErrorCategory =
  | 'CONFIGURATION_ERROR'
  | 'TRANSPORT_ERROR'
  | 'AUTHENTICATION_ERROR'
  | 'RATE_LIMIT'
  | 'PARSE_ERROR'
  | 'TIMEOUT'
  | 'UNSUPPORTED_FILE'
  | 'RASTERIZATION_ERROR'
  | 'CANCELLED';

/** Body excerpts carried in error messages are capped at this many characters */
const MAX_EXCERPT_LENGTH = 500;

export class OCRError extends Error {
  constructor(
    message: string,
    public readonly category: OCRErrorCategory,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'OCRError';
  }
}

/**
 * Failure attributed to one provider
 */
export class ProviderError extends OCRError {
  constructor(
    public readonly provider: string,
    message: string,
    category: OCRErrorCategory,
    options?: { cause?: unknown }
  ) {
    super(message, category, options);
    this.name = 'ProviderError';
  }
}

/**
 * A credential or setting the provider needs is missing.
 * Raised before any network call is made.
 */
export class ConfigurationError extends ProviderError {
  constructor(
    provider: string,
    message: string,
    public readonly missing: readonly string[] = []
  ) {
    super(provider, message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class TransportError extends ProviderError {
  constructor(
    provider: string,
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown; category?: OCRErrorCategory }
  ) {
    super(provider, message, options?.category ?? 'TRANSPORT_ERROR', options);
    this.name = 'TransportError';
  }
}

export class AuthenticationError extends TransportError {
  constructor(provider: string, message: string, statusCode: number) {
    super(provider, message, statusCode, { category: 'AUTHENTICATION_ERROR' });
    this.name = 'AuthenticationError';
  }
}

export class RateLimitError extends TransportError {
  constructor(
    provider: string,
    message: string = 'Rate limit exceeded',
    public readonly retryAfter: number = 60
  ) {
    super(provider, message, 429, { category: 'RATE_LIMIT' });
    this.name = 'RateLimitError';
  }
}

/**
 * The vendor answered, but not with data the adapter can interpret
 */
export class ParseError extends ProviderError {
  constructor(
    provider: string,
    message: string,
    public readonly rawText: string,
    options?: { cause?: unknown }
  ) {
    super(provider, message, 'PARSE_ERROR', options);
    this.name = 'ParseError';
  }
}

export class ProviderTimeoutError extends ProviderError {
  constructor(
    provider: string,
    public readonly timeoutMs: number,
    options?: { cause?: unknown }
  ) {
    super(provider, `${provider} did not respond within ${timeoutMs}ms`, 'TIMEOUT', options);
    this.name = 'ProviderTimeoutError';
  }
}

export class UnsupportedFileError extends ProviderError {
  constructor(
    provider: string,
    public readonly extension: string,
    supported: readonly string[]
  ) {
    super(
      provider,
      `Unsupported file type for ${provider}: .${extension} (supported: ${supported.map((e) => `.${e}`).join(', ')})`,
      'UNSUPPORTED_FILE'
    );
    this.name = 'UnsupportedFileError';
  }
}

/**
 * The PDF could not be split into pages. Fatal for every per-page provider
 * on that document; whole-document providers are unaffected.
 */
export class RasterizationError extends OCRError {
  constructor(
    message: string,
    public readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'RASTERIZATION_ERROR', options);
    this.name = 'RasterizationError';
  }
}

/**
 * A payload contained a reference cycle (JSON input never does)
 */
export class CyclicPayloadError extends OCRError {
  constructor(public readonly path: string) {
    super(`Cyclic structure detected at ${path}`, 'PARSE_ERROR');
    this.name = 'CyclicPayloadError';
  }
}

export class RequestCancelledError extends OCRError {
  constructor(message: string = 'Request cancelled') {
    super(message, 'CANCELLED');
    this.name = 'RequestCancelledError';
  }
}

/**
 * Trim a response body for inclusion in an error message
 */
export function excerpt(text: string, max: number = MAX_EXCERPT_LENGTH): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/**
 * Map a non-success HTTP status to the matching error class
 */
export function mapHttpError(
  provider: string,
  status: number,
  body: string,
  retryAfterHeader?: string | null
): TransportError {
  const detail = `${provider} API error: ${status}${body ? ` - ${excerpt(body)}` : ''}`;
  if (status === 401 || status === 403) {
    return new AuthenticationError(provider, detail, status);
  }
  if (status === 429) {
    const parsed = retryAfterHeader ? parseInt(retryAfterHeader, 10) : NaN;
    return new RateLimitError(provider, detail, Number.isNaN(parsed) ? 60 : parsed);
  }
  return new TransportError(provider, detail, status);
}

/**
 * Category of any thrown value ('INTERNAL_ERROR' for foreign errors)
 */
export function categoryOf(error: unknown): OCRErrorCategory | 'INTERNAL_ERROR' {
  return error instanceof OCRError ? error.category : 'INTERNAL_ERROR';
}

/**
 * Render a failure as the text shown in place of a provider's result.
 * Always names the provider and the underlying cause.
 */
export function describeError(provider: string, error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  if (error instanceof ConfigurationError) {
    return `${provider} credentials not configured: ${message}`;
  }
  if (error instanceof ParseError && error.rawText) {
    return `Error processing with ${provider}: ${message}\nRaw response: ${excerpt(error.rawText)}`;
  }
  return `Error processing with ${provider}: ${message}`;
}
