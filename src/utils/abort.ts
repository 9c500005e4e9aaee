/**
 * Per-call deadlines
 *
 * Each vendor call gets its own AbortSignal that fires on the provider's
 * timeout or when the caller's signal aborts, whichever comes first. The
 * deadline holds even if the callee ignores the signal.
 *
 * @module utils/abort
 */

import { ProviderTimeoutError, RequestCancelledError } from '../services/ocr/errors.js';

export async function withDeadline<T>(
  provider: string,
  timeoutMs: number,
  parent: AbortSignal | undefined,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  if (parent?.aborted) {
    throw new RequestCancelledError();
  }

  const controller = new AbortController();
  let timedOut = false;

  const stopped = new Promise<never>((_, reject) => {
    controller.signal.addEventListener(
      'abort',
      () => reject(timedOut ? new ProviderTimeoutError(provider, timeoutMs) : new RequestCancelledError()),
      { once: true }
    );
  });

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onParentAbort = () => controller.abort();
  parent?.addEventListener('abort', onParentAbort, { once: true });

  try {
    return await Promise.race([fn(controller.signal), stopped]);
  } catch (error) {
    if (timedOut && !(error instanceof ProviderTimeoutError)) {
      throw new ProviderTimeoutError(provider, timeoutMs, { cause: error });
    }
    if (parent?.aborted && !(error instanceof RequestCancelledError)) {
      throw new RequestCancelledError();
    }
    throw error;
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}
