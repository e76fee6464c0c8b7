import { NetworkError, ProcessingError, isRetryable } from '../errors/index.js';
import { RetrySettings } from '../config/index.js';
import { Logger } from '../types/gateway.js';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Retry an operation on retry-safe failures only.
 *
 * NetworkError: the request never reached the gateway, retried at once.
 * ProcessingError: waits retryDelayMs * 2^attempt before the next try.
 * Anything else is thrown immediately.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  settings: RetrySettings & { logger?: Logger }
): Promise<T> {
  const logger = settings.logger ?? console;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!isRetryable(error) || attempt >= settings.maxRetries) {
        throw error;
      }

      const delayMs = error instanceof ProcessingError ? settings.retryDelayMs * 2 ** attempt : 0;
      logger.warn(
        `[withRetry] Attempt ${attempt + 1} failed with ${
          error instanceof NetworkError ? 'NetworkError' : 'ProcessingError'
        }, retrying in ${delayMs}ms`
      );
      if (delayMs > 0) {
        await sleep(delayMs);
      }
    }
  }
}
