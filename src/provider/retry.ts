import { toProviderError } from './errors.js';

export interface RetryOptions {
  /** Extra attempts after the first one. */
  retries: number;
  backoffMs: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run a read-only provider lookup, retrying retryable failures with
 * exponential backoff. Whatever escapes is a ProviderError.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  operationName: string,
  options: RetryOptions
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const providerError = toProviderError(error);
      if (!providerError.retryable || attempt >= options.retries) {
        throw providerError;
      }

      const delay = options.backoffMs * Math.pow(2, attempt);
      console.error(
        `${operationName} attempt ${attempt + 1} failed: ${providerError.message}. Retrying in ${delay}ms...`
      );
      await sleep(delay);
    }
  }
}
