import { logger } from './logger';

/**
 * Retry helper for network operations with exponential backoff
 * shouldRetry lets callers stop early on errors that a retry cannot fix.
 * An aborted signal ends the wait and gives up with the last error.
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  maxRetries: number = 3,
  baseDelay: number = 1000,
  operationName: string = 'operation',
  shouldRetry: (error: unknown) => boolean = () => true,
  signal?: AbortSignal,
): Promise<T> {
  let lastError: unknown;

  for (let i = 0; i <= maxRetries; i++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (i === maxRetries || !shouldRetry(error) || signal?.aborted) {
        break;
      }
      const delay = baseDelay * Math.pow(2, i);
      const retryCount = i + 1;
      logger.warn(
        `${operationName} failed, retrying in ${delay}ms (retry ${retryCount}/${maxRetries})`,
        {
          error: error instanceof Error ? error.message : String(error),
        },
      );
      await sleep(delay, signal);
      if (signal?.aborted) {
        break;
      }
    }
  }

  throw lastError;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
