import { errorMessage } from './utils/errors';
import { Logger } from './utils/logger';

export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  operationName: string,
  maxAttempts: number,
  baseDelay: number,
  isRetryable: (error: unknown) => boolean = () => true
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await operation();
    } catch (error: unknown) {
      lastError = error;

      if (!isRetryable(error)) {
        throw error;
      }

      Logger.warn(`${operationName} failed`, {
        attempt,
        maxAttempts,
        error: errorMessage(error),
      });

      if (attempt < maxAttempts) {
        // Exponential backoff: baseDelay * 2^(attempt-1)
        const delay = baseDelay * Math.pow(2, attempt - 1);
        Logger.info(`Retrying ${operationName} after ${delay}ms`, { attempt });
        await sleep(delay);
      }
    }
  }

  Logger.error(`${operationName} failed after ${maxAttempts} attempts`, lastError);
  throw lastError;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
