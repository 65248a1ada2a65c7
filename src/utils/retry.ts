import { AppError } from './errors.js';
import { logger } from './logger.js';

const TRANSIENT_PATTERN = /Execution context was destroyed|Cannot find context with specified id|frame was detached/i;

/**
 * Run an async operation, retrying once more when it fails for a transient
 * reason, such as the page navigating underneath an evaluate call. Translated
 * errors are never retried.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: { retries?: number; operation?: string; delayMs?: number } = {},
): Promise<T> {
  const maxRetries = options.retries ?? 1;
  const operation = options.operation ?? 'operation';
  const delayMs = options.delayMs ?? 200;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const transient =
        !(err instanceof AppError) && err instanceof Error && TRANSIENT_PATTERN.test(err.message);

      if (!transient || attempt >= maxRetries) {
        throw err;
      }

      logger.debug(
        { operation, attempt: attempt + 1, error: err.message },
        'Retrying after transient failure',
      );

      await new Promise((r) => setTimeout(r, delayMs));
    }
  }
}
