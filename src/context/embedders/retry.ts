import { BackendError } from '../../errors/backend.js';
import { logger } from '../../logging/logger.js';

/**
 * Configuration options for the retry mechanism.
 */
export interface RetryOptions {
  /** Total attempts, including the first. */
  maxAttempts: number;
  /** Delay before the second attempt; doubles for each one after. */
  baseDelayMs: number;
  /** Upper bound on a single attempt; the attempt's signal aborts when it is reached. */
  timeoutMs: number;
  /** Errors for which this returns false are rethrown at once. */
  shouldRetry: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export class AttemptsExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(lastError instanceof Error ? lastError.message : String(lastError));
    this.name = 'AttemptsExhaustedError';
  }
}

const TRANSIENT_STATUSES = new Set([408, 429, 500, 502, 503, 504]);

/** Network failures, timeouts, 408, 429 and 5xx are worth another attempt. */
export function isTransientError(error: unknown): boolean {
  if (error instanceof BackendError) {
    return error.statusCode === undefined || TRANSIENT_STATUSES.has(error.statusCode) || error.statusCode >= 500;
  }
  return false;
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

async function withTimeout<T>(operation: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new BackendError(`Embedding request timed out after ${timeoutMs} ms`));
    }, timeoutMs);
  });
  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Runs `operation` with a per-attempt timeout, retrying transient failures
 * with exponential backoff. Throws AttemptsExhaustedError carrying the last
 * failure once no attempts remain or the failure is not retryable.
 */
export async function retry<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    try {
      return await withTimeout(operation, options.timeoutMs);
    } catch (error) {
      lastError = error;
      if (attempt >= options.maxAttempts || !options.shouldRetry(error)) {
        throw new AttemptsExhaustedError(attempt, error);
      }
      const delay = options.baseDelayMs * 2 ** (attempt - 1);
      options.onRetry?.(error, attempt, delay);
      logger.debug(`Retrying embedding batch in ${delay} ms (attempt ${attempt + 1}/${options.maxAttempts})`);
      if (delay > 0) await sleep(delay);
    }
  }

  throw new AttemptsExhaustedError(options.maxAttempts, lastError);
}
