import { setTimeout as sleep } from 'node:timers/promises';

import { MalformedResponseError, ProviderUnavailableError } from './errors/planner-errors';
import { describeError, logger } from './logger';

export interface RetryPolicy {
  timeoutMs: number;
  /** Extra attempts after the first one. */
  retries: number;
  backoffMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  timeoutMs: 30_000,
  retries: 1,
  backoffMs: 500,
};

export type ProviderOperation<T> = (signal: AbortSignal) => Promise<T>;

export const withTimeout = async <T>(
  label: string,
  operation: ProviderOperation<T>,
  timeoutMs: number,
): Promise<T> => {
  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new ProviderUnavailableError(`${label} timed out after ${timeoutMs}ms.`, { timeoutMs }));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
};

/**
 * Runs a provider call under a timeout, retrying with linear backoff. Malformed
 * responses are rethrown immediately; every other failure ends as ProviderUnavailableError.
 */
export const callWithRetry = async <T>(
  label: string,
  operation: ProviderOperation<T>,
  policy: RetryPolicy,
): Promise<T> => {
  let lastError: unknown;

  for (let attempt = 0; attempt <= policy.retries; attempt += 1) {
    if (attempt > 0) {
      logger.warn('provider_call_retry', {
        label,
        attempt,
        backoffMs: policy.backoffMs * attempt,
        error: describeError(lastError),
      });
      await sleep(policy.backoffMs * attempt);
    }

    try {
      return await withTimeout(label, operation, policy.timeoutMs);
    } catch (error: unknown) {
      if (error instanceof MalformedResponseError) {
        throw error;
      }
      lastError = error;
    }
  }

  if (lastError instanceof ProviderUnavailableError) {
    throw lastError;
  }

  throw new ProviderUnavailableError(`${label} failed after ${policy.retries + 1} attempts.`, {
    cause: describeError(lastError),
  });
};
