import { setTimeout as sleep } from "timers/promises";

import { CancelledError, ServiceError, describeError } from "../errors";
import { Logger } from "../logging/logger";

export type RetryPolicy = {
  /** attempts including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  exponential: boolean;
};

type RetryHooks = {
  signal?: AbortSignal;
  label?: string;
};

const log = new Logger("retry");

const isRetryable = (e: unknown) => e instanceof ServiceError && e.retryable;

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return policy.exponential ? policy.baseDelayMs * Math.pow(2, attempt - 1) : policy.baseDelayMs;
}

export async function withRetry<T>(
  policy: RetryPolicy,
  operation: (attempt: number) => Promise<T>,
  hooks: RetryHooks = {},
): Promise<T> {
  const label = hooks.label ?? "operation";

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (e) {
      if (!isRetryable(e) || attempt >= policy.maxAttempts) throw e;

      const delay = backoffDelay(policy, attempt);
      log.debug(`${label}: attempt ${attempt}/${policy.maxAttempts} failed, retrying in ${delay}ms: ${describeError(e)}`);

      try {
        await sleep(delay, undefined, { signal: hooks.signal });
      } catch (sleepErr) {
        throw new CancelledError(`${label} cancelled during retry backoff: ${describeError(sleepErr)}`);
      }
    }
  }
}
