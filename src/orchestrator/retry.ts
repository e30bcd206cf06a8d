export interface RetryPolicy {
  maxAttempts: number;
  /** Sleep before attempt n+1 is `n * backoffMs`. */
  backoffMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = { maxAttempts: 3, backoffMs: 1000 };

export type RetryReason =
  | { kind: "error"; error: unknown }
  | { kind: "rejected" };

export interface RetryHooks<T> {
  /** False asks for another attempt; the last attempt's value is kept regardless. */
  accept?: (value: T, attempt: number) => boolean;
  onRetry?: (attempt: number, reason: RetryReason, delayMs: number) => void;
}

export class RetriesExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(`gave up after ${attempts} attempts`, { cause });
    this.name = "RetriesExhaustedError";
    this.attempts = attempts;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Run `op` up to `policy.maxAttempts` times. A thrown error is retried and, on
 * the final attempt, rethrown wrapped in RetriesExhaustedError. A value that
 * `accept` rejects is retried too, but never turns into an error.
 */
export async function withRetry<T>(
  op: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  hooks: RetryHooks<T> = {},
): Promise<T> {
  const max = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    let reason: RetryReason;
    try {
      const value = await op(attempt);
      if (attempt >= max || !hooks.accept || hooks.accept(value, attempt)) return value;
      reason = { kind: "rejected" };
    } catch (err) {
      if (attempt >= max) throw new RetriesExhaustedError(attempt, err);
      reason = { kind: "error", error: err };
    }

    const delay = attempt * policy.backoffMs;
    hooks.onRetry?.(attempt, reason, delay);
    if (delay > 0) await sleep(delay);
  }
}
