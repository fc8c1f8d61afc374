// pattern: Functional Core
import type { RetryPolicy } from "./types";

export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Delay before the retry that follows failed attempt `attempt` (1-based):
 * `baseDelayMs * backoffFactor^(attempt - 1)`, capped at `maxDelayMs`.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const delay = policy.baseDelayMs * policy.backoffFactor ** (attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

export type AttemptOutcome =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: string };

export type RetryOutcome = Readonly<{
  ok: boolean;
  attemptsUsed: number;
  lastError: string | null;
}>;

/**
 * Runs `attempt` until it succeeds or the policy's attempts are spent,
 * sleeping between tries. Never sleeps after the final attempt. `lastError`
 * is only set when every attempt failed.
 */
export async function retryWithBackoff(
  attempt: (n: number) => Promise<AttemptOutcome>,
  policy: RetryPolicy,
  onRetry: (n: number, error: string, delayMs: number) => void,
  wait: SleepFn = sleep,
): Promise<RetryOutcome> {
  const attempts = Math.max(1, policy.attempts);
  let lastError: string | null = null;

  for (let n = 1; n <= attempts; n++) {
    const outcome = await attempt(n);
    if (outcome.ok) {
      return { ok: true, attemptsUsed: n, lastError: null };
    }

    lastError = outcome.error;
    if (n < attempts) {
      const delayMs = backoffDelay(policy, n);
      onRetry(n, outcome.error, delayMs);
      await wait(delayMs);
    }
  }

  return { ok: false, attemptsUsed: attempts, lastError };
}
