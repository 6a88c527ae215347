/**
 * Bounded polling
 */

export interface RetryPolicy {
  /** Delay between attempts (milliseconds) */
  intervalMs: number
  /** Attempts before giving up */
  maxAttempts: number
}

export type PollOutcome<T> =
  | { done: true; value: T; attempts: number }
  | { done: false; attempts: number }

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * Call `check` until it returns a value or the policy is exhausted.
 * No sleep after the final attempt.
 */
export async function poll<T>(
  policy: RetryPolicy,
  check: (attempt: number) => Promise<T | undefined>
): Promise<PollOutcome<T>> {
  const attempts = Math.max(1, policy.maxAttempts)

  for (let attempt = 1; attempt <= attempts; attempt++) {
    const value = await check(attempt)
    if (value !== undefined) {
      return { done: true, value, attempts: attempt }
    }
    if (attempt < attempts) {
      await sleep(policy.intervalMs)
    }
  }

  return { done: false, attempts }
}
