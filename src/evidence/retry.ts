/**
 * Bounded retry primitive shared by evidence sources.
 *
 * An attempt either finishes, reports that the answer is still being computed
 * ("pending"), or fails transiently. Pending attempts are bounded by the total
 * time spent waiting, and by the number of polls that budget allows; transient
 * failures by the number of calls.
 */
export type AttemptOutcome<T> =
  | { kind: "done"; value: T }
  | { kind: "pending" }
  | { kind: "transient"; error: unknown };

export type RetryPolicy = {
  /** Total calls allowed when attempts fail transiently. */
  maxAttempts: number;
  intervalMs: number;
  /** Upper bound on accumulated waiting while the result is pending. */
  timeoutMs: number;
};

export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class RetryExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(`Gave up after ${attempts} failed attempt(s)`);
    this.name = "RetryExhaustedError";
  }
}

export class RetryTimeoutError extends Error {
  constructor(readonly waitedMs: number) {
    super(`Still pending after waiting ${waitedMs}ms`);
    this.name = "RetryTimeoutError";
  }
}

export type RetryHooks = {
  sleep?: Sleep;
  onRetry?: (info: { attempt: number; reason: "pending" | "transient"; waitedMs: number }) => void;
};

/** Polls that fit in the pending budget; a zero interval still counts one per millisecond. */
export function maxPendingPolls(policy: RetryPolicy): number {
  return Math.max(1, Math.ceil(policy.timeoutMs / Math.max(1, policy.intervalMs)));
}

/**
 * Run `attempt` until it is done, the pending budget is spent, or the
 * transient-failure budget is spent.
 */
export async function retryUntil<T>(
  attempt: (n: number) => Promise<AttemptOutcome<T>>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<T> {
  const sleep = hooks.sleep ?? realSleep;
  let calls = 0;
  let failures = 0;
  let pending = 0;
  let waitedMs = 0;
  const pendingLimit = maxPendingPolls(policy);

  for (;;) {
    calls++;
    const outcome = await attempt(calls);

    if (outcome.kind === "done") return outcome.value;

    if (outcome.kind === "pending") {
      pending++;
      if (waitedMs + policy.intervalMs >= policy.timeoutMs || pending >= pendingLimit) {
        throw new RetryTimeoutError(waitedMs);
      }
    } else {
      failures++;
      if (failures >= policy.maxAttempts) {
        throw new RetryExhaustedError(failures, outcome.error);
      }
    }

    hooks.onRetry?.({ attempt: calls, reason: outcome.kind, waitedMs });
    await sleep(policy.intervalMs);
    waitedMs += policy.intervalMs;
  }
}
