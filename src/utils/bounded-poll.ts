// Bounded waiting primitives. Every wait in the pipeline has an explicit
// interval and ceiling; nothing here loops forever.

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface PollOptions {
  intervalMs: number;
  timeoutMs: number;
  /** Called after every unsuccessful check with the 1-based attempt number. */
  onAttempt?: (attempt: number) => void;
}

export type PollResult<T> = { ok: true; value: T; attempts: number } | { ok: false; attempts: number };

/**
 * Run `check` every `intervalMs` until it returns a non-null value or
 * `timeoutMs` worth of intervals have elapsed.
 *
 * The attempt budget is `ceil(timeoutMs / intervalMs)` (at least one), so the
 * total wait never exceeds the ceiling by more than one interval.
 */
export async function pollUntil<T>(
  check: () => Promise<T | null>,
  options: PollOptions,
): Promise<PollResult<T>> {
  const maxAttempts = Math.max(1, Math.ceil(options.timeoutMs / Math.max(1, options.intervalMs)));

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    await sleep(options.intervalMs);
    const value = await check();
    if (value !== null) {
      return { ok: true, value, attempts: attempt };
    }
    options.onAttempt?.(attempt);
  }

  return { ok: false, attempts: maxAttempts };
}

export type TimedResult<T> = { timedOut: false; value: T } | { timedOut: true };

/**
 * Race `promise` against a timer. The timer is always cleared, and a promise
 * that loses the race keeps running; callers decide what to do about it.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number): Promise<TimedResult<T>> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<TimedResult<T>>((resolve) => {
    timer = setTimeout(() => resolve({ timedOut: true }), ms);
  });
  try {
    return await Promise.race([promise.then((value): TimedResult<T> => ({ timedOut: false, value })), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
