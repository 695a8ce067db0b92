/**
 * wait.ts: The only two ways this codebase waits.
 *
 *   sleep(ms)       a fixed settle delay after navigation or a click
 *   pollUntil(...)  a bounded polling retry with a hard deadline
 *
 * Nothing else in the pipeline calls `setTimeout` directly.
 */

export interface PollOptions {
  /** Hard deadline measured from the first attempt. */
  timeoutMs: number;
  /** Pause between attempts.  Defaults to 250 ms. */
  intervalMs?: number;
  /** Stops polling early; the poll then resolves to `null`. */
  signal?: AbortSignal;
}

export const DEFAULT_POLL_INTERVAL_MS = 250;

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Call `attempt` until it yields a non-null value or the deadline passes.
 *
 * The attempt always runs at least once, even with a zero timeout, so a value
 * that is already there is never reported as missing.
 */
export async function pollUntil<T>(
  attempt: () => Promise<T | null>,
  options: PollOptions,
): Promise<T | null> {
  const interval = Math.max(1, options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS);
  const deadline = Date.now() + options.timeoutMs;

  for (;;) {
    const value = await attempt();
    if (value !== null) return value;

    const remaining = deadline - Date.now();
    if (remaining <= 0 || options.signal?.aborted) return null;

    await sleep(Math.min(interval, remaining));
  }
}
