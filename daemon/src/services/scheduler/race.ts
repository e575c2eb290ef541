/**
 * Timer vs. Cancellation Race
 *
 * The only suspension point of a timer behavior: wait for whichever comes
 * first, the delay elapsing or the task's stop signal.
 */

/** Maximum delay for setTimeout (Node.js limit: ~24.8 days) */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export type RaceOutcome = "woke" | "cancelled";

export function race(delayMs: number, signal: AbortSignal): Promise<RaceOutcome> {
  if (signal.aborted) {
    return Promise.resolve("cancelled");
  }

  return new Promise<RaceOutcome>((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve("cancelled");
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve("woke");
    }, Math.max(0, Math.min(delayMs, MAX_TIMEOUT_MS)));
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Race until an absolute instant. Wakes only once `now()` has reached the
 * target: timers may fire early by a millisecond, and targets beyond the
 * setTimeout ceiling take several races.
 */
export async function sleepUntil(
  targetMs: number,
  signal: AbortSignal,
  now: () => number,
): Promise<RaceOutcome> {
  for (;;) {
    if (signal.aborted) return "cancelled";
    const remaining = targetMs - now();
    if (remaining <= 0) return "woke";
    const outcome = await race(remaining, signal);
    if (outcome === "cancelled") return outcome;
  }
}
