import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { race, sleepUntil, MAX_TIMEOUT_MS, type RaceOutcome } from "./race.js";

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

function track(promise: Promise<RaceOutcome>): { outcome: RaceOutcome | undefined } {
  const state: { outcome: RaceOutcome | undefined } = { outcome: undefined };
  void promise.then((outcome) => {
    state.outcome = outcome;
  });
  return state;
}

describe("race", () => {
  it("wakes when the delay elapses", async () => {
    const state = track(race(1_000, new AbortController().signal));

    await vi.advanceTimersByTimeAsync(999);
    expect(state.outcome).toBeUndefined();

    await vi.advanceTimersByTimeAsync(1);
    expect(state.outcome).toBe("woke");
  });

  it("resolves as cancelled when the signal aborts first", async () => {
    const controller = new AbortController();
    const result = race(60_000, controller.signal);

    controller.abort();

    await expect(result).resolves.toBe("cancelled");
    expect(vi.getTimerCount()).toBe(0);
  });

  it("does not arm a timer when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(race(1_000, controller.signal)).resolves.toBe("cancelled");
    expect(vi.getTimerCount()).toBe(0);
  });
});

describe("sleepUntil", () => {
  it("chains races for targets beyond the setTimeout ceiling", async () => {
    const target = Date.now() + MAX_TIMEOUT_MS + 5_000;
    const state = track(sleepUntil(target, new AbortController().signal, Date.now));

    await vi.advanceTimersByTimeAsync(MAX_TIMEOUT_MS);
    expect(state.outcome).toBeUndefined();

    await vi.advanceTimersByTimeAsync(5_000);
    expect(state.outcome).toBe("woke");
  });

  it("keeps waiting when the timer fires before the clock reaches the target", async () => {
    let lag = 0;
    const now = () => Date.now() - lag;
    const state = track(sleepUntil(Date.now() + 1_000, new AbortController().signal, now));

    lag = 5;
    await vi.advanceTimersByTimeAsync(1_000);
    expect(state.outcome).toBeUndefined();

    await vi.advanceTimersByTimeAsync(5);
    expect(state.outcome).toBe("woke");
  });

  it("resolves as cancelled when aborted between races", async () => {
    const controller = new AbortController();
    const state = track(sleepUntil(Date.now() + MAX_TIMEOUT_MS + 5_000, controller.signal, Date.now));

    await vi.advanceTimersByTimeAsync(MAX_TIMEOUT_MS);
    controller.abort();
    await vi.advanceTimersByTimeAsync(0);

    expect(state.outcome).toBe("cancelled");
  });

  it("wakes immediately for a target in the past", async () => {
    const state = track(sleepUntil(Date.now() - 1_000, new AbortController().signal, Date.now));
    await vi.advanceTimersByTimeAsync(0);
    expect(state.outcome).toBe("woke");
  });
});
