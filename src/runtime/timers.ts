import {
  clearTimeout as nodeClearTimeout,
  setTimeout as nodeSetTimeout,
} from "node:timers";

/**
 * Handle returned by {@link runtimeSetTimeout}. The nominal type mirrors the
 * Node.js handle so callers may `.unref()` it, even though fake timers swap
 * the implementation at runtime.
 */
export type TimeoutHandle = ReturnType<typeof nodeSetTimeout>;

const fallbackTimers = {
  setTimeout: nodeSetTimeout,
  clearTimeout: nodeClearTimeout,
} as const;

/**
 * Looks the timer up on {@link globalThis} at call time. Sinon installs its
 * fake clock there, so heartbeat and restart deadlines stay under the control
 * of the test scheduler.
 */
function resolveTimer<K extends keyof typeof fallbackTimers>(key: K): (typeof fallbackTimers)[K] {
  const candidate = (globalThis as Record<string, unknown>)[key];
  if (typeof candidate === "function") {
    return candidate as (typeof fallbackTimers)[K];
  }
  return fallbackTimers[key];
}

/** Schedules a timeout through the currently active timer implementation. */
export function runtimeSetTimeout(
  ...args: Parameters<typeof nodeSetTimeout>
): TimeoutHandle {
  const candidate = resolveTimer("setTimeout");
  if (candidate === fallbackTimers.setTimeout) {
    return candidate(...args);
  }
  return candidate.apply(globalThis, args);
}

/** Cancels a timeout through the currently active timer implementation. */
export function runtimeClearTimeout(handle: TimeoutHandle): void {
  const candidate = resolveTimer("clearTimeout");
  if (candidate === fallbackTimers.clearTimeout) {
    candidate(handle);
    return;
  }
  candidate.apply(globalThis, [handle]);
}

/** Wall clock read through `Date.now` so fake timers advance it too. */
export function runtimeNow(): number {
  return Date.now();
}

export const runtimeTimers = {
  setTimeout: runtimeSetTimeout,
  clearTimeout: runtimeClearTimeout,
  now: runtimeNow,
} as const;
