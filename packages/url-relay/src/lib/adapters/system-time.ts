import type { Clock, TimerService } from "../ports/time.js";

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Timer service on the global setTimeout/clearTimeout.
 */
export const realTimerService: TimerService = {
  setTimeout: (fn, ms) => globalThis.setTimeout(fn, ms),
  clearTimeout: (id) => globalThis.clearTimeout(id),
};
