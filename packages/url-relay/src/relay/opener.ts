import type { UrlOpener } from "../lib/ports/url-opener.js";
import type { Clock, TimerService } from "../lib/ports/time.js";
import { systemClock, realTimerService } from "../lib/adapters/system-time.js";

export type OpenOutcome =
  | { ok: true; elapsedMs: number }
  | { ok: false; reason: "failed" | "timeout"; error: string; elapsedMs: number };

export interface OpenDeadlineOptions {
  timeoutMs: number;
  clock?: Clock;
  timerService?: TimerService;
}

/**
 * Dispatch a URL to the opener and wait at most `timeoutMs` for the result.
 *
 * Past the deadline the outcome is a timeout failure; the launch itself is
 * left running, since the host action is outside this process.
 */
export async function openWithDeadline(
  opener: UrlOpener,
  url: string,
  options: OpenDeadlineOptions
): Promise<OpenOutcome> {
  const { timeoutMs, clock = systemClock, timerService = realTimerService } = options;
  const startedAt = clock.now();

  const attempt = Promise.resolve()
    .then(() => opener.open(url))
    .then(
      () => null,
      (error: unknown) => (error instanceof Error ? error : new Error(String(error)))
    );

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<"timeout">((resolve) => {
    timer = timerService.setTimeout(() => resolve("timeout"), timeoutMs);
  });

  const result = await Promise.race([attempt, deadline]);
  if (timer !== undefined) {
    timerService.clearTimeout(timer);
  }

  const elapsedMs = clock.now() - startedAt;

  if (result === "timeout") {
    return {
      ok: false,
      reason: "timeout",
      error: `no result within ${timeoutMs} ms`,
      elapsedMs,
    };
  }

  if (result instanceof Error) {
    return { ok: false, reason: "failed", error: result.message, elapsedMs };
  }

  return { ok: true, elapsedMs };
}
