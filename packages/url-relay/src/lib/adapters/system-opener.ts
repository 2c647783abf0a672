import type { EventEmitter } from "events";
import type { UrlOpener } from "../ports/url-opener.js";
import type { TimerService } from "../ports/time.js";
import type { Logger } from "../logger.js";
import { realTimerService } from "./system-time.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The part of a spawned launcher process the opener listens to */
export type LaunchedProcess = Pick<EventEmitter, "once" | "on">;

/** Start the platform launcher (open, xdg-open, start) for a URL */
export type LaunchFn = (url: string, browser?: string) => Promise<LaunchedProcess>;

export interface SystemUrlOpenerOptions {
  /** Named browser application; the default browser when absent */
  browser?: string;
  /** How long to watch the launcher for an early failure */
  settleMs?: number;
  timerService?: TimerService;
  launch?: LaunchFn;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_SETTLE_MS = 1000;

/**
 * Settle window for a given open deadline: never more than half of it, so a
 * launcher that keeps running still reports success before the deadline.
 */
export function settleWindowFor(openTimeoutMs: number): number {
  return Math.min(DEFAULT_SETTLE_MS, Math.floor(openTimeoutMs / 2));
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Launch through the 'open' package, mapping the portable browser names it
 * knows (chrome, firefox, edge) to the platform's application name.
 */
export const launchWithOpen: LaunchFn = async (url, browser) => {
  const { default: open, apps } = await import("open");
  const known: Record<string, string | readonly string[]> = {
    chrome: apps.chrome,
    firefox: apps.firefox,
    edge: apps.edge,
  };
  const name = browser ? known[browser.toLowerCase()] ?? browser : undefined;
  return open(url, { wait: false, ...(name !== undefined && { app: { name } }) });
};

/**
 * Wait for the launcher to exit 0, or to still be running after `settleMs`.
 * A spawn error or a non-zero exit inside that window is a failure.
 */
export function awaitLaunch(
  child: LaunchedProcess,
  settleMs: number,
  timerService: TimerService,
  logger?: Logger
): Promise<void> {
  return new Promise((resolve, reject) => {
    let settled = false;

    const finish = (error?: Error) => {
      if (settled) return;
      settled = true;
      timerService.clearTimeout(timer);
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    };

    // Stays attached after settling; late launcher errors are only logged
    child.on("error", (error: Error) => {
      if (settled) {
        logger?.warn("Browser launcher failed after dispatch", { error: error.message });
        return;
      }
      finish(error);
    });

    child.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      if (code === 0) {
        finish();
      } else if (code !== null) {
        finish(new Error(`Browser launcher exited with code ${code}`));
      } else {
        finish(new Error(`Browser launcher was killed by ${signal ?? "a signal"}`));
      }
    });

    const timer = timerService.setTimeout(() => finish(), settleMs);
  });
}

/**
 * Production opener: hands the URL to the host's default (or named) browser.
 */
export function createSystemUrlOpener(options: SystemUrlOpenerOptions = {}): UrlOpener {
  const {
    browser,
    settleMs = DEFAULT_SETTLE_MS,
    timerService = realTimerService,
    launch = launchWithOpen,
    logger,
  } = options;

  return {
    async open(url: string): Promise<void> {
      const child = await launch(url, browser);
      await awaitLaunch(child, settleMs, timerService, logger);
    },
  };
}
