import type { SignalHandler } from "../ports/signal-handler.js";

/** The slice of `process` the signal handler touches */
export interface SignalTarget {
  on(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  exit(code?: number): never;
}

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ["SIGTERM", "SIGINT"];

/**
 * Create a signal handler for process shutdown signals.
 * The first signal runs every registered callback, then exits 0 (1 if a
 * callback failed). A second signal while shutting down exits 1 at once.
 */
export function createProcessSignalHandler(target: SignalTarget = process): SignalHandler {
  const handlers: Array<(signal: NodeJS.Signals) => Promise<void>> = [];
  let isHandling = false;

  const handleSignal = (signal: NodeJS.Signals) => {
    if (isHandling) {
      target.exit(1);
      return;
    }
    isHandling = true;
    void Promise.allSettled(handlers.map((h) => h(signal))).then((results) => {
      const failed = results.some((r) => r.status === "rejected");
      target.exit(failed ? 1 : 0);
    });
  };

  return {
    onShutdown(callback) {
      handlers.push(callback);
      if (handlers.length === 1) {
        for (const signal of SHUTDOWN_SIGNALS) {
          target.on(signal, handleSignal);
        }
      }
    },
    removeAll() {
      handlers.length = 0;
      for (const signal of SHUTDOWN_SIGNALS) {
        target.off(signal, handleSignal);
      }
    },
  };
}
