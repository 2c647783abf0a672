import type { UrlOpener } from "../ports/url-opener.js";

export interface RecordingUrlOpener extends UrlOpener {
  /** URLs handed to `open`, in call order */
  readonly dispatched: readonly string[];
}

export interface RecordingOpenerOptions {
  /** Reject every open with this error */
  failWith?: Error;
  /** Never settle, as a launcher that hangs */
  hang?: boolean;
}

/**
 * In-memory opener that records dispatches instead of launching anything.
 */
export function createRecordingUrlOpener(options: RecordingOpenerOptions = {}): RecordingUrlOpener {
  const dispatched: string[] = [];

  return {
    dispatched,
    open(url: string): Promise<void> {
      dispatched.push(url);
      if (options.hang) {
        return new Promise<void>(() => {});
      }
      if (options.failWith) {
        return Promise.reject(options.failWith);
      }
      return Promise.resolve();
    },
  };
}
