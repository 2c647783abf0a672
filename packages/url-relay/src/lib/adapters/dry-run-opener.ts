import type { UrlOpener } from "../ports/url-opener.js";
import type { Logger } from "../logger.js";

/**
 * Opener for dry-run mode: logs the URL and reports success without
 * touching the host.
 */
export function createDryRunUrlOpener(logger?: Logger): UrlOpener {
  return {
    async open(url: string): Promise<void> {
      logger?.info("Dry run - would open URL", { url });
    },
  };
}
