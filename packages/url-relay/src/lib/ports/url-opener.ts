/**
 * Abstraction for the host's "open this URL" action.
 * Allows testing the relay protocol without launching a browser.
 */
export interface UrlOpener {
  /**
   * Hand a validated URL to the host browser.
   * Resolves once the launch was dispatched; rejects if it could not be.
   */
  open(url: string): Promise<void>;
}
