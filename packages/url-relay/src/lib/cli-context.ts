/**
 * Global CLI context for the client commands (ping, send, token).
 * The relay listener itself never reads this; it takes an explicit config.
 */

export interface CLIContext {
  /** Output JSON instead of human-readable text */
  json: boolean;
  /** Suppress spinners and progress indicators */
  quiet: boolean;
}

const DEFAULT_CONTEXT: CLIContext = {
  json: false,
  quiet: false,
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

/**
 * Initialize CLI context from command line arguments and environment.
 */
export function initContext(argv: string[] = process.argv): CLIContext {
  currentContext = { ...DEFAULT_CONTEXT };

  if (argv.includes("--json")) {
    currentContext.json = true;
    currentContext.quiet = true; // JSON mode implies quiet
  }

  if (argv.includes("--quiet") || argv.includes("-q")) {
    currentContext.quiet = true;
  }

  if (isTruthy(process.env.URL_RELAY_JSON)) {
    currentContext.json = true;
    currentContext.quiet = true;
  }

  if (isTruthy(process.env.URL_RELAY_QUIET)) {
    currentContext.quiet = true;
  }

  return currentContext;
}

function isTruthy(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

export function getContext(): CLIContext {
  return currentContext;
}

export function isJsonMode(): boolean {
  return currentContext.json;
}

export function isQuietMode(): boolean {
  return currentContext.quiet;
}

/**
 * Reset context to defaults (for testing).
 */
export function resetContext(): void {
  currentContext = { ...DEFAULT_CONTEXT };
}
