/**
 * Output mode detection for determining how to render CLI output.
 */

export type OutputMode = "tui" | "static" | "json";

/**
 * Detect the appropriate output mode based on environment and flags.
 *
 * - `tui`: Interactive terminal, spinners and colors
 * - `static`: Plain text output (supervisor log files, pipes, CI)
 * - `json`: Structured JSON output for scripting
 */
export function getOutputMode(argv: string[] = process.argv): OutputMode {
  if (argv.includes("--json")) {
    return "json";
  }

  if (process.env.CI || process.env.URL_RELAY_NON_INTERACTIVE) {
    return "static";
  }

  // Not a TTY: running under a service supervisor or piped
  if (!process.stdout.isTTY) {
    return "static";
  }

  if (process.env.TERM === "dumb") {
    return "static";
  }

  return "tui";
}

/**
 * Check if we're in an interactive TTY environment.
 */
export function isInteractive(): boolean {
  return getOutputMode() === "tui";
}
