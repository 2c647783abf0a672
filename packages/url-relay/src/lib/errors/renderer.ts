import chalk from "chalk";
import { RelayError, isRelayError } from "./types.js";
import { getOutputMode, type OutputMode } from "../output/mode.js";

/**
 * Symbols for error display.
 */
const SYM = {
  error: "✗",
  arrow: "→",
};

/**
 * Get terminal width, with fallback for non-TTY.
 */
function getTerminalWidth(): number {
  return process.stderr.columns || 80;
}

/**
 * Wrap text to fit within a given width, preserving indentation.
 */
export function wrapText(text: string, maxWidth: number, indent: string = ""): string[] {
  const words = text.split(" ");
  const lines: string[] = [];
  let currentLine = "";

  for (const word of words) {
    const testLine = currentLine ? `${currentLine} ${word}` : word;
    if (testLine.length <= maxWidth) {
      currentLine = testLine;
    } else {
      if (currentLine) lines.push(currentLine);
      currentLine = word;
    }
  }
  if (currentLine) lines.push(currentLine);

  return lines.map((line, i) => (i === 0 ? line : indent + line));
}

function renderStaticError(error: RelayError): void {
  const termWidth = Math.min(getTerminalWidth(), 80);
  const output: string[] = [""];

  const errorLines = wrapText(error.message, termWidth - 4, "  ");
  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(errorLines[0])}`);
  for (let i = 1; i < errorLines.length; i++) {
    output.push(`  ${chalk.red(errorLines[i])}`);
  }

  // Config issues arrive one per line, keep them that way
  if (error.details) {
    output.push("");
    for (const detail of error.details.split("\n")) {
      for (const line of wrapText(detail, termWidth - 4, "    ")) {
        output.push(`  ${chalk.dim(line)}`);
      }
    }
  }

  if (error.suggestion) {
    output.push("");
    const suggestionLines = wrapText(error.suggestion, termWidth - 4, "  ");
    output.push(`  ${chalk.yellow(SYM.arrow)} ${suggestionLines[0]}`);
    for (let i = 1; i < suggestionLines.length; i++) {
      output.push(`    ${suggestionLines[i]}`);
    }
  }

  if (error.example) {
    output.push("");
    output.push(`  ${chalk.dim("Try:")} ${chalk.cyan(error.example)}`);
  }

  output.push("");

  for (const line of output) {
    console.error(line);
  }
}

function renderJSONError(error: RelayError): void {
  const output = {
    error: true,
    code: error.code,
    message: error.message,
    suggestion: error.suggestion,
    example: error.example,
    details: error.details,
  };

  const cleaned = Object.fromEntries(
    Object.entries(output).filter(([, v]) => v !== undefined)
  );

  console.error(JSON.stringify(cleaned, null, 2));
}

/**
 * Render an error based on the current output mode.
 */
export function renderError(error: RelayError, mode?: OutputMode): void {
  const outputMode = mode ?? getOutputMode();

  switch (outputMode) {
    case "json":
      renderJSONError(error);
      break;
    case "static":
    case "tui":
      renderStaticError(error);
      break;
  }
}

/**
 * Convert an unknown error to a RelayError and render it.
 */
export function renderUnknownError(error: unknown, mode?: OutputMode): void {
  if (isRelayError(error)) {
    renderError(error, mode);
  } else {
    const message = error instanceof Error ? error.message : String(error);
    const relayError = new RelayError("UNKNOWN_ERROR", message, {
      cause: error instanceof Error ? error : undefined,
    });
    renderError(relayError, mode);
  }
}

export { RelayError, isRelayError };
