import { Command, InvalidArgumentError } from "commander";
import { randomBytes } from "crypto";
import { maybeOutputJson, type TokenResultJson } from "../lib/json-output.js";

export const DEFAULT_TOKEN_BYTES = 32;
const MIN_TOKEN_BYTES = 16;
const MAX_TOKEN_BYTES = 128;

/**
 * Random URL-safe token for the relay and its callers.
 */
export function generateToken(bytes: number = DEFAULT_TOKEN_BYTES): string {
  return randomBytes(bytes).toString("base64url");
}

export function parseTokenBytes(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < MIN_TOKEN_BYTES || n > MAX_TOKEN_BYTES) {
    throw new InvalidArgumentError(
      `Must be an integer between ${MIN_TOKEN_BYTES} and ${MAX_TOKEN_BYTES}.`
    );
  }
  return n;
}

export function registerTokenCommand(program: Command): void {
  program
    .command("token")
    .description("Print a new random shared token")
    .option(
      "--bytes <n>",
      `Random bytes before encoding (default: ${DEFAULT_TOKEN_BYTES})`,
      parseTokenBytes
    )
    .action((options: { bytes?: number }) => {
      const bytes = options.bytes ?? DEFAULT_TOKEN_BYTES;
      const token = generateToken(bytes);

      const result: TokenResultJson = { token, bytes };
      if (maybeOutputJson(result)) return;

      console.log(token);
    });
}
