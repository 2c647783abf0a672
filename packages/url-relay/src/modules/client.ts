/**
 * Client commands - talk to a running relay from the guest (or the host).
 * Useful for checking a guest's wiring before pointing a browser extension
 * at the relay.
 */

import { Command } from "commander";
import chalk from "chalk";
import {
  createRelayClient,
  resolveClientOptions,
  type ClientFlags,
  type FetchLike,
} from "../lib/relay-client.js";
import type { Clock } from "../lib/ports/time.js";
import { systemClock } from "../lib/adapters/system-time.js";
import { createSpinner } from "../lib/spinner.js";
import { maybeOutputJson, type PingResultJson, type SendResultJson } from "../lib/json-output.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { parseIntegerOption } from "./serve.js";

export interface ClientDeps {
  fetchImpl?: FetchLike;
  env?: NodeJS.ProcessEnv;
  clock?: Clock;
}

function addConnectionOptions(command: Command): Command {
  return command
    .option("-H, --host <host>", "Relay host (default: 127.0.0.1, or URL_RELAY_HOST)")
    .option("-p, --port <port>", "Relay port (default: 51888, or URL_RELAY_PORT)", parseIntegerOption)
    .option("-t, --token <token>", "Shared token (default: URL_RELAY_TOKEN)")
    .option("--https", "Use https to reach the relay")
    .option("--timeout <ms>", "Give up after this many milliseconds", parseIntegerOption);
}

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

export async function runPing(flags: ClientFlags, deps: ClientDeps = {}): Promise<void> {
  const { clock = systemClock } = deps;
  const client = createRelayClient({
    ...resolveClientOptions(flags, deps.env),
    fetchImpl: deps.fetchImpl,
  });

  const spinner = createSpinner(`Pinging ${client.endpoint}...`).start();
  const startedAt = clock.now();
  try {
    const reply = await client.ping();
    const latencyMs = clock.now() - startedAt;
    spinner.stop();

    const result: PingResultJson = {
      endpoint: client.endpoint,
      service: reply.service,
      version: reply.version,
      latencyMs,
    };
    if (maybeOutputJson(result)) return;

    console.log(
      `${chalk.green("✓")} ${reply.service} ${reply.version} at ${client.endpoint} ${chalk.gray(`(${latencyMs} ms)`)}`
    );
  } catch (error) {
    spinner.fail("Ping failed");
    throw error;
  }
}

export async function runSend(url: string, flags: ClientFlags, deps: ClientDeps = {}): Promise<void> {
  const client = createRelayClient({
    ...resolveClientOptions(flags, deps.env),
    fetchImpl: deps.fetchImpl,
  });

  const spinner = createSpinner(`Sending ${url}...`).start();
  try {
    const reply = await client.send(url);
    spinner.stop();

    const result: SendResultJson = {
      endpoint: client.endpoint,
      url: reply.url,
      dryRun: reply.dryRun,
      elapsedMs: reply.elapsedMs,
    };
    if (maybeOutputJson(result)) return;

    const verb = reply.dryRun ? "Accepted (dry run)" : "Opened";
    console.log(`${chalk.green("✓")} ${verb}: ${reply.url} ${chalk.gray(`(${reply.elapsedMs} ms)`)}`);
  } catch (error) {
    spinner.fail("Send failed");
    throw error;
  }
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerClientCommands(program: Command, deps: ClientDeps = {}): void {
  addConnectionOptions(
    program.command("ping").description("Check that a relay is reachable and accepts the token")
  )
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Examples:")}
  url-relay ping --host 10.211.55.2 --token "$URL_RELAY_TOKEN"
  url-relay ping --json
`
    )
    .action(async (options: ClientFlags) => {
      try {
        await runPing(options, deps);
      } catch (error) {
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });

  addConnectionOptions(
    program
      .command("send")
      .description("Ask a relay to open a URL on its host")
      .argument("<url>", "http or https URL to open")
  )
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Examples:")}
  url-relay send https://example.com --host 10.211.55.2
  URL_RELAY_HOST=10.37.129.2 url-relay send https://example.com
`
    )
    .action(async (url: string, options: ClientFlags) => {
      try {
        await runSend(url, options, deps);
      } catch (error) {
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });
}
