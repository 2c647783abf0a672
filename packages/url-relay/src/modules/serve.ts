import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import type { AddressInfo } from "net";
import {
  loadConfig,
  redactToken,
  type ConfigOverrides,
  type RelayConfig,
} from "../lib/config.js";
import { createLogger, levelFromVerbose, type Logger } from "../lib/logger.js";
import type { SignalHandler } from "../lib/ports/signal-handler.js";
import type { UrlOpener } from "../lib/ports/url-opener.js";
import { createProcessSignalHandler } from "../lib/adapters/process-signals.js";
import { createSystemUrlOpener, settleWindowFor } from "../lib/adapters/system-opener.js";
import { createDryRunUrlOpener } from "../lib/adapters/dry-run-opener.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { VERSION } from "../lib/version.js";
import { createOriginFilter } from "../relay/origin-filter.js";
import { createRelayServer, type RelayServer } from "../relay/server.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ServeOptions {
  port?: number;
  bind?: string;
  token?: string;
  allow?: string[];
  browser?: string;
  dryRun?: boolean;
  verbose?: boolean;
  logJson?: boolean;
  config?: string;
}

/**
 * Dependencies for the serve command.
 * All have production defaults.
 */
export interface ServeDeps {
  signalHandler?: SignalHandler;
  /** Replaces the system or dry-run opener */
  opener?: UrlOpener;
  env?: NodeJS.ProcessEnv;
  version?: string;
}

export interface RunningRelay {
  config: RelayConfig;
  server: RelayServer;
  address: AddressInfo;
  logger: Logger;
}

// ---------------------------------------------------------------------------
// Option Parsing (Pure Functions)
// ---------------------------------------------------------------------------

export function parseIntegerOption(value: string): number {
  const n = Number(value.trim());
  if (value.trim() === "" || !Number.isInteger(n)) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}".`);
  }
  return n;
}

/**
 * Map serve flags onto config overrides. Absent flags stay undefined so
 * lower layers show through.
 */
export function toConfigOverrides(options: ServeOptions): ConfigOverrides {
  return {
    port: options.port,
    bindAddress: options.bind,
    token: options.token,
    allowedRanges: options.allow,
    browser: options.browser,
    dryRun: options.dryRun || undefined,
    verbose: options.verbose || undefined,
    logJson: options.logJson || undefined,
  };
}

/**
 * Startup summary written once the listener is bound.
 */
export function formatBanner(
  config: RelayConfig,
  address: AddressInfo,
  version: string
): string[] {
  const ranges = createOriginFilter(config.allowedRanges).ranges;
  return [
    `url-relay ${version} listening on ${address.address}:${address.port}`,
    `  token:    ${redactToken(config.token)}`,
    `  allowed:  ${ranges.length > 0 ? ranges.join(", ") : "(none, every request is refused)"}`,
    `  schemes:  ${config.allowedSchemes.join(", ")}`,
    `  browser:  ${config.browser ?? "system default"}`,
    `  dry-run:  ${config.dryRun ? "on" : "off"}`,
  ];
}

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

/**
 * Load configuration, bind the listener, and hook shutdown signals.
 * Throws CONFIG_INVALID or BIND_FAILED before anything is listening.
 */
export async function startRelay(
  options: ServeOptions,
  deps: ServeDeps = {}
): Promise<RunningRelay> {
  const version = deps.version ?? VERSION;
  const { config, sources } = loadConfig(
    options.config,
    toConfigOverrides(options),
    deps.env ?? process.env
  );

  const logger = createLogger({
    level: levelFromVerbose(config.verbose),
    json: config.logJson,
  });

  if (sources.length > 0) {
    logger.debug("Loaded configuration", { sources });
  }

  const opener =
    deps.opener ??
    (config.dryRun
      ? createDryRunUrlOpener(logger)
      : createSystemUrlOpener({
          browser: config.browser,
          settleMs: settleWindowFor(config.openTimeoutMs),
          logger,
        }));

  const server = createRelayServer(config, { opener, logger, version });

  let address: AddressInfo;
  try {
    address = await server.start();
  } catch (error) {
    logger.error("Failed to bind", {
      bind: config.bindAddress,
      port: config.port,
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }

  for (const line of formatBanner(config, address, version)) {
    logger.info(line);
  }

  const signalHandler = deps.signalHandler ?? createProcessSignalHandler();
  signalHandler.onShutdown(async (signal) => {
    logger.info("Shutting down", { signal, inFlight: server.inFlight() });
    await server.stop();
    logger.info("Shutdown complete");
  });

  return { config, server, address, logger };
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerServeCommand(program: Command, deps: ServeDeps = {}): void {
  program
    .command("serve")
    .description("Run the relay listener on this host")
    .option("-p, --port <port>", "Port to listen on (default: 51888)", parseIntegerOption)
    .option("-b, --bind <address>", "Address to bind (default: 0.0.0.0)")
    .option("-t, --token <token>", "Shared token callers must send")
    .option("-a, --allow <cidr...>", "Allowed client ranges, or 'all'")
    .option("--browser <app>", "Open URLs in this browser instead of the default")
    .option("-n, --dry-run", "Accept and log requests without opening anything")
    .option("-v, --verbose", "Log every request at debug level")
    .option("--log-json", "Write logs as JSON lines")
    .option("-c, --config <path>", "Path to configuration file")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Environment:")}
  ${chalk.yellow("URL_RELAY_TOKEN")}            Shared token (required unless set elsewhere)
  ${chalk.yellow("URL_RELAY_ALLOWED_RANGES")}   Comma-separated CIDR ranges
  ${chalk.yellow("URL_RELAY_PORT")}             Listen port

${chalk.bold.cyan("Examples:")}
  url-relay serve --token "$(url-relay token)"
      ${chalk.gray("Start with a fresh token on the default port")}

  url-relay serve --allow 192.168.64.0/24 --verbose
      ${chalk.gray("Accept a different VM network and log each request")}

  url-relay serve --dry-run
      ${chalk.gray("Check guest wiring without opening browser windows")}
`
    )
    .action(async (options: ServeOptions) => {
      try {
        await startRelay(options, deps);
      } catch (error) {
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });
}
