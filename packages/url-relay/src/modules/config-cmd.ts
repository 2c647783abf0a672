import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import {
  loadConfig,
  redactToken,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
} from "../lib/config.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import {
  maybeOutputJson,
  type ConfigPathJson,
  type ConfigShowJson,
} from "../lib/json-output.js";
import { generateToken } from "./token.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

/**
 * Example config file with a freshly generated token filled in.
 */
export function buildExampleConfig(token: string): string {
  return `# url-relay configuration
# Place at ~/.config/url-relay/config.yaml (user) or /etc/url-relay/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags
# 2. Environment (URL_RELAY_*)
# 3. User config (~/.config/url-relay/config.yaml, or --config)
# 4. System config (/etc/url-relay/config.yaml)
# 5. Built-in defaults

listen:
  # Address to bind; 0.0.0.0 listens on every interface
  bind: "0.0.0.0"
  port: 51888

# Shared secret callers send in the X-Auth-Token header
token: "${token}"

# Client addresses allowed to reach the relay (CIDR, single address, or "all")
allowedRanges:
  - "10.211.55.0/24"
  - "10.37.129.0/24"

# URL schemes the relay will open (http, https, ftp, mailto)
allowedSchemes:
  - http
  - https

# Browser application to use instead of the system default
# browser: firefox

# Log requests without opening anything
dryRun: false

timeouts:
  # Longest wait for the host to accept a URL
  openMs: 5000
  # Longest wait for a request body
  readMs: 5000
  # How long shutdown waits for in-flight requests
  shutdownGraceMs: 3000

limits:
  maxBodyBytes: 16384

logging:
  verbose: false
  # JSON lines, for log collectors
  json: false
`;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Manage url-relay configuration");

  config
    .command("init")
    .description("Create an example configuration file with a new token")
    .option(
      "-g, --global",
      "Create system-wide config at /etc/url-relay/config.yaml"
    )
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(
          chalk.gray("Use a text editor to modify it, or delete it first.")
        );
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, buildExampleConfig(generateToken()), {
          encoding: "utf-8",
          mode: 0o600,
        });
        console.log(chalk.green(`Created config file: ${targetPath}`));
        console.log(chalk.gray("It holds a new token; give the same token to the guest."));
      } catch (error) {
        console.error(
          chalk.red(
            `Failed to create config: ${error instanceof Error ? error.message : String(error)}`
          )
        );
        if (options.global) {
          console.error(chalk.gray("System config may require sudo."));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .option("-c, --config <path>", "Specific config file to use")
    .action((options: { config?: string }) => {
      try {
        const { config: resolved, sources } = loadConfig(options.config, {}, process.env, {
          requireToken: false,
        });
        const effective = { ...resolved, token: redactToken(resolved.token) };

        const result: ConfigShowJson = { effective, sources };
        if (maybeOutputJson(result)) return;

        console.log(chalk.cyan("Effective Configuration:"));
        console.log(chalk.gray("─".repeat(40)));

        if (sources.length > 0) {
          console.log(chalk.gray(`Sources: ${sources.join(", ")}`));
        } else {
          console.log(chalk.gray("Sources: (defaults and environment only)"));
        }

        console.log();
        console.log(chalk.bold("Listener:"));
        console.log(`  bind:           ${resolved.bindAddress}`);
        console.log(`  port:           ${resolved.port}`);
        console.log(`  token:          ${effective.token}`);

        console.log();
        console.log(chalk.bold("Access:"));
        for (const range of resolved.allowedRanges) {
          console.log(`  - ${range}`);
        }
        if (resolved.allowedRanges.length === 0) {
          console.log(chalk.yellow("  (none, every request is refused)"));
        }
        console.log(`  schemes:        ${resolved.allowedSchemes.join(", ")}`);

        console.log();
        console.log(chalk.bold("Opening:"));
        console.log(`  browser:        ${resolved.browser ?? "system default"}`);
        console.log(`  dryRun:         ${resolved.dryRun}`);
        console.log(`  openTimeoutMs:  ${resolved.openTimeoutMs}`);

        console.log();
        console.log(chalk.bold("Requests:"));
        console.log(`  readTimeoutMs:  ${resolved.readTimeoutMs}`);
        console.log(`  maxBodyBytes:   ${resolved.maxBodyBytes}`);
        console.log(`  shutdownGrace:  ${resolved.shutdownGraceMs}`);

        console.log();
        console.log(chalk.bold("Logging:"));
        console.log(`  verbose:        ${resolved.verbose}`);
        console.log(`  json:           ${resolved.logJson}`);
      } catch (error) {
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => {
      const result: ConfigPathJson = {
        user: { path: USER_CONFIG_PATH, exists: existsSync(USER_CONFIG_PATH) },
        system: { path: SYSTEM_CONFIG_PATH, exists: existsSync(SYSTEM_CONFIG_PATH) },
      };
      if (maybeOutputJson(result)) return;

      console.log(chalk.cyan("Configuration file locations:"));
      console.log();
      console.log(chalk.bold("User config:"));
      console.log(`  ${result.user.path}`);
      console.log(
        `  ${result.user.exists ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
      console.log();
      console.log(chalk.bold("System config:"));
      console.log(`  ${result.system.path}`);
      console.log(
        `  ${result.system.exists ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
    });
}
