import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { configInvalid, missingToken } from "./errors/catalog.js";
import { isValidRange } from "../relay/origin-filter.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path */
export const SYSTEM_CONFIG_PATH = "/etc/url-relay/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(
  homedir(),
  ".config",
  "url-relay",
  "config.yaml"
);

/** Schemes a browser can navigate to that may be enabled for opening */
export const NAVIGABLE_SCHEMES = ["http", "https", "ftp", "mailto"] as const;

export type NavigableScheme = (typeof NAVIGABLE_SCHEMES)[number];

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  bindAddress: "0.0.0.0",
  port: 51888,
  // Host-only networks of common desktop hypervisors
  allowedRanges: ["10.211.55.0/24", "10.37.129.0/24"],
  allowedSchemes: ["http", "https"],
  openTimeoutMs: 5000,
  readTimeoutMs: 5000,
  maxBodyBytes: 16 * 1024,
  shutdownGraceMs: 3000,
} as const;

/** Environment variables read by the relay listener */
export const ENV = {
  bind: "URL_RELAY_BIND",
  port: "URL_RELAY_PORT",
  token: "URL_RELAY_TOKEN",
  allowedRanges: "URL_RELAY_ALLOWED_RANGES",
  allowedSchemes: "URL_RELAY_ALLOWED_SCHEMES",
  browser: "URL_RELAY_BROWSER",
  verbose: "URL_RELAY_VERBOSE",
  dryRun: "URL_RELAY_DRY_RUN",
  logJson: "URL_RELAY_LOG_JSON",
  openTimeoutMs: "URL_RELAY_OPEN_TIMEOUT_MS",
  readTimeoutMs: "URL_RELAY_READ_TIMEOUT_MS",
  maxBodyBytes: "URL_RELAY_MAX_BODY_BYTES",
  shutdownGraceMs: "URL_RELAY_SHUTDOWN_GRACE_MS",
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const PortSchema = z.number().int().min(1).max(65535);
const OpenTimeoutSchema = z.number().int().min(500).max(60_000);
const ReadTimeoutSchema = z.number().int().min(500).max(120_000);
const GraceSchema = z.number().int().min(0).max(60_000);
const BodyLimitSchema = z.number().int().min(256).max(1024 * 1024);

const RangeSchema = z
  .string()
  .trim()
  .refine(isValidRange, (value) => ({
    message: `"${value}" is not a CIDR range, an address, or "all"`,
  }));

/** Complete configuration file schema */
export const ConfigFileSchema = z
  .object({
    listen: z
      .object({
        bind: z.string().min(1).optional(),
        port: PortSchema.optional(),
      })
      .strict()
      .optional(),
    token: z.string().optional(),
    allowedRanges: z.array(RangeSchema).optional(),
    allowedSchemes: z.array(z.enum(NAVIGABLE_SCHEMES)).optional(),
    browser: z.string().min(1).optional(),
    dryRun: z.boolean().optional(),
    timeouts: z
      .object({
        openMs: OpenTimeoutSchema.optional(),
        readMs: ReadTimeoutSchema.optional(),
        shutdownGraceMs: GraceSchema.optional(),
      })
      .strict()
      .optional(),
    limits: z
      .object({
        maxBodyBytes: BodyLimitSchema.optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        verbose: z.boolean().optional(),
        json: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration, immutable for the lifetime of the relay */
export const RelayConfigSchema = z.object({
  bindAddress: z.string().trim().min(1),
  port: PortSchema,
  token: z.string().min(1),
  allowedRanges: z.array(RangeSchema),
  allowedSchemes: z.array(z.enum(NAVIGABLE_SCHEMES)).min(1),
  browser: z.string().min(1).optional(),
  verbose: z.boolean(),
  dryRun: z.boolean(),
  logJson: z.boolean(),
  openTimeoutMs: OpenTimeoutSchema,
  readTimeoutMs: ReadTimeoutSchema,
  maxBodyBytes: BodyLimitSchema,
  shutdownGraceMs: GraceSchema,
});

export type RelayConfig = Readonly<z.infer<typeof RelayConfigSchema>>;

/** Mutable shape used while layering sources */
type ConfigDraft = z.infer<typeof RelayConfigSchema>;

export type ConfigOverrides = Partial<ConfigDraft>;

export interface ResolveOptions {
  /** Reject a missing token (default). Off only for display. */
  requireToken?: boolean;
}

/** Same shape with the token allowed to be empty, for `config show` */
const DisplayConfigSchema = RelayConfigSchema.extend({ token: z.string() });

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) =>
    i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message
  );
}

/**
 * Load a YAML config file from disk.
 * Returns undefined if file doesn't exist.
 * Throws CONFIG_INVALID if the file exists but is unreadable or invalid.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw configInvalid([`cannot read file: ${errorMessage(err)}`], path);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw configInvalid([`invalid YAML: ${errorMessage(err)}`], path);
  }

  // Handle empty files
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw configInvalid(formatIssues(result.error), path);
  }

  return result.data;
}

function parseInteger(
  name: string,
  value: string,
  issues: string[]
): number | undefined {
  const n = Number(value.trim());
  if (value.trim() === "" || !Number.isInteger(n)) {
    issues.push(`${name}: expected an integer, got "${value}"`);
    return undefined;
  }
  return n;
}

function parseBoolean(
  name: string,
  value: string,
  issues: string[]
): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off", ""].includes(normalized)) return false;
  issues.push(`${name}: expected true or false, got "${value}"`);
  return undefined;
}

/**
 * Split a comma-separated list, dropping blanks and duplicates.
 */
export function parseList(value: string): string[] {
  const unique = new Set<string>();
  for (const item of value.split(",")) {
    const trimmed = item.trim();
    if (trimmed) unique.add(trimmed);
  }
  return [...unique];
}

function isNavigableScheme(value: string): value is NavigableScheme {
  return NAVIGABLE_SCHEMES.some((scheme) => scheme === value);
}

/**
 * Read overrides from the environment.
 * Unset variables are skipped; malformed ones raise CONFIG_INVALID.
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const issues: string[] = [];
  const out: ConfigOverrides = {};

  const bind = env[ENV.bind];
  if (bind !== undefined) out.bindAddress = bind.trim();

  const port = env[ENV.port];
  if (port !== undefined) out.port = parseInteger(ENV.port, port, issues);

  const token = env[ENV.token];
  if (token !== undefined) out.token = token;

  const ranges = env[ENV.allowedRanges];
  if (ranges !== undefined) out.allowedRanges = parseList(ranges);

  const schemes = env[ENV.allowedSchemes];
  if (schemes !== undefined) {
    const list = parseList(schemes).map((s) => s.toLowerCase().replace(/:$/, ""));
    const unknown = list.filter((s) => !isNavigableScheme(s));
    if (unknown.length > 0) {
      issues.push(
        `${ENV.allowedSchemes}: unsupported scheme(s) ${unknown.join(", ")} (choose from ${NAVIGABLE_SCHEMES.join(", ")})`
      );
    } else {
      out.allowedSchemes = list.filter(isNavigableScheme);
    }
  }

  const browser = env[ENV.browser];
  if (browser !== undefined && browser.trim()) out.browser = browser.trim();

  const verbose = env[ENV.verbose];
  if (verbose !== undefined) out.verbose = parseBoolean(ENV.verbose, verbose, issues);

  const dryRun = env[ENV.dryRun];
  if (dryRun !== undefined) out.dryRun = parseBoolean(ENV.dryRun, dryRun, issues);

  const logJson = env[ENV.logJson];
  if (logJson !== undefined) out.logJson = parseBoolean(ENV.logJson, logJson, issues);

  const openTimeout = env[ENV.openTimeoutMs];
  if (openTimeout !== undefined) {
    out.openTimeoutMs = parseInteger(ENV.openTimeoutMs, openTimeout, issues);
  }

  const readTimeout = env[ENV.readTimeoutMs];
  if (readTimeout !== undefined) {
    out.readTimeoutMs = parseInteger(ENV.readTimeoutMs, readTimeout, issues);
  }

  const maxBody = env[ENV.maxBodyBytes];
  if (maxBody !== undefined) {
    out.maxBodyBytes = parseInteger(ENV.maxBodyBytes, maxBody, issues);
  }

  const grace = env[ENV.shutdownGraceMs];
  if (grace !== undefined) {
    out.shutdownGraceMs = parseInteger(ENV.shutdownGraceMs, grace, issues);
  }

  if (issues.length > 0) {
    throw configInvalid(issues, "environment");
  }

  return out;
}

/**
 * Apply values from a config file to a draft config.
 * Only overrides values that are explicitly set in the source.
 */
function applyConfigFile(target: ConfigDraft, source: ConfigFile): void {
  if (source.listen?.bind !== undefined) {
    target.bindAddress = source.listen.bind;
  }
  if (source.listen?.port !== undefined) {
    target.port = source.listen.port;
  }
  if (source.token !== undefined) {
    target.token = source.token;
  }
  if (source.allowedRanges !== undefined) {
    target.allowedRanges = source.allowedRanges;
  }
  if (source.allowedSchemes !== undefined) {
    target.allowedSchemes = source.allowedSchemes;
  }
  if (source.browser !== undefined) {
    target.browser = source.browser;
  }
  if (source.dryRun !== undefined) {
    target.dryRun = source.dryRun;
  }
  if (source.timeouts?.openMs !== undefined) {
    target.openTimeoutMs = source.timeouts.openMs;
  }
  if (source.timeouts?.readMs !== undefined) {
    target.readTimeoutMs = source.timeouts.readMs;
  }
  if (source.timeouts?.shutdownGraceMs !== undefined) {
    target.shutdownGraceMs = source.timeouts.shutdownGraceMs;
  }
  if (source.limits?.maxBodyBytes !== undefined) {
    target.maxBodyBytes = source.limits.maxBodyBytes;
  }
  if (source.logging?.verbose !== undefined) {
    target.verbose = source.logging.verbose;
  }
  if (source.logging?.json !== undefined) {
    target.logJson = source.logging.json;
  }
}

/**
 * Apply the defined values of a partial override.
 */
function applyOverrides(target: ConfigDraft, source: ConfigOverrides): void {
  Object.assign(
    target,
    Object.fromEntries(Object.entries(source).filter(([, v]) => v !== undefined))
  );
}

/**
 * Merge configuration sources with proper precedence and validate the result:
 * CLI args > Environment > User config > System config > Defaults
 */
export function resolveConfig(
  cliOptions: ConfigOverrides = {},
  envConfig: ConfigOverrides = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined,
  { requireToken = true }: ResolveOptions = {}
): RelayConfig {
  const draft: ConfigDraft = {
    bindAddress: CONFIG_DEFAULTS.bindAddress,
    port: CONFIG_DEFAULTS.port,
    token: "",
    allowedRanges: [...CONFIG_DEFAULTS.allowedRanges],
    allowedSchemes: [...CONFIG_DEFAULTS.allowedSchemes],
    verbose: false,
    dryRun: false,
    logJson: false,
    openTimeoutMs: CONFIG_DEFAULTS.openTimeoutMs,
    readTimeoutMs: CONFIG_DEFAULTS.readTimeoutMs,
    maxBodyBytes: CONFIG_DEFAULTS.maxBodyBytes,
    shutdownGraceMs: CONFIG_DEFAULTS.shutdownGraceMs,
  };

  if (systemConfig) {
    applyConfigFile(draft, systemConfig);
  }

  if (userConfig) {
    applyConfigFile(draft, userConfig);
  }

  applyOverrides(draft, envConfig);
  applyOverrides(draft, cliOptions);

  if (requireToken && !draft.token.trim()) {
    throw missingToken();
  }

  const result = (requireToken ? RelayConfigSchema : DisplayConfigSchema).safeParse(draft);
  if (!result.success) {
    throw configInvalid(formatIssues(result.error));
  }

  return Object.freeze(result.data);
}

/**
 * Load configuration from all sources.
 * Optionally accepts explicit config path from CLI.
 *
 * @param explicitPath - Optional path to a specific config file
 * @returns The resolved config and list of source files that were loaded
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  options: ResolveOptions = {}
): {
  config: RelayConfig;
  sources: string[];
} {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    // Explicit path takes precedence, used as "user config"
    userConfig = loadConfigFile(explicitPath);
    if (!userConfig) {
      throw configInvalid(["file does not exist"], explicitPath);
    }
    sources.push(explicitPath);
  } else {
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const envConfig = readEnvConfig(env);
  const config = resolveConfig(cliOptions, envConfig, userConfig, systemConfig, options);

  return { config, sources };
}

/**
 * Shorten a token for display: first and last two characters only.
 */
export function redactToken(token: string): string {
  if (!token) return "<empty>";
  if (token.length <= 4) return "***";
  return `${token.slice(0, 2)}***${token.slice(-2)}`;
}
