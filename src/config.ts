/**
 * Configuration management for Fanout
 */

import fs from "fs";
import path from "path";
import { ConfigError } from "./errors.js";
import { PLACEHOLDER_CREDENTIALS } from "./generators.js";

export interface Config {
  csv?: string;
  script?: string;
  out?: string;
  username?: string;
  password?: string;
  header?: boolean;
  include_date?: boolean;
  utc?: boolean;
  extension?: string;
}

export interface FanoutOptions {
  csv?: string;
  script?: string;
  /** Output directory; defaults to the CSV file's directory */
  out?: string;
  username: string;
  password: string;
  header: boolean;
  include_date: boolean;
  utc: boolean;
  extension: string;
}

export interface CliArgs {
  csv?: string;
  script?: string;
  out?: string;
  username?: string;
  password?: string;
  header?: boolean;
  include_date?: boolean;
  utc?: boolean;
  dry_run?: boolean;
}

export const CONFIG_FILE_NAMES = [".fanoutrc", ".fanoutrc.json"];

/**
 * Find configuration file in the given directory
 */
export function findConfigFile(cwd: string = process.cwd()): string | null {
  for (const configName of CONFIG_FILE_NAMES) {
    const configPath = path.resolve(cwd, configName);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
  }

  return null;
}

/**
 * Expand environment variables in a string value
 * Supports: $VAR, ${VAR}, ${VAR:default}
 */
export function expandEnvVars(
  value: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  return value.replace(
    /\$\{([^}]+)\}|\$([A-Z_][A-Z0-9_]*)/g,
    (match: string, braced: string | undefined, simple: string | undefined) => {
      if (braced !== undefined && braced.includes(":")) {
        const separator = braced.indexOf(":");
        const envVar = braced.slice(0, separator);
        const defaultValue = braced.slice(separator + 1);
        return env[envVar] || defaultValue;
      }

      const varName = braced ?? simple ?? "";
      return env[varName] || match;
    }
  );
}

function expandConfigEnvVars(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === "string") {
    return expandEnvVars(value, env);
  }

  if (Array.isArray(value)) {
    return value.map((item) => expandConfigEnvVars(item, env));
  }

  if (value && typeof value === "object") {
    const expanded: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      expanded[key] = expandConfigEnvVars(entry, env);
    }
    return expanded;
  }

  return value;
}

const STRING_KEYS = [
  "csv",
  "script",
  "out",
  "username",
  "password",
  "extension",
] as const;
const BOOLEAN_KEYS = ["header", "include_date", "utc"] as const;

/**
 * Check the shape of a parsed config file
 */
function toConfig(raw: unknown, configPath: string): Config {
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    throw new ConfigError(`Config file ${configPath} must contain an object`);
  }

  const source = new Map(Object.entries(raw));
  const config: Config = {};

  for (const key of STRING_KEYS) {
    const value = source.get(key);
    if (value === undefined) continue;
    if (typeof value !== "string") {
      throw new ConfigError(`Config option "${key}" must be a string`);
    }
    config[key] = value;
  }

  for (const key of BOOLEAN_KEYS) {
    const value = source.get(key);
    if (value === undefined) continue;
    if (typeof value !== "boolean") {
      throw new ConfigError(`Config option "${key}" must be a boolean`);
    }
    config[key] = value;
  }

  return config;
}

/**
 * Load and parse configuration file with environment variable expansion
 */
export function loadConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env
): Config {
  let parsed: unknown;
  try {
    const configContent = fs.readFileSync(configPath, "utf8");
    parsed = JSON.parse(configContent);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to load config file ${configPath}: ${reason}`);
  }

  return toConfig(expandConfigEnvVars(parsed, env), configPath);
}

/**
 * Resolve configuration from multiple sources with precedence:
 * 1. CLI arguments (highest)
 * 2. Environment variables
 * 3. Configuration file (lowest)
 */
export function resolveConfig(
  cliArgs: Partial<CliArgs> = {},
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): FanoutOptions {
  let config: Config = {};

  const actualConfigPath = configPath || findConfigFile();
  if (actualConfigPath) {
    config = loadConfig(actualConfigPath, env);
  }

  const resolved = mergeConfigs(getDefaultConfig(), config);

  // Override with environment variables
  if (env.FANOUT_CSV) {
    resolved.csv = env.FANOUT_CSV;
  }
  if (env.FANOUT_SCRIPT) {
    resolved.script = env.FANOUT_SCRIPT;
  }
  if (env.OUTPUT_DIR) {
    resolved.out = env.OUTPUT_DIR;
  }
  if (env.SQLCMD_USERNAME !== undefined) {
    resolved.username = env.SQLCMD_USERNAME;
  }
  if (env.SQLCMD_PASSWORD !== undefined) {
    resolved.password = env.SQLCMD_PASSWORD;
  }

  return mergeConfigs(resolved, cliArgs);
}

/**
 * Validate configuration options
 */
export function validateConfig(
  config: FanoutOptions
): asserts config is FanoutOptions & { csv: string; script: string } {
  if (!config.csv || config.csv.trim().length === 0) {
    throw new ConfigError("A CSV file must be specified (--csv)");
  }

  if (!config.script || config.script.trim().length === 0) {
    throw new ConfigError("A SQL script must be specified (--script)");
  }

  if (!config.extension.startsWith(".") || config.extension.length < 2) {
    throw new ConfigError(
      `Output extension must start with "." (got "${config.extension}")`
    );
  }
}

/**
 * Get default configuration
 */
export function getDefaultConfig(): FanoutOptions {
  return {
    csv: undefined,
    script: undefined,
    out: undefined, // Default: alongside the CSV file
    username: PLACEHOLDER_CREDENTIALS.username,
    password: PLACEHOLDER_CREDENTIALS.password,
    header: true,
    include_date: false,
    utc: false,
    extension: ".sql",
  };
}

/**
 * Merge configurations (used for library usage)
 */
export function mergeConfigs(
  base: FanoutOptions,
  override: Partial<FanoutOptions> | Config
): FanoutOptions {
  return {
    csv: override.csv || base.csv,
    script: override.script || base.script,
    out: override.out || base.out,
    // Credentials may legitimately be set to an empty string
    username: override.username ?? base.username,
    password: override.password ?? base.password,
    header: override.header ?? base.header,
    include_date: override.include_date ?? base.include_date,
    utc: override.utc ?? base.utc,
    extension: override.extension || base.extension,
  };
}
