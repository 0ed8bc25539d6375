/**
 * Command-line interface for Fanout
 */

import type { CliArgs, FanoutOptions } from "./config.js";
import { resolveConfig } from "./config.js";
import { ConfigError, FormatError } from "./errors.js";
import { Fanout } from "./index.js";
import type { ServerDatabaseRecord } from "./reader.js";

export const TOOL_NAME = "fanout";
export const VERSION = "1.0.0";

const BANNER = `
  ___ __ _ _ __   ___  _   _| |_
 / __/ _\` | '_ \\ / _ \\| | | | __|
| (_| (_| | | | | (_) | |_| | |_
 \\__\\__,_|_| |_|\\___/ \\__,_|\\__|   ${TOOL_NAME} v${VERSION}

📡 One script, every server
`;

/**
 * Show ASCII art banner
 */
export function showBanner(): void {
  console.log(BANNER);
}

/**
 * Show help information
 */
export function showHelp(): void {
  console.log(`
📡 ${TOOL_NAME} v${VERSION} - Multi-server SQLCMD script generator

Reads (server, database) pairs from a CSV file and writes a SQLCMD script that
connects to each server, switches to the database and runs your SQL script.

USAGE:
  ${TOOL_NAME} --csv servers.csv --script setup.sql
  ${TOOL_NAME} --csv servers.csv --script setup.sql --username deploy --password "..."
  ${TOOL_NAME} --config ./fanout.json
  ${TOOL_NAME} (uses .fanoutrc if present)

OPTIONS:
  --csv <file>        📄 CSV with "server" and "database" columns
  --script <file>     📜 SQL script to run against every database
  --username <name>   👤 SQL login bound to $(USERNAME)
  --password <value>  🔑 Password bound to $(PASSWORD)
  --out <directory>   📁 Output directory (default: next to the CSV)
  --config <file>     ⚙️  Path to configuration file (JSON)
  --include-date      🕒 Add the generation time to the header
  --no-header         ✂️  Omit the comment banners
  --utc               🌍 Use UTC for the filename timestamp
  --dry-run           👀 Print the script instead of writing it
  --help, -h          ❓ Show this help
  --version, -v       ℹ️  Show version

CONFIGURATION FILE:
  Create .fanoutrc (auto-detected) or custom JSON:
  {
    "csv": "./servers.csv",
    "script": "./setup.sql",
    "username": "\${SQLCMD_USERNAME}",
    "password": "\${SQLCMD_PASSWORD}",
    "out": "./generated",
    "include_date": true
  }

ENVIRONMENT:
  FANOUT_CSV          📄 CSV file path
  FANOUT_SCRIPT       📜 SQL script path
  OUTPUT_DIR          📁 Output directory path
  SQLCMD_USERNAME     👤 SQL login
  SQLCMD_PASSWORD     🔑 Password

Output is named run_all_YYYYMMDD_HHMMSS.sql. Credentials are written in plain
text; open the result in SSMS with Query > SQLCMD Mode enabled.
`);
}

/**
 * Show version information
 */
export function showVersion(): void {
  console.log(`📡 ${TOOL_NAME} v${VERSION} - Multi-server SQLCMD script generator`);
}

/**
 * Like requireValue, but an explicit "" is kept
 */
function optionalValue(flag: string, value: string | undefined): string {
  if (value !== undefined && value.startsWith("--")) {
    throw new ConfigError(`Option ${flag} requires a value`);
  }
  return value ?? "";
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith("--")) {
    throw new ConfigError(`Option ${flag} requires a value`);
  }
  return value;
}

/**
 * Parse command line arguments
 */
export function parseCliArgs(
  args: string[] = process.argv.slice(2)
): Partial<CliArgs> {
  const result: Partial<CliArgs> = {};

  // Check for help or version first
  if (args.includes("--help") || args.includes("-h")) {
    showHelp();
    process.exit(0);
  }

  if (args.includes("--version") || args.includes("-v")) {
    showVersion();
    process.exit(0);
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case "--csv":
        result.csv = requireValue(arg, next);
        i++;
        break;
      case "--script":
        result.script = requireValue(arg, next);
        i++;
        break;
      case "--username":
        // Empty strings are allowed and reported as a warning later
        result.username = optionalValue(arg, next);
        i++;
        break;
      case "--password":
        result.password = optionalValue(arg, next);
        i++;
        break;
      case "--out":
        result.out = requireValue(arg, next);
        i++;
        break;
      case "--include-date":
        result.include_date = true;
        break;
      case "--no-header":
        result.header = false;
        break;
      case "--utc":
        result.utc = true;
        break;
      case "--dry-run":
        result.dry_run = true;
        break;
      case "--config":
        // Config file path is handled separately
        i++;
        break;
      default:
        throw new ConfigError(`Unknown option: ${arg}`);
    }
  }

  return result;
}

/**
 * Get config file path from CLI args
 */
export function getConfigPath(
  args: string[] = process.argv.slice(2)
): string | undefined {
  const configIndex = args.indexOf("--config");

  if (configIndex !== -1 && args[configIndex + 1]) {
    return args[configIndex + 1];
  }

  return undefined;
}

/**
 * Display configuration summary
 */
export function displayConfigSummary(config: FanoutOptions): void {
  console.log(`📄 Server list: ${config.csv ?? "(not set)"}`);
  console.log(`📜 Script: ${config.script ?? "(not set)"}`);
  console.log(`📁 Output: ${config.out || "next to the CSV file"}`);
  console.log(`👤 Login: ${config.username || "(empty)"}`);
}

/**
 * Display warnings collected while validating the request
 */
export function displayWarnings(warnings: string[]): void {
  for (const warning of warnings) {
    console.warn(`⚠️  ${warning}`);
  }
}

/**
 * Display the numbered record list in execution order
 */
export function displayRecords(records: readonly ServerDatabaseRecord[]): void {
  for (const record of records) {
    console.log(`    🔹 [${record.ordinal}] ${record.database} on ${record.server}`);
  }
}

/**
 * Display completion summary
 */
export function displayCompletionSummary(summary: {
  outputPath: string;
  records: number;
  size: number;
}): void {
  console.log(`\n✅ SQLCMD script generated!`);
  console.log(`📊 Summary:`);
  console.log(`   • Execution blocks: ${summary.records}`);
  console.log(`   • Size: ${summary.size} bytes`);
  console.log(`   • Output file: ${summary.outputPath}`);
  console.log(`\n💡 Enable Query > SQLCMD Mode before running it.\n`);
}

/**
 * Describe an error for the console, including row and field details
 */
export function describeError(error: unknown): string {
  if (error instanceof FormatError) {
    const details: string[] = [];
    if (error.ordinal !== undefined) details.push(`row ${error.ordinal}`);
    if (error.field !== undefined) details.push(`field "${error.field}"`);
    return details.length > 0
      ? `${error.message} (${details.join(", ")})`
      : error.message;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return "Unknown error occurred";
}

/**
 * Display error message
 */
export function displayError(message: string): void {
  console.error(`💥 Generation failed: ${message}`);
}

/**
 * Main CLI runner function
 */
export async function runCLI(
  args: string[] = process.argv.slice(2)
): Promise<void> {
  try {
    showBanner();

    const cliArgs = parseCliArgs(args);
    const configPath = getConfigPath(args);

    const config = resolveConfig(cliArgs, configPath);
    displayConfigSummary(config);

    const fanout = new Fanout(config);

    if (cliArgs.dry_run) {
      const preview = await fanout.preview();
      displayWarnings(preview.warnings);
      console.log(`\n-- ${preview.document.suggestedFilename}\n`);
      console.log(preview.document.content);
      return;
    }

    const result = await fanout.generate();

    displayWarnings(result.warnings);
    console.log(`\n🚀 Execution order:`);
    displayRecords(result.records);

    displayCompletionSummary({
      outputPath: result.outputPath,
      records: result.records.length,
      size: result.size,
    });
  } catch (error) {
    displayError(describeError(error));
    throw error;
  }
}
