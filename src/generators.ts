/**
 * SQLCMD script generation utilities for Fanout
 */

import path from "path";
import type { ServerDatabaseRecord } from "./reader.js";
import { EmptyInputError, FanoutError, FormatError } from "./errors.js";

export interface GenerationRequest {
  records: readonly ServerDatabaseRecord[];
  scriptPath: string;
  username: string;
  password: string;
}

export interface GeneratedDocument {
  content: string;
  suggestedFilename: string;
}

export interface DocumentOptions {
  /** Emit the comment banners around the preamble */
  header: boolean;
  /** Add a "Generated:" line to the header */
  includeDate: boolean;
  /** Format timestamps in UTC instead of local time */
  utc: boolean;
  extension: string;
}

export const DEFAULT_DOCUMENT_OPTIONS: DocumentOptions = {
  header: true,
  includeDate: false,
  utc: false,
  extension: ".sql",
};

export const FILENAME_PREFIX = "run_all_";

/** Collision suffixes stay three digits wide so names keep sorting by time */
export const MAX_COLLISION_SUFFIX = 999;

/** Credentials the tool falls back to when none are configured */
export const PLACEHOLDER_CREDENTIALS = {
  username: "username",
  password: "password",
} as const;

const RULE = "-".repeat(60);

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

function dateParts(date: Date, utc: boolean) {
  return utc
    ? {
        year: date.getUTCFullYear(),
        month: date.getUTCMonth() + 1,
        day: date.getUTCDate(),
        hours: date.getUTCHours(),
        minutes: date.getUTCMinutes(),
        seconds: date.getUTCSeconds(),
      }
    : {
        year: date.getFullYear(),
        month: date.getMonth() + 1,
        day: date.getDate(),
        hours: date.getHours(),
        minutes: date.getMinutes(),
        seconds: date.getSeconds(),
      };
}

/**
 * Format a date as a fixed-width YYYYMMDD_HHMMSS stamp
 */
export function formatTimestamp(date: Date, utc = false): string {
  const p = dateParts(date, utc);
  return (
    `${pad(p.year, 4)}${pad(p.month)}${pad(p.day)}` +
    `_${pad(p.hours)}${pad(p.minutes)}${pad(p.seconds)}`
  );
}

function formatReadableDate(date: Date, utc: boolean): string {
  const p = dateParts(date, utc);
  return (
    `${pad(p.year, 4)}-${pad(p.month)}-${pad(p.day)} ` +
    `${pad(p.hours)}:${pad(p.minutes)}:${pad(p.seconds)}${utc ? " UTC" : ""}`
  );
}

/**
 * Output filename for a run started at the given time
 */
export function suggestFilename(
  generatedAt: Date,
  options: Pick<DocumentOptions, "utc" | "extension"> = DEFAULT_DOCUMENT_OPTIONS
): string {
  return `${FILENAME_PREFIX}${formatTimestamp(generatedAt, options.utc)}${
    options.extension
  }`;
}

/**
 * Quote a value for a :setvar line
 */
export function quoteSetvarValue(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

/**
 * Escape text placed inside a T-SQL string literal
 */
export function escapeStringLiteral(value: string): string {
  return value.replace(/'/g, "''");
}

/**
 * Wrap a name in T-SQL square brackets
 */
export function bracketIdentifier(name: string): string {
  return `[${name.replace(/]/g, "]]")}]`;
}

/**
 * Generate the variable bindings every execution block relies on
 */
export function generatePreambleSQL(request: GenerationRequest): string[] {
  return [
    `:setvar USERNAME ${quoteSetvarValue(request.username)}`,
    `:setvar PASSWORD ${quoteSetvarValue(request.password)}`,
    `:setvar SCRIPT ${quoteSetvarValue(request.scriptPath)}`,
  ];
}

/**
 * Generate the statements that run the script against one database
 */
export function generateExecutionBlock(record: ServerDatabaseRecord): string[] {
  const label = `[${record.ordinal}] ${record.database} on ${record.server}`;

  return [
    `PRINT '--- ${escapeStringLiteral(label)} ---'`,
    `:CONNECT ${record.server} -U $(USERNAME) -P $(PASSWORD)`,
    `USE ${bracketIdentifier(record.database)};`,
    ":r $(SCRIPT)",
    "GO",
  ];
}

/**
 * Build the complete SQLCMD document for a request
 */
export function assemble(
  request: GenerationRequest,
  generatedAt: Date,
  options: Partial<DocumentOptions> = {}
): GeneratedDocument {
  const resolved: DocumentOptions = { ...DEFAULT_DOCUMENT_OPTIONS, ...options };

  if (request.records.length === 0) {
    throw new EmptyInputError();
  }

  const sections: string[] = [];

  if (resolved.header) {
    sections.push(RULE);
    sections.push("-- MULTI-DATABASE SQLCMD SCRIPT");
    sections.push("-- Enable: Query > SQLCMD Mode");
    if (resolved.includeDate) {
      sections.push(
        `-- Generated: ${formatReadableDate(generatedAt, resolved.utc)}`
      );
    }
    sections.push(RULE);
    sections.push("");
  }

  sections.push(...generatePreambleSQL(request));
  sections.push("");

  if (resolved.header) {
    sections.push(RULE);
    sections.push("-- BEGIN EXECUTION");
    sections.push(RULE);
    sections.push("");
  }

  const blocks = request.records.map((record) =>
    generateExecutionBlock(record).join("\n")
  );
  sections.push(blocks.join("\n\n"));

  return {
    content: sections.join("\n") + "\n",
    suggestedFilename: suggestFilename(generatedAt, resolved),
  };
}

/**
 * Caller-facing entry point taking the request fields separately
 */
export function generateDocument(
  records: readonly ServerDatabaseRecord[],
  scriptPath: string,
  username: string,
  password: string,
  now: Date,
  options?: Partial<DocumentOptions>
): GeneratedDocument {
  return assemble({ records, scriptPath, username, password }, now, options);
}

/**
 * Check a request before assembly; returns warnings for suspicious credentials
 */
export function validateRequest(request: GenerationRequest): string[] {
  const warnings: string[] = [];

  if (request.scriptPath.trim().length === 0) {
    throw new FormatError("Script path must not be empty", {
      field: "scriptPath",
    });
  }

  for (const field of ["scriptPath", "username", "password"] as const) {
    if (/[\r\n]/.test(request[field])) {
      throw new FormatError(`${field} must not contain line breaks`, {
        field,
      });
    }
  }

  if (request.username.length === 0) {
    warnings.push("Username is empty");
  }
  if (request.password.length === 0) {
    warnings.push("Password is empty");
  }
  if (
    request.username === PLACEHOLDER_CREDENTIALS.username &&
    request.password === PLACEHOLDER_CREDENTIALS.password
  ) {
    warnings.push(
      "Placeholder credentials in use; edit the :setvar lines before running"
    );
  }

  return warnings;
}

/**
 * Pick a free output path, appending _001, _002, ... before the extension
 * when the suggested name is already taken
 */
export function resolveOutputPath(
  directory: string,
  filename: string,
  exists: (candidate: string) => boolean
): string {
  let filePath = path.join(directory, filename);
  const extension = path.extname(filename);
  const stem = filename.slice(0, filename.length - extension.length);

  let counter = 1;
  while (exists(filePath)) {
    if (counter > MAX_COLLISION_SUFFIX) {
      throw new FanoutError(
        `No free output name for ${filename} after ${MAX_COLLISION_SUFFIX} attempts`,
        { directory, filename }
      );
    }
    filePath = path.join(directory, `${stem}_${pad(counter, 3)}${extension}`);
    counter++;
  }

  return filePath;
}
