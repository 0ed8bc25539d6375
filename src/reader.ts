/**
 * CSV reading for Fanout
 *
 * Turns already-loaded CSV text into ordered (server, database) records.
 * Quoted fields, doubled quotes and CRLF/LF/CR line endings are understood.
 */

import { EmptyInputError, FormatError } from "./errors.js";

export interface ServerDatabaseRecord {
  readonly server: string;
  readonly database: string;
  /** 1-based position among data rows */
  readonly ordinal: number;
}

export const REQUIRED_FIELDS = ["server", "database"] as const;

export type RequiredField = (typeof REQUIRED_FIELDS)[number];

/**
 * Parse CSV content into rows of fields
 */
export function parseCsv(content: string): string[][] {
  const rows: string[][] = [];
  let currentRow: string[] = [];
  let currentField = "";
  let inQuotes = false;
  let i = 0;

  while (i < content.length) {
    const char = content[i];

    if (inQuotes) {
      if (char === '"') {
        // "" inside a quoted field is a literal quote
        if (content[i + 1] === '"') {
          currentField += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
        i++;
        continue;
      }
      currentField += char;
      i++;
      continue;
    }

    if (char === '"' && currentField.length === 0) {
      inQuotes = true;
      i++;
      continue;
    }

    if (char === ",") {
      currentRow.push(currentField);
      currentField = "";
      i++;
      continue;
    }

    if (char === "\r" || char === "\n") {
      currentRow.push(currentField);
      currentField = "";
      rows.push(currentRow);
      currentRow = [];
      i += char === "\r" && content[i + 1] === "\n" ? 2 : 1;
      continue;
    }

    currentField += char;
    i++;
  }

  if (currentField.length > 0 || currentRow.length > 0) {
    currentRow.push(currentField);
    rows.push(currentRow);
  }

  return rows;
}

function isBlankRow(row: readonly string[]): boolean {
  return row.length === 1 && row[0].trim().length === 0;
}

function locateField(headers: readonly string[], field: RequiredField): number {
  const index = headers.indexOf(field);
  if (index === -1) {
    throw new FormatError(`Missing required column "${field}" in CSV header`, {
      field,
    });
  }
  return index;
}

function readValue(
  row: readonly string[],
  index: number,
  field: RequiredField,
  ordinal: number
): string {
  const value = (row[index] ?? "").trim();

  if (value.length === 0) {
    throw new FormatError(`Row ${ordinal}: empty "${field}" value`, {
      field,
      ordinal,
    });
  }
  if (/[\r\n]/.test(value)) {
    throw new FormatError(`Row ${ordinal}: "${field}" value spans lines`, {
      field,
      ordinal,
    });
  }

  return value;
}

/**
 * Read server/database records from CSV text, preserving row order
 */
export function readRecords(tabularData: string): ServerDatabaseRecord[] {
  const content = tabularData.startsWith("\uFEFF")
    ? tabularData.slice(1)
    : tabularData;
  const rows = parseCsv(content).filter((row) => !isBlankRow(row));

  if (rows.length === 0) {
    throw new FormatError("CSV input has no header row");
  }

  const headers = rows[0].map((h) => h.trim());
  const serverIndex = locateField(headers, "server");
  const databaseIndex = locateField(headers, "database");

  const dataRows = rows.slice(1);
  if (dataRows.length === 0) {
    throw new EmptyInputError();
  }

  const records = dataRows.map((row, index): ServerDatabaseRecord => {
    const ordinal = index + 1;
    return Object.freeze({
      server: readValue(row, serverIndex, "server", ordinal),
      database: readValue(row, databaseIndex, "database", ordinal),
      ordinal,
    });
  });

  return records;
}
