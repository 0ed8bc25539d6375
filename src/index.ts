/**
 * Main Fanout class - multi-server SQLCMD script generator
 */

import fs from "fs/promises";
import path from "path";
import type { FanoutOptions } from "./config.js";
import { validateConfig, mergeConfigs, getDefaultConfig } from "./config.js";
import { FileNotFoundError } from "./errors.js";
import {
  assemble,
  resolveOutputPath,
  validateRequest,
  type DocumentOptions,
  type GeneratedDocument,
  type GenerationRequest,
} from "./generators.js";
import { readRecords, type ServerDatabaseRecord } from "./reader.js";

export interface GenerationPreview {
  document: GeneratedDocument;
  records: ServerDatabaseRecord[];
  warnings: string[];
  /** Directory the document would be written to */
  outputDir: string;
}

export interface GenerationResult {
  outputPath: string;
  records: ServerDatabaseRecord[];
  warnings: string[];
  size: number;
}

export * from "./errors.js";
export * from "./generators.js";
export * from "./reader.js";
export type { FanoutOptions, CliArgs } from "./config.js";
export { resolveConfig, loadConfig } from "./config.js";

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Main Fanout class: reads the server list, assembles the script, writes it
 */
export class Fanout {
  private options: FanoutOptions;

  constructor(options: Partial<FanoutOptions> = {}) {
    this.options = mergeConfigs(getDefaultConfig(), options);
  }

  /**
   * Configure the generator with new options
   */
  configure(options: Partial<FanoutOptions>): void {
    this.options = mergeConfigs(this.options, options);
  }

  /**
   * Build the document without writing anything
   */
  async preview(now: Date = new Date()): Promise<GenerationPreview> {
    const options = this.options;
    validateConfig(options);

    const csvPath = path.resolve(options.csv);
    const scriptPath = path.resolve(options.script);

    if (!(await fileExists(csvPath))) {
      throw new FileNotFoundError("CSV file", csvPath);
    }
    if (!(await fileExists(scriptPath))) {
      throw new FileNotFoundError("SQL script file", scriptPath);
    }

    const csvContent = await fs.readFile(csvPath, "utf-8");
    const records = readRecords(csvContent);

    const request: GenerationRequest = {
      records,
      scriptPath,
      username: options.username,
      password: options.password,
    };
    const warnings = validateRequest(request);
    const document = assemble(request, now, this.documentOptions());

    return {
      document,
      records,
      warnings,
      outputDir: path.resolve(options.out || path.dirname(csvPath)),
    };
  }

  /**
   * Generate the script and write it next to the CSV (or into `out`)
   */
  async generate(now: Date = new Date()): Promise<GenerationResult> {
    const { document, records, warnings, outputDir } = await this.preview(now);

    await fs.mkdir(outputDir, { recursive: true });

    const taken = new Set(await fs.readdir(outputDir));
    const outputPath = resolveOutputPath(
      outputDir,
      document.suggestedFilename,
      (candidate) => taken.has(path.basename(candidate))
    );

    // "wx" fails instead of overwriting if another run claimed the name first
    await fs.writeFile(outputPath, document.content, {
      encoding: "utf-8",
      flag: "wx",
    });

    return {
      outputPath,
      records,
      warnings,
      size: Buffer.byteLength(document.content, "utf-8"),
    };
  }

  private documentOptions(): DocumentOptions {
    return {
      header: this.options.header,
      includeDate: this.options.include_date,
      utc: this.options.utc,
      extension: this.options.extension,
    };
  }
}

/**
 * Convenience function to create and use Fanout
 */
export async function generateScript(
  options: Partial<FanoutOptions>,
  now?: Date
): Promise<GenerationResult> {
  const fanout = new Fanout(options);
  return await fanout.generate(now);
}
