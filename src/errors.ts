/**
 * Error types for Fanout
 */

export type ErrorMetadata = Record<string, unknown>;

/**
 * Base for every error Fanout raises on purpose
 */
export class FanoutError extends Error {
  readonly metadata: ErrorMetadata | undefined;

  constructor(message: string, metadata?: ErrorMetadata) {
    super(message);
    this.name = this.constructor.name;
    this.metadata = metadata;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Malformed or incomplete tabular input
 */
export class FormatError extends FanoutError {
  readonly field: string | undefined;
  readonly ordinal: number | undefined;

  constructor(
    message: string,
    details: { field?: string; ordinal?: number } = {}
  ) {
    super(message, details);
    this.field = details.field;
    this.ordinal = details.ordinal;
  }
}

/**
 * Input that parsed fine but has no rows to process
 */
export class EmptyInputError extends FanoutError {
  constructor(message = "No rows to process") {
    super(message);
  }
}

export class ConfigError extends FanoutError {}

export class FileNotFoundError extends FanoutError {
  readonly path: string;

  constructor(label: string, filePath: string) {
    super(`${label} not found: ${filePath}`, { path: filePath });
    this.path = filePath;
  }
}
