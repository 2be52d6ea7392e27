/**
 * Error taxonomy
 *
 * Fatal errors (configuration, resolution) propagate to the caller
 * unchanged. Parse and validation errors are raised by the note loader's
 * internals and recovered into invalid note records; they never escape
 * the pipeline.
 *
 * @packageDocumentation
 */

export type ShiplogErrorCode = 'CONFIGURATION' | 'RESOLUTION' | 'PARSE' | 'VALIDATION';

/**
 * Base class for every error raised on purpose by shiplog
 */
export class ShiplogError extends Error {
  constructor(
    message: string,
    /** Semantic error code */
    public readonly code: ShiplogErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ShiplogError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Missing credential, missing schema, invalid config file
 */
export class ConfigurationError extends ShiplogError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIGURATION', options);
    this.name = 'ConfigurationError';
  }
}

/**
 * A range expression could not be turned into commits
 * (unknown revision, failed pull request lookup)
 */
export class ResolutionError extends ShiplogError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'RESOLUTION', options);
    this.name = 'ResolutionError';
  }
}

/**
 * A note artifact is not a well-formed document
 */
export class ParseError extends ShiplogError {
  constructor(
    message: string,
    /** Repository-relative path of the offending artifact */
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, 'PARSE', options);
    this.name = 'ParseError';
  }
}

/**
 * A single field violates its schema definition
 */
export class ValidationError extends ShiplogError {
  constructor(
    /** Field label the violation belongs to */
    public readonly field: string,
    /** Human-readable reason, without the field prefix */
    public readonly reason: string,
  ) {
    super(`${field}: ${reason}`, 'VALIDATION');
    this.name = 'ValidationError';
  }
}

export function isShiplogError(error: unknown): error is ShiplogError {
  return error instanceof ShiplogError;
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
