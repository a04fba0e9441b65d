/**
 * Custom Error Classes
 *
 * Only ValidationError and ConfigError are ever thrown. The album errors
 * travel inside a Result; an empty album or a bad watermark is an expected
 * outcome, not a fault.
 */

export type AlbumLevel = 'year' | 'month' | 'day' | 'file';

/**
 * Base error class for all capture-relay errors
 */
export class RelayError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RelayError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends RelayError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * Configuration that cannot run: bad values or no usable upload channel
 */
export class ConfigError extends RelayError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'CONFIG_ERROR', { issues });
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * The album has no item yet; `level` is the first empty level under `parent`
 */
export class AlbumNotReadyError extends RelayError {
  public readonly level: AlbumLevel;
  public readonly parent: string;

  constructor(level: AlbumLevel, parent: string) {
    super(
      level === 'file'
        ? `No files found in ${parent}`
        : `No valid ${level} directories in ${parent}`,
      'ALBUM_NOT_READY',
      { level, parent }
    );
    this.name = 'AlbumNotReadyError';
    this.level = level;
    this.parent = parent;
  }
}

/**
 * Watermark path that is not shaped `<root>/YYYY/MM/DD/<file>`
 */
export class InvalidWatermarkError extends RelayError {
  public readonly watermark: string;

  constructor(watermark: string, reason: string) {
    super(
      `Invalid watermark ${watermark}: ${reason}`,
      'INVALID_WATERMARK',
      { watermark, reason }
    );
    this.name = 'InvalidWatermarkError';
    this.watermark = watermark;
  }
}
