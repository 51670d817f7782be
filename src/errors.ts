/**
 * Base error class for all config.txt toolkit errors
 */
export class VTAPConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'VTAPConfigError';
  }
}

/**
 * Error thrown when a field fails its range, format or required check.
 *
 * Raised while constructing a section; no partially-valid instance exists
 * afterwards.
 */
export class ValidationError extends VTAPConfigError {
  /** Property path of the offending field (e.g. "keySlot", "tagRead.blockNum") */
  readonly field: string;
  /** The rejected value */
  readonly value: unknown;

  constructor(field: string, message: string, value?: unknown) {
    super(`${field}: ${message}`);
    this.name = 'ValidationError';
    this.field = field;
    this.value = value;
  }

  /**
   * Same error, re-attributed under a parent field
   * (e.g. "color" becomes "led.passLed.color")
   */
  withPrefix(prefix: string): ValidationError {
    const message = this.message.slice(this.field.length + 2);
    return new ValidationError(`${prefix}.${this.field}`, message, this.value);
  }
}

/**
 * Error thrown when a document is not a config.txt file (missing header)
 */
export class ConfigFormatError extends VTAPConfigError {
  /** 1-based line number of the offending line, if any */
  readonly line?: number;

  constructor(message: string, line?: number) {
    super(message);
    this.name = 'ConfigFormatError';
    this.line = line;
  }
}

/**
 * Error thrown when a config file cannot be read or written
 */
export class ConfigFileError extends VTAPConfigError {
  readonly path: string;
  /** Node.js error code (e.g. "ENOENT"), when available */
  readonly code?: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ConfigFileError';
    this.path = path;
    if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') {
      this.code = cause.code;
    }
  }
}

/**
 * Run a builder and re-attribute its validation error under a parent field
 */
export function withFieldPrefix<T>(prefix: string, build: () => T): T {
  try {
    return build();
  } catch (error) {
    if (error instanceof ValidationError) {
      throw error.withPrefix(prefix);
    }
    throw error;
  }
}
