export class MetricsError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'MetricsError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A window held fewer samples than the computation needs. Always names both
 * the required and the actual count.
 */
export class InsufficientDataError extends MetricsError {
  public readonly required: number;
  public readonly found: number;
  public readonly window: string;

  constructor(window: string, required: number, found: number, options?: ErrorOptions) {
    super(`${window} needs at least ${required} data points (found ${found})`, 'INSUFFICIENT_DATA', options);
    this.name = 'InsufficientDataError';
    this.required = required;
    this.found = found;
    this.window = window;
  }
}

/** A physiologically implausible input, or a derived value outside its documented range. */
export class OutOfRangeError extends MetricsError {
  public readonly field: string;
  public readonly value: unknown;

  constructor(field: string, value: unknown, message: string, options?: ErrorOptions) {
    super(`${field}: ${message}`, 'OUT_OF_RANGE', options);
    this.name = 'OutOfRangeError';
    this.field = field;
    this.value = value;
  }
}

export class FitConvergenceError extends MetricsError {
  public readonly iterations: number;

  constructor(message: string, iterations: number, options?: ErrorOptions) {
    super(message, 'FIT_NOT_CONVERGED', options);
    this.name = 'FitConvergenceError';
    this.iterations = iterations;
  }
}

export class StorageError extends MetricsError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'STORAGE_ERROR', options);
    this.name = 'StorageError';
  }
}

export class ConfigError extends MetricsError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}
