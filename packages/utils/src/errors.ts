/**
 * Custom Error Classes
 * ====================
 * Standardized error classes for the gridtrend pipeline.
 *
 * Every pipeline error is terminal for the run that raised it: inputs are
 * local static files, so nothing here is retryable.
 */

export type ErrorContext = Record<string, unknown>;

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly context?: ErrorContext;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    context?: ErrorContext,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

/**
 * Validation error - for input validation failures
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'VALIDATION_ERROR', context);
  }
}

/**
 * Configuration error - for configuration issues
 */
export class ConfigurationError extends AppError {
  constructor(message: string, configKey?: string, context?: ErrorContext) {
    super(message, 'CONFIGURATION_ERROR', { configKey, ...context });
  }
}

/**
 * The grid file is missing, unreadable, not a supported format, or lacks a
 * required coordinate or data variable.
 */
export class DatasetOpenError extends AppError {
  public readonly path: string;

  constructor(message: string, path: string, context?: ErrorContext) {
    super(message, 'DATASET_OPEN_ERROR', { path, ...context });
    this.path = path;
  }
}

/**
 * A variable requested by name is absent from the file
 */
export class VariableNotFoundError extends AppError {
  public readonly variable: string;

  constructor(variable: string, path?: string, context?: ErrorContext) {
    super(
      path ? `Variable '${variable}' not found in ${path}` : `Variable '${variable}' not found`,
      'VARIABLE_NOT_FOUND',
      { variable, path, ...context }
    );
    this.variable = variable;
  }
}

/**
 * A time `units` attribute does not follow "<unit> since <YYYY>-<MM>-<DD>"
 */
export class TimeUnitsParseError extends AppError {
  public readonly units: string;

  constructor(units: string, reason: string, context?: ErrorContext) {
    super(`Cannot parse time units '${units}': ${reason}`, 'TIME_UNITS_PARSE_ERROR', {
      units,
      ...context,
    });
    this.units = units;
  }
}

/**
 * A region selection matched no grid cells on at least one axis
 */
export class EmptyRegionError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'EMPTY_REGION', context);
  }
}

/**
 * Every selected cell is missing at one time step
 */
export class AllMissingError extends AppError {
  public readonly timeIndex: number;

  constructor(timeIndex: number, context?: ErrorContext) {
    super(
      `All selected cells are missing at time index ${timeIndex}`,
      'ALL_MISSING',
      { timeIndex, ...context }
    );
    this.timeIndex = timeIndex;
  }
}

/**
 * Field dimensions do not match the coordinate lengths
 */
export class DimensionMismatchError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'DIMENSION_MISMATCH', context);
  }
}

/**
 * Check if error is an operational error (expected errors that should be handled)
 */
export function isOperationalError(error: Error): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}
