/**
 * Custom error types for compose-topology.
 * Expected failures travel as Result<T>; these classes cover the exceptional paths.
 */

/**
 * Base error class for all application errors
 */
export abstract class ApplicationError extends Error {
  public readonly timestamp: Date;
  public readonly context: Record<string, unknown>;

  constructor(
    message: string,
    public readonly code: string,
    context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context ?? {};
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): {
    name: string;
    message: string;
    code: string;
    timestamp: Date;
    context: Record<string, unknown>;
    stack?: string;
  } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * Error thrown when a compose document cannot be read as YAML or does not match the schema
 */
export class ComposeParseError extends ApplicationError {
  constructor(
    message: string,
    public readonly filePath?: string,
    public override readonly cause?: Error,
    context?: Record<string, unknown>,
  ) {
    super(message, 'COMPOSE_PARSE_ERROR', { ...context, filePath });
    this.name = 'ComposeParseError';
  }
}

/**
 * Error thrown when validation fails
 */
export class ValidationError extends ApplicationError {
  constructor(
    message: string,
    public readonly fields?: string[],
    public readonly violations?: Array<{ field: string; message: string }>,
    context?: Record<string, unknown>,
  ) {
    super(message, 'VALIDATION_ERROR', { ...context, fields, violations });
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends ApplicationError {
  constructor(
    message: string,
    public readonly configKey?: string,
    public readonly expectedType?: string,
    public readonly actualValue?: unknown,
    context?: Record<string, unknown>,
  ) {
    super(message, 'CONFIG_ERROR', { ...context, configKey, expectedType, actualValue });
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when a file or resource is not found
 */
export class NotFoundError extends ApplicationError {
  constructor(
    message: string,
    public readonly resourceType?: string,
    public readonly resourceId?: string,
    context?: Record<string, unknown>,
  ) {
    super(message, 'NOT_FOUND', { ...context, resourceType, resourceId });
    this.name = 'NotFoundError';
  }
}

/**
 * Helper function to check if an error is one of our custom error types
 */
export function isApplicationError(error: unknown): error is ApplicationError {
  return error instanceof ApplicationError;
}

/**
 * Helper function to convert unknown errors to our error types
 */
export function normalizeError(
  error: unknown,
  defaultMessage = 'An unexpected error occurred',
): ApplicationError {
  if (isApplicationError(error)) {
    return error;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    if (message.includes('enoent') || message.includes('not found')) {
      return new NotFoundError(error.message, 'file');
    }

    if (error.name === 'YAMLException') {
      return new ComposeParseError(error.message, undefined, error);
    }

    return new ValidationError(error.message, undefined, undefined, { originalError: error.name });
  }

  return new ValidationError(
    typeof error === 'string' ? error : defaultMessage,
    undefined,
    undefined,
    { originalError: error },
  );
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}
