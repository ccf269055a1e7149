/**
 * Custom Error Classes
 * ====================
 * Every failure the registry reports carries a stable `code` (the error kind)
 * and the HTTP status the API layer answers with.
 */

export type ErrorContext = Record<string, unknown>;

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: ErrorContext;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    statusCode: number = 500,
    context?: ErrorContext,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

/**
 * Malformed or missing metadata
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'VALIDATION_ERROR', 422, context);
  }
}

/**
 * Referenced model, version or alias does not exist
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string | number, context?: ErrorContext) {
    const message =
      identifier !== undefined
        ? `${resource} with identifier '${identifier}' not found`
        : `${resource} not found`;
    super(message, 'NOT_FOUND', 404, { resource, identifier, ...context });
  }
}

/**
 * Duplicate model name, alias name or version number
 */
export class ConflictError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'CONFLICT', 409, context);
  }
}

/**
 * The artifact store could not complete a save, delete or lookup
 */
export class StorageError extends AppError {
  constructor(message: string, operation?: string, context?: ErrorContext) {
    super(message, 'STORAGE_ERROR', 502, { operation, ...context });
  }
}

export class DatabaseError extends AppError {
  constructor(message: string, operation?: string, context?: ErrorContext) {
    super(message, 'DATABASE_ERROR', 500, { operation, ...context });
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, configKey?: string, context?: ErrorContext) {
    super(message, 'CONFIGURATION_ERROR', 500, { configKey, ...context }, false);
  }
}
