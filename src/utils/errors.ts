/**
 * Application error classes. Services throw these; routes turn them into
 * responses through `statusCode` and `toJSON()`.
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, statusCode = 500, context?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
    Error.captureStackTrace(this, new.target);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.message,
      code: this.code,
    };
  }
}

/**
 * 422 - input rejected at the entity boundary (missing fields, negative
 * amounts, malformed decimals, unknown references).
 */
export class ValidationError extends AppError {
  public readonly errors: string[];

  constructor(errors: string[], message = 'Validation failed') {
    super(errors.length > 0 ? `${message}: ${errors.join(', ')}` : message, 'VALIDATION_ERROR', 422, { errors });
    this.errors = errors;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      errors: this.errors,
    };
  }
}

export class NotFoundError extends AppError {
  public readonly resourceType: string;
  public readonly resourceId?: number;

  constructor(resourceType: string, resourceId?: number) {
    super(
      resourceId !== undefined ? `${resourceType} not found: ${resourceId}` : `${resourceType} not found`,
      'NOT_FOUND',
      404,
      { resourceType, resourceId },
    );
    this.resourceType = resourceType;
    this.resourceId = resourceId;
  }
}

/** 409 - duplicate invoice number, or a state change the record does not allow. */
export class ConflictError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFLICT', 409, context);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
