import { HTTPException } from 'hono/http-exception';
import type { ZodError } from 'zod';
import type { ContentfulStatusCode } from 'hono/utils/http-status';

/**
 * Valid HTTP status codes for API exceptions.
 * Uses Hono's ContentfulStatusCode which excludes informational codes (1xx).
 */
export type ApiStatusCode = ContentfulStatusCode;

/**
 * Base exception for everything inkpost throws on purpose.
 * Extends Hono's HTTPException so route handlers can let it bubble up
 * to the global error handler unchanged.
 *
 * @example
 * ```ts
 * throw new ApiException('Something went wrong', 500, 'INTERNAL_ERROR');
 * throw new ApiException('Invalid input', 400, 'VALIDATION_ERROR', { field: 'email' });
 * ```
 */
export class ApiException extends HTTPException {
  public readonly code: string;
  public readonly details?: unknown;

  constructor(
    message: string,
    status: ApiStatusCode = 500,
    code: string = 'INTERNAL_ERROR',
    details?: unknown,
    cause?: unknown
  ) {
    super(status, { message, cause });
    this.name = 'ApiException';
    this.code = code;
    this.details = details;
  }

  /**
   * Converts the exception to the JSON body sent to clients.
   */
  toJSON() {
    const errorObj: { code: string; message: string; details?: unknown } = {
      code: this.code,
      message: this.message,
    };
    if (this.details) {
      errorObj.details = this.details;
    }
    return {
      success: false as const,
      error: errorObj,
    };
  }
}

export class InputValidationException extends ApiException {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'InputValidationException';
  }

  static fromZodError(error: ZodError): InputValidationException {
    const issues = error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
      code: issue.code,
    }));

    return new InputValidationException('Validation failed', issues);
  }
}

export class NotFoundException extends ApiException {
  constructor(resource: string = 'Resource', id?: string | number) {
    super(
      id === undefined ? `${resource} not found` : `${resource} with id '${id}' not found`,
      404,
      'NOT_FOUND'
    );
    this.name = 'NotFoundException';
  }
}

export class UnauthorizedException extends ApiException {
  constructor(message: string = 'Unauthorized') {
    super(message, 401, 'UNAUTHORIZED');
    this.name = 'UnauthorizedException';
  }
}

/** Which SQLite constraint rejected a write. */
export type ConstraintKind = 'unique' | 'foreign_key' | 'not_null' | 'primary_key' | 'check' | 'unknown';

/**
 * A write was rejected by a store constraint, e.g. a duplicate email
 * or a post pointing at a user that does not exist.
 */
export class ConstraintViolationException extends ApiException {
  public readonly constraint: ConstraintKind;

  constructor(message: string, constraint: ConstraintKind = 'unknown', cause?: unknown) {
    super(message, 409, 'CONSTRAINT_VIOLATION', { constraint }, cause);
    this.name = 'ConstraintViolationException';
    this.constraint = constraint;
  }
}

/**
 * The store could not be opened, read or written.
 */
export class StoreUnavailableException extends ApiException {
  constructor(message: string = 'Store unavailable', cause?: unknown) {
    super(message, 503, 'STORE_UNAVAILABLE', undefined, cause);
    this.name = 'StoreUnavailableException';
  }
}

export class ConfigurationException extends ApiException {
  constructor(message: string, details?: unknown, cause?: unknown) {
    super(message, 500, 'CONFIGURATION_ERROR', details, cause);
    this.name = 'ConfigurationException';
  }
}
