/**
 * Custom Error Classes
 */

/**
 * Base error class for all contacts-hub errors
 */
export class ContactsHubError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ContactsHubError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Missing or invalid credentials
 */
export class UnauthorizedError extends ContactsHubError {
  constructor(message: string = 'Could not validate credentials') {
    super(message, 'UNAUTHORIZED', 401);
    this.name = 'UnauthorizedError';
  }
}

/**
 * Authenticated, but the role may not perform the operation
 */
export class ForbiddenError extends ContactsHubError {
  constructor(message: string = 'Operation forbidden', details?: Record<string, unknown>) {
    super(message, 'FORBIDDEN', 403, details);
    this.name = 'ForbiddenError';
  }
}

/**
 * Not found error for missing resources
 */
export class NotFoundError extends ContactsHubError {
  constructor(resource: string, identifier: string | number) {
    super(
      `${resource} not found: ${identifier}`,
      'NOT_FOUND',
      404,
      { resource, identifier }
    );
    this.name = 'NotFoundError';
  }
}

/**
 * A unique value is already taken
 */
export class ConflictError extends ContactsHubError {
  constructor(resource: string, field: string, value: string) {
    super(
      `${resource} with this ${field} already exists`,
      'CONFLICT',
      409,
      { resource, field, value }
    );
    this.name = 'ConflictError';
  }
}
