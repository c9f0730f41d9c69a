/**
 * Custom Error Classes
 * ====================
 * Every error that reaches the HTTP layer carries its status and a stable code.
 */

/**
 * Base application error
 */
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code?: string
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Resource not found error
 */
export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 404, "NOT_FOUND");
  }
}

/**
 * Validation error
 */
export class ValidationError extends AppError {
  constructor(message: string, public details?: unknown) {
    super(message, 400, "VALIDATION_ERROR");
  }
}

/**
 * Duplicate resource (account or contact)
 */
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, "CONFLICT");
  }
}

/**
 * External API error
 */
export class ExternalApiError extends AppError {
  constructor(
    public api: string,
    message: string,
    public originalError?: unknown
  ) {
    super(`${api} API error: ${message}`, 502, "EXTERNAL_API_ERROR");
  }
}

/**
 * Database error
 */
export class DatabaseError extends AppError {
  constructor(message: string, public originalError?: unknown) {
    super(`Database error: ${message}`, 500, "DATABASE_ERROR");
  }
}

/**
 * Authentication error (bad credentials or token)
 */
export class AuthenticationError extends AppError {
  constructor(message: string = "Could not validate credentials") {
    super(message, 401, "AUTHENTICATION_ERROR");
  }
}

/**
 * Authenticated, but not allowed
 */
export class AuthorizationError extends AppError {
  constructor(message: string = "FORBIDDEN") {
    super(message, 403, "FORBIDDEN");
  }
}

/**
 * Email verification token could not be decoded
 */
export class UnprocessableTokenError extends AppError {
  constructor(message: string = "Invalid token for email verification") {
    super(message, 422, "UNPROCESSABLE_TOKEN");
  }
}

export class TooManyRequestsError extends AppError {
  constructor(public retryAfterSeconds: number) {
    super("Too Many Requests", 429, "RATE_LIMITED");
  }
}

/**
 * Configuration error
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(`Configuration error: ${message}`, 500, "CONFIGURATION_ERROR");
  }
}
