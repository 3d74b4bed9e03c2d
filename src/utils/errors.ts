/**
 * Error types for caller-contract violations.
 *
 * Business outcomes (bad credentials, access denied, invalid target) are never
 * thrown; they are returned as AuthenticationResult failures. AuthError is
 * reserved for misuse of the API: null arguments, malformed results and
 * invalid provider registration.
 */

export class AuthError extends Error {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AuthError';

    // Maintain proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AuthError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

export function createAuthError(
  code: string,
  message: string,
  statusCode: number = 500,
  details?: Record<string, unknown>
): AuthError {
  return new AuthError(code, message, statusCode, details);
}

// Predefined error types
export const AuthErrors = {
  ARGUMENT_NULL: (parameter: string) =>
    createAuthError('ARGUMENT_NULL', `Value cannot be null: ${parameter}`, 400, { parameter }),

  INVALID_RESULT: (reason: string) =>
    createAuthError('INVALID_RESULT', `Invalid authentication result: ${reason}`, 500),

  INVALID_PROVIDER: (family: string) =>
    createAuthError('INVALID_PROVIDER', `Provider must implement the ${family} provider interface`, 500),

  DUPLICATE_PROVIDER: (family: string, name: string) =>
    createAuthError(
      'DUPLICATE_PROVIDER',
      `${family} provider already registered: ${name}`,
      500,
      { family, name }
    ),

  CONFIGURATION_ERROR: (message: string) =>
    createAuthError('CONFIGURATION_ERROR', `Configuration error: ${message}`, 500),
} as const;

// Error sanitization for logging
export function sanitizeError(error: unknown): Record<string, unknown> {
  if (error instanceof AuthError) {
    return {
      type: 'AuthError',
      code: error.code,
      message: error.message,
      statusCode: error.statusCode,
      // Don't include details in production to prevent information leakage
      ...(process.env.NODE_ENV !== 'production' && { details: error.details }),
    };
  }

  if (error instanceof Error) {
    return {
      type: 'Error',
      message: error.message,
      name: error.name,
      // Only include stack trace in development
      ...(process.env.NODE_ENV === 'development' && { stack: error.stack }),
    };
  }

  return {
    type: 'Unknown',
    message: 'An unknown error occurred',
  };
}
