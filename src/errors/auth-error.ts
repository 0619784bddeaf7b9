import {
  type AuthErrorCode,
  type AuthErrorCategory,
  type AuthErrorStatus,
  ERROR_STATUS_CODES,
  ERROR_CATEGORIES,
  ERROR_DESCRIPTIONS,
  ERROR_INVALID_INPUT,
  ERROR_CONFLICT,
  ERROR_INVALID_CREDENTIALS,
  ERROR_UNAUTHENTICATED,
  ERROR_TOKEN_EXPIRED,
  ERROR_TOKEN_REVOKED,
  ERROR_TOKEN_MALFORMED,
  ERROR_UNKNOWN_PROVIDER,
  ERROR_PROVIDER_NOT_CONFIGURED,
  ERROR_CSRF_MISMATCH,
  ERROR_PROVIDER_DENIED,
  ERROR_MISSING_CODE,
  ERROR_TOKEN_EXCHANGE_FAILED,
  ERROR_PROFILE_FETCH_FAILED,
  ERROR_MISSING_SUBJECT_ID,
  ERROR_MISSING_EMAIL,
} from './error-codes.js';

/**
 * Error response body
 */
export interface AuthErrorResponse {
  error: AuthErrorCode;
  error_description?: string;
}

/**
 * Authentication error
 *
 * Every failure of the authentication core is one of these. None are
 * retried; the HTTP layer renders them with `statusCode`.
 */
export class AuthError extends Error {
  public readonly code: AuthErrorCode;
  public readonly statusCode: AuthErrorStatus;
  public readonly category: AuthErrorCategory;
  public readonly description: string;

  constructor(
    code: AuthErrorCode,
    description?: string,
    options?: {
      cause?: unknown;
    }
  ) {
    const desc = description ?? ERROR_DESCRIPTIONS[code];
    super(desc);
    this.name = 'AuthError';
    this.code = code;
    this.statusCode = ERROR_STATUS_CODES[code];
    this.category = ERROR_CATEGORIES[code];
    this.description = desc;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    // Maintains proper stack trace in V8
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON response body
   */
  toJSON(): AuthErrorResponse {
    const response: AuthErrorResponse = {
      error: this.code,
    };

    if (this.description) {
      response.error_description = this.description;
    }

    return response;
  }

  // Factory methods

  static invalidInput(description?: string): AuthError {
    return new AuthError(ERROR_INVALID_INPUT, description);
  }

  static conflict(description?: string): AuthError {
    return new AuthError(ERROR_CONFLICT, description);
  }

  static invalidCredentials(): AuthError {
    // One message for every failure path so callers cannot enumerate accounts
    return new AuthError(ERROR_INVALID_CREDENTIALS);
  }

  static unauthenticated(description?: string): AuthError {
    return new AuthError(ERROR_UNAUTHENTICATED, description);
  }

  static tokenExpired(): AuthError {
    return new AuthError(ERROR_TOKEN_EXPIRED);
  }

  static tokenRevoked(): AuthError {
    return new AuthError(ERROR_TOKEN_REVOKED);
  }

  static tokenMalformed(description?: string, cause?: unknown): AuthError {
    return new AuthError(ERROR_TOKEN_MALFORMED, description, { cause });
  }

  static unknownProvider(provider: string): AuthError {
    return new AuthError(ERROR_UNKNOWN_PROVIDER, `Unsupported OAuth provider: ${provider}`);
  }

  static providerNotConfigured(provider: string): AuthError {
    return new AuthError(ERROR_PROVIDER_NOT_CONFIGURED, `OAuth provider not configured: ${provider}`);
  }

  static csrfMismatch(): AuthError {
    return new AuthError(ERROR_CSRF_MISMATCH);
  }

  static providerDenied(error: string, errorDescription?: string): AuthError {
    return new AuthError(
      ERROR_PROVIDER_DENIED,
      `OAuth error: ${errorDescription ?? error}`
    );
  }

  static missingCode(): AuthError {
    return new AuthError(ERROR_MISSING_CODE);
  }

  static tokenExchangeFailed(description?: string, cause?: unknown): AuthError {
    return new AuthError(ERROR_TOKEN_EXCHANGE_FAILED, description, { cause });
  }

  static profileFetchFailed(description?: string, cause?: unknown): AuthError {
    return new AuthError(ERROR_PROFILE_FETCH_FAILED, description, { cause });
  }

  static missingSubjectId(): AuthError {
    return new AuthError(ERROR_MISSING_SUBJECT_ID);
  }

  static missingEmail(): AuthError {
    return new AuthError(ERROR_MISSING_EMAIL);
  }
}
