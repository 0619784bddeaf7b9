import type { ErrorHandler, MiddlewareHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import { AuthError } from '../errors/auth-error.js';
import {
  ERROR_TOKEN_EXPIRED,
  ERROR_TOKEN_MALFORMED,
  ERROR_TOKEN_REVOKED,
  type AuthErrorCode,
} from '../errors/error-codes.js';
import {
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  HEADER_WWW_AUTHENTICATE,
} from '../config/constants.js';
import { createLogger, type Logger } from '../logging/logger.js';

const TOKEN_ERROR_CODES: ReadonlySet<AuthErrorCode> = new Set([
  ERROR_TOKEN_EXPIRED,
  ERROR_TOKEN_REVOKED,
  ERROR_TOKEN_MALFORMED,
]);

/**
 * `WWW-Authenticate` challenge for a 401 (RFC 6750 section 3)
 */
export function bearerChallenge(err: AuthError): string {
  if (TOKEN_ERROR_CODES.has(err.code)) {
    return `Bearer realm="auth", error="invalid_token", error_description="${err.description}"`;
  }
  return 'Bearer realm="auth"';
}

/**
 * Summarize zod issues as one line
 */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join(', ');
}

export interface AuthErrorHandlerOptions {
  logger?: Logger;
  /**
   * Hide messages of unexpected errors (production)
   */
  exposeInternalErrors?: boolean;
}

/**
 * Global error handler
 *
 * Renders `{ error, error_description }` with the status of the error kind.
 */
export function authErrorHandler(options: AuthErrorHandlerOptions = {}): ErrorHandler {
  const logger = options.logger ?? createLogger('http');
  const exposeInternalErrors =
    options.exposeInternalErrors ?? process.env['NODE_ENV'] !== 'production';

  return (err, c) => {
    // Set no-cache headers for error responses
    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    if (err instanceof AuthError) {
      if (err.category === 'upstream') {
        logger.warn({ code: err.code, path: c.req.path, err: err.cause }, err.description);
      } else {
        logger.debug({ code: err.code, path: c.req.path }, err.description);
      }
      if (err.category === 'auth') {
        c.header(HEADER_WWW_AUTHENTICATE, bearerChallenge(err));
      }
      return c.json(err.toJSON(), err.statusCode);
    }

    if (err instanceof ZodError) {
      return c.json(AuthError.invalidInput(formatZodIssues(err)).toJSON(), 400);
    }

    // Body parsing failures raised by Hono's validator
    if (err instanceof HTTPException && err.status === 400) {
      return c.json(AuthError.invalidInput(err.message || undefined).toJSON(), 400);
    }

    logger.error({ err, path: c.req.path }, 'unhandled error');

    return c.json(
      {
        error: 'server_error',
        error_description: exposeInternalErrors ? err.message : 'An unexpected error occurred',
      },
      500
    );
  };
}

/**
 * Security headers middleware
 */
export function securityHeaders(
  options: { production?: boolean } = {}
): MiddlewareHandler {
  const production = options.production ?? process.env['NODE_ENV'] === 'production';

  return async (c, next) => {
    await next();

    // Prevent clickjacking
    c.header('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    c.header('X-Content-Type-Options', 'nosniff');

    // Referrer policy; callback URLs carry codes
    c.header('Referrer-Policy', 'no-referrer');

    // Strict Transport Security (enable in production with HTTPS)
    if (production) {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}
