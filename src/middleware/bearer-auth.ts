import type { MiddlewareHandler } from 'hono';
import type { AuthVariables } from '../types/hono.js';
import type { TokenService } from '../services/token-service.js';
import { AuthError } from '../errors/auth-error.js';
import { HEADER_AUTHORIZATION } from '../config/constants.js';

export interface BearerAuthOptions {
  tokens: TokenService;
}

/**
 * Extract bearer token from Authorization header
 */
export function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader) {
    return null;
  }
  const match = /^Bearer\s+(\S+)\s*$/i.exec(authHeader);
  return match?.[1] ?? null;
}

/**
 * Middleware to require a valid bearer token
 *
 * Sets `identityId` in context variables on success
 */
export function bearerAuth(options: BearerAuthOptions): MiddlewareHandler<{
  Variables: AuthVariables;
}> {
  const { tokens } = options;

  return async (c, next) => {
    const token = extractBearerToken(c.req.header(HEADER_AUTHORIZATION));

    if (!token) {
      throw AuthError.unauthenticated();
    }

    const identityId = await tokens.verify(token);

    c.set('identityId', identityId);

    await next();
  };
}
