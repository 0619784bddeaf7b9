import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { AuthVariables } from '../../types/hono.js';
import type { IIdentityStorage } from '../../storage/interfaces/identity-storage.js';
import type { LocalAuthService } from '../../services/local-auth.js';
import type { TokenService } from '../../services/token-service.js';
import { toIdentityView } from '../../types/identity.js';
import { AuthError } from '../../errors/auth-error.js';
import { bearerAuth, extractBearerToken } from '../../middleware/bearer-auth.js';
import { formatZodIssues } from '../../middleware/error-handler.js';
import {
  HEADER_AUTHORIZATION,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
} from '../../config/constants.js';

const credentialsSchema = z.object({
  email: z.string().max(320),
  password: z.string().max(1024),
});

const credentialsValidator = zValidator('json', credentialsSchema, (result) => {
  if (!result.success) {
    throw AuthError.invalidInput(formatZodIssues(result.error));
  }
});

export interface LocalAuthRoutesOptions {
  localAuth: LocalAuthService;
  tokens: TokenService;
  identities: IIdentityStorage;
}

/**
 * Create local account routes
 *
 * Routes:
 * - POST /register - Create an account, returns a token
 * - POST /login - Exchange credentials for a token
 * - POST /logout - Revoke the presented token
 * - POST /refresh - Exchange a valid token for a fresh one
 * - GET /me - Current identity
 */
export function createLocalAuthRoutes(options: LocalAuthRoutesOptions) {
  const { localAuth, tokens, identities } = options;

  const router = new Hono<{ Variables: AuthVariables }>();

  router.post('/register', credentialsValidator, async (c) => {
    const { email, password } = c.req.valid('json');
    const token = await localAuth.register(email, password);

    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);
    return c.json(tokens.toResponse(token), 201);
  });

  router.post('/login', credentialsValidator, async (c) => {
    const { email, password } = c.req.valid('json');
    const token = await localAuth.login(email, password);

    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);
    return c.json(tokens.toResponse(token));
  });

  router.post('/logout', async (c) => {
    const token = extractBearerToken(c.req.header(HEADER_AUTHORIZATION));
    if (!token) {
      throw AuthError.unauthenticated();
    }

    await localAuth.logout(token);
    return c.json({ message: 'Logged out' });
  });

  router.post('/refresh', async (c) => {
    const token = extractBearerToken(c.req.header(HEADER_AUTHORIZATION));
    if (!token) {
      throw AuthError.unauthenticated();
    }

    const fresh = await tokens.refresh(token);

    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);
    return c.json(tokens.toResponse(fresh));
  });

  router.get('/me', bearerAuth({ tokens }), async (c) => {
    const identity = await identities.findById(c.get('identityId'));
    if (!identity) {
      throw AuthError.unauthenticated('The account for this token no longer exists.');
    }

    return c.json(toIdentityView(identity));
  });

  return router;
}
