import { Hono } from 'hono';
import type { AuthVariables } from '../../types/hono.js';
import { createLocalAuthRoutes, type LocalAuthRoutesOptions } from './local.js';
import { createOAuthRoutes, type OAuthRoutesOptions } from './oauth.js';

export type AuthRoutesOptions = LocalAuthRoutesOptions & OAuthRoutesOptions;

/**
 * Create all authentication routes, mounted under /auth
 */
export function createAuthRoutes(options: AuthRoutesOptions): Hono<{ Variables: AuthVariables }> {
  const app = new Hono<{ Variables: AuthVariables }>();

  app.route('/', createLocalAuthRoutes(options));
  app.route('/oauth', createOAuthRoutes(options));

  return app;
}

export * from './local.js';
export * from './oauth.js';
