import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { AuthVariables } from './types/hono.js';
import type { IStorage } from './storage/interfaces/index.js';
import type { LinkPolicy } from './config/index.js';
import type { ICredentialHasher } from './crypto/hash.js';
import type { IProviderClient } from './federation/provider-client.js';
import type { ProviderCredentialsMap, ProviderRegistry } from './federation/providers.js';
import { ScryptCredentialHasher } from './crypto/hash.js';
import { FetchProviderClient } from './federation/provider-client.js';
import { TokenService } from './services/token-service.js';
import { IdentityResolver } from './services/identity-resolver.js';
import { OAuthFlowService } from './services/oauth-flow.js';
import { LocalAuthService } from './services/local-auth.js';
import { authErrorHandler, securityHeaders } from './middleware/error-handler.js';
import { requestLogger, createLogger, type Logger } from './logging/logger.js';
import { createAuthRoutes } from './routes/auth/index.js';

export interface AuthServerOptions {
  storage: IStorage;
  secrets: {
    jwtSecretKey: string;
    sessionSecret: string;
  };
  tokenTtlSeconds?: number;
  oauth?: {
    providers?: ProviderCredentialsMap;
    registry?: ProviderRegistry;
    providerClient?: IProviderClient;
    providerTimeoutMs?: number;
    successRedirect?: string;
    linkPolicy?: LinkPolicy;
  };
  hasher?: ICredentialHasher;
  now?: () => Date;
  logger?: Logger;
  enableCors?: boolean;
  enableLogging?: boolean;
  production?: boolean;
}

/**
 * Services wired by `createAuthServer`, exposed for the entry point and tests
 */
export interface AuthServices {
  tokens: TokenService;
  resolver: IdentityResolver;
  flow: OAuthFlowService;
  localAuth: LocalAuthService;
}

/**
 * Create the authentication HTTP application
 */
export function createAuthServer(options: AuthServerOptions): {
  app: Hono<{ Variables: AuthVariables }>;
  services: AuthServices;
} {
  const {
    storage,
    secrets,
    tokenTtlSeconds,
    oauth = {},
    hasher = new ScryptCredentialHasher(),
    now,
    logger = createLogger('app'),
    enableCors = true,
    enableLogging = true,
    production = false,
  } = options;

  const tokens = new TokenService({
    secret: secrets.jwtSecretKey,
    ttlSeconds: tokenTtlSeconds,
    revocations: storage.revocations,
    now,
  });

  const resolver = new IdentityResolver({
    identities: storage.identities,
    linkPolicy: oauth.linkPolicy,
    logger: logger.child({ component: 'identity-resolver' }),
  });

  const flow = new OAuthFlowService({
    credentials: oauth.providers ?? {},
    registry: oauth.registry,
    providerClient:
      oauth.providerClient ??
      new FetchProviderClient({
        timeoutMs: oauth.providerTimeoutMs,
        logger: logger.child({ component: 'provider-client' }),
      }),
    resolver,
    tokens,
    identities: storage.identities,
    logger: logger.child({ component: 'oauth-flow' }),
  });

  const localAuth = new LocalAuthService({
    identities: storage.identities,
    hasher,
    tokens,
    logger: logger.child({ component: 'local-auth' }),
  });

  const app = new Hono<{ Variables: AuthVariables }>();

  // Global error handler
  app.onError(
    authErrorHandler({
      logger: logger.child({ component: 'http' }),
      exposeInternalErrors: !production,
    })
  );

  // Security headers
  app.use('*', securityHeaders({ production }));

  // Logging
  if (enableLogging) {
    app.use('*', requestLogger(logger.child({ component: 'http' })));
  }

  // CORS (token endpoints called from SPAs)
  if (enableCors) {
    app.use(
      '/auth/*',
      cors({
        origin: '*',
        allowMethods: ['GET', 'POST', 'OPTIONS'],
        allowHeaders: ['Authorization', 'Content-Type'],
        exposeHeaders: ['WWW-Authenticate'],
        maxAge: 86400,
      })
    );
  }

  // Health check
  app.get('/health', (c) => c.json({ status: 'ok' }));

  app.route(
    '/auth',
    createAuthRoutes({
      localAuth,
      tokens,
      identities: storage.identities,
      flow,
      sessionSecret: secrets.sessionSecret,
      successRedirect: oauth.successRedirect,
      secureCookies: production,
      now,
    })
  );

  return { app, services: { tokens, resolver, flow, localAuth } };
}
