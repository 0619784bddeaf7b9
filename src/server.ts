import { serve } from '@hono/node-server';
import { createAuthServer } from './app.js';
import { createMemoryStorage } from './storage/memory/index.js';
import { createDrizzleStorage } from './storage/drizzle/index.js';
import { getConfig } from './config/index.js';
import { createRootLogger, setLogger, createLogger } from './logging/logger.js';
import { REVOCATION_PRUNE_INTERVAL_MS } from './config/constants.js';
import type { IStorage } from './storage/interfaces/index.js';

// Load configuration
const config = getConfig();

const rootLogger = createRootLogger({
  level: config.logging.level,
  environment: config.server.nodeEnv,
});
setLogger(rootLogger);
const logger = createLogger('server', rootLogger);

// Create storage based on environment
let storage: IStorage;

if (config.database.url) {
  logger.info('using PostgreSQL storage');
  storage = createDrizzleStorage({
    url: config.database.url,
    encryptionKey: config.secrets.encryptionKey,
  });
} else {
  logger.warn('using in-memory storage (no DATABASE_URL configured); data is lost on restart');
  storage = createMemoryStorage();
}

const { app } = createAuthServer({
  storage,
  secrets: config.secrets,
  tokenTtlSeconds: config.tokens.ttlSeconds,
  oauth: {
    providers: config.oauth.providers,
    providerTimeoutMs: config.oauth.providerTimeoutMs,
    successRedirect: config.oauth.successRedirect,
    linkPolicy: config.oauth.linkPolicy,
  },
  logger: rootLogger,
  enableLogging: config.server.nodeEnv !== 'test',
  production: config.server.nodeEnv === 'production',
});

// Start server
const server = serve(
  {
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  },
  (info) => {
    logger.info(
      { address: info.address, port: info.port, providers: Object.keys(config.oauth.providers) },
      'auth server listening'
    );
  }
);

// Drop revocation entries whose tokens can no longer verify
const pruneTimer = setInterval(() => {
  storage.revocations
    .deleteExpired()
    .then((deleted) => {
      if (deleted > 0) {
        logger.debug({ deleted }, 'pruned expired revocations');
      }
    })
    .catch((err: unknown) => {
      logger.error({ err }, 'revocation pruning failed');
    });
}, REVOCATION_PRUNE_INTERVAL_MS);
pruneTimer.unref();

function shutdown(signal: string): void {
  logger.info({ signal }, 'shutting down');
  clearInterval(pruneTimer);
  server.close();
  storage
    .close()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logger.error({ err }, 'failed to close storage');
      process.exit(1);
    });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
