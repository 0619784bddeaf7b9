// Library exports; `server.ts` is the runnable entry point
export { createAuthServer, type AuthServerOptions, type AuthServices } from './app.js';
export { createMemoryStorage } from './storage/memory/index.js';
export { createDrizzleStorage, closeDatabase } from './storage/drizzle/index.js';
export * from './types/index.js';
export * from './storage/interfaces/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './crypto/index.js';
export * from './federation/index.js';
export * from './services/index.js';
export { bearerAuth, extractBearerToken } from './middleware/bearer-auth.js';
export { authErrorHandler, securityHeaders } from './middleware/error-handler.js';
export { createRootLogger, createLogger, getLogger, setLogger, requestLogger } from './logging/logger.js';
