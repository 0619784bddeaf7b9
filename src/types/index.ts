// Identity types
export * from './identity.js';

// Token types
export * from './token.js';

// OAuth provider types
export * from './oauth.js';

// Hono context types
export * from './hono.js';
