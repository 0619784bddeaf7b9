export * from './token-service.js';
export * from './identity-resolver.js';
export * from './oauth-flow.js';
export * from './local-auth.js';
