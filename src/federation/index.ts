export * from './providers.js';
export * from './provider-client.js';
