export * from './random.js';
export * from './hash.js';
export * from './jwt.js';
export * from './encrypt.js';
