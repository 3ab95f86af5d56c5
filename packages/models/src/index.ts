export * from './enums/oauth.js';
export * from './types/index.js';
