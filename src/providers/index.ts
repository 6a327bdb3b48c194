/**
 * Provider binding exports
 */

export * from './facebook/index.js';
export * from './github/index.js';
