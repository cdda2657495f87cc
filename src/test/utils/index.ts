/**
 * Test utilities barrel export
 * SSOT for all test helper imports
 */

// Servers
export * from './testServerHelpers.js';
export * from './mockBackends.js';

// Stream utilities
export * from './streamHelpers.js';
export * from './sseUtils.js';
export * from './ndjsonUtils.js';
