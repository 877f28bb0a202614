/**
 * orgview - cached read-only queries over an AWS organization hierarchy
 *
 * Main entry point for the library exports.
 */

// View
export * from './view.js';

// Hierarchy
export * from './hierarchy/types.js';
export * from './hierarchy/client.js';
export * from './hierarchy/ancestry.js';
export * from './hierarchy/builder.js';
export * from './hierarchy/result.js';

// Providers
export * from './provider/types.js';
export * from './provider/organizations.js';
export * from './provider/supplier.js';

// Cache
export * from './cache/ttl-cache.js';

// Configuration exports
export * from './config/schema.js';
export * from './config/config.js';

// Logging exports
export * from './logging/logger.js';

// Version info
export const VERSION = '0.1.0';
