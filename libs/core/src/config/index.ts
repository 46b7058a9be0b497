/**
 * Configuration utilities
 */

export * from './defaults';
export * from './schema';
export * from './loader';
