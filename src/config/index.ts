/**
 * Config module - environment schema and resolved runtime configuration
 */

export * from './env-schema.js';
export * from './detector-config.js';
