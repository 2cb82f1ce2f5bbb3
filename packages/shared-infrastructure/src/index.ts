/**
 * @spatial-audio/shared-infrastructure
 *
 * Env parsing and content hashing utilities used across the pipeline packages.
 */
export * from './env/loaders.js';
export * from './hash.js';
