/**
 * Secret Resolver Observability
 *
 * Exports for metrics and logging.
 */

export * from './metrics.js';
export * from './logging.js';
