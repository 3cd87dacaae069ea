/**
 * Shared module exports
 * Cross-cutting concerns used across all domains
 *
 * @module shared
 */

// Error taxonomy
export * from './errors';

// Logger and abortable timers
export * from './utils';
