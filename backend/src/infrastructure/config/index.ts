/**
 * Application configuration
 * @module infrastructure/config
 */
export * from './environment';
export * from './orchestrator.config';
export * from './pricing.config';
