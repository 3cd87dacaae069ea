/**
 * Shared utility functions
 * @module shared/utils
 */
export * from './logger';
export * from './sleep';
