/**
 * Infrastructure layer exports
 * Configuration and the document store
 *
 * @module infrastructure
 */

// Environment, tuning and pricing
export * from './config';

// Database REST API
export * from './document-store';
