/**
 * @module orchestrator
 */
export { createOrchestrator } from './createOrchestrator';
export type { Orchestrator, OrchestratorOptions } from './createOrchestrator';
export { buildManagedCredentialSource, buildDatabaseCredentialSource } from './credentialSources';
