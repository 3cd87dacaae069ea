/**
 * @graph-orchestrator/backend
 *
 * Lifecycle orchestration for graph-algorithm jobs on remote analytics
 * engines.
 *
 * @module backend
 *
 * @example
 * ```typescript
 * import { createOrchestrator } from '@graph-orchestrator/backend';
 *
 * const orchestrator = createOrchestrator();
 * const result = await orchestrator.runAnalysis({
 *   name: 'rank customers',
 *   algorithm: 'pagerank',
 *   vertexCollections: ['customers'],
 *   edgeCollections: ['purchases'],
 * });
 * await orchestrator.flush();
 * ```
 */

export * from './orchestrator';
export * from './domains/execution';
export * from './domains/billing';
export * from './domains/catalog';
export * from './services/auth';
export * from './services/engine';
export * from './infrastructure';
export * from './shared';
