/**
 * Sink for execution-history records. Storage and querying live outside
 * the orchestrator.
 *
 * @module domains/catalog/IExecutionCatalog
 */

import type { ExecutionRecord } from '@graph-orchestrator/shared';

export interface IExecutionCatalog {
  recordExecution(record: ExecutionRecord): Promise<void>;
}
