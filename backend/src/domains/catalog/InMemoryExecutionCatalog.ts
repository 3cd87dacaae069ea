/**
 * Catalog that keeps records in memory. Used when no document store is
 * configured and by tests.
 *
 * @module domains/catalog/InMemoryExecutionCatalog
 */

import type { ExecutionRecord } from '@graph-orchestrator/shared';
import type { IExecutionCatalog } from './IExecutionCatalog';

export class InMemoryExecutionCatalog implements IExecutionCatalog {
  private readonly records: ExecutionRecord[] = [];

  async recordExecution(record: ExecutionRecord): Promise<void> {
    this.records.push(record);
  }

  list(): readonly ExecutionRecord[] {
    return this.records;
  }

  find(executionId: string): ExecutionRecord | undefined {
    return this.records.find((record) => record.executionId === executionId);
  }
}
