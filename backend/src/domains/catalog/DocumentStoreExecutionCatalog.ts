/**
 * Document Store Execution Catalog
 *
 * Appends one document per execution to a configurable collection,
 * creating the collection on first use.
 *
 * @module domains/catalog/DocumentStoreExecutionCatalog
 */

import type { Logger } from 'pino';
import type { ExecutionRecord } from '@graph-orchestrator/shared';
import type { IDocumentStore } from '@/infrastructure/document-store';
import { createChildLogger } from '@/shared/utils/logger';
import type { IExecutionCatalog } from './IExecutionCatalog';

export interface DocumentStoreExecutionCatalogDependencies {
  store: IDocumentStore;
  collection: string;
  logger?: Logger;
}

export class DocumentStoreExecutionCatalog implements IExecutionCatalog {
  private readonly store: IDocumentStore;
  private readonly collection: string;
  private readonly log: Logger;
  private collectionReady: Promise<void> | null = null;

  constructor(deps: DocumentStoreExecutionCatalogDependencies) {
    this.store = deps.store;
    this.collection = deps.collection;
    this.log = deps.logger ?? createChildLogger({ service: 'ExecutionCatalog' });
  }

  async recordExecution(record: ExecutionRecord): Promise<void> {
    await this.ensureCollection();
    const key = await this.store.insertDocument(this.collection, {
      _key: record.executionId,
      ...record,
    });
    this.log.info(
      { executionId: record.executionId, collection: this.collection, key, status: record.status },
      'Execution recorded'
    );
  }

  private ensureCollection(): Promise<void> {
    if (!this.collectionReady) {
      this.collectionReady = this.store.createCollection(this.collection).catch((error: unknown) => {
        this.collectionReady = null;
        throw error;
      });
    }
    return this.collectionReady;
  }
}
