/**
 * Execution catalog
 * @module domains/catalog
 */
export type { IExecutionCatalog } from './IExecutionCatalog';
export { buildExecutionRecord, type RecordContext } from './buildExecutionRecord';
export {
  DocumentStoreExecutionCatalog,
  type DocumentStoreExecutionCatalogDependencies,
} from './DocumentStoreExecutionCatalog';
export { InMemoryExecutionCatalog } from './InMemoryExecutionCatalog';
