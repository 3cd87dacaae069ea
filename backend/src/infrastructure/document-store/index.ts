/**
 * @module infrastructure/document-store
 */
export type {
  IDocumentStore,
  NamedGraphCollections,
  AttributeEntry,
  CreateCollectionOptions,
} from './IDocumentStore';
export { HttpDocumentStore } from './HttpDocumentStore';
export type { HttpDocumentStoreOptions } from './HttpDocumentStore';
