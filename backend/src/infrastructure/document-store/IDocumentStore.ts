/**
 * Document store contract used for named-graph lookup, result counts and
 * the execution catalog.
 *
 * @module infrastructure/document-store/IDocumentStore
 */

export interface NamedGraphCollections {
  vertexCollections: string[];
  edgeCollections: string[];
}

export interface AttributeEntry {
  /** Document key */
  key: string;
  attributes: Record<string, unknown>;
}

export interface CreateCollectionOptions {
  edge?: boolean;
}

export interface IDocumentStore {
  readonly database: string;

  count(collection: string, signal?: AbortSignal): Promise<number>;

  hasCollection(collection: string, signal?: AbortSignal): Promise<boolean>;

  /** No-op when the collection already exists. */
  createCollection(collection: string, options?: CreateCollectionOptions, signal?: AbortSignal): Promise<void>;

  /**
   * Merge attributes into existing documents, in batches.
   *
   * @returns Number of documents updated
   */
  writeAttributes(
    collection: string,
    entries: readonly AttributeEntry[],
    options?: { batchSize?: number },
    signal?: AbortSignal
  ): Promise<number>;

  /**
   * @returns Key of the inserted document
   */
  insertDocument(collection: string, document: Record<string, unknown>, signal?: AbortSignal): Promise<string>;

  getNamedGraphCollections(graphName: string, signal?: AbortSignal): Promise<NamedGraphCollections>;

  /** Up to `limit` documents from the collection, in store order. */
  sampleDocuments(collection: string, limit: number, signal?: AbortSignal): Promise<Array<Record<string, unknown>>>;
}
