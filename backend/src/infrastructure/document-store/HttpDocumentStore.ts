/**
 * HTTP Document Store
 *
 * `IDocumentStore` over the database REST API (`/_db/{db}/_api/...`).
 *
 * @module infrastructure/document-store/HttpDocumentStore
 */

import type { Logger } from 'pino';
import type { EngineHttpClient } from '@/services/engine/EngineHttpClient';
import { isRecord, readNumber, readString } from '@/services/engine/JobStatusAdapter';
import { ConfigError, EngineApiError } from '@/shared/errors';
import { createChildLogger } from '@/shared/utils/logger';
import type {
  AttributeEntry,
  CreateCollectionOptions,
  IDocumentStore,
  NamedGraphCollections,
} from './IDocumentStore';

const DEFAULT_WRITE_BATCH_SIZE = 1000;

// Database collection types
const DOCUMENT_COLLECTION = 2;
const EDGE_COLLECTION = 3;

export interface HttpDocumentStoreOptions {
  endpoint: string;
  database: string;
  http: EngineHttpClient;
  logger?: Logger;
}

function stringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

export class HttpDocumentStore implements IDocumentStore {
  readonly database: string;

  private readonly apiBase: string;
  private readonly http: EngineHttpClient;
  private readonly log: Logger;

  constructor(options: HttpDocumentStoreOptions) {
    this.database = options.database;
    this.apiBase = `${options.endpoint.replace(/\/+$/, '')}/_db/${encodeURIComponent(options.database)}/_api`;
    this.http = options.http;
    this.log = options.logger ?? createChildLogger({ service: 'HttpDocumentStore' });
  }

  async count(collection: string, signal?: AbortSignal): Promise<number> {
    const body = await this.http.get(`${this.collectionUrl(collection)}/count`, signal);
    return isRecord(body) ? readNumber(body, 'count') ?? 0 : 0;
  }

  async hasCollection(collection: string, signal?: AbortSignal): Promise<boolean> {
    try {
      await this.http.get(this.collectionUrl(collection), signal);
      return true;
    } catch (error) {
      if (error instanceof EngineApiError && error.notFound) {
        return false;
      }
      throw error;
    }
  }

  async createCollection(
    collection: string,
    options: CreateCollectionOptions = {},
    signal?: AbortSignal
  ): Promise<void> {
    try {
      await this.http.post(
        `${this.apiBase}/collection`,
        { name: collection, type: options.edge ? EDGE_COLLECTION : DOCUMENT_COLLECTION },
        signal
      );
      this.log.info({ collection, database: this.database }, 'Created collection');
    } catch (error) {
      // 409: duplicate name
      if (error instanceof EngineApiError && error.status === 409) {
        return;
      }
      throw error;
    }
  }

  async writeAttributes(
    collection: string,
    entries: readonly AttributeEntry[],
    options: { batchSize?: number } = {},
    signal?: AbortSignal
  ): Promise<number> {
    const batchSize = options.batchSize ?? DEFAULT_WRITE_BATCH_SIZE;
    if (batchSize < 1) {
      throw new ConfigError('batchSize must be at least 1');
    }

    let written = 0;
    for (let offset = 0; offset < entries.length; offset += batchSize) {
      const batch = entries.slice(offset, offset + batchSize).map((entry) => ({
        ...entry.attributes,
        _key: entry.key,
      }));
      const response = await this.http.patch(
        `${this.apiBase}/document/${encodeURIComponent(collection)}`,
        batch,
        signal
      );
      written += Array.isArray(response)
        ? response.filter((item) => !(isRecord(item) && item.error === true)).length
        : batch.length;
    }

    this.log.debug({ collection, written, total: entries.length }, 'Wrote attributes');
    return written;
  }

  async insertDocument(
    collection: string,
    document: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<string> {
    const body = await this.http.post(`${this.apiBase}/document/${encodeURIComponent(collection)}`, document, signal);
    const key = isRecord(body) ? readString(body, '_key') : undefined;
    if (!key) {
      throw new EngineApiError(200, `Insert into ${collection} returned no document key`);
    }
    return key;
  }

  async getNamedGraphCollections(graphName: string, signal?: AbortSignal): Promise<NamedGraphCollections> {
    const body = await this.http.get(`${this.apiBase}/gharial/${encodeURIComponent(graphName)}`, signal);
    const graph = isRecord(body) ? body.graph : undefined;
    if (!isRecord(graph)) {
      throw new EngineApiError(200, `Named graph ${graphName} has no definition`);
    }

    const vertices = new Set<string>();
    const edges: string[] = [];
    const definitions = Array.isArray(graph.edgeDefinitions) ? graph.edgeDefinitions : [];

    for (const definition of definitions) {
      if (!isRecord(definition)) continue;
      const edgeCollection = readString(definition, 'collection');
      if (edgeCollection && !edges.includes(edgeCollection)) edges.push(edgeCollection);
      for (const name of [...stringArray(definition.from), ...stringArray(definition.to)]) {
        vertices.add(name);
      }
    }
    for (const orphan of stringArray(graph.orphanCollections)) {
      vertices.add(orphan);
    }

    return { vertexCollections: [...vertices], edgeCollections: edges };
  }

  async sampleDocuments(
    collection: string,
    limit: number,
    signal?: AbortSignal
  ): Promise<Array<Record<string, unknown>>> {
    const body = await this.http.post(
      `${this.apiBase}/cursor`,
      {
        query: 'FOR doc IN @@collection LIMIT @limit RETURN doc',
        bindVars: { '@collection': collection, limit },
        batchSize: limit,
      },
      signal
    );
    const result = isRecord(body) && Array.isArray(body.result) ? body.result : [];
    return result.filter(isRecord);
  }

  private collectionUrl(collection: string): string {
    return `${this.apiBase}/collection/${encodeURIComponent(collection)}`;
  }
}
