/**
 * Engine connection factory.
 *
 * @module services/engine/createEngineConnection
 */

import type { IDocumentStore } from '@/infrastructure/document-store';
import type { EngineReadinessSettings, StoreSettings } from './BaseEngineConnection';
import type { EngineHttpClient } from './EngineHttpClient';
import type { IEngineConnection } from './IEngineConnection';
import { ManagedEngineConnection } from './ManagedEngineConnection';
import { SelfManagedEngineConnection } from './SelfManagedEngineConnection';

export type EngineConnectionTarget =
  | { mode: 'amp'; deploymentUrl: string; port: number }
  | { mode: 'self_managed'; endpoint: string };

export interface EngineConnectionFactoryOptions {
  target: EngineConnectionTarget;
  http: EngineHttpClient;
  readiness: EngineReadinessSettings;
  defaultDatabase: string;
  documentStore?: IDocumentStore | null;
  store?: StoreSettings;
  clock?: () => number;
}

/**
 * Build the connection for the configured deployment mode.
 */
export function createEngineConnection(options: EngineConnectionFactoryOptions): IEngineConnection {
  const { target, ...shared } = options;

  switch (target.mode) {
    case 'amp':
      return new ManagedEngineConnection({
        ...shared,
        deploymentUrl: target.deploymentUrl,
        port: target.port,
      });
    case 'self_managed':
      return new SelfManagedEngineConnection({
        ...shared,
        endpoint: target.endpoint,
      });
  }
}
