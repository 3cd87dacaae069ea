/**
 * Engine connections
 * @module services/engine
 */
export type { IEngineConnection, DiscoverOptions } from './IEngineConnection';
export { EngineHttpClient } from './EngineHttpClient';
export type { EngineHttpClientOptions, HttpMethod } from './EngineHttpClient';
export {
  JobStatusAdapter,
  managedJobStatusAdapter,
  selfManagedJobStatusAdapter,
  mapJobState,
} from './JobStatusAdapter';
export { BaseEngineConnection, DEFAULT_STORE_SETTINGS } from './BaseEngineConnection';
export type { StoreSettings, EngineReadinessSettings } from './BaseEngineConnection';
export { ManagedEngineConnection } from './ManagedEngineConnection';
export { SelfManagedEngineConnection, serviceShortId } from './SelfManagedEngineConnection';
export { createEngineConnection } from './createEngineConnection';
export type { EngineConnectionTarget, EngineConnectionFactoryOptions } from './createEngineConnection';
