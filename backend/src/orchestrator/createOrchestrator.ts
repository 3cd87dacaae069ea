/**
 * Orchestrator composition root.
 *
 * Wires credentials, the engine connection for the configured deployment
 * mode, the optional document store and catalog, and the execution
 * components from a validated environment and tuning config.
 *
 * @module orchestrator/createOrchestrator
 */

import type { Logger } from 'pino';
import type {
  AnalysisRequest,
  BatchResult,
  DeploymentMode,
  ExecutionResult,
} from '@graph-orchestrator/shared';
import {
  describeEnvironment,
  findMissingSettings,
  getEnv,
  getOrchestratorConfig,
  type Environment,
  type OrchestratorConfig,
} from '@/infrastructure/config';
import { HttpDocumentStore, type IDocumentStore } from '@/infrastructure/document-store';
import { CredentialManager } from '@/services/auth';
import {
  EngineHttpClient,
  createEngineConnection,
  type EngineConnectionTarget,
  type IEngineConnection,
} from '@/services/engine';
import { estimateAnalysisCost, type CostEstimate } from '@/domains/billing';
import {
  DocumentStoreExecutionCatalog,
  type IExecutionCatalog,
} from '@/domains/catalog';
import {
  BatchRunner,
  EngineCleanupAuditor,
  ExecutionStateMachine,
  RetryPolicy,
  resolveAnalysisRequest,
  type AuditOptions,
  type AuditReport,
  type BatchOptions,
  type RequestDefaults,
  type RunOptions,
} from '@/domains/execution';
import { ConfigError } from '@/shared/errors';
import { createChildLogger } from '@/shared/utils/logger';
import { buildDatabaseCredentialSource, buildManagedCredentialSource } from './credentialSources';

const HOUR_MS = 60 * 60 * 1000;

export interface OrchestratorOptions {
  env?: Environment;
  config?: OrchestratorConfig;
  /** Replaces the catalog built from the environment */
  catalog?: IExecutionCatalog | null;
  logger?: Logger;
}

export interface Orchestrator {
  readonly deploymentMode: DeploymentMode;
  readonly connection: IEngineConnection;
  readonly credentials: CredentialManager;
  readonly documentStore: IDocumentStore | null;
  readonly catalog: IExecutionCatalog | null;
  readonly defaults: RequestDefaults;

  /** @throws ConfigError for invalid input */
  resolveRequest(input: unknown): AnalysisRequest;
  /** @throws ConfigError for invalid input; remote failures are reported in the result */
  runAnalysis(input: unknown, options?: RunOptions): Promise<ExecutionResult>;
  runBatch(inputs: readonly unknown[], options?: BatchOptions): Promise<BatchResult>;
  estimateCost(input: unknown, expectedMinutes?: number): CostEstimate;
  auditEngines(options?: AuditOptions): Promise<AuditReport>;
  /** Wait for pending catalog writes */
  flush(): Promise<void>;
}

function toTarget(env: Environment): EngineConnectionTarget {
  if (env.DEPLOYMENT_MODE === 'amp') {
    if (!env.GAE_DEPLOYMENT_URL) {
      throw new ConfigError('GAE_DEPLOYMENT_URL is required in amp mode', ['GAE_DEPLOYMENT_URL']);
    }
    return { mode: 'amp', deploymentUrl: env.GAE_DEPLOYMENT_URL, port: env.GAE_PORT };
  }
  if (!env.ARANGO_ENDPOINT) {
    throw new ConfigError('ARANGO_ENDPOINT is required in self_managed mode', ['ARANGO_ENDPOINT']);
  }
  return { mode: 'self_managed', endpoint: env.ARANGO_ENDPOINT };
}

/**
 * @throws ConfigError when the environment lacks what the deployment mode needs
 */
export function createOrchestrator(options: OrchestratorOptions = {}): Orchestrator {
  const env = options.env ?? getEnv();
  const config = options.config ?? getOrchestratorConfig();
  const log = options.logger ?? createChildLogger({ service: 'Orchestrator' });

  const missing = findMissingSettings(env);
  if (missing.length > 0) {
    throw new ConfigError(`Incomplete configuration: ${missing.join('; ')}`, missing);
  }

  const requestTimeoutMs = config.http.requestTimeoutMs;
  const credentialTiming = {
    lifetimeMs: config.credential.lifetimeHours * HOUR_MS,
    refreshMarginMs: config.credential.refreshThresholdHours * HOUR_MS,
  };

  const databaseCredentials = new CredentialManager({
    source: buildDatabaseCredentialSource(env, requestTimeoutMs),
    ...credentialTiming,
  });

  // Self-managed engines sit behind the database endpoint and share its login
  const credentials =
    env.DEPLOYMENT_MODE === 'amp'
      ? new CredentialManager({ source: buildManagedCredentialSource(env, requestTimeoutMs), ...credentialTiming })
      : databaseCredentials;

  const documentStore: IDocumentStore | null = env.ARANGO_ENDPOINT
    ? new HttpDocumentStore({
        endpoint: env.ARANGO_ENDPOINT,
        database: env.ARANGO_DATABASE,
        http: new EngineHttpClient({ credentials: databaseCredentials, requestTimeoutMs }),
      })
    : null;

  const connection = createEngineConnection({
    target: toTarget(env),
    http: new EngineHttpClient({ credentials, requestTimeoutMs }),
    readiness: {
      readyTimeoutMs: config.engine.readyTimeoutMs,
      readyProbeIntervalMs: config.engine.readyProbeIntervalMs,
    },
    defaultDatabase: env.ARANGO_DATABASE,
    documentStore,
  });

  let catalog: IExecutionCatalog | null = null;
  if (options.catalog !== undefined) {
    catalog = options.catalog;
  } else if (env.CATALOG_ENABLED && documentStore) {
    catalog = new DocumentStoreExecutionCatalog({ store: documentStore, collection: env.CATALOG_COLLECTION });
  }

  const defaults: RequestDefaults = {
    engineSize: config.engine.defaultSize,
    timeoutMs: config.polling.defaultJobTimeoutMs,
    database: env.ARANGO_DATABASE,
  };

  const stateMachine = new ExecutionStateMachine({
    connection,
    credentials,
    retryPolicy: new RetryPolicy({ config: config.retry }),
    pollIntervalMs: config.polling.intervalMs,
    resultVerification: {
      timeoutMs: config.results.verifyTimeoutMs,
      intervalMs: config.results.verifyIntervalMs,
    },
    documentStore,
    catalog,
    defaultDatabase: env.ARANGO_DATABASE,
  });
  const batchRunner = new BatchRunner({ stateMachine, defaults });
  const auditor = new EngineCleanupAuditor({ connection });

  log.info({ ...describeEnvironment(env), catalog: catalog !== null }, 'Orchestrator configured');

  const resolveRequest = (input: unknown): AnalysisRequest => resolveAnalysisRequest(input, defaults);

  return {
    deploymentMode: connection.deploymentMode,
    connection,
    credentials,
    documentStore,
    catalog,
    defaults,
    resolveRequest,
    runAnalysis: async (input, runOptions) => stateMachine.run(resolveRequest(input), runOptions),
    runBatch: (inputs, batchOptions) => batchRunner.runBatch(inputs, batchOptions),
    estimateCost: (input, expectedMinutes = 15) =>
      estimateAnalysisCost(resolveRequest(input), expectedMinutes, {
        metered: connection.capabilities.meteredBilling,
      }),
    auditEngines: (auditOptions) => auditor.audit(auditOptions),
    flush: () => stateMachine.flushCatalog(),
  };
}
