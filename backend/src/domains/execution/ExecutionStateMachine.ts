/**
 * Execution State Machine
 *
 * Drives one analysis request through
 * `init -> credential_ready -> engine_ready -> graph_loaded ->
 * algorithm_running -> results_stored -> cleaned`, tearing the engine down
 * exactly once on every exit path.
 *
 * After storage the target collection is polled until results show up, and
 * requests that ask for it get their stored documents sanity-checked.
 *
 * `run()` never throws for remote failures: every error is classified
 * into the returned `ExecutionResult`. Teardown failures are reported as
 * `cleanupError` and never change the primary status.
 *
 * @module domains/execution/ExecutionStateMachine
 */

import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import type {
  AnalysisRequest,
  ClassifiedError,
  EngineHandle,
  ExecutionPhase,
  ExecutionResult,
  ExecutionStatus,
  JobHandle,
  PhaseTransition,
} from '@graph-orchestrator/shared';
import type { EngineHourlyRates } from '@/infrastructure/config';
import type { IDocumentStore } from '@/infrastructure/document-store';
import type { CredentialManager } from '@/services/auth';
import type { IEngineConnection } from '@/services/engine';
import { estimateEngineCost } from '@/domains/billing';
import { buildExecutionRecord, type IExecutionCatalog } from '@/domains/catalog';
import {
  CancelledError,
  CleanupError,
  ResultValidationError,
  classifyError,
  errorMessage,
} from '@/shared/errors';
import { createChildLogger } from '@/shared/utils/logger';
import { sleep, throwIfAborted } from '@/shared/utils/sleep';
import { assertTransition, isAbortTransition } from './executionPhases';
import { isJobSucceeded, pollUntilTerminal } from './JobPoller';
import { RESULT_SAMPLE_SIZE, validateStoredResults } from './ResultValidator';
import type { RetryPolicy } from './RetryPolicy';

export interface ResultVerificationOptions {
  /** Give up waiting for a non-empty target collection after this long */
  timeoutMs: number;
  intervalMs: number;
}

const DEFAULT_RESULT_VERIFICATION: ResultVerificationOptions = {
  timeoutMs: 60_000,
  intervalMs: 2_000,
};

export interface ExecutionStateMachineDependencies {
  connection: IEngineConnection;
  credentials: Pick<CredentialManager, 'getCredential'>;
  retryPolicy: RetryPolicy;
  pollIntervalMs: number;
  resultVerification?: ResultVerificationOptions;
  /** Used for result counts, validation and target-collection creation */
  documentStore?: IDocumentStore | null;
  catalog?: IExecutionCatalog | null;
  /** Database recorded in the catalog when the request names none */
  defaultDatabase?: string;
  rates?: EngineHourlyRates;
  clock?: () => number;
  generateId?: () => string;
  logger?: Logger;
}

export interface RunOptions {
  signal?: AbortSignal;
}

/**
 * Mutable bookkeeping for one run. Never shared between runs.
 */
interface RunState {
  phase: ExecutionPhase;
  history: PhaseTransition[];
  engine: EngineHandle | null;
  /** Engines from abandoned provisioning attempts whose teardown failed */
  pendingTeardown: EngineHandle[];
  jobs: JobHandle[];
  graphId: string | null;
  vertexCount: number | null;
  edgeCount: number | null;
  documentsWritten: number;
  algorithmFinished: boolean;
  warnings: string[];
  attempts: Record<string, number>;
}

export class ExecutionStateMachine {
  private readonly connection: IEngineConnection;
  private readonly credentials: Pick<CredentialManager, 'getCredential'>;
  private readonly retryPolicy: RetryPolicy;
  private readonly pollIntervalMs: number;
  private readonly resultVerification: ResultVerificationOptions;
  private readonly documentStore: IDocumentStore | null;
  private readonly catalog: IExecutionCatalog | null;
  private readonly defaultDatabase?: string;
  private readonly rates?: EngineHourlyRates;
  private readonly clock: () => number;
  private readonly generateId: () => string;
  private readonly log: Logger;

  // Catalog writes still in flight (fire-and-forget)
  private readonly pendingRecords = new Set<Promise<void>>();

  constructor(deps: ExecutionStateMachineDependencies) {
    this.connection = deps.connection;
    this.credentials = deps.credentials;
    this.retryPolicy = deps.retryPolicy;
    this.pollIntervalMs = deps.pollIntervalMs;
    this.resultVerification = deps.resultVerification ?? DEFAULT_RESULT_VERIFICATION;
    this.documentStore = deps.documentStore ?? null;
    this.catalog = deps.catalog ?? null;
    this.defaultDatabase = deps.defaultDatabase;
    this.rates = deps.rates;
    this.clock = deps.clock ?? Date.now;
    this.generateId = deps.generateId ?? uuidv4;
    this.log = deps.logger ?? createChildLogger({ service: 'ExecutionStateMachine' });
  }

  async run(request: AnalysisRequest, options: RunOptions = {}): Promise<ExecutionResult> {
    const { signal } = options;
    const executionId = this.generateId();
    const startedAt = this.clock();
    const log = this.log.child({ executionId, request: request.name });

    const state: RunState = {
      phase: 'init',
      history: [],
      engine: null,
      pendingTeardown: [],
      jobs: [],
      graphId: null,
      vertexCount: null,
      edgeCount: null,
      documentsWritten: 0,
      algorithmFinished: false,
      warnings: [],
      attempts: {},
    };

    log.info({ algorithm: request.algorithm, engineSize: request.engineSize }, 'Execution started');

    let failure: unknown = null;
    let cleanupError: ClassifiedError | null = null;
    let phaseReached: ExecutionPhase = state.phase;

    try {
      await this.execute(request, state, log, signal);
    } catch (error) {
      failure = error;
      log.error({ phase: state.phase, error: errorMessage(error) }, 'Execution failed');
    } finally {
      phaseReached = state.phase;
      cleanupError = await this.cleanup(state, log);
      this.transition(state, 'cleaned', log);
    }

    const finishedAt = this.clock();
    const engine = state.engine;
    const engineUptimeSeconds = engine ? Math.max(0, (finishedAt - engine.createdAt) / 1000) : 0;
    const estimatedCostUsd = engine
      ? estimateEngineCost(engine.size, engineUptimeSeconds, {
          metered: this.connection.capabilities.meteredBilling,
          rates: this.rates,
        })
      : 0;

    const result: ExecutionResult = {
      executionId,
      requestName: request.name,
      algorithm: request.algorithm,
      status: this.resolveStatus(failure, state, signal),
      phase: phaseReached,
      phaseHistory: state.history,
      engine,
      jobs: state.jobs,
      graphId: state.graphId,
      vertexCount: state.vertexCount,
      edgeCount: state.edgeCount,
      documentsWritten: state.documentsWritten,
      startedAt: new Date(startedAt).toISOString(),
      finishedAt: new Date(finishedAt).toISOString(),
      elapsedMs: finishedAt - startedAt,
      engineUptimeSeconds,
      estimatedCostUsd,
      error: failure === null ? null : classifyError(failure),
      cleanupError,
      warnings: state.warnings,
      attempts: state.attempts,
    };

    log.info(
      {
        status: result.status,
        phase: result.phase,
        elapsedMs: result.elapsedMs,
        estimatedCostUsd,
        documentsWritten: result.documentsWritten,
      },
      'Execution finished'
    );

    this.emitRecord(result, request, log);
    return result;
  }

  /**
   * Wait for every catalog write started so far. Failures were already logged.
   */
  async flushCatalog(): Promise<void> {
    await Promise.all([...this.pendingRecords]);
  }

  private async execute(
    request: AnalysisRequest,
    state: RunState,
    log: Logger,
    signal?: AbortSignal
  ): Promise<void> {
    // Credential
    await this.withRetry(state, 'credential', () => this.credentials.getCredential(signal), log, signal);
    this.transition(state, 'credential_ready', log, signal);

    // Engine
    const engine = await this.withRetry(
      state,
      'provision',
      async () => {
        const previous = state.engine;
        if (previous) {
          // A handle captured by an earlier attempt must not be orphaned
          state.engine = null;
          await this.releaseAbandonedEngine(state, previous, log);
        }
        return this.connection.discoverOrProvision(request.engineSize, {
          exclusive: request.exclusiveEngine,
          signal,
          onHandle: (handle) => {
            state.engine = handle;
          },
        });
      },
      log,
      signal
    );
    state.engine = engine;
    if (engine.reused) {
      state.warnings.push(`Reused running engine ${engine.id}; it is torn down when this execution ends`);
    }
    this.transition(state, 'engine_ready', log, signal, { engineId: engine.id, reused: engine.reused });

    // Graph
    const loadJob = await this.withRetry(
      state,
      'load',
      () => this.connection.loadGraph(engine, request, signal),
      log,
      signal
    );
    const loaded = await this.awaitJob(state, engine, loadJob, request, log, signal);
    const graphId = loaded.graphId ?? loadJob.graphId ?? loaded.id;
    state.graphId = graphId;
    await this.readGraphDetails(state, engine, graphId, log, signal);
    this.transition(state, 'graph_loaded', log, signal, { graphId });

    // Algorithm
    const algorithmJob = await this.withRetry(
      state,
      'algorithm',
      () => this.connection.runAlgorithm(engine, request, graphId, signal),
      log,
      signal
    );
    this.transition(state, 'algorithm_running', log, signal, { jobId: algorithmJob.id });
    const finished = await this.awaitJob(state, engine, algorithmJob, request, log, signal);
    state.algorithmFinished = true;

    // Results
    await this.prepareTargetCollection(request, log, signal);
    const storeJob = await this.withRetry(
      state,
      'store',
      () => this.connection.storeResults(engine, request, [finished.id], signal),
      log,
      signal
    );
    const stored = await this.awaitJob(state, engine, storeJob, request, log, signal);
    state.documentsWritten = await this.verifyStoredResults(stored, request, state, log, signal);
    this.transition(state, 'results_stored', log, signal, { documentsWritten: state.documentsWritten });

    if (request.validateResults) {
      await this.validateResults(request, state, log, signal);
    }
  }

  private async withRetry<T>(
    state: RunState,
    label: string,
    operation: () => Promise<T>,
    log: Logger,
    signal?: AbortSignal
  ): Promise<T> {
    const { value, attempts } = await this.retryPolicy.execute(label, operation, {
      signal,
      context: { phase: state.phase },
    });
    if (attempts > 1) {
      state.attempts[label] = (state.attempts[label] ?? 0) + attempts;
      log.info({ label, attempts }, 'Operation succeeded after retries');
    }
    return value;
  }

  /**
   * Poll a submitted job to completion, keeping the latest snapshot in
   * `state.jobs`.
   */
  private async awaitJob(
    state: RunState,
    engine: EngineHandle,
    submitted: JobHandle,
    request: AnalysisRequest,
    log: Logger,
    signal?: AbortSignal
  ): Promise<JobHandle> {
    this.recordJob(state, submitted);
    if (isJobSucceeded(submitted)) {
      return submitted;
    }

    const { job, polls } = await pollUntilTerminal(
      () =>
        this.withRetry(
          state,
          `poll:${submitted.kind}`,
          () => this.connection.getJob(engine, submitted.id, submitted.kind, signal),
          log,
          signal
        ),
      {
        intervalMs: this.pollIntervalMs,
        timeoutMs: request.timeoutMs,
        signal,
        clock: this.clock,
        onSnapshot: (snapshot, poll) => {
          this.recordJob(state, snapshot);
          log.debug(
            { jobId: snapshot.id, kind: snapshot.kind, status: snapshot.status, progress: snapshot.progress, poll },
            'Job status'
          );
        },
      }
    );

    log.info({ jobId: job.id, kind: job.kind, polls }, 'Job completed');
    return job;
  }

  private recordJob(state: RunState, job: JobHandle): void {
    const index = state.jobs.findIndex((existing) => existing.id === job.id && existing.kind === job.kind);
    if (index === -1) {
      state.jobs.push(job);
    } else {
      state.jobs[index] = job;
    }
  }

  private async readGraphDetails(
    state: RunState,
    engine: EngineHandle,
    graphId: string,
    log: Logger,
    signal?: AbortSignal
  ): Promise<void> {
    try {
      const graph = await this.connection.getGraph(engine, graphId, signal);
      state.vertexCount = graph.vertexCount ?? null;
      state.edgeCount = graph.edgeCount ?? null;
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      log.warn({ graphId, error: errorMessage(error) }, 'Could not read graph details');
    }
  }

  /**
   * Create the target collection when a document store is configured and
   * the collection is missing. Failures are left to the store job.
   */
  private async prepareTargetCollection(request: AnalysisRequest, log: Logger, signal?: AbortSignal): Promise<void> {
    const store = this.documentStore;
    if (!store) return;

    try {
      if (!(await store.hasCollection(request.targetCollection, signal))) {
        await store.createCollection(request.targetCollection, {}, signal);
        log.info({ collection: request.targetCollection }, 'Target collection created');
      }
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      log.warn({ collection: request.targetCollection, error: errorMessage(error) }, 'Could not prepare target collection');
    }
  }

  /**
   * Number of stored documents. A positive count from the store job wins;
   * otherwise the target collection is polled until it is non-empty or the
   * verification window closes, which leaves a warning and a count of 0.
   */
  private async verifyStoredResults(
    stored: JobHandle,
    request: AnalysisRequest,
    state: RunState,
    log: Logger,
    signal?: AbortSignal
  ): Promise<number> {
    if (stored.resultCount !== undefined && stored.resultCount > 0) {
      return stored.resultCount;
    }
    const store = this.documentStore;
    if (!store) return stored.resultCount ?? 0;

    const collection = request.targetCollection;
    const { timeoutMs, intervalMs } = this.resultVerification;
    const startedAt = this.clock();
    let checks = 0;

    for (;;) {
      checks++;
      try {
        const count = await store.count(collection, signal);
        if (count > 0) {
          log.info({ collection, count, checks }, 'Stored results verified');
          return count;
        }
      } catch (error) {
        if (error instanceof CancelledError) throw error;
        log.warn({ collection, error: errorMessage(error) }, 'Result verification check failed');
      }

      const elapsed = this.clock() - startedAt;
      if (elapsed >= timeoutMs) break;
      await sleep(Math.min(intervalMs, timeoutMs - elapsed), signal);
    }

    state.warnings.push(`Results not verified after ${timeoutMs}ms; ${collection} is still empty`);
    log.warn({ collection, timeoutMs, checks }, 'Stored results not verified');
    return 0;
  }

  /**
   * Sample the target collection and check it against the request.
   *
   * @throws ResultValidationError when a sample fails a check
   */
  private async validateResults(
    request: AnalysisRequest,
    state: RunState,
    log: Logger,
    signal?: AbortSignal
  ): Promise<void> {
    const store = this.documentStore;
    if (!store) {
      state.warnings.push('Result validation skipped: no document store is configured');
      return;
    }
    if (state.documentsWritten === 0) {
      log.info({ collection: request.targetCollection }, 'Result validation skipped; nothing was stored');
      return;
    }

    const samples = await this.withRetry(
      state,
      'validate',
      () => store.sampleDocuments(request.targetCollection, RESULT_SAMPLE_SIZE, signal),
      log,
      signal
    );
    const { issues, warnings } = validateStoredResults(samples, request);
    state.warnings.push(...warnings);

    if (issues.length > 0) {
      throw new ResultValidationError(issues, { details: { collection: request.targetCollection } });
    }
    log.info({ collection: request.targetCollection, samples: samples.length }, 'Stored results validated');
  }

  /**
   * Stop an engine left behind by a failed provisioning attempt. A failure
   * here never fails the attempt; the engine is retried during cleanup.
   */
  private async releaseAbandonedEngine(state: RunState, engine: EngineHandle, log: Logger): Promise<void> {
    try {
      await this.teardownEngine(engine, log);
    } catch (error) {
      state.pendingTeardown.push(engine);
      log.warn({ engineId: engine.id, error: errorMessage(error) }, 'Deferred teardown of abandoned engine');
    }
  }

  /**
   * Tear down every engine this run acquired: abandoned ones first, then
   * the current one. Runs once per execution and is not bound to the
   * caller's signal. Returns the first failure.
   */
  private async cleanup(state: RunState, log: Logger): Promise<ClassifiedError | null> {
    let firstFailure: ClassifiedError | null = null;

    const abandoned = state.pendingTeardown.splice(0);
    for (const engine of abandoned) {
      const outcome = await this.stopForCleanup(state, engine, log);
      firstFailure = firstFailure ?? outcome.error;
    }

    const engine = state.engine;
    if (engine) {
      const outcome = await this.stopForCleanup(state, engine, log);
      if (outcome.stopped) {
        state.engine = outcome.stopped;
      }
      firstFailure = firstFailure ?? outcome.error;
    }

    return firstFailure;
  }

  private async stopForCleanup(
    state: RunState,
    engine: EngineHandle,
    log: Logger
  ): Promise<{ stopped: EngineHandle | null; error: ClassifiedError | null }> {
    try {
      return { stopped: await this.teardownEngine(engine, log), error: null };
    } catch (error) {
      const cleanupFailure = new CleanupError(
        engine.id,
        `Failed to stop engine ${engine.id}: ${errorMessage(error)}`,
        { cause: error }
      );
      state.warnings.push(`Engine ${engine.id} may still be running; stop it manually`);
      log.error({ engineId: engine.id, error: errorMessage(error) }, 'Engine teardown failed');
      return { stopped: null, error: classifyError(cleanupFailure) };
    }
  }

  private async teardownEngine(engine: EngineHandle, log: Logger): Promise<EngineHandle> {
    const { value } = await this.retryPolicy.execute('teardown', () => this.connection.teardown(engine), {
      context: { engineId: engine.id },
    });
    log.info({ engineId: engine.id, reused: engine.reused }, 'Engine stopped');
    return value;
  }

  private transition(
    state: RunState,
    to: ExecutionPhase,
    log: Logger,
    signal?: AbortSignal,
    context: Record<string, unknown> = {}
  ): void {
    const from = state.phase;
    assertTransition(from, to);
    state.history.push({ from, to, at: this.clock(), aborted: isAbortTransition(from, to) });
    state.phase = to;
    log.debug({ ...context, from, phase: to }, 'Phase transition');
    if (to !== 'cleaned') {
      throwIfAborted(signal);
    }
  }

  private resolveStatus(failure: unknown, state: RunState, signal?: AbortSignal): ExecutionStatus {
    if (failure === null) return 'completed';
    if (failure instanceof CancelledError || signal?.aborted) return 'cancelled';
    if (state.algorithmFinished) return 'partial';
    return 'failed';
  }

  private emitRecord(result: ExecutionResult, request: AnalysisRequest, log: Logger): void {
    const catalog = this.catalog;
    if (!catalog) return;

    const pending = (async () => {
      const record = buildExecutionRecord(result, request, {
        deploymentMode: this.connection.deploymentMode,
        defaultDatabase: this.defaultDatabase,
      });
      await catalog.recordExecution(record);
    })()
      .catch((error: unknown) => {
        log.warn({ error: errorMessage(error) }, 'Failed to record execution in catalog');
      })
      .finally(() => {
        this.pendingRecords.delete(pending);
      });

    this.pendingRecords.add(pending);
  }
}
