/**
 * Engine Cleanup Auditor
 *
 * Finds engines left running by a crashed or interrupted process and stops
 * them. Engines younger than the threshold, engines in the keep list and
 * engines already stopped are left alone.
 *
 * @module domains/execution/EngineCleanupAuditor
 */

import type { Logger } from 'pino';
import type { EngineSummary } from '@graph-orchestrator/shared';
import type { IEngineConnection } from '@/services/engine';
import { errorMessage } from '@/shared/errors';
import { createChildLogger } from '@/shared/utils/logger';

export interface AuditOptions {
  /** Only engines older than this are stopped. Engines with no creation time count as old. */
  olderThanMs?: number;
  /** Report what would be stopped without stopping anything */
  dryRun?: boolean;
  keepIds?: readonly string[];
  signal?: AbortSignal;
}

export interface AuditFailure {
  engineId: string;
  error: string;
}

export interface AuditReport {
  inspected: number;
  /** Ids stopped (or that would be stopped on a dry run) */
  stopped: string[];
  skipped: string[];
  failures: AuditFailure[];
  dryRun: boolean;
}

export interface EngineCleanupAuditorDependencies {
  connection: IEngineConnection;
  clock?: () => number;
  logger?: Logger;
}

export class EngineCleanupAuditor {
  private readonly connection: IEngineConnection;
  private readonly clock: () => number;
  private readonly log: Logger;

  constructor(deps: EngineCleanupAuditorDependencies) {
    this.connection = deps.connection;
    this.clock = deps.clock ?? Date.now;
    this.log = deps.logger ?? createChildLogger({ service: 'EngineCleanupAuditor' });
  }

  async audit(options: AuditOptions = {}): Promise<AuditReport> {
    const { olderThanMs = 0, dryRun = false, keepIds = [], signal } = options;
    const keep = new Set(keepIds);
    const now = this.clock();

    const engines = await this.connection.listEngines(signal);
    const report: AuditReport = { inspected: engines.length, stopped: [], skipped: [], failures: [], dryRun };

    for (const engine of engines) {
      if (!this.isCandidate(engine, keep, now, olderThanMs)) {
        report.skipped.push(engine.id);
        continue;
      }

      if (dryRun) {
        report.stopped.push(engine.id);
        this.log.info({ engineId: engine.id, status: engine.status }, 'Would stop engine (dry run)');
        continue;
      }

      try {
        await this.connection.stopEngine(engine.id, signal);
        report.stopped.push(engine.id);
        this.log.info({ engineId: engine.id }, 'Orphaned engine stopped');
      } catch (error) {
        report.failures.push({ engineId: engine.id, error: errorMessage(error) });
        this.log.error({ engineId: engine.id, error: errorMessage(error) }, 'Failed to stop orphaned engine');
      }
    }

    this.log.info(
      {
        inspected: report.inspected,
        stopped: report.stopped.length,
        skipped: report.skipped.length,
        failures: report.failures.length,
        dryRun,
      },
      'Engine audit finished'
    );
    return report;
  }

  private isCandidate(engine: EngineSummary, keep: ReadonlySet<string>, now: number, olderThanMs: number): boolean {
    if (keep.has(engine.id) || engine.status === 'stopped') {
      return false;
    }
    if (engine.createdAt === undefined) {
      return true;
    }
    return now - engine.createdAt >= olderThanMs;
  }
}
