/**
 * ManagedEngineConnection Unit Tests
 *
 * Management API and engine API served by msw.
 *
 * @module __tests__/unit/services/engine/ManagedEngineConnection.test
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { http, HttpResponse } from 'msw';
import type { EngineHandle } from '@graph-orchestrator/shared';
import { server } from '../../../mocks/server';
import { MANAGED_ENGINE_URL, MANAGED_PORT, MANAGED_URL, MANAGEMENT_BASE } from '../../../mocks/handlers';
import { TEST_TIMING, TEST_TOKENS } from '../../../helpers/test.constants';
import { InMemoryDocumentStore } from '../../../helpers/InMemoryDocumentStore';
import { AnalysisRequestFixture, TEST_REQUEST_DEFAULTS } from '../../../fixtures/AnalysisRequestFixture';
import { ManagedEngineConnection, parseEngineDetail } from '@/services/engine/ManagedEngineConnection';
import { EngineHttpClient } from '@/services/engine/EngineHttpClient';
import { CredentialManager } from '@/services/auth/CredentialManager';
import { StaticTokenCredentialSource } from '@/services/auth/StaticTokenCredentialSource';
import { resolveAnalysisRequest } from '@/domains/execution/AnalysisRequestResolver';
import { ConfigError, EngineApiError } from '@/shared/errors';
import type { IDocumentStore } from '@/infrastructure/document-store';

const READY_DETAIL = {
  id: 'eng-9',
  size_id: 'e16',
  type_id: 'gral',
  status: { is_started: true, succeeded: true, endpoint: MANAGED_ENGINE_URL },
};

function createConnection(documentStore: IDocumentStore | null = null, now = 1_000): ManagedEngineConnection {
  const credentials = new CredentialManager({ source: new StaticTokenCredentialSource(TEST_TOKENS.STATIC) });
  return new ManagedEngineConnection({
    deploymentUrl: `${MANAGED_URL}/`,
    port: MANAGED_PORT,
    http: new EngineHttpClient({ credentials, requestTimeoutMs: TEST_TIMING.REQUEST_TIMEOUT_MS }),
    readiness: {
      readyTimeoutMs: TEST_TIMING.READY_TIMEOUT_MS,
      readyProbeIntervalMs: TEST_TIMING.READY_PROBE_INTERVAL_MS,
    },
    defaultDatabase: 'test_db',
    documentStore,
    clock: () => now,
  });
}

function readyEngine(): EngineHandle {
  return {
    id: 'eng-9',
    size: 'e16',
    status: 'ready',
    createdAt: 1_000,
    baseUrl: MANAGED_ENGINE_URL,
    reused: false,
    deploymentMode: 'amp',
  };
}

describe('ManagedEngineConnection', () => {
  let provisionBodies: unknown[];

  beforeEach(() => {
    provisionBodies = [];
    server.use(
      http.get(`${MANAGED_ENGINE_URL}/v1/version`, () => HttpResponse.json({ version: '1.0.0' })),
      http.post(`${MANAGEMENT_BASE}/engines`, async ({ request }) => {
        provisionBodies.push(await request.json());
        return HttpResponse.json({ id: 'eng-new' });
      })
    );
  });

  describe('parseEngineDetail', () => {
    it('should read a started engine as ready with its endpoint and size', () => {
      expect(parseEngineDetail(READY_DETAIL)).toEqual({
        id: 'eng-9',
        status: 'ready',
        endpoint: MANAGED_ENGINE_URL,
        size: 'e16',
        type: 'gral',
      });
    });

    it('should read failed engines as error and unknown sizes as null', () => {
      expect(parseEngineDetail({ id: 'x', size_id: 'huge', status: { failed: true } })).toMatchObject({
        status: 'error',
        size: null,
        endpoint: null,
      });
    });
  });

  describe('discoverOrProvision', () => {
    it('should provision a sized engine and wait until it is started', async () => {
      let detailCalls = 0;
      server.use(
        http.get(`${MANAGEMENT_BASE}/engines`, () => HttpResponse.json({ items: [] })),
        http.get(`${MANAGEMENT_BASE}/engines/eng-new`, () => {
          detailCalls++;
          return detailCalls === 1
            ? HttpResponse.json({ id: 'eng-new', status: { is_started: false } })
            : HttpResponse.json({ ...READY_DETAIL, id: 'eng-new', size_id: 'e8' });
        })
      );
      const captured: EngineHandle[] = [];

      const handle = await createConnection().discoverOrProvision('e8', { onHandle: (h) => captured.push(h) });

      expect(provisionBodies).toEqual([{ type_id: 'gral', size_id: 'e8' }]);
      expect(handle).toEqual({
        id: 'eng-new',
        size: 'e8',
        status: 'ready',
        createdAt: 1_000,
        baseUrl: MANAGED_ENGINE_URL,
        reused: false,
        deploymentMode: 'amp',
      });
      expect(captured).toHaveLength(1);
      expect(captured[0]).toMatchObject({ id: 'eng-new', status: 'provisioning', baseUrl: null });
      expect(detailCalls).toBe(2);
    });

    it('should reuse a ready engine on repeated calls without provisioning', async () => {
      server.use(
        http.get(`${MANAGEMENT_BASE}/engines`, () => HttpResponse.json({ items: [READY_DETAIL] })),
        http.get(`${MANAGEMENT_BASE}/engines/eng-9`, () => HttpResponse.json(READY_DETAIL))
      );
      const connection = createConnection();

      const first = await connection.discoverOrProvision('e16');
      const second = await connection.discoverOrProvision('e16');

      expect(first.id).toBe('eng-9');
      expect(second.id).toBe('eng-9');
      expect(first.reused).toBe(true);
      expect(provisionBodies).toHaveLength(0);
    });

    it('should provision a new engine when exclusive even if one is running', async () => {
      server.use(
        http.get(`${MANAGEMENT_BASE}/engines`, () => HttpResponse.json({ items: [READY_DETAIL] })),
        http.get(`${MANAGEMENT_BASE}/engines/eng-new`, () => HttpResponse.json({ ...READY_DETAIL, id: 'eng-new' }))
      );

      const handle = await createConnection().discoverOrProvision('e16', { exclusive: true });

      expect(handle.id).toBe('eng-new');
      expect(provisionBodies).toHaveLength(1);
    });

    it('should fail when the engine reports a failed start', async () => {
      server.use(
        http.get(`${MANAGEMENT_BASE}/engines`, () => HttpResponse.json({ items: [] })),
        http.get(`${MANAGEMENT_BASE}/engines/eng-new`, () =>
          HttpResponse.json({ id: 'eng-new', status: { failed: true } })
        )
      );

      await expect(createConnection().discoverOrProvision('e16')).rejects.toThrow(
        new EngineApiError(200, 'Engine eng-new failed to start')
      );
    });
  });

  describe('teardown', () => {
    it('should delete the engine and return a stopped handle', async () => {
      const deleted: string[] = [];
      server.use(
        http.delete(`${MANAGEMENT_BASE}/engines/:id`, ({ params }) => {
          deleted.push(String(params.id));
          return HttpResponse.json({});
        })
      );

      const stopped = await createConnection().teardown(readyEngine());

      expect(stopped.status).toBe('stopped');
      expect(deleted).toEqual(['eng-9']);
    });

    it('should treat a 404 as already stopped', async () => {
      server.use(http.delete(`${MANAGEMENT_BASE}/engines/:id`, () => new HttpResponse(null, { status: 404 })));

      await expect(createConnection().teardown(readyEngine())).resolves.toMatchObject({ status: 'stopped' });
    });
  });

  describe('jobs', () => {
    it('should submit a collection load and return a load job with its graph id', async () => {
      let body: unknown = null;
      server.use(
        http.post(`${MANAGED_ENGINE_URL}/v1/loaddata`, async ({ request }) => {
          body = await request.json();
          return HttpResponse.json({ job_id: 11, graph_id: 5 });
        })
      );
      const request = AnalysisRequestFixture.createRequest({ vertexAttributes: ['name'] });

      const job = await createConnection().loadGraph(readyEngine(), request);

      expect(body).toEqual({
        database: 'test_db',
        vertex_collections: ['customers'],
        edge_collections: ['purchases'],
        vertex_attributes: ['name'],
      });
      expect(job).toMatchObject({ id: '11', kind: 'load', status: 'pending', graphId: '5' });
    });

    it('should resolve a named graph through the document store', async () => {
      let body: unknown = null;
      server.use(
        http.post(`${MANAGED_ENGINE_URL}/v1/loaddata`, async ({ request }) => {
          body = await request.json();
          return HttpResponse.json({ job_id: 12, graph_id: 6 });
        })
      );
      const store = new InMemoryDocumentStore();
      store.namedGraphs.set('social', { vertexCollections: ['people'], edgeCollections: ['knows'] });
      const request = resolveAnalysisRequest({ name: 'g', algorithm: 'wcc', namedGraph: 'social' }, TEST_REQUEST_DEFAULTS);

      await createConnection(store).loadGraph(readyEngine(), request);

      expect(body).toEqual({ database: 'test_db', vertex_collections: ['people'], edge_collections: ['knows'] });
    });

    it('should reject a named graph without a document store', async () => {
      const request = resolveAnalysisRequest({ name: 'g', algorithm: 'wcc', namedGraph: 'social' }, TEST_REQUEST_DEFAULTS);

      await expect(createConnection(null).loadGraph(readyEngine(), request)).rejects.toBeInstanceOf(ConfigError);
    });

    it('should submit the algorithm with merged parameters and the graph id', async () => {
      let body: unknown = null;
      server.use(
        http.post(`${MANAGED_ENGINE_URL}/v1/pagerank`, async ({ request }) => {
          body = await request.json();
          return HttpResponse.json({ job_id: 21 });
        })
      );
      const request = AnalysisRequestFixture.createRequest({ params: { maximum_supersteps: 20 } });

      const job = await createConnection().runAlgorithm(readyEngine(), request, '5');

      expect(body).toEqual({ damping_factor: 0.85, maximum_supersteps: 20, graph_id: '5' });
      expect(job).toMatchObject({ id: '21', kind: 'algorithm' });
    });

    it('should submit result storage for the algorithm job', async () => {
      let body: unknown = null;
      server.use(
        http.post(`${MANAGED_ENGINE_URL}/v1/storeresults`, async ({ request }) => {
          body = await request.json();
          return HttpResponse.json({ job_id: 31 });
        })
      );
      const request = AnalysisRequestFixture.createRequest({ targetCollection: 'customer_ranks' });

      await createConnection().storeResults(readyEngine(), request, ['21']);

      expect(body).toEqual({
        database: 'test_db',
        target_collection: 'customer_ranks',
        job_ids: ['21'],
        attribute_names: ['rank'],
        parallelism: 8,
        batch_size: 10000,
      });
    });

    it('should poll a job by id and normalize the nested status', async () => {
      server.use(
        http.get(`${MANAGED_ENGINE_URL}/v1/jobs/21`, () =>
          HttpResponse.json({ id: 21, status: { state: 'done' }, result_count: 1200 })
        )
      );

      const job = await createConnection().getJob(readyEngine(), '21', 'algorithm');

      expect(job).toMatchObject({ id: '21', kind: 'algorithm', status: 'completed', resultCount: 1200 });
    });
  });

  describe('engine inventory', () => {
    it('should list jobs from a jobs envelope and drop entries without an id', async () => {
      server.use(
        http.get(`${MANAGED_ENGINE_URL}/v1/jobs`, () =>
          HttpResponse.json({
            jobs: [
              { id: 21, status: { state: 'done' } },
              { job_id: '22', status: { state: 'running' } },
              { status: { state: 'done' } },
            ],
          })
        )
      );

      const jobs = await createConnection().listJobs(readyEngine());

      expect(jobs.map((job) => [job.id, job.kind, job.status])).toEqual([
        ['21', 'algorithm', 'completed'],
        ['22', 'algorithm', 'running'],
      ]);
    });

    it('should list graphs from a bare array', async () => {
      server.use(
        http.get(`${MANAGED_ENGINE_URL}/v1/graphs`, () =>
          HttpResponse.json([{ graph_id: 'g-1', vertex_count: 3, edge_count: 2 }, { id: 'g-2' }, { vertex_count: 5 }])
        )
      );

      const graphs = await createConnection().listGraphs(readyEngine());

      expect(graphs).toEqual([{ id: 'g-1', vertexCount: 3, edgeCount: 2 }, { id: 'g-2' }]);
    });

    it('should fall back to the requested id when the graph payload has none', async () => {
      server.use(
        http.get(`${MANAGED_ENGINE_URL}/v1/graphs/g-9`, () => HttpResponse.json({ graph: { vertex_count: 12 } }))
      );

      const graph = await createConnection().getGraph(readyEngine(), 'g-9');

      expect(graph).toEqual({ id: 'g-9', vertexCount: 12 });
    });

    it('should URL-encode the graph id when deleting a graph', async () => {
      const paths: string[] = [];
      server.use(
        http.delete(`${MANAGED_ENGINE_URL}/v1/graphs/*`, ({ request }) => {
          paths.push(new URL(request.url).pathname);
          return HttpResponse.json({});
        })
      );

      await createConnection().deleteGraph(readyEngine(), 'team graph/2');

      expect(paths).toEqual(['/v1/graphs/team%20graph%2F2']);
    });
  });
});
