/**
 * Job Status Adapter Unit Tests
 *
 * @module __tests__/unit/services/engine/JobStatusAdapter.test
 */

import { describe, it, expect } from 'vitest';
import {
  managedJobStatusAdapter,
  mapJobState,
  selfManagedJobStatusAdapter,
} from '@/services/engine/JobStatusAdapter';

describe('mapJobState', () => {
  it.each([
    ['done', 'completed'],
    ['Succeeded', 'completed'],
    ['error', 'failed'],
    ['canceled', 'cancelled'],
    ['queued', 'pending'],
    ['loading', 'running'],
  ])('should map %s to %s', (state, expected) => {
    expect(mapJobState(state)).toBe(expected);
  });
});

describe('managedJobStatusAdapter', () => {
  it('should read the nested status.state shape', () => {
    const job = managedJobStatusAdapter.toJobHandle({ id: 'job-1', status: { state: 'running' } }, 'algorithm');

    expect(job).toMatchObject({ id: 'job-1', kind: 'algorithm', status: 'running' });
  });

  it('should read the progress envelope', () => {
    expect(managedJobStatusAdapter.toJobHandle({ job_id: 3, progress: 2, total: 5 }, 'load')).toMatchObject({
      id: '3',
      status: 'running',
      progress: 2,
      total: 5,
    });
    expect(managedJobStatusAdapter.toJobHandle({ job_id: 3, progress: 5, total: 5 }, 'load')).toMatchObject({
      status: 'completed',
    });
    expect(managedJobStatusAdapter.toJobHandle({ job_id: 3, progress: 0, total: 5 }, 'load')).toMatchObject({
      status: 'pending',
    });
  });

  it('should report the error message of a failed progress envelope', () => {
    const job = managedJobStatusAdapter.toJobHandle(
      { job_id: 4, progress: 1, total: 5, error: true, error_message: 'out of memory' },
      'algorithm'
    );

    expect(job).toMatchObject({ status: 'failed', error: 'out of memory' });
  });

  it('should carry graph id and result count', () => {
    const job = managedJobStatusAdapter.toJobHandle(
      { job_id: 8, graph_id: 12, status: { state: 'done' }, documents_written: '1500' },
      'store'
    );

    expect(job).toMatchObject({ id: '8', graphId: '12', resultCount: 1500, status: 'completed' });
  });
});

describe('selfManagedJobStatusAdapter', () => {
  it('should read flat state strings', () => {
    expect(selfManagedJobStatusAdapter.toJobHandle({ job_id: 'a1', state: 'finished' }, 'algorithm')).toMatchObject({
      id: 'a1',
      status: 'completed',
    });
  });

  it('should read status strings and default the error message', () => {
    expect(selfManagedJobStatusAdapter.toJobHandle({ job_id: 'a2', status: 'failed' }, 'algorithm')).toMatchObject({
      status: 'failed',
      error: 'Unknown error',
    });
  });

  it('should use the fallback id when the payload has none', () => {
    expect(selfManagedJobStatusAdapter.toJobHandle({ state: 'running' }, 'load', { fallbackId: 'polled' })).toMatchObject({
      id: 'polled',
      status: 'running',
    });
  });

  it('should return null without any id', () => {
    expect(selfManagedJobStatusAdapter.toJobHandle({ state: 'running' }, 'load')).toBeNull();
  });

  it('should read unknown shapes as pending', () => {
    expect(selfManagedJobStatusAdapter.toJobHandle({ job_id: 1 }, 'load')).toMatchObject({ status: 'pending' });
  });
});
