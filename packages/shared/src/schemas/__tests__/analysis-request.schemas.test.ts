/**
 * Analysis Request Schema Tests
 */

import { describe, it, expect } from 'vitest';
import { analysisRequestInputSchema, formatSchemaIssues } from '../analysis-request.schemas';

describe('analysisRequestInputSchema', () => {
  it('accepts a named-graph request', () => {
    const result = analysisRequestInputSchema.safeParse({
      name: 'social-pagerank',
      algorithm: 'pagerank',
      namedGraph: 'social',
    });
    expect(result.success).toBe(true);
  });

  it('accepts a collection-list request with params', () => {
    const result = analysisRequestInputSchema.safeParse({
      name: 'components',
      algorithm: 'wcc',
      vertexCollections: ['users'],
      edgeCollections: ['follows'],
      params: { maximum_supersteps: 10 },
    });
    expect(result.success).toBe(true);
  });

  it('accepts algorithm aliases', () => {
    const result = analysisRequestInputSchema.safeParse({
      name: 'communities',
      algorithm: 'label-propagation',
      namedGraph: 'social',
    });
    expect(result.success).toBe(true);
  });

  it('rejects both graph sources at once', () => {
    const result = analysisRequestInputSchema.safeParse({
      name: 'both',
      algorithm: 'pagerank',
      namedGraph: 'social',
      vertexCollections: ['users'],
      edgeCollections: ['follows'],
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatSchemaIssues(result.error)).toEqual([
        'namedGraph: Set either namedGraph or vertexCollections/edgeCollections, not both',
      ]);
    }
  });

  it('rejects a request without a graph source', () => {
    const result = analysisRequestInputSchema.safeParse({ name: 'none', algorithm: 'pagerank' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatSchemaIssues(result.error)).toEqual([
        'namedGraph: A graph source is required: namedGraph or vertexCollections/edgeCollections',
      ]);
    }
  });

  it('rejects an empty edge collection list', () => {
    const result = analysisRequestInputSchema.safeParse({
      name: 'no-edges',
      algorithm: 'scc',
      vertexCollections: ['users'],
      edgeCollections: [],
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatSchemaIssues(result.error)).toEqual([
        'edgeCollections: At least one edge collection is required',
      ]);
    }
  });

  it('rejects an unsupported algorithm', () => {
    const result = analysisRequestInputSchema.safeParse({
      name: 'unknown',
      algorithm: 'triangle_count',
      namedGraph: 'social',
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['algorithm']);
    }
  });

  it('rejects a non-positive timeout', () => {
    const result = analysisRequestInputSchema.safeParse({
      name: 'timeout',
      algorithm: 'pagerank',
      namedGraph: 'social',
      timeoutMs: 0,
    });
    expect(result.success).toBe(false);
  });
});
