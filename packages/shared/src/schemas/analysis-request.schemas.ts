/**
 * Analysis Request Schemas
 *
 * Zod schemas validating caller-supplied analysis requests before any
 * remote call is made.
 *
 * @module @graph-orchestrator/shared/schemas/analysis-request
 */

import { z } from 'zod';
import { SUPPORTED_ALGORITHMS, resolveAlgorithmId } from '../constants/algorithms';

const collectionName = z
  .string()
  .trim()
  .min(1, 'Collection name cannot be empty')
  .max(256, 'Collection name too long (max 256 chars)');

const paramValue = z.union([z.string(), z.number(), z.boolean()]);

/**
 * Analysis Request Input Schema
 *
 * Exactly one graph source: `namedGraph`, or both collection lists.
 */
export const analysisRequestInputSchema = z
  .object({
    name: z.string().trim().min(1, 'Name cannot be empty').max(200, 'Name too long (max 200 chars)'),
    description: z.string().max(2000).optional(),
    algorithm: z.string().refine((value) => resolveAlgorithmId(value) !== null, {
      message: `Unsupported algorithm. Supported: ${SUPPORTED_ALGORITHMS.join(', ')}`,
    }),
    params: z.record(paramValue).optional(),
    namedGraph: z.string().trim().min(1, 'Named graph cannot be empty').optional(),
    vertexCollections: z.array(collectionName).optional(),
    edgeCollections: z.array(collectionName).optional(),
    vertexAttributes: z.array(z.string().min(1)).optional(),
    database: z.string().trim().min(1).optional(),
    targetCollection: collectionName.optional(),
    resultAttributes: z.array(z.string().trim().min(1)).min(1).optional(),
    engineSize: z.string().trim().min(1).optional(),
    timeoutMs: z.number().int().positive('Timeout must be positive').optional(),
    exclusiveEngine: z.boolean().optional(),
    validateResults: z.boolean().optional(),
  })
  .superRefine((input, ctx) => {
    const hasNamedGraph = input.namedGraph !== undefined;
    const hasAnyCollections =
      input.vertexCollections !== undefined || input.edgeCollections !== undefined;

    if (hasNamedGraph && hasAnyCollections) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['namedGraph'],
        message: 'Set either namedGraph or vertexCollections/edgeCollections, not both',
      });
      return;
    }

    if (!hasNamedGraph && !hasAnyCollections) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['namedGraph'],
        message: 'A graph source is required: namedGraph or vertexCollections/edgeCollections',
      });
      return;
    }

    if (!hasNamedGraph) {
      if (!input.vertexCollections || input.vertexCollections.length === 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['vertexCollections'],
          message: 'At least one vertex collection is required',
        });
      }
      if (!input.edgeCollections || input.edgeCollections.length === 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['edgeCollections'],
          message: 'At least one edge collection is required',
        });
      }
    }
  });

export type AnalysisRequestInputData = z.infer<typeof analysisRequestInputSchema>;

/**
 * Flatten Zod issues into `path: message` strings.
 */
export function formatSchemaIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
