/**
 * Schemas Index
 *
 * @module @graph-orchestrator/shared/schemas
 */

export {
  analysisRequestInputSchema,
  formatSchemaIssues,
  type AnalysisRequestInputData,
} from './analysis-request.schemas';
