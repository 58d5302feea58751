/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  setDocumentName,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, XLSX_MIME_TYPE, type Config } from './config';

// Errors
export {
  StructurerError,
  ExtractionError,
  ExtractionClientError,
  RenderError,
  describeError,
  type StructurerErrorCode,
} from './errors';

// Types
export * from './types';

// Metrics
export {
  register,
  documentsProcessedCounter,
  pipelineDurationHistogram,
  extractedRecordsHistogram,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export {
  validateRecordList,
  recordListSchema,
  recordListValidationSchema,
  type ValidationResult,
} from './schemas';
