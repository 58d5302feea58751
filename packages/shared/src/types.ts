/**
 * Shared TypeScript Types
 *
 * Types for the PDF → records → spreadsheet pipeline, matching the JSON schemas in ./schemas
 */

// ============================================================================
// Extraction
// ============================================================================

/** One fact pulled out of a document. */
export interface ExtractedRecord {
  /** Label, heading or question found in the document. */
  key: string;
  /** Text associated with the key, in the document's own wording. */
  value: string;
  /** Contextual nuance that belongs to neither key nor value. */
  comments: string | null;
}

/** Records for one document, in the order the model returned them. */
export type ExtractionResult = ExtractedRecord[];

/** Response body the model is constrained to produce. */
export interface RecordListResponse {
  entries: ExtractedRecord[];
}

export interface PageText {
  pageNumber: number;
  text: string;
}

export interface PdfTextResult {
  pages: PageText[];
  totalPages: number;
  /** Every page's text followed by a newline, in page order. */
  text: string;
}

// ============================================================================
// Spreadsheet
// ============================================================================

export const SPREADSHEET_COLUMNS = ['key', 'value', 'comments'] as const;

export type SpreadsheetColumn = (typeof SPREADSHEET_COLUMNS)[number];

/** One body row of the rendered sheet; same shape as a record. */
export interface SpreadsheetRow {
  key: string;
  value: string;
  comments: string | null;
}

// ============================================================================
// API Types
// ============================================================================

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}

export interface HealthResponse {
  status: 'healthy';
  service: string;
  timestamp: string;
}
