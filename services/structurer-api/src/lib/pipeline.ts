/**
 * Document Pipeline
 *
 * PDF bytes + credential → records + .xlsx bytes. The three stages run
 * strictly in sequence and the first failure ends the run; nothing is kept
 * between calls.
 */

import {
  logger,
  config,
  XLSX_MIME_TYPE,
  documentsProcessedCounter,
  pipelineDurationHistogram,
  extractedRecordsHistogram,
  type ExtractionResult,
  type ExtractedRecord,
  type PdfTextResult,
} from '@doc-structurer/shared';
import { extractTextFromPdf } from './pdf';
import { extractRecords, type RecordExtractor, type ExtractRecordsOptions } from './llm';
import { recordsToRows, renderSpreadsheet } from './spreadsheet';

export interface ProcessDocumentRequest {
  pdf: Uint8Array;
  apiKey: string;
  /** Download name of the workbook; defaults to OUTPUT_FILE_NAME. */
  fileName?: string;
}

export interface PipelineOutput {
  records: ExtractionResult;
  spreadsheet: Buffer;
  fileName: string;
  mimeType: string;
  pageCount: number;
}

export interface PipelineDependencies {
  extractText: (data: Uint8Array) => Promise<PdfTextResult>;
  extractRecords: RecordExtractor;
  renderSpreadsheet: (rows: readonly unknown[]) => Promise<Buffer>;
  llmOptions?: ExtractRecordsOptions;
}

const defaultDependencies: PipelineDependencies = {
  extractText: extractTextFromPdf,
  extractRecords,
  renderSpreadsheet,
};

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Records whose value cannot be found in the document text, ignoring
 * differences in whitespace. Empty values are not counted.
 */
export function findUnverifiedRecords(
  records: ExtractionResult,
  documentText: string
): ExtractedRecord[] {
  const haystack = normalizeWhitespace(documentText);
  return records.filter((record) => {
    const needle = normalizeWhitespace(record.value);
    return needle !== '' && !haystack.includes(needle);
  });
}

/**
 * Run extract → structure → render for one document.
 */
export async function processDocument(
  request: ProcessDocumentRequest,
  dependencies: Partial<PipelineDependencies> = {}
): Promise<PipelineOutput> {
  const deps: PipelineDependencies = { ...defaultDependencies, ...dependencies };
  const startTime = Date.now();

  try {
    // Step 1: Get text
    const pdfResult = await deps.extractText(request.pdf);

    if (pdfResult.text.trim() === '') {
      logger.warn('PDF has no extractable text, sending it to the model anyway', {
        totalPages: pdfResult.totalPages,
      });
    }

    // Step 2: Structure it
    const { records, model, requestId } = await deps.extractRecords(
      request.apiKey,
      pdfResult.text,
      deps.llmOptions
    );
    extractedRecordsHistogram.observe(records.length);

    const unverified = findUnverifiedRecords(records, pdfResult.text);
    if (unverified.length > 0) {
      logger.warn('Some record values do not appear verbatim in the document', {
        request_id: requestId,
        unverified_count: unverified.length,
        record_count: records.length,
      });
    }

    // Step 3: Render
    const spreadsheet = await deps.renderSpreadsheet(recordsToRows(records));

    const duration = (Date.now() - startTime) / 1000;
    pipelineDurationHistogram.observe({ status: 'success' }, duration);
    documentsProcessedCounter.inc({ status: 'success' });

    logger.info('Document processed', {
      model,
      request_id: requestId,
      total_pages: pdfResult.totalPages,
      record_count: records.length,
      spreadsheet_bytes: spreadsheet.length,
      duration_seconds: duration,
    });

    return {
      records,
      spreadsheet,
      fileName: request.fileName ?? config.outputFileName,
      mimeType: XLSX_MIME_TYPE,
      pageCount: pdfResult.totalPages,
    };
  } catch (error) {
    const duration = (Date.now() - startTime) / 1000;
    pipelineDurationHistogram.observe({ status: 'error' }, duration);
    documentsProcessedCounter.inc({ status: 'error' });

    logger.error('Document processing failed', error);
    throw error;
  }
}
