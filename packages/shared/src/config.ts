/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 * The provider credential is deliberately absent: it arrives with each request.
 */

export interface Config {
  // HTTP
  port: number;
  maxUploadBytes: number;

  // LLM
  llmModel: string;
  llmRequestTimeoutMs: number;
  llmBaseUrl: string | undefined;

  // Output
  outputFileName: string;
  sheetName: string;
}

export const XLSX_MIME_TYPE =
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export const config: Config = {
  // HTTP
  port: parseInt(process.env.PORT || '8080', 10),
  maxUploadBytes: parseInt(process.env.MAX_UPLOAD_BYTES || String(50 * 1024 * 1024), 10),

  // LLM
  llmModel: process.env.LLM_MODEL || 'gpt-4o',
  llmRequestTimeoutMs: parseInt(process.env.LLM_REQUEST_TIMEOUT_MS || '60000', 10),
  llmBaseUrl: process.env.OPENAI_BASE_URL || undefined,

  // Output
  outputFileName: process.env.OUTPUT_FILE_NAME || 'Structured_Output.xlsx',
  sheetName: 'Extracted Data',
};
