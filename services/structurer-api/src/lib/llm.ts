/**
 * LLM Integration (Structured Extraction)
 *
 * Single call per document: a fixed system instruction plus the document
 * text, answered in OpenAI structured-output mode and re-validated with Ajv.
 * No retries and no caching.
 */

import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  AuthenticationError,
} from 'openai';
import {
  logger,
  config,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  validateRecordList,
  recordListSchema,
  ExtractionClientError,
  type ExtractionResult,
} from '@doc-structurer/shared';

export const PROMPT_VERSION = '1.0.0';

export const EXTRACTION_SYSTEM_PROMPT = `You are a specialized data extraction AI. Your goal is to transform unstructured PDF text into a structured Excel-ready format.

**STRICT RULES:**
1. **100% Data Capture:** You must capture EVERY piece of information. Do not omit anything.
2. **Original Language:** Retain the exact wording for the 'value' field. Do not paraphrase or summarize unless absolutely necessary for format.
3. **Key:Value Logic:** Identify logical pairings. If a text is a heading followed by a paragraph, the heading is the key. If a label is followed by a detail, the label is the key.
4. **Context:** If there is surrounding text that provides important nuance but isn't the direct value, place it in the 'comments' field. Use null when there is none.

Analyze the input text and output a JSON object containing a list of these key-value-comments entries.`;

export const EXTRACTION_USER_PROMPT_TEMPLATE = 'Here is the document content:\n\n{{text}}';

/**
 * JSON Schema for OpenAI Structured Outputs.
 */
export const RECORD_LIST_RESPONSE_FORMAT = {
  name: 'extracted_data',
  strict: true,
  schema: recordListSchema,
} as const;

export interface ExtractRecordsOptions {
  model?: string;
  timeoutMs?: number;
  baseURL?: string;
  /** Transport handed to the OpenAI client; tests substitute an in-process one. */
  fetch?: typeof fetch;
}

export interface ExtractRecordsResult {
  records: ExtractionResult;
  model: string;
  requestId: string;
}

export type RecordExtractor = (
  apiKey: string,
  text: string,
  options?: ExtractRecordsOptions
) => Promise<ExtractRecordsResult>;

function buildUserPrompt(text: string): string {
  return EXTRACTION_USER_PROMPT_TEMPLATE.replace('{{text}}', () => text);
}

/**
 * Map an SDK failure onto ExtractionClientError with a message a user can act on.
 */
function toClientError(error: unknown): ExtractionClientError {
  if (error instanceof ExtractionClientError) return error;

  if (error instanceof AuthenticationError) {
    return new ExtractionClientError('The OpenAI API key was rejected', {
      cause: error,
      status: error.status,
    });
  }
  if (error instanceof APIConnectionTimeoutError) {
    return new ExtractionClientError('The OpenAI request timed out', { cause: error });
  }
  if (error instanceof APIConnectionError) {
    return new ExtractionClientError(`Could not reach OpenAI: ${error.message}`, { cause: error });
  }
  if (error instanceof APIError) {
    return new ExtractionClientError(`OpenAI request failed: ${error.message}`, {
      cause: error,
      status: error.status,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ExtractionClientError(`OpenAI request failed: ${message}`, { cause: error });
}

/**
 * Parse and validate the message content returned by the model.
 */
export function parseRecordList(content: string | null | undefined): ExtractionResult {
  if (!content) {
    throw new ExtractionClientError('Empty response from OpenAI');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ExtractionClientError('OpenAI response is not valid JSON', { cause: error });
  }

  const validation = validateRecordList(parsed);
  if (!validation.valid) {
    throw new ExtractionClientError(
      `OpenAI response does not match the record schema: ${validation.errors.join('; ')}`
    );
  }

  return validation.data.entries;
}

/**
 * Turn document text into key/value/comments records with one model call.
 */
export const extractRecords: RecordExtractor = async (apiKey, text, options = {}) => {
  if (!apiKey || apiKey.trim() === '') {
    throw new ExtractionClientError('An OpenAI API key is required');
  }

  const model = options.model ?? config.llmModel;

  const openai = new OpenAI({
    apiKey: apiKey.trim(),
    baseURL: options.baseURL ?? config.llmBaseUrl,
    timeout: options.timeoutMs ?? config.llmRequestTimeoutMs,
    maxRetries: 0,
    fetch: options.fetch,
  });

  logger.info('Extracting records with LLM', {
    model,
    prompt_version: PROMPT_VERSION,
    text_length: text.length,
  });

  const startTime = Date.now();

  try {
    const response = await openai.chat.completions.create({
      model,
      messages: [
        { role: 'system', content: EXTRACTION_SYSTEM_PROMPT },
        { role: 'user', content: buildUserPrompt(text) },
      ],
      response_format: {
        type: 'json_schema',
        json_schema: RECORD_LIST_RESPONSE_FORMAT,
      },
      temperature: 0,
    });

    const duration = (Date.now() - startTime) / 1000;
    llmRequestDurationHistogram.observe({ model }, duration);

    const requestId = response.id || `req_${Date.now()}`;
    const message = response.choices[0]?.message;

    if (message?.refusal) {
      throw new ExtractionClientError(`OpenAI refused the request: ${message.refusal}`);
    }

    const records = parseRecordList(message?.content);

    llmRequestsCounter.inc({ model, status: 'success' });
    logger.info('OpenAI record extraction complete', {
      model,
      request_id: requestId,
      duration_seconds: duration,
      tokens_used: response.usage?.total_tokens,
      record_count: records.length,
    });

    return { records, model, requestId };
  } catch (error) {
    llmRequestsCounter.inc({ model, status: 'error' });

    const clientError = toClientError(error);
    logger.error('OpenAI record extraction failed', clientError, { model });

    throw clientError;
  }
};
