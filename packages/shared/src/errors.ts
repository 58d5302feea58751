/**
 * Error taxonomy for the structuring pipeline.
 *
 * One class per stage. Every one is terminal for the current invocation;
 * callers only ever surface `message`.
 */

export type StructurerErrorCode =
  | 'extraction_failed'
  | 'llm_request_failed'
  | 'render_failed';

export class StructurerError extends Error {
  readonly code: StructurerErrorCode;

  constructor(message: string, code: StructurerErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StructurerError';
    this.code = code;
  }
}

/** The PDF could not be read: corrupt, encrypted or empty. */
export class ExtractionError extends StructurerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'extraction_failed', options);
    this.name = 'ExtractionError';
  }
}

/** The model call could not produce a schema-conforming record list. */
export class ExtractionClientError extends StructurerError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, 'llm_request_failed', options);
    this.name = 'ExtractionClientError';
    this.status = options?.status;
  }
}

/** Row data handed to the renderer does not have the expected columns. */
export class RenderError extends StructurerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'render_failed', options);
    this.name = 'RenderError';
  }
}

/**
 * Human-readable description of any thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
