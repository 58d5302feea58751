/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for model responses. The provider's
 * structured-output mode is not trusted on its own: every response body
 * is checked here before it becomes an ExtractionResult.
 */

import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import { logger } from './logger';
import type { RecordListResponse } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow annotation keywords shared with the provider schema
  allErrors: true,
  verbose: true,
});

/**
 * Record list schema as sent to the provider's structured-output mode.
 */
export const recordListSchema = {
  type: 'object',
  additionalProperties: false,
  required: ['entries'],
  properties: {
    entries: {
      type: 'array',
      description: 'The collection of all extracted data points, in document order',
      items: { $ref: '#/$defs/data_point' },
    },
  },
  $defs: {
    data_point: {
      type: 'object',
      additionalProperties: false,
      required: ['key', 'value', 'comments'],
      properties: {
        key: {
          type: 'string',
          description: 'The specific label, header, or question found in the document text.',
        },
        value: {
          type: 'string',
          description:
            'The exact answer, data, or text detail associated with the key. Must use original wording.',
        },
        comments: {
          type: ['string', 'null'],
          description:
            'Any extra context, side notes, or formatting details relevant to this data point.',
        },
      },
    },
  },
} as const;

const dataPoint = recordListSchema.$defs.data_point;

// Local checks go one step further than the provider schema: keys must not be empty
export const recordListValidationSchema = {
  ...recordListSchema,
  $defs: {
    data_point: {
      ...dataPoint,
      properties: {
        ...dataPoint.properties,
        key: { ...dataPoint.properties.key, minLength: 1 },
      },
    },
  },
} as const;

// Compiled lazily on first use
let recordListValidator: ValidateFunction<RecordListResponse> | null = null;

function getRecordListValidator(): ValidateFunction<RecordListResponse> {
  if (!recordListValidator) {
    recordListValidator = ajv.compile<RecordListResponse>(recordListValidationSchema);
  }
  return recordListValidator;
}

export type ValidationResult<T> =
  | { valid: true; data: T }
  | { valid: false; errors: string[] };

/**
 * Validate a parsed model response against the record list schema
 */
export function validateRecordList(data: unknown): ValidationResult<RecordListResponse> {
  const validate = getRecordListValidator();

  if (!validate(data)) {
    const errors = (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
    logger.warn('Record list validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true, data };
}
