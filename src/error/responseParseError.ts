import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';
import { getValidationError } from './validationError.js';

/**
 * Error raised when a successful response carries headers that do not decode
 * into the operation's response record.
 */
export class ResponseParseError extends Error {
  /** ResponseParseError error-name */
  static name = 'ResponseParseError';
  override name = 'ResponseParseError';

  /** Validation issues of the underlying {@link ValidationError}, if any */
  get issues(): StandardSchemaV1.Issue[] {
    return getValidationError(this.cause)?.issues ?? [];
  }
}

/**
 * Type guard for {@link ResponseParseError}.
 */
export function isResponseParseError(error: unknown): error is ResponseParseError {
  return isErrorType(ResponseParseError, error);
}

/**
 * Extract a {@link ResponseParseError} from an unknown error value, following nested causes.
 */
export function getResponseParseError(error: unknown): null | ResponseParseError {
  return unwrapErrorType(ResponseParseError, error);
}
