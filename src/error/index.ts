/**
 * Error entrypoint: exports the typed request errors and helpers for identifying and unwrapping error types.
 * Use this when you only need error utilities without the request builders.
 * @module
 */

/** Error thrown when a request is aborted via AbortController. */
/** Type guard that checks if an error is an {@link AbortError}. */
export { AbortError, isAbortError } from './abortError.js';
/** Error representing a failure generating a resource URI. */
/** Extract a {@link ConstructURLError} from an unknown error value, following nested causes. */
/** Type guard for {@link ConstructURLError}. */
export { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Error returned when a mandatory builder parameter was never supplied. */
export { getMissingParameterError, isMissingParameterError, MissingParameterError } from './missingParameterError.js';
/** Error returned when a success response could not be decoded. */
export { getResponseParseError, isResponseParseError, ResponseParseError } from './responseParseError.js';
/** Type guard that checks if an error is a {@link TimeoutError}. */
/** Error thrown when a request exceeds the configured timeout. */
export { isTimeoutError, TimeoutError } from './timeoutError.js';
/** Error returned when the request never produced a response. */
export { getTransportError, isTransportError, TransportError } from './transportError.js';
/** Error returned when the service answers with a status other than the expected one. */
export {
  getUnexpectedStatusError,
  isUnexpectedStatusError,
  UnexpectedStatusError,
  type UnexpectedStatusDetails,
} from './unexpectedStatusError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Extracts a {@link ValidationError} from an unknown error value. */
/** Type guard that checks if an error is a {@link ValidationError}. */
/** Error thrown when validation of payloads fails. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
