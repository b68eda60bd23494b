import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when the request never produced a response: connection
 * failures, timeouts and aborts. The transport's own error is the `cause`.
 */
export class TransportError extends Error {
  /** TransportError error-name */
  static name = 'TransportError';
  override name = 'TransportError';
}

/**
 * Type guard for {@link TransportError}.
 */
export function isTransportError(error: unknown): error is TransportError {
  return isErrorType(TransportError, error);
}

/**
 * Extract a {@link TransportError} from an unknown error value, following nested causes.
 */
export function getTransportError(error: unknown): null | TransportError {
  return unwrapErrorType(TransportError, error);
}
