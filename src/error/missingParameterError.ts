import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a mandatory builder parameter was never supplied.
 */
export class MissingParameterError extends Error {
  /** MissingParameterError error-name */
  static name = 'MissingParameterError';
  override name = 'MissingParameterError';
  /** Name of the missing parameter */
  #field: string;

  /** Creates a new instance of a MissingParameterError naming the missing field */
  constructor(field: string, message: string = `error missing required parameter ${field}`, opts?: ErrorOptions) {
    super(message, opts);
    this.#field = field;
  }

  /** Name of the missing parameter */
  get field(): string {
    return this.#field;
  }
}

/**
 * Type guard for {@link MissingParameterError}.
 */
export function isMissingParameterError(error: unknown): error is MissingParameterError {
  return isErrorType(MissingParameterError, error);
}

/**
 * Extract a {@link MissingParameterError} from an unknown error value, following nested causes.
 */
export function getMissingParameterError(error: unknown): null | MissingParameterError {
  return unwrapErrorType(MissingParameterError, error);
}
