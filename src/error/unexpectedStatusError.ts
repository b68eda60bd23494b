import type { StatusCode } from '../types/request.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Details the service attaches to a failed response. */
export interface UnexpectedStatusDetails {
  /** Response headers, if any were received. */
  headers?: Headers;
}

/**
 * Error representing a response whose status differs from the operation's
 * single expected success status.
 */
export class UnexpectedStatusError extends Error {
  /** UnexpectedStatusError error-name */
  static name = 'UnexpectedStatusError';
  override name = 'UnexpectedStatusError';
  /** Status the service answered with */
  #status: StatusCode;
  /** Raw response body */
  #body: string;
  /** Response headers */
  #headers: Headers;

  /** Creates a new instance of an UnexpectedStatusError wrapping status, body and headers */
  constructor(
    status: StatusCode,
    body: string,
    details: UnexpectedStatusDetails = {},
    message: string = `error unexpected status ${status}`,
    opts?: ErrorOptions,
  ) {
    super(message, opts);
    this.#status = status;
    this.#body = body;
    this.#headers = new Headers(details.headers);
  }

  /** Status the service answered with */
  get status(): StatusCode {
    return this.#status;
  }

  /** Raw response body, usually an XML error document */
  get body(): string {
    return this.#body;
  }

  /** Response headers */
  get headers(): Headers {
    return new Headers(this.#headers);
  }

  /** Service error code from `x-ms-error-code`, falling back to the body's `<Code>` element */
  get errorCode(): string | undefined {
    const header = this.#headers.get('x-ms-error-code');
    if (header) {
      return header;
    }

    return /<Code>([^<]+)<\/Code>/.exec(this.#body)?.[1];
  }

  /** Server-assigned request id */
  get requestId(): string | undefined {
    return this.#headers.get('x-ms-request-id') ?? undefined;
  }
}

/**
 * Type guard for {@link UnexpectedStatusError}.
 */
export function isUnexpectedStatusError(error: unknown): error is UnexpectedStatusError {
  return isErrorType(UnexpectedStatusError, error);
}

/**
 * Extract an {@link UnexpectedStatusError} from an unknown error value, following nested causes.
 */
export function getUnexpectedStatusError(error: unknown): null | UnexpectedStatusError {
  return unwrapErrorType(UnexpectedStatusError, error);
}
