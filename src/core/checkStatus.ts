import { TransportError } from '../error/transportError.js';
import { UnexpectedStatusError } from '../error/unexpectedStatusError.js';
import type { FetchResponse, StatusCode } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';

/** Headers and raw body of a response that passed the status check. */
export interface ExtractedResponse {
  headers: Headers;
  body: string;
}

/**
 * Reads the body and compares the status against the operation's single
 * expected success status.
 *
 * - Any other status returns an {@link UnexpectedStatusError} with the body and headers.
 * - A body that cannot be read returns a {@link TransportError}.
 */
export async function checkStatusAndExtract(
  response: FetchResponse,
  expectedStatus: StatusCode,
): SafeWrapAsync<TransportError | UnexpectedStatusError, ExtractedResponse> {
  const [errBody, body] = await safeWrapAsync(() => response.text());
  if (errBody) {
    return [new TransportError('error reading response body', { cause: errBody }), null];
  }

  if (response.status !== expectedStatus) {
    return [new UnexpectedStatusError(response.status, body, { headers: response.headers }), null];
  }

  return [null, { headers: response.headers, body }];
}
