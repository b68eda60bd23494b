import type { Logger } from '../logger/index.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header options accepted by the fetch wrapper, `null` removes a default header. */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | null>;

/** HTTP status codes the storage service is known to answer with. */
export type StatusCode =
  | 100
  | 101
  | 200
  | 201
  | 202
  | 203
  | 204
  | 205
  | 206
  | 207
  | 208
  | 226
  | 300
  | 301
  | 302
  | 303
  | 304
  | 307
  | 308
  | 400
  | 401
  | 403
  | 404
  | 405
  | 406
  | 408
  | 409
  | 410
  | 411
  | 412
  | 413
  | 414
  | 415
  | 416
  | 417
  | 421
  | 422
  | 423
  | 424
  | 428
  | 429
  | 431
  | 451
  | 500
  | 501
  | 502
  | 503
  | 504
  | 505
  | 507
  | 508
  | 511;

/** Wire-level HTTP methods. */
export type HttpMethod = 'GET' | 'HEAD' | 'PUT' | 'POST' | 'DELETE';

/** Fetch response with a narrowed status code union. */
export interface FetchResponse extends Response {
  /** "Strong" type of status-codes {@link StatusCode} */
  status: StatusCode;
}

/**
 * Operation-specific header assembly, handed to the transport which applies it
 * on top of its own default headers.
 */
export type HeaderMutator = (headers: Headers) => Headers;

/** Per-call transport options. */
export interface PerformRequestOptions {
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
}

/**
 * Contract the request builders need from a storage client: where the blob
 * endpoint lives, and a way to put a request on the wire.
 */
export interface StorageClientDefinition {
  /** Storage account name. */
  readonly accountName: string;
  /** Absolute blob service endpoint, without trailing slash. */
  readonly blobEndpoint: string;
  /** Logger shared with the builders issued by this client. */
  readonly logger: Logger;
  /**
   * Issues a single HTTP request. Resolves with the response whatever its
   * status, or with the transport failure.
   */
  performRequest(
    uri: string,
    method: HttpMethod,
    headerMutator: HeaderMutator,
    body: BodyInit | null,
    opts?: PerformRequestOptions,
  ): SafeWrapAsync<Error, FetchResponse>;
}
