import { type ClientConfig, loadClientConfigFromEnv, parseClientConfig } from '../config/index.js';
import { DeleteBlobBuilder } from '../core/deleteBlob/builder.js';
import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';
import { TransportError } from '../error/transportError.js';
import type { ValidationError } from '../error/validationError.js';
import { createLogger, type Logger } from '../logger/index.js';
import type {
  FetchResponse,
  HeaderMutator,
  HttpMethod,
  PerformRequestOptions,
  StorageClientDefinition,
} from '../types/request.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions, redactHeaders } from './utils.js';

/** The subset of `fetch` the client calls. */
export type FetchImplementation = (input: string, init: RequestInit) => Promise<Response>;

/** Options to configure the {@link StorageClient}. */
export interface StorageClientOptions {
  /** Defaults to a logger built from `config.logging`. */
  logger?: Logger;
  /** Defaults to the global `fetch`, looked up on every request. */
  fetch?: FetchImplementation;
}

/** Public blob endpoint of an account. */
export function defaultBlobEndpoint(accountName: string): string {
  return `https://${accountName}.blob.core.windows.net`;
}

function withoutQuery(uri: string): string {
  const index = uri.indexOf('?');
  return index === -1 ? uri : uri.slice(0, index);
}

/** Turns an abort reason into the error reported as the transport failure's cause. */
function abortCause(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof TimeoutError || reason instanceof AbortError) {
    return reason;
  }

  return new AbortError('error request aborted', { cause: reason });
}

/**
 * Fetch-based storage client.
 *
 * - sends `x-ms-version` and `x-ms-date` on every request, under the
 *   configured default headers and the operation's own headers,
 * - bounds each request with the configured timeout, merged with the caller's signal,
 * - hands every response back whatever its status; checking it is up to the operation.
 */
export class StorageClient implements StorageClientDefinition {
  readonly accountName: string;
  readonly blobEndpoint: string;
  readonly logger: Logger;
  #config: ClientConfig;
  #fetch: FetchImplementation;

  /** Creates a client from an already parsed configuration. */
  constructor(config: ClientConfig, opts: StorageClientOptions = {}) {
    this.#config = config;
    this.accountName = config.accountName;
    this.blobEndpoint = (config.blobEndpoint ?? defaultBlobEndpoint(config.accountName)).replace(/\/+$/, '');
    this.logger = opts.logger ?? createLogger(config.logging);
    this.#fetch = opts.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Validates raw configuration, then creates the client.
   */
  static async fromConfig(input: unknown, opts?: StorageClientOptions): SafeWrapAsync<ValidationError, StorageClient> {
    const [err, config] = await parseClientConfig(input);
    if (err) {
      return [err, null];
    }

    return [null, new StorageClient(config, opts)];
  }

  /**
   * Reads the configuration from environment variables, then creates the client.
   */
  static async fromEnv(
    env: NodeJS.ProcessEnv = process.env,
    opts?: StorageClientOptions,
  ): SafeWrapAsync<ValidationError, StorageClient> {
    const [err, config] = await loadClientConfigFromEnv(env);
    if (err) {
      return [err, null];
    }

    return [null, new StorageClient(config, opts)];
  }

  /** Starts a Delete Blob request against this client. */
  deleteBlob(): DeleteBlobBuilder<false, false, false> {
    return DeleteBlobBuilder.create(this);
  }

  /**
   * Issues a single request.
   *
   * Errors:
   * - Network failures, timeouts and aborts are wrapped in `TransportError`;
   *   a timeout has a `TimeoutError` cause, a caller abort an `AbortError`.
   * - Headers the runtime refuses are wrapped in `TransportError` before anything is sent.
   * - Non-2xx responses are not errors here.
   */
  async performRequest(
    uri: string,
    method: HttpMethod,
    headerMutator: HeaderMutator,
    body: BodyInit | null,
    opts: PerformRequestOptions = {},
  ): SafeWrapAsync<Error, FetchResponse> {
    const [errHeaders, headers] = safeWrap(() =>
      headerMutator(
        mergeHeaderOptions(
          { 'x-ms-version': this.#config.apiVersion, 'x-ms-date': new Date().toUTCString() },
          this.#config.headers,
        ),
      ),
    );
    if (errHeaders) {
      return [new TransportError(`error assembling ${method} request headers`, { cause: errHeaders }), null];
    }

    const timeout = createTimeoutSignal(this.#config.requestTimeoutMs);
    const merged = mergeSignals([opts.signal, timeout?.signal]);
    const signal = merged?.signal;

    this.logger.debug({ method, uri: withoutQuery(uri), headers: redactHeaders(headers) }, 'storage request');

    const [err, res] = await safeWrapAsync(() =>
      this.#fetch(uri, {
        method,
        headers,
        body,
        ...(signal && { signal }),
      }),
    );
    timeout?.clear();
    merged?.clear();

    if (err) {
      const cause = signal?.aborted ? abortCause(signal) : err;
      this.logger.error({ err: cause, method, uri: withoutQuery(uri) }, 'storage request failed');
      return [new TransportError(`error performing ${method} request`, { cause }), null];
    }

    // Cast this for some more type-safety on http-status-codes
    return [null, res as FetchResponse];
  }
}
