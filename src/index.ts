/**
 * Root entrypoint: re-exports the storage client, request builders, configuration and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Fetch-based storage client; `deleteBlob()` starts a {@link DeleteBlobBuilder}.
 */
export { type FetchImplementation, StorageClient, type StorageClientOptions } from './fetch/client.js';

export * from './core/index.js';

/**
 * Client configuration schema and loaders.
 */
export {
  type ClientConfig,
  type ClientConfigInput,
  ClientConfigSchema,
  DEFAULT_API_VERSION,
  DEFAULT_REQUEST_TIMEOUT_MS,
  loadClientConfigFromEnv,
  parseClientConfig,
} from './config/index.js';

/** pino logger factory used by the client. */
export { createLogger, type Logger, type LoggingConfig } from './logger/index.js';

/**
 * Contract the builders need from a client, and the transport types around it.
 */
export type {
  FetchResponse,
  HeaderMutator,
  HttpMethod,
  PerformRequestOptions,
  StatusCode,
  StorageClientDefinition,
} from './types/request.js';

export * from './error/index.js';

/** Error-first tuple results. */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
