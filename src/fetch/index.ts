/**
 * Fetch entrypoint: exports the storage client and header helpers.
 * @module
 */
export { defaultBlobEndpoint, type FetchImplementation, StorageClient, type StorageClientOptions } from './client.js';
export { headersToRecord, mergeHeaderOptions, redactHeaders } from './utils.js';
