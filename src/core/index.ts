/**
 * Core entrypoint: exports the request builders, their wire helpers and results.
 * Import from here if you only need the builders without the fetch client or error helpers.
 * @module
 */

/**
 * Immutable, typestate builder for Delete Blob. `finalize` only type-checks
 * once container name, blob name and delete-snapshots method are supplied.
 */
export { type CompleteDeleteBlobBuilder, DeleteBlobBuilder } from './deleteBlob/builder.js';

/**
 * Pure helpers describing the wire request of a delete.
 */
export {
  buildDeleteBlobRequest,
  buildDeleteBlobUri,
  DELETE_BLOB_EXPECTED_STATUS,
  DeleteBlobHeaders,
  deleteBlobHeaders,
} from './deleteBlob/request.js';

/**
 * Decoded result of a successful delete.
 */
export { DeleteBlobResponse, type DeleteBlobResponseFields } from './deleteBlob/response.js';

export {
  type CompleteDeleteBlobParameters,
  type DeleteBlobError,
  type DeleteBlobParameters,
  type DeleteBlobRequest,
  DeleteSnapshotsMethod,
  type FinalizeOptions,
  type MandatoryParameter,
} from './deleteBlob/types.js';

/** Status check shared by operations. */
export { checkStatusAndExtract, type ExtractedResponse } from './checkStatus.js';

/** Lease token validation. */
export { type LeaseId, LeaseIdSchema, parseLeaseId } from './lease.js';
