import type { ConstructURLError } from '../../error/constructUrlError.js';
import type { HeaderMutator } from '../../types/request.js';
import { generateResourceUri } from '../../utils/constructUrl.js';
import type { SafeWrap } from '../../utils/wrap.js';
import type { CompleteDeleteBlobParameters, DeleteBlobRequest } from './types.js';

/** Status the service answers a successful delete with. */
export const DELETE_BLOB_EXPECTED_STATUS = 202;

export const DeleteBlobHeaders = {
  deleteSnapshots: 'x-ms-delete-snapshots',
  leaseId: 'x-ms-lease-id',
  clientRequestId: 'x-ms-client-request-id',
} as const;

/**
 * `<endpoint>/<container>/<blob>`, with `?timeout=<seconds>` when a timeout is set.
 * No other query parameter is ever added.
 */
export function buildDeleteBlobUri(
  blobEndpoint: string,
  params: CompleteDeleteBlobParameters,
): SafeWrap<ConstructURLError, string> {
  return generateResourceUri(
    blobEndpoint,
    { container: params.containerName, blob: params.blobName },
    { timeout: params.timeout },
  );
}

/**
 * Header mutator for a delete: the snapshot directive always, lease and
 * client request id only when set, in that order.
 */
export function deleteBlobHeaders(params: CompleteDeleteBlobParameters): HeaderMutator {
  return (headers) => {
    headers.set(DeleteBlobHeaders.deleteSnapshots, params.deleteSnapshotsMethod);

    if (params.leaseId !== undefined) {
      headers.set(DeleteBlobHeaders.leaseId, params.leaseId);
    }

    if (params.clientRequestId !== undefined) {
      headers.set(DeleteBlobHeaders.clientRequestId, params.clientRequestId);
    }

    return headers;
  };
}

/**
 * Method, URI and operation headers of a delete, without touching the network.
 */
export function buildDeleteBlobRequest(
  blobEndpoint: string,
  params: CompleteDeleteBlobParameters,
): SafeWrap<ConstructURLError, DeleteBlobRequest> {
  const [errUri, uri] = buildDeleteBlobUri(blobEndpoint, params);
  if (errUri) {
    return [errUri, null];
  }

  return [null, { method: 'DELETE', uri, headers: deleteBlobHeaders(params)(new Headers()) }];
}
