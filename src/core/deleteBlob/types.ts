import type { ConstructURLError } from '../../error/constructUrlError.js';
import type { MissingParameterError } from '../../error/missingParameterError.js';
import type { ResponseParseError } from '../../error/responseParseError.js';
import type { TransportError } from '../../error/transportError.js';
import type { UnexpectedStatusError } from '../../error/unexpectedStatusError.js';
import type { HttpMethod } from '../../types/request.js';

/**
 * What happens to a blob's snapshots on delete. A blob that has snapshots
 * cannot be deleted without one of these; the service enforces that.
 */
export const DeleteSnapshotsMethod = {
  /** Delete the blob and all of its snapshots. */
  Include: 'include',
  /** Delete only the snapshots, keep the base blob. */
  Only: 'only',
} as const;

export type DeleteSnapshotsMethod = (typeof DeleteSnapshotsMethod)[keyof typeof DeleteSnapshotsMethod];

/** Parameters the builder accumulates. */
export interface DeleteBlobParameters {
  readonly containerName?: string;
  readonly blobName?: string;
  readonly deleteSnapshotsMethod: DeleteSnapshotsMethod;
  /** Server-side timeout in seconds. */
  readonly timeout?: number;
  readonly leaseId?: string;
  readonly clientRequestId?: string;
}

/** Parameters of a builder whose mandatory fields are all supplied. */
export interface CompleteDeleteBlobParameters extends DeleteBlobParameters {
  readonly containerName: string;
  readonly blobName: string;
}

/** Mandatory parameters, in the order they are checked. */
export const MANDATORY_PARAMETERS = ['containerName', 'blobName', 'deleteSnapshotsMethod'] as const;

export type MandatoryParameter = (typeof MANDATORY_PARAMETERS)[number];

/** Wire-level description of a delete blob request. */
export interface DeleteBlobRequest {
  method: Extract<HttpMethod, 'DELETE'>;
  uri: string;
  /** Operation headers only; the client adds its defaults on top. */
  headers: Headers;
}

/** Options for a single `finalize` call. */
export interface FinalizeOptions {
  /** Cancels the request while it is in flight. */
  signal?: AbortSignal;
}

/** Every error `finalize` can resolve with. */
export type DeleteBlobError =
  | MissingParameterError
  | ConstructURLError
  | TransportError
  | UnexpectedStatusError
  | ResponseParseError;
