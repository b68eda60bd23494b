import type { ConstructURLError } from '../../error/constructUrlError.js';
import { MissingParameterError } from '../../error/missingParameterError.js';
import { TransportError } from '../../error/transportError.js';
import { isValidHeaderValue } from '../../fetch/utils.js';
import type { StorageClientDefinition } from '../../types/request.js';
import type { SafeWrap, SafeWrapAsync } from '../../utils/wrap.js';
import { checkStatusAndExtract } from '../checkStatus.js';
import { buildDeleteBlobRequest, DELETE_BLOB_EXPECTED_STATUS, deleteBlobHeaders } from './request.js';
import { DeleteBlobResponse } from './response.js';
import {
  type CompleteDeleteBlobParameters,
  type DeleteBlobError,
  type DeleteBlobParameters,
  type DeleteBlobRequest,
  DeleteSnapshotsMethod,
  type FinalizeOptions,
  MANDATORY_PARAMETERS,
  type MandatoryParameter,
} from './types.js';

/** Which mandatory parameters have been supplied, mirrored in the builder's type parameters. */
type Assigned<ContainerNameSet extends boolean, BlobNameSet extends boolean, DeleteSnapshotsMethodSet extends boolean> = {
  readonly containerName: ContainerNameSet;
  readonly blobName: BlobNameSet;
  readonly deleteSnapshotsMethod: DeleteSnapshotsMethodSet;
};

/** A builder with every mandatory parameter supplied. */
export type CompleteDeleteBlobBuilder = DeleteBlobBuilder<true, true, true>;

const SNAPSHOT_METHODS: readonly string[] = Object.values(DeleteSnapshotsMethod);

function assertHeaderValue(field: string, value: string): void {
  if (!isValidHeaderValue(value)) {
    throw new TypeError(`error invalid ${field}, it cannot be sent as a header value`);
  }
}

function isDeleteSnapshotsMethod(value: unknown): value is DeleteSnapshotsMethod {
  return typeof value === 'string' && SNAPSHOT_METHODS.includes(value);
}

/**
 * Immutable builder for a Delete Blob request.
 *
 * Container name, blob name and the delete-snapshots method are mandatory. Each
 * one flips its type parameter to `true` once supplied, and {@link finalize} only
 * type-checks on a {@link CompleteDeleteBlobBuilder}. The same completeness is kept
 * at run time, so a builder reached around the type system still fails before
 * anything goes on the wire.
 *
 * @example
 * const [err, response] = await client
 *   .deleteBlob()
 *   .withContainerName('photos')
 *   .withBlobName('2024/beach.jpg')
 *   .withDeleteSnapshotsMethod(DeleteSnapshotsMethod.Include)
 *   .finalize();
 */
export class DeleteBlobBuilder<
  ContainerNameSet extends boolean = false,
  BlobNameSet extends boolean = false,
  DeleteSnapshotsMethodSet extends boolean = false,
> {
  #client: StorageClientDefinition;
  #params: DeleteBlobParameters;
  #assigned: Assigned<ContainerNameSet, BlobNameSet, DeleteSnapshotsMethodSet>;

  private constructor(
    client: StorageClientDefinition,
    params: DeleteBlobParameters,
    assigned: Assigned<ContainerNameSet, BlobNameSet, DeleteSnapshotsMethodSet>,
  ) {
    this.#client = client;
    this.#params = Object.freeze({ ...params });
    this.#assigned = Object.freeze({ ...assigned });
    Object.freeze(this);
  }

  /**
   * Starts an empty builder. The delete-snapshots method starts out as
   * `include` but still has to be chosen explicitly.
   */
  static create(client: StorageClientDefinition): DeleteBlobBuilder<false, false, false> {
    return new DeleteBlobBuilder<false, false, false>(
      client,
      { deleteSnapshotsMethod: DeleteSnapshotsMethod.Include },
      { containerName: false, blobName: false, deleteSnapshotsMethod: false },
    );
  }

  withContainerName(containerName: string): DeleteBlobBuilder<true, BlobNameSet, DeleteSnapshotsMethodSet> {
    return new DeleteBlobBuilder<true, BlobNameSet, DeleteSnapshotsMethodSet>(
      this.#client,
      { ...this.#params, containerName },
      { ...this.#assigned, containerName: true },
    );
  }

  withBlobName(blobName: string): DeleteBlobBuilder<ContainerNameSet, true, DeleteSnapshotsMethodSet> {
    return new DeleteBlobBuilder<ContainerNameSet, true, DeleteSnapshotsMethodSet>(
      this.#client,
      { ...this.#params, blobName },
      { ...this.#assigned, blobName: true },
    );
  }

  /**
   * @throws {TypeError} when called with something other than `include` or `only`.
   */
  withDeleteSnapshotsMethod(
    deleteSnapshotsMethod: DeleteSnapshotsMethod,
  ): DeleteBlobBuilder<ContainerNameSet, BlobNameSet, true> {
    if (!isDeleteSnapshotsMethod(deleteSnapshotsMethod)) {
      throw new TypeError(`error invalid delete snapshots method ${String(deleteSnapshotsMethod)}`);
    }

    return new DeleteBlobBuilder<ContainerNameSet, BlobNameSet, true>(
      this.#client,
      { ...this.#params, deleteSnapshotsMethod },
      { ...this.#assigned, deleteSnapshotsMethod: true },
    );
  }

  /**
   * Server-side timeout, sent as the `timeout` query parameter.
   *
   * @param seconds - non-negative integer
   * @throws {RangeError} for negative, fractional or unsafe values.
   */
  withTimeout(seconds: number): DeleteBlobBuilder<ContainerNameSet, BlobNameSet, DeleteSnapshotsMethodSet> {
    if (!Number.isSafeInteger(seconds) || seconds < 0) {
      throw new RangeError(`error timeout must be a non-negative integer of seconds, got ${seconds}`);
    }

    return this.#with({ timeout: seconds });
  }

  /**
   * Required by the service when the blob holds an active lease.
   *
   * @throws {TypeError} for values containing NUL, CR, LF or characters above U+00FF.
   */
  withLeaseId(leaseId: string): DeleteBlobBuilder<ContainerNameSet, BlobNameSet, DeleteSnapshotsMethodSet> {
    assertHeaderValue('lease id', leaseId);
    return this.#with({ leaseId });
  }

  /**
   * @throws {TypeError} for values containing NUL, CR, LF or characters above U+00FF.
   */
  withClientRequestId(clientRequestId: string): DeleteBlobBuilder<ContainerNameSet, BlobNameSet, DeleteSnapshotsMethodSet> {
    assertHeaderValue('client request id', clientRequestId);
    return this.#with({ clientRequestId });
  }

  /** Client the request will be issued through. */
  client(): StorageClientDefinition {
    return this.#client;
  }

  /** @throws {MissingParameterError} when the container name was never supplied. */
  containerName(this: DeleteBlobBuilder<true, boolean, boolean>): string {
    const { containerName } = this.#params;
    if (!this.#assigned.containerName || containerName === undefined) {
      throw new MissingParameterError('containerName');
    }

    return containerName;
  }

  /** @throws {MissingParameterError} when the blob name was never supplied. */
  blobName(this: DeleteBlobBuilder<boolean, true, boolean>): string {
    const { blobName } = this.#params;
    if (!this.#assigned.blobName || blobName === undefined) {
      throw new MissingParameterError('blobName');
    }

    return blobName;
  }

  /** @throws {MissingParameterError} when the method was never chosen explicitly. */
  deleteSnapshotsMethod(this: DeleteBlobBuilder<boolean, boolean, true>): DeleteSnapshotsMethod {
    if (!this.#assigned.deleteSnapshotsMethod) {
      throw new MissingParameterError('deleteSnapshotsMethod');
    }

    return this.#params.deleteSnapshotsMethod;
  }

  timeout(): number | undefined {
    return this.#params.timeout;
  }

  leaseId(): string | undefined {
    return this.#params.leaseId;
  }

  clientRequestId(): string | undefined {
    return this.#params.clientRequestId;
  }

  /** Frozen snapshot of every parameter, supplied or not. */
  parameters(): Readonly<DeleteBlobParameters> {
    return this.#params;
  }

  /** First unset mandatory parameter, in check order, or `null` when complete. */
  missingParameter(): MandatoryParameter | null {
    return MANDATORY_PARAMETERS.find((field) => !this.#assigned[field]) ?? null;
  }

  /** Narrows a builder of unknown state to a {@link CompleteDeleteBlobBuilder}. */
  isComplete(): this is CompleteDeleteBlobBuilder {
    return this.missingParameter() === null;
  }

  /**
   * Method, URI and operation headers this builder would send, without sending them.
   */
  toRequest(this: CompleteDeleteBlobBuilder): SafeWrap<MissingParameterError | ConstructURLError, DeleteBlobRequest> {
    const [errParams, params] = this.#resolve();
    if (errParams) {
      return [errParams, null];
    }

    return buildDeleteBlobRequest(this.#client.blobEndpoint, params);
  }

  /**
   * Issues the delete and decodes the result.
   *
   * Pipeline: completeness check, URI, headers, one request through the client,
   * status check against 202, header decoding. Every failure comes back as the
   * first tuple element; nothing is retried.
   */
  async finalize(
    this: CompleteDeleteBlobBuilder,
    opts: FinalizeOptions = {},
  ): SafeWrapAsync<DeleteBlobError, DeleteBlobResponse> {
    const [errParams, params] = this.#resolve();
    if (errParams) {
      return [errParams, null];
    }

    const logger = this.#client.logger;
    const [errRequest, request] = buildDeleteBlobRequest(this.#client.blobEndpoint, params);
    if (errRequest) {
      return [errRequest, null];
    }

    logger.trace({ uri: request.uri }, 'delete blob uri');

    const [errPerform, response] = await this.#client.performRequest(
      request.uri,
      request.method,
      deleteBlobHeaders(params),
      null,
      opts,
    );
    if (errPerform) {
      return [
        errPerform instanceof TransportError
          ? errPerform
          : new TransportError('error performing delete blob request', { cause: errPerform }),
        null,
      ];
    }

    const [errStatus, extracted] = await checkStatusAndExtract(response, DELETE_BLOB_EXPECTED_STATUS);
    if (errStatus) {
      logger.warn(
        { err: errStatus, container: params.containerName, blob: params.blobName },
        'delete blob returned an error',
      );
      return [errStatus, null];
    }

    return DeleteBlobResponse.fromHeaders(extracted.headers);
  }

  /** Copy with some optional parameters replaced; completeness is unchanged. */
  #with(
    changes: Partial<Pick<DeleteBlobParameters, 'timeout' | 'leaseId' | 'clientRequestId'>>,
  ): DeleteBlobBuilder<ContainerNameSet, BlobNameSet, DeleteSnapshotsMethodSet> {
    return new DeleteBlobBuilder<ContainerNameSet, BlobNameSet, DeleteSnapshotsMethodSet>(
      this.#client,
      { ...this.#params, ...changes },
      this.#assigned,
    );
  }

  /** Mandatory parameters in check order, or the first one missing. */
  #resolve(): SafeWrap<MissingParameterError, CompleteDeleteBlobParameters> {
    const missing = this.missingParameter();
    if (missing) {
      return [new MissingParameterError(missing), null];
    }

    const { containerName, blobName } = this.#params;
    if (containerName === undefined) {
      return [new MissingParameterError('containerName'), null];
    }

    if (blobName === undefined) {
      return [new MissingParameterError('blobName'), null];
    }

    return [null, { ...this.#params, containerName, blobName }];
  }
}
