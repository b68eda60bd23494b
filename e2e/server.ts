import { Hono } from 'hono';
import type { FetchImplementation } from '../src/index.js';

/** A blob as the fake service holds it. */
export interface FakeBlob {
  snapshots: number;
  leaseId?: string;
}

/** What the fake service saw of a request. */
export interface RecordedRequest {
  method: string;
  path: string;
  query: Record<string, string>;
  headers: Record<string, string>;
}

export interface FakeBlobServiceOptions {
  /** Answer with `x-ms-delete-type-permanent`, as soft-delete accounts do. */
  softDelete?: boolean;
}

export type FakeBlobService = {
  app: Hono;
  /** Routes client requests into the app without opening a port. */
  fetch: FetchImplementation;
  putBlob: (container: string, blob: string, blobState?: Partial<FakeBlob>) => void;
  getBlob: (container: string, blob: string) => FakeBlob | undefined;
  requests: RecordedRequest[];
  reset: () => void;
};

function storageError(status: number, code: string, message: string, requestId: string): Response {
  return new Response(
    `<?xml version="1.0" encoding="utf-8"?><Error><Code>${code}</Code><Message>${message}</Message></Error>`,
    {
      status,
      headers: {
        'content-type': 'application/xml',
        'x-ms-error-code': code,
        'x-ms-request-id': requestId,
      },
    },
  );
}

/**
 * In-process stand-in for the blob service, covering Delete Blob with
 * snapshots and leases.
 */
export function createFakeBlobService(opts: FakeBlobServiceOptions = {}): FakeBlobService {
  const blobs = new Map<string, FakeBlob>();
  const requests: RecordedRequest[] = [];
  let requestCount = 0;
  const app = new Hono();

  const keyOf = (container: string, blob: string) => `${container}/${blob}`;

  app.delete('/:container/:blob{.+}', (c) => {
    requestCount += 1;
    const requestId = `request-${requestCount}`;
    const container = c.req.param('container');
    const blob = c.req.param('blob');
    const headers = c.req.header();

    requests.push({ method: c.req.method, path: c.req.path, query: c.req.query(), headers });

    if (!headers['x-ms-version']) {
      return storageError(400, 'MissingRequiredHeader', 'x-ms-version is required', requestId);
    }

    const timeout = c.req.query('timeout');
    if (timeout !== undefined && !/^\d+$/.test(timeout)) {
      return storageError(400, 'InvalidQueryParameterValue', 'timeout must be an integer', requestId);
    }

    const method = headers['x-ms-delete-snapshots'];
    if (method !== undefined && method !== 'include' && method !== 'only') {
      return storageError(400, 'InvalidHeaderValue', 'x-ms-delete-snapshots is invalid', requestId);
    }

    const key = keyOf(container, blob);
    const stored = blobs.get(key);
    if (!stored) {
      return storageError(404, 'BlobNotFound', 'The specified blob does not exist.', requestId);
    }

    const leaseId = headers['x-ms-lease-id'];
    if (stored.leaseId !== undefined && leaseId === undefined) {
      return storageError(412, 'LeaseIdMissing', 'There is currently a lease on the blob.', requestId);
    }

    if (stored.leaseId !== undefined && leaseId !== stored.leaseId) {
      return storageError(412, 'LeaseIdMismatchWithBlobOperation', 'The lease ID does not match.', requestId);
    }

    if (stored.leaseId === undefined && leaseId !== undefined) {
      return storageError(412, 'LeaseNotPresentWithBlobOperation', 'There is currently no lease.', requestId);
    }

    if (stored.snapshots > 0 && method === undefined) {
      return storageError(409, 'SnapshotsPresent', 'This operation is not permitted because the blob has snapshots.', requestId);
    }

    if (method === 'only') {
      stored.snapshots = 0;
    } else {
      blobs.delete(key);
    }

    const response = new Headers({
      'x-ms-request-id': requestId,
      'x-ms-version': headers['x-ms-version'],
      date: new Date().toUTCString(),
    });

    const clientRequestId = headers['x-ms-client-request-id'];
    if (clientRequestId !== undefined) {
      response.set('x-ms-client-request-id', clientRequestId);
    }

    if (opts.softDelete) {
      response.set('x-ms-delete-type-permanent', 'false');
    }

    return new Response(null, { status: 202, headers: response });
  });

  return {
    app,
    fetch: async (input, init) => app.request(input, init),
    putBlob: (container, blob, blobState = {}) => {
      blobs.set(keyOf(container, blob), { snapshots: 0, ...blobState });
    },
    getBlob: (container, blob) => blobs.get(keyOf(container, blob)),
    requests,
    reset: () => {
      blobs.clear();
      requests.length = 0;
      requestCount = 0;
    },
  };
}
