import z from 'zod';
import { ResponseParseError } from '../../error/responseParseError.js';
import { headersToRecord } from '../../fetch/utils.js';
import { validator } from '../../utils/validator.js';
import type { SafeWrapAsync } from '../../utils/wrap.js';

const httpDate = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), 'invalid HTTP date')
  .transform((value) => new Date(value));

/** Headers of a successful delete, keys lower-cased. */
export const DeleteBlobResponseHeadersSchema = z.object({
  'x-ms-request-id': z.string().min(1),
  'x-ms-client-request-id': z.string().optional(),
  'x-ms-version': z.string().optional(),
  date: httpDate.optional(),
  'x-ms-delete-type-permanent': z
    .enum(['true', 'false'])
    .transform((value) => value === 'true')
    .optional(),
});

/** Fields of a {@link DeleteBlobResponse}. */
export interface DeleteBlobResponseFields {
  /** Server-assigned request id. */
  requestId: string;
  /** Echo of the client request id, when one was sent. */
  clientRequestId?: string;
  /** Service version that handled the request. */
  version?: string;
  date?: Date;
  /** Set by accounts with soft delete: whether the blob is gone for good. */
  deleteTypePermanent?: boolean;
}

/**
 * Result of a successful delete, decoded from the response headers.
 */
export class DeleteBlobResponse implements DeleteBlobResponseFields {
  readonly requestId: string;
  readonly clientRequestId?: string;
  readonly version?: string;
  readonly date?: Date;
  readonly deleteTypePermanent?: boolean;

  constructor(fields: DeleteBlobResponseFields) {
    this.requestId = fields.requestId;
    this.clientRequestId = fields.clientRequestId;
    this.version = fields.version;
    this.date = fields.date;
    this.deleteTypePermanent = fields.deleteTypePermanent;
  }

  /**
   * Decodes the response headers. A missing request id or a malformed value
   * returns a {@link ResponseParseError} carrying the validation issues.
   */
  static async fromHeaders(headers: Headers): SafeWrapAsync<ResponseParseError, DeleteBlobResponse> {
    const [errParse, parsed] = await validator(headersToRecord(headers), DeleteBlobResponseHeadersSchema);
    if (errParse) {
      return [new ResponseParseError('error parsing delete blob response headers', { cause: errParse }), null];
    }

    return [
      null,
      new DeleteBlobResponse({
        requestId: parsed['x-ms-request-id'],
        clientRequestId: parsed['x-ms-client-request-id'],
        version: parsed['x-ms-version'],
        date: parsed.date,
        deleteTypePermanent: parsed['x-ms-delete-type-permanent'],
      }),
    ];
  }
}
