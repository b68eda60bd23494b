import z from 'zod';
import type { ValidationError } from '../error/validationError.js';
import { validator } from '../utils/validator.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Lease tokens are GUIDs issued by the service when a lease is acquired. */
export const LeaseIdSchema = z.string().uuid('lease id must be a GUID').brand<'LeaseId'>();

export type LeaseId = z.output<typeof LeaseIdSchema>;

/**
 * Checks that a value is a lease token before it is sent as `x-ms-lease-id`.
 */
export function parseLeaseId(value: unknown): SafeWrapAsync<ValidationError, LeaseId> {
  return validator(value, LeaseIdSchema);
}
