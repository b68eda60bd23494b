import type { HeaderOptions } from '../types/request.js';

/** Headers whose values never reach the logs. */
const REDACTED_HEADERS = new Set(['authorization', 'x-ms-lease-id', 'x-ms-copy-source-authorization']);

/**
 * Filters out unsupported values and turns remaining into strings.
 */
function sanitize(value: unknown): string | null {
  const type = typeof value;
  return type === 'object' || type === 'function' || type === 'symbol' ? null : String(value);
}

/**
 * Normalizes the different header container shapes into a consistent iterable.
 */
function toEntries(headers?: HeaderOptions): Iterable<[string, unknown]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  if (Array.isArray(headers)) {
    return headers.map(([key, value]): [string, unknown] => [key, value]);
  }

  return Object.entries(headers);
}

/**
 * Merge global and local headers into a single `Headers` instance, normalizing keys.
 * A `null` value removes whatever an earlier source set for that key.
 */
export function mergeHeaderOptions(globalHeaders?: HeaderOptions, localHeaders?: HeaderOptions): Headers {
  const merged = new Headers();

  for (const [key, value] of [...toEntries(globalHeaders), ...toEntries(localHeaders)]) {
    if (value == null) {
      merged.delete(key);
      continue;
    }

    const clean = sanitize(value);
    if (clean !== null) {
      merged.set(key, clean);
    }
  }

  return merged;
}

/** NUL, CR, LF, or anything outside Latin-1. */
const INVALID_HEADER_VALUE = /[\0\r\n\u0100-\uffff]/;

/**
 * Whether `Headers` accepts the string as a header value.
 */
export function isValidHeaderValue(value: string): boolean {
  return !INVALID_HEADER_VALUE.test(value);
}

/**
 * Lower-cased plain-object view of a `Headers` instance.
 */
export function headersToRecord(headers: Headers): Record<string, string> {
  return Object.fromEntries(headers.entries());
}

/**
 * Plain-object view of headers safe for logging.
 */
export function redactHeaders(headers: Headers): Record<string, string> {
  const record = headersToRecord(headers);
  for (const key of Object.keys(record)) {
    if (REDACTED_HEADERS.has(key)) {
      record[key] = '[redacted]';
    }
  }

  return record;
}
