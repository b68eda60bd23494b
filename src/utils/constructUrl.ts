import { ConstructURLError } from '../error/constructUrlError.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/** Container/blob identifiers of a storage resource. */
export interface ResourcePath {
  /** Container name */
  container: string;
  /** Blob name, `/` separates virtual directories */
  blob?: string;
}

/** Query parameters, `undefined` values are left out. */
export type SearchParams = Record<string, string | number | boolean | undefined>;

/** URL parsing collapses these, so the request would address another resource. */
function isDotSegment(segment: string): boolean {
  return segment === '.' || segment === '..';
}

/**
 * Builds `<endpoint>/<container>[/<blob>][?<search>]`.
 *
 * The container and every `/`-separated segment of the blob are percent-encoded,
 * so virtual directories survive. The endpoint must be an absolute http(s) URL
 * without query or fragment.
 */
export function generateResourceUri(
  endpoint: string,
  path: ResourcePath,
  search: SearchParams = {},
): SafeWrap<ConstructURLError, string> {
  const [errEndpoint, url] = safeWrap(() => new URL(endpoint));
  if (errEndpoint) {
    return [new ConstructURLError('error constructing URI, invalid endpoint', endpoint, { cause: errEndpoint }), null];
  }

  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    return [new ConstructURLError(`error constructing URI, unsupported protocol ${url.protocol}`, endpoint), null];
  }

  if (url.search || url.hash) {
    return [new ConstructURLError('error constructing URI, endpoint contains query or fragment', endpoint), null];
  }

  if (!path.container) {
    return [new ConstructURLError('error constructing URI, container name is empty', endpoint), null];
  }

  if (path.blob === '') {
    return [new ConstructURLError('error constructing URI, blob name is empty', `${endpoint}/${path.container}`), null];
  }

  const names = [path.container, ...(path.blob?.split('/') ?? [])];
  if (names.some(isDotSegment)) {
    return [new ConstructURLError('error constructing URI, name has a . or .. segment', endpoint), null];
  }

  const [errEncode, segments] = safeWrap(() => {
    const encoded = [encodeURIComponent(path.container)];
    if (path.blob !== undefined) {
      encoded.push(path.blob.split('/').map(encodeURIComponent).join('/'));
    }

    return encoded;
  });
  if (errEncode) {
    return [new ConstructURLError('error constructing URI, name cannot be encoded', endpoint, { cause: errEncode }), null];
  }

  let result = `${url.origin}${url.pathname.replace(/\/+$/, '')}/${segments.join('/')}`;

  const searchParams = new URLSearchParams();
  for (const [key, value] of Object.entries(search)) {
    if (value === undefined) {
      continue;
    }

    searchParams.set(key, String(value));
  }

  const query = searchParams.toString();
  if (query) {
    result += `?${query}`;
  }

  return [null, result];
}
