import { describe, expect, it } from 'vitest';
import { ConstructURLError } from '../error/constructUrlError.js';
import { generateResourceUri } from './constructUrl.js';

const endpoint = 'https://account.blob.core.windows.net';

describe('generateResourceUri', () => {
  it('joins endpoint, container and blob', () => {
    const [err, uri] = generateResourceUri(endpoint, { container: 'c', blob: 'b' });

    expect(err).toBeNull();
    expect(uri).toBe('https://account.blob.core.windows.net/c/b');
  });

  it('ignores a trailing slash on the endpoint', () => {
    const [, uri] = generateResourceUri(`${endpoint}/`, { container: 'c', blob: 'b' });

    expect(uri).toBe('https://account.blob.core.windows.net/c/b');
  });

  it('keeps an endpoint path such as an emulator account segment', () => {
    const [, uri] = generateResourceUri('http://127.0.0.1:10000/devstoreaccount1', { container: 'c', blob: 'b' });

    expect(uri).toBe('http://127.0.0.1:10000/devstoreaccount1/c/b');
  });

  it('encodes names but keeps virtual directories', () => {
    const [, uri] = generateResourceUri(endpoint, { container: 'photos', blob: 'summer 2024/beach#1.jpg' });

    expect(uri).toBe('https://account.blob.core.windows.net/photos/summer%202024/beach%231.jpg');
  });

  it('builds a container-only URI when no blob is given', () => {
    const [, uri] = generateResourceUri(endpoint, { container: 'c' });

    expect(uri).toBe('https://account.blob.core.windows.net/c');
  });

  it('appends defined search params only', () => {
    const [, uri] = generateResourceUri(endpoint, { container: 'c', blob: 'b' }, { timeout: 30, snapshot: undefined });

    expect(uri).toBe('https://account.blob.core.windows.net/c/b?timeout=30');
  });

  it('errors on an invalid endpoint', () => {
    const [err, uri] = generateResourceUri('not a url', { container: 'c', blob: 'b' });

    expect(uri).toBeNull();
    expect(err).toBeInstanceOf(ConstructURLError);
    expect(err?.url).toBe('not a url');
    expect(err?.message).toBe('error constructing URI, invalid endpoint');
  });

  it('errors on a non-http endpoint', () => {
    const [err] = generateResourceUri('ftp://account.blob.core.windows.net', { container: 'c', blob: 'b' });

    expect(err?.message).toBe('error constructing URI, unsupported protocol ftp:');
  });

  it('errors on an endpoint carrying a query', () => {
    const [err] = generateResourceUri(`${endpoint}?sv=1`, { container: 'c', blob: 'b' });

    expect(err?.message).toBe('error constructing URI, endpoint contains query or fragment');
  });

  it('errors on empty names', () => {
    const [errContainer] = generateResourceUri(endpoint, { container: '', blob: 'b' });
    const [errBlob] = generateResourceUri(endpoint, { container: 'c', blob: '' });

    expect(errContainer?.message).toBe('error constructing URI, container name is empty');
    expect(errBlob?.message).toBe('error constructing URI, blob name is empty');
    expect(errBlob?.url).toBe('https://account.blob.core.windows.net/c');
  });

  it.each([
    ['x/../y', 'c'],
    ['./b', 'c'],
    ['a/.', 'c'],
    ['..', 'c'],
    ['b', '..'],
  ])('errors on dot segments in blob %j of container %j', (blob, container) => {
    const [err, uri] = generateResourceUri(endpoint, { container, blob });

    expect(uri).toBeNull();
    expect(err?.message).toBe('error constructing URI, name has a . or .. segment');
  });

  it('keeps dots inside a segment and encodes escaped dots', () => {
    const [, dotted] = generateResourceUri(endpoint, { container: 'c', blob: 'a/..b/.hidden' });
    const [, escaped] = generateResourceUri(endpoint, { container: 'c', blob: 'x/%2E%2E/y' });

    expect(dotted).toBe('https://account.blob.core.windows.net/c/a/..b/.hidden');
    expect(escaped).toBe('https://account.blob.core.windows.net/c/x/%252E%252E/y');
  });

  it('errors on names that cannot be encoded', () => {
    const [err] = generateResourceUri(endpoint, { container: 'c', blob: '\uD800' });

    expect(err?.message).toBe('error constructing URI, name cannot be encoded');
    expect(err?.cause).toBeInstanceOf(URIError);
  });
});
