import { describe, expect, it } from 'vitest';
import { getUnexpectedStatusError, isUnexpectedStatusError, UnexpectedStatusError } from './unexpectedStatusError.js';

const notFoundBody =
  '<?xml version="1.0" encoding="utf-8"?><Error><Code>BlobNotFound</Code><Message>The specified blob does not exist.</Message></Error>';

describe('UnexpectedStatusError', () => {
  it('carries status and body', () => {
    const err = new UnexpectedStatusError(404, notFoundBody);

    expect(err.status).toBe(404);
    expect(err.body).toBe(notFoundBody);
    expect(err.message).toBe('error unexpected status 404');
  });

  it('reads the error code from the x-ms-error-code header first', () => {
    const err = new UnexpectedStatusError(404, notFoundBody, {
      headers: new Headers({ 'x-ms-error-code': 'ContainerNotFound', 'x-ms-request-id': 'req-1' }),
    });

    expect(err.errorCode).toBe('ContainerNotFound');
    expect(err.requestId).toBe('req-1');
  });

  it('falls back to the <Code> element of the body', () => {
    const err = new UnexpectedStatusError(404, notFoundBody);

    expect(err.errorCode).toBe('BlobNotFound');
    expect(err.requestId).toBeUndefined();
  });

  it('has no error code for an empty body', () => {
    expect(new UnexpectedStatusError(500, '').errorCode).toBeUndefined();
  });

  it('returns a copy of the headers', () => {
    const err = new UnexpectedStatusError(412, '', { headers: new Headers({ 'x-ms-request-id': 'req-2' }) });
    err.headers.set('x-ms-request-id', 'changed');

    expect(err.requestId).toBe('req-2');
  });

  it('is recognised directly and through causes', () => {
    const err = new UnexpectedStatusError(409, '');

    expect(isUnexpectedStatusError(err)).toBe(true);
    expect(getUnexpectedStatusError(new Error('outer', { cause: err }))).toBe(err);
    expect(isUnexpectedStatusError(new Error('boom'))).toBe(false);
  });
});
