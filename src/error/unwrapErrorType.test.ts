import { describe, expect, it } from 'vitest';
import { MissingParameterError } from './missingParameterError.js';
import { TransportError } from './transportError.js';
import { UnexpectedStatusError } from './unexpectedStatusError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

class TargetError extends Error {}

class OtherError extends Error {}

class PrefixedError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(`${PrefixedError.name}: ${message}`, options);
  }
}

describe('unwrapErrorType', () => {
  it('returns null for non-errors', () => {
    expect(unwrapErrorType(TargetError, { foo: 'bar' })).toBeNull();
    expect(unwrapErrorType(TargetError, 'TargetError')).toBeNull();
    expect(unwrapErrorType(TargetError, null)).toBeNull();
  });

  it('returns the error itself when it matches', () => {
    const err = new MissingParameterError('blobName');

    expect(unwrapErrorType(MissingParameterError, err)).toBe(err);
  });

  it('follows cause chains', () => {
    const status = new UnexpectedStatusError(404, '');
    const wrapped = new Error('outer', { cause: new Error('middle', { cause: status }) });

    expect(unwrapErrorType(UnexpectedStatusError, wrapped)).toBe(status);
  });

  it('stops at the first match in the chain', () => {
    const inner = new TransportError('inner');
    const outer = new TransportError('outer', { cause: inner });

    expect(unwrapErrorType(TransportError, outer)).toBe(outer);
  });

  it('returns null when nothing in the chain matches', () => {
    const err = new OtherError('err2', { cause: new Error('err1') });

    expect(unwrapErrorType(TargetError, err)).toBeNull();
  });

  it('matches by name when prototypes differ', () => {
    const err = new OtherError('boom');
    Object.defineProperty(err, 'name', { value: TargetError.name });

    expect(unwrapErrorType(TargetError, err)).toBe(err);
  });

  it('matches a message re-wrapped error carrying the class name as prefix', () => {
    const original = new PrefixedError('lost');
    const rewrapped = new Error(original.message);

    expect(unwrapErrorType(PrefixedError, rewrapped)).toBe(rewrapped);
  });
});
