import { describe, expect, it } from 'vitest';
import { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';

describe('ConstructURLError', () => {
  it('exposes url via getter', () => {
    const err = new ConstructURLError('bad url', 'https://account.blob.core.windows.net/');
    expect(err.url).toBe('https://account.blob.core.windows.net/');
    expect(err.name).toBe('ConstructURLError');
  });

  it('is recognised directly and through causes', () => {
    const err = new ConstructURLError('bad url', 'not a url');
    const wrapped = new Error('outer', { cause: err });

    expect(isConstructURLError(err)).toBe(true);
    expect(getConstructURLError(wrapped)).toBe(err);
  });

  it('returns null when no ConstructURLError exists', () => {
    const wrapped = new Error('outer', { cause: new Error('inner') });
    expect(getConstructURLError(wrapped)).toBeNull();
    expect(isConstructURLError(new Error('boom'))).toBe(false);
  });
});
