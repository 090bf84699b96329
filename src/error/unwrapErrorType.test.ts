import { describe, expect, it } from 'vitest';
import { HTTPError } from './httpError.js';
import { RetryExhaustedError } from './retryError.js';
import { TimeoutError } from './timeoutError.js';
import { findError, unwrapErrorType } from './unwrapErrorType.js';

describe('unwrapErrorType', () => {
  it('returns null for non-error values', () => {
    expect(unwrapErrorType(TimeoutError, { name: 'TimeoutError' })).toBeNull();
    expect(unwrapErrorType(TimeoutError, 'TimeoutError')).toBeNull();
    expect(unwrapErrorType(TimeoutError, undefined)).toBeNull();
  });

  it('returns the error itself when it matches', () => {
    const err = new TimeoutError('timed out');
    expect(unwrapErrorType(TimeoutError, err)).toBe(err);
  });

  it('finds the HTTPError under a retry outcome and a wrapper', () => {
    const http = new HTTPError({ status: 500, statusText: 'Internal Server Error' }, 'upstream down');
    const exhausted = new RetryExhaustedError('error retries exhausted', 4, { cause: http });
    const wrapped = new Error('error doing request in chatCompletion', { cause: exhausted });

    expect(unwrapErrorType(HTTPError, wrapped)).toBe(http);
    expect(unwrapErrorType(RetryExhaustedError, wrapped)?.attempts).toBe(4);
  });

  it('returns the outermost match when the type repeats', () => {
    const inner = new TimeoutError('inner');
    const outer = new TimeoutError('outer', { cause: inner });

    expect(unwrapErrorType(TimeoutError, outer)).toBe(outer);
  });

  it('stops at a non-error cause', () => {
    const wrapped = new Error('outer', { cause: { message: 'not an error' } });
    expect(unwrapErrorType(TimeoutError, wrapped)).toBeNull();
  });

  it('terminates on cause cycles', () => {
    const a = new Error('a');
    const b = new Error('b', { cause: a });
    a.cause = b;

    expect(unwrapErrorType(TimeoutError, b)).toBeNull();
  });
});

describe('findError', () => {
  it('returns the first error in the chain matching the predicate', () => {
    const reset = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
    const wrapped = new Error('error calling POST in fetchClient', { cause: reset });

    expect(findError(wrapped, (error) => 'code' in error)).toBe(reset);
    expect(findError(wrapped, (error) => error.message === 'fetch failed')).toBeNull();
  });
});
