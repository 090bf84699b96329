import { describe, expect, it } from 'vitest';
import { safeWrap, safeWrapAsync, toError } from './wrap.js';

describe('safeWrap', () => {
  it('returns [null, data] when the function succeeds', () => {
    const [err, data] = safeWrap(() => 42);

    expect(err).toBeNull();
    expect(data).toBe(42);
  });

  it('returns [error, null] when the function throws', () => {
    const [err, data] = safeWrap(() => JSON.parse('{nope'));

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(SyntaxError);
  });

  it('keeps subclasses of Error as they are', () => {
    class CustomError extends Error {}
    const thrown = new CustomError('custom boom');

    const [err] = safeWrap(() => {
      throw thrown;
    });

    expect(err).toBe(thrown);
  });
});

describe('safeWrapAsync', () => {
  it('returns [null, data] when the promise resolves', async () => {
    const [err, data] = await safeWrapAsync(async () => 'ok');

    expect(err).toBeNull();
    expect(data).toBe('ok');
  });

  it('returns [error, null] when the promise rejects', async () => {
    const [err, data] = await safeWrapAsync(() => Promise.reject(new Error('async boom')));

    expect(data).toBeNull();
    expect(err?.message).toBe('async boom');
  });

  it('captures synchronous throws inside the factory', async () => {
    const [err] = await safeWrapAsync((): Promise<string> => {
      throw new Error('sync boom');
    });

    expect(err?.message).toBe('sync boom');
  });
});

describe('toError', () => {
  it('wraps thrown strings with the string as message', () => {
    expect(toError('bad').message).toBe('bad');
  });

  it('wraps other values and keeps them as cause', () => {
    const err = toError({ code: 42 });

    expect(err.message).toBe('error non-error value thrown');
    expect(err.cause).toEqual({ code: 42 });
  });
});
