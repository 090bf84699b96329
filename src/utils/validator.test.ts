import type { StandardSchemaV1 } from '@standard-schema/spec';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { ValidationError } from '../error/validationError.js';
import { validateSync, validator } from './validator.js';

function schemaOf(validate: StandardSchemaV1.Props<unknown, string>['validate']): StandardSchemaV1<unknown, string> {
  return { '~standard': { version: 1, vendor: 'test', validate } };
}

describe('validator', () => {
  it('returns the parsed value for a matching zod schema', async () => {
    const [err, parsed] = await validator({ text: 'hello', extra: 1 }, z.object({ text: z.string() }));

    expect(err).toBeNull();
    expect(parsed).toEqual({ text: 'hello' });
  });

  it('lists issues for a mismatching body', async () => {
    const [err, parsed] = await validator({ text: 1 }, z.object({ text: z.string() }));

    expect(parsed).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect(err?.paths).toEqual(['text']);
  });

  it('awaits async schemas', async () => {
    const [err, value] = await validator(
      'test',
      schemaOf(async (input) => ({ value: String(input) })),
    );

    expect(err).toBeNull();
    expect(value).toBe('test');
  });

  it('returns error when async validation rejects', async () => {
    const [err, value] = await validator(
      {},
      schemaOf(async () => {
        throw new Error('oops');
      }),
    );

    expect(value).toBeNull();
    expect(err?.message).toBe('error validating async data');
    expect(err?.cause).toEqual(new Error('oops'));
  });

  it('returns error when sync validation throws', async () => {
    const [err, value] = await validator(
      {},
      schemaOf(() => {
        throw new Error('oops');
      }),
    );

    expect(value).toBeNull();
    expect(err?.message).toBe('error validating on validation start');
  });
});

describe('validateSync', () => {
  it('applies zod defaults', () => {
    const schema = z.object({ model: z.string().default('whisper-1'), prompt: z.string().optional() });
    const [err, value] = validateSync({}, schema);

    expect(err).toBeNull();
    expect(value).toEqual({ model: 'whisper-1' });
  });

  it('uses the given message for issues', () => {
    const [err] = validateSync({}, z.object({ input: z.string() }), 'error building SpeechRequest');

    expect(err?.message.startsWith('error building SpeechRequest; input: ')).toBe(true);
  });

  it('rejects schemas that only validate asynchronously', () => {
    const [err, value] = validateSync('x', schemaOf(async (input) => ({ value: String(input) })));

    expect(value).toBeNull();
    expect(err?.message).toBe('error async schema used for synchronous validation');
  });
});
