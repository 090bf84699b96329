import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Turns a settled standard-schema result into a tuple.
 */
function settle<Output>(
  result: StandardSchemaV1.Result<Output> | null | undefined,
  message: string,
): SafeWrap<ValidationError, Output> {
  if (!result || typeof result !== 'object') {
    return [new ValidationError('error validation result of wrong type', []), null];
  }

  if (result.issues) {
    return [new ValidationError(message, [...result.issues]), null];
  }

  return [null, result.value];
}

/**
 * Validates an input value against a StandardSchemaV1 schema and wraps the result
 * in a tuple-style `[error, value]` response. Used on response bodies.
 *
 * - A throwing schema becomes `ValidationError('error validating on validation start')`.
 * - A rejecting async schema becomes `ValidationError('error validating async data')`.
 * - Issues become `ValidationError('error validating data')` listing each issue.
 */
export async function validator<Output>(
  input: unknown,
  schema: StandardSchemaV1<unknown, Output>,
): SafeWrapAsync<ValidationError, Output> {
  const [err, result] = safeWrap(() => schema['~standard'].validate(input));
  if (err) {
    return [new ValidationError('error validating on validation start', [], { cause: err }), null];
  }

  if (!(result instanceof Promise)) {
    return settle(result, 'error validating data');
  }

  const [errAsync, resultAsync] = await safeWrapAsync(() => result);
  if (errAsync) {
    return [new ValidationError('error validating async data', [], { cause: errAsync }), null];
  }

  return settle(resultAsync, 'error validating data');
}

/**
 * Synchronous variant of {@link validator} for request builders and client options.
 * Schemas that only validate asynchronously are rejected.
 */
export function validateSync<Output>(
  input: unknown,
  schema: StandardSchemaV1<unknown, Output>,
  message = 'error validating data',
): SafeWrap<ValidationError, Output> {
  const [err, result] = safeWrap(() => schema['~standard'].validate(input));
  if (err) {
    return [new ValidationError('error validating on validation start', [], { cause: err }), null];
  }

  if (result instanceof Promise) {
    // The result is never awaited; settle it so a rejection is not reported as unhandled.
    result.then(
      () => undefined,
      () => undefined,
    );
    return [new ValidationError('error async schema used for synchronous validation', []), null];
  }

  return settle(result, message);
}
