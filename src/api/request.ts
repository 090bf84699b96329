import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { ValidationError } from '../error/validationError.js';
import type { PreparedRequest } from '../types/request.js';
import { validateSync } from '../utils/validator.js';
import type { SafeWrap } from '../utils/wrap.js';

/**
 * Collects fields for a request value and validates them on {@link RequestBuilder.build}.
 *
 * Fields are keyed by their wire name. Unset optional fields stay absent from the
 * built value, so they never reach the payload; fields with a declared default are
 * filled in by the schema.
 *
 * @typeParam Input - Wire-shaped input accepted by the schema.
 * @typeParam Params - Validated wire payload with defaults applied.
 * @typeParam Request - Request value created from the payload.
 */
export class RequestBuilder<Input extends object, Params, Request> {
  /** Fields set so far. */
  #fields: Partial<Input> = {};
  /** Request type name, used in error messages. */
  readonly #name: string;
  /** Schema validating the fields and applying defaults. */
  readonly #schema: StandardSchemaV1<unknown, Params>;
  /** Creates the request value from a validated payload. */
  readonly #create: (params: Params) => Request;

  constructor(name: string, schema: StandardSchemaV1<unknown, Params>, create: (params: Params) => Request) {
    this.#name = name;
    this.#schema = schema;
    this.#create = create;
  }

  /** Sets a single field by wire name. */
  set<Key extends keyof Input>(key: Key, value: Input[Key]): this {
    this.#fields[key] = value;
    return this;
  }

  /** Reads back a field set earlier. */
  protected get<Key extends keyof Input>(key: Key): Input[Key] | undefined {
    return this.#fields[key];
  }

  /**
   * Validates the collected fields and creates the request.
   * Fails with a {@link ValidationError} naming every missing or invalid field.
   */
  build(): SafeWrap<ValidationError, Request> {
    const [err, params] = validateSync(this.#fields, this.#schema, `error building ${this.#name}`);
    if (err) {
      return [err, null];
    }

    return [null, this.#create(params)];
  }
}

/**
 * Prepares a JSON-bodied POST from a request value's wire payload.
 */
export function jsonRequest(url: string, payload: unknown): PreparedRequest {
  return {
    url,
    method: 'POST',
    body: JSON.stringify(payload),
    headers: { 'Content-Type': 'application/json' },
  };
}
