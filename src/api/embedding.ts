import { z } from 'zod';
import type { ValidationError } from '../error/validationError.js';
import type { IntoRequest, PreparedRequest } from '../types/request.js';
import { joinUrl } from '../utils/joinUrl.js';
import type { SafeWrap } from '../utils/wrap.js';
import { jsonRequest, RequestBuilder } from './request.js';

export const EmbeddingModel = {
  TextEmbeddingAda002: 'text-embedding-ada-002',
} as const;
export type EmbeddingModel = (typeof EmbeddingModel)[keyof typeof EmbeddingModel];

export const EmbeddingEncodingFormat = {
  Float: 'float',
  Base64: 'base64',
} as const;
export type EmbeddingEncodingFormat = (typeof EmbeddingEncodingFormat)[keyof typeof EmbeddingEncodingFormat];

/** A single string, or up to 2048 strings embedded in one call. Token arrays are not supported. */
export const embeddingInputSchema = z.union([z.string().min(1), z.array(z.string().min(1)).min(1).max(2048)]);
export type EmbeddingInput = z.infer<typeof embeddingInputSchema>;

export const embeddingRequestSchema = z.object({
  input: embeddingInputSchema,
  model: z.enum(EmbeddingModel).default(EmbeddingModel.TextEmbeddingAda002),
  encoding_format: z.enum(EmbeddingEncodingFormat).optional(),
  user: z.string().optional(),
});
export type EmbeddingParams = z.output<typeof embeddingRequestSchema>;

export class EmbeddingRequest implements IntoRequest {
  readonly params: Readonly<EmbeddingParams>;

  private constructor(params: EmbeddingParams) {
    this.params = Object.freeze(params);
  }

  static builder(): EmbeddingRequestBuilder {
    return new EmbeddingRequestBuilder((params) => new EmbeddingRequest(params));
  }

  /** Embeds a single string. */
  static new(input: string): SafeWrap<ValidationError, EmbeddingRequest> {
    return EmbeddingRequest.builder().input(input).build();
  }

  /** Embeds several strings in one call; results keep the input order by `index`. */
  static newArray(input: readonly string[]): SafeWrap<ValidationError, EmbeddingRequest> {
    return EmbeddingRequest.builder().input([...input]).build();
  }

  toJSON(): Readonly<EmbeddingParams> {
    return this.params;
  }

  intoRequest(baseUrl: string): PreparedRequest {
    return jsonRequest(joinUrl(baseUrl, 'embeddings'), this);
  }
}

/** Builder for {@link EmbeddingRequest}. `input` is required. */
export class EmbeddingRequestBuilder extends RequestBuilder<
  z.input<typeof embeddingRequestSchema>,
  EmbeddingParams,
  EmbeddingRequest
> {
  constructor(create: (params: EmbeddingParams) => EmbeddingRequest) {
    super('EmbeddingRequest', embeddingRequestSchema, create);
  }

  input(value: EmbeddingInput): this {
    return this.set('input', value);
  }

  model(value: EmbeddingModel): this {
    return this.set('model', value);
  }

  encodingFormat(value: EmbeddingEncodingFormat): this {
    return this.set('encoding_format', value);
  }

  user(value: string): this {
    return this.set('user', value);
  }
}

export const embeddingDataSchema = z.object({
  index: z.number(),
  /** Floats, or a base64 string when `encoding_format` is `base64`. */
  embedding: z.union([z.array(z.number()), z.string()]),
  object: z.string(),
});
export type EmbeddingData = z.infer<typeof embeddingDataSchema>;

export const embeddingResponseSchema = z.object({
  object: z.string(),
  data: z.array(embeddingDataSchema),
  model: z.string(),
  usage: z.object({
    prompt_tokens: z.number(),
    total_tokens: z.number(),
  }),
});
export type EmbeddingResponse = z.infer<typeof embeddingResponseSchema>;
