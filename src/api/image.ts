import { z } from 'zod';
import type { ValidationError } from '../error/validationError.js';
import type { IntoRequest, PreparedRequest } from '../types/request.js';
import { joinUrl } from '../utils/joinUrl.js';
import type { SafeWrap } from '../utils/wrap.js';
import { jsonRequest, RequestBuilder } from './request.js';

/** Image generation models. */
export const ImageModel = {
  DallE3: 'dall-e-3',
} as const;
export type ImageModel = (typeof ImageModel)[keyof typeof ImageModel];

/** `hd` creates images with finer details and greater consistency. */
export const ImageQuality = {
  Standard: 'standard',
  Hd: 'hd',
} as const;
export type ImageQuality = (typeof ImageQuality)[keyof typeof ImageQuality];

/** Whether generated images come back as URLs or inline base64. */
export const ImageResponseFormat = {
  Url: 'url',
  B64Json: 'b64_json',
} as const;
export type ImageResponseFormat = (typeof ImageResponseFormat)[keyof typeof ImageResponseFormat];

/** Output sizes supported by dall-e-3. */
export const ImageSize = {
  Large: '1024x1024',
  LargeWide: '1792x1024',
  LargeTall: '1024x1792',
} as const;
export type ImageSize = (typeof ImageSize)[keyof typeof ImageSize];

/** `vivid` leans hyper-real and dramatic, `natural` less so. */
export const ImageStyle = {
  Vivid: 'vivid',
  Natural: 'natural',
} as const;
export type ImageStyle = (typeof ImageStyle)[keyof typeof ImageStyle];

/** Wire payload of an image generation request. */
export const createImageRequestSchema = z.object({
  prompt: z.string().min(1).max(4000),
  model: z.enum(ImageModel).default(ImageModel.DallE3),
  n: z.int().min(1).max(10).optional(),
  quality: z.enum(ImageQuality).optional(),
  response_format: z.enum(ImageResponseFormat).optional(),
  size: z.enum(ImageSize).optional(),
  style: z.enum(ImageStyle).optional(),
  user: z.string().optional(),
});
export type CreateImageParams = z.output<typeof createImageRequestSchema>;

/**
 * Image generation request. Create through {@link CreateImageRequest.builder} or
 * {@link CreateImageRequest.new}.
 */
export class CreateImageRequest implements IntoRequest {
  /** Wire payload, defaults applied. */
  readonly params: Readonly<CreateImageParams>;

  private constructor(params: CreateImageParams) {
    this.params = Object.freeze(params);
  }

  /** Starts a builder. */
  static builder(): CreateImageRequestBuilder {
    return new CreateImageRequestBuilder((params) => new CreateImageRequest(params));
  }

  /** Request with only a prompt, every other field left to the provider. */
  static new(prompt: string): SafeWrap<ValidationError, CreateImageRequest> {
    return CreateImageRequest.builder().prompt(prompt).build();
  }

  toJSON(): Readonly<CreateImageParams> {
    return this.params;
  }

  intoRequest(baseUrl: string): PreparedRequest {
    return jsonRequest(joinUrl(baseUrl, 'images/generations'), this);
  }
}

/** Builder for {@link CreateImageRequest}. `prompt` is required. */
export class CreateImageRequestBuilder extends RequestBuilder<
  z.input<typeof createImageRequestSchema>,
  CreateImageParams,
  CreateImageRequest
> {
  constructor(create: (params: CreateImageParams) => CreateImageRequest) {
    super('CreateImageRequest', createImageRequestSchema, create);
  }

  /** Text description of the desired image, at most 4000 characters. */
  prompt(value: string): this {
    return this.set('prompt', value);
  }

  model(value: ImageModel): this {
    return this.set('model', value);
  }

  /** Number of images, 1 to 10. dall-e-3 only supports 1. */
  n(value: number): this {
    return this.set('n', value);
  }

  quality(value: ImageQuality): this {
    return this.set('quality', value);
  }

  responseFormat(value: ImageResponseFormat): this {
    return this.set('response_format', value);
  }

  size(value: ImageSize): this {
    return this.set('size', value);
  }

  style(value: ImageStyle): this {
    return this.set('style', value);
  }

  /** End-user identifier passed along for abuse monitoring. */
  user(value: string): this {
    return this.set('user', value);
  }
}

/** One generated image. */
export const imageObjectSchema = z.object({
  b64_json: z.string().optional(),
  url: z.string().optional(),
  revised_prompt: z.string().optional(),
});
export type ImageObject = z.infer<typeof imageObjectSchema>;

/** Response of an image generation request. */
export const createImageResponseSchema = z.object({
  created: z.number(),
  data: z.array(imageObjectSchema),
});
export type CreateImageResponse = z.infer<typeof createImageResponseSchema>;
