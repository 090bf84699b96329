import { z } from 'zod';
import type { ValidationError } from '../error/validationError.js';
import type { IntoRequest, PreparedRequest } from '../types/request.js';
import { joinUrl } from '../utils/joinUrl.js';
import { MultipartFormBuilder } from '../utils/multipart.js';
import type { SafeWrap } from '../utils/wrap.js';
import { RequestBuilder } from './request.js';

export const WhisperModel = {
  Whisper1: 'whisper-1',
} as const;
export type WhisperModel = (typeof WhisperModel)[keyof typeof WhisperModel];

/** Output format of a transcription; only `json` is parsed, the rest come back as raw text. */
export const WhisperResponseFormat = {
  Json: 'json',
  Text: 'text',
  Srt: 'srt',
  VerboseJson: 'verbose_json',
  Vtt: 'vtt',
} as const;
export type WhisperResponseFormat = (typeof WhisperResponseFormat)[keyof typeof WhisperResponseFormat];

/** Selects the endpoint. Never sent as a form field. */
export const WhisperRequestType = {
  Transcription: 'transcription',
  Translation: 'translation',
} as const;
export type WhisperRequestType = (typeof WhisperRequestType)[keyof typeof WhisperRequestType];

const audioFileSchema = z.custom<Uint8Array>((value) => value instanceof Uint8Array && value.byteLength > 0, {
  message: 'expected non-empty audio bytes',
});

export const whisperRequestSchema = z.object({
  request_type: z.enum(WhisperRequestType),
  file: audioFileSchema,
  model: z.enum(WhisperModel).default(WhisperModel.Whisper1),
  response_format: z.enum(WhisperResponseFormat).default(WhisperResponseFormat.Json),
  /** ISO-639-1 code of the spoken language, transcription only. */
  language: z.string().min(1).optional(),
  prompt: z.string().optional(),
  temperature: z.number().min(0).max(1).optional(),
});
export type WhisperParams = z.output<typeof whisperRequestSchema>;

const ENDPOINTS: Record<WhisperRequestType, string> = {
  transcription: 'audio/transcriptions',
  translation: 'audio/translations',
};

/**
 * Speech-to-text request, sent as a multipart form. Transcription keeps the spoken
 * language, translation always produces English.
 */
export class WhisperRequest implements IntoRequest {
  readonly params: Readonly<WhisperParams>;

  private constructor(params: WhisperParams) {
    this.params = Object.freeze(params);
  }

  static builder(): WhisperRequestBuilder {
    return new WhisperRequestBuilder((params) => new WhisperRequest(params));
  }

  static transcription(file: Uint8Array): SafeWrap<ValidationError, WhisperRequest> {
    return WhisperRequest.builder().requestType(WhisperRequestType.Transcription).file(file).build();
  }

  static translation(file: Uint8Array): SafeWrap<ValidationError, WhisperRequest> {
    return WhisperRequest.builder().requestType(WhisperRequestType.Translation).file(file).build();
  }

  get requestType(): WhisperRequestType {
    return this.params.request_type;
  }

  get responseFormat(): WhisperResponseFormat {
    return this.params.response_format;
  }

  /** Form parts in wire order. `language` is dropped for translations. */
  form(): MultipartFormBuilder {
    const { params } = this;

    const language = params.request_type === WhisperRequestType.Transcription ? params.language : undefined;
    return new MultipartFormBuilder()
      .addFile('file', params.file, 'file.mp3', 'audio/mp3')
      .addField('model', params.model)
      .addField('response_format', params.response_format)
      .addOptionalField('language', language)
      .addOptionalField('prompt', params.prompt)
      .addOptionalField('temperature', params.temperature);
  }

  intoRequest(baseUrl: string): PreparedRequest {
    // fetch sets the multipart Content-Type with its boundary
    return {
      url: joinUrl(baseUrl, ENDPOINTS[this.params.request_type]),
      method: 'POST',
      body: this.form().build(),
      headers: {},
    };
  }
}

/** Builder for {@link WhisperRequest}. `file` and `requestType` are required. */
export class WhisperRequestBuilder extends RequestBuilder<
  z.input<typeof whisperRequestSchema>,
  WhisperParams,
  WhisperRequest
> {
  constructor(create: (params: WhisperParams) => WhisperRequest) {
    super('WhisperRequest', whisperRequestSchema, create);
  }

  requestType(value: WhisperRequestType): this {
    return this.set('request_type', value);
  }

  /** Audio bytes; uploaded as `file.mp3`. */
  file(value: Uint8Array): this {
    return this.set('file', value);
  }

  model(value: WhisperModel): this {
    return this.set('model', value);
  }

  responseFormat(value: WhisperResponseFormat): this {
    return this.set('response_format', value);
  }

  language(value: string): this {
    return this.set('language', value);
  }

  /** Text guiding the model's style, or continuing a previous segment. */
  prompt(value: string): this {
    return this.set('prompt', value);
  }

  temperature(value: number): this {
    return this.set('temperature', value);
  }
}

export const whisperResponseSchema = z.object({
  text: z.string(),
});
export type WhisperResponse = z.infer<typeof whisperResponseSchema>;
