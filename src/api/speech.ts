import { z } from 'zod';
import type { ValidationError } from '../error/validationError.js';
import type { IntoRequest, PreparedRequest } from '../types/request.js';
import { joinUrl } from '../utils/joinUrl.js';
import type { SafeWrap } from '../utils/wrap.js';
import { jsonRequest, RequestBuilder } from './request.js';

/** Text-to-speech models. */
export const SpeechModel = {
  Tts1: 'tts-1',
  Tts1Hd: 'tts-1-hd',
} as const;
export type SpeechModel = (typeof SpeechModel)[keyof typeof SpeechModel];

/** Voices available for synthesis. */
export const SpeechVoice = {
  Alloy: 'alloy',
  Echo: 'echo',
  Fable: 'fable',
  Onyx: 'onyx',
  Nova: 'nova',
  Shimmer: 'shimmer',
} as const;
export type SpeechVoice = (typeof SpeechVoice)[keyof typeof SpeechVoice];

/** Audio container of the synthesized speech. */
export const SpeechResponseFormat = {
  Mp3: 'mp3',
  Opus: 'opus',
  Aac: 'aac',
  Flac: 'flac',
} as const;
export type SpeechResponseFormat = (typeof SpeechResponseFormat)[keyof typeof SpeechResponseFormat];

export const speechRequestSchema = z.object({
  model: z.enum(SpeechModel).default(SpeechModel.Tts1),
  input: z.string().min(1).max(4096),
  voice: z.enum(SpeechVoice).default(SpeechVoice.Nova),
  response_format: z.enum(SpeechResponseFormat).default(SpeechResponseFormat.Mp3),
  speed: z.number().min(0.25).max(4).optional(),
});
export type SpeechParams = z.output<typeof speechRequestSchema>;

/**
 * Speech synthesis request; the response is raw audio bytes.
 */
export class SpeechRequest implements IntoRequest {
  readonly params: Readonly<SpeechParams>;

  private constructor(params: SpeechParams) {
    this.params = Object.freeze(params);
  }

  static builder(): SpeechRequestBuilder {
    return new SpeechRequestBuilder((params) => new SpeechRequest(params));
  }

  /** Request for `input` with the default model, voice and format. */
  static new(input: string): SafeWrap<ValidationError, SpeechRequest> {
    return SpeechRequest.builder().input(input).build();
  }

  toJSON(): Readonly<SpeechParams> {
    return this.params;
  }

  intoRequest(baseUrl: string): PreparedRequest {
    return jsonRequest(joinUrl(baseUrl, 'audio/speech'), this);
  }
}

/** Builder for {@link SpeechRequest}. `input` is required. */
export class SpeechRequestBuilder extends RequestBuilder<
  z.input<typeof speechRequestSchema>,
  SpeechParams,
  SpeechRequest
> {
  constructor(create: (params: SpeechParams) => SpeechRequest) {
    super('SpeechRequest', speechRequestSchema, create);
  }

  model(value: SpeechModel): this {
    return this.set('model', value);
  }

  /** Text to synthesize, at most 4096 characters. */
  input(value: string): this {
    return this.set('input', value);
  }

  voice(value: SpeechVoice): this {
    return this.set('voice', value);
  }

  responseFormat(value: SpeechResponseFormat): this {
    return this.set('response_format', value);
  }

  /** Playback speed from 0.25 to 4.0. */
  speed(value: number): this {
    return this.set('speed', value);
  }
}
