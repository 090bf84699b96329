import { describe, expect, it } from 'vitest';
import { SpeechModel, SpeechRequest, SpeechResponseFormat, SpeechVoice } from './speech.js';

describe('SpeechRequest', () => {
  it('defaults model, voice and format', () => {
    const [err, req] = SpeechRequest.new('Hello there');

    expect(err).toBeNull();
    expect(req?.toJSON()).toEqual({ model: 'tts-1', input: 'Hello there', voice: 'nova', response_format: 'mp3' });
  });

  it('sends the chosen variants as wire strings', () => {
    const [, req] = SpeechRequest.builder()
      .input('Hello there')
      .model(SpeechModel.Tts1Hd)
      .voice(SpeechVoice.Shimmer)
      .responseFormat(SpeechResponseFormat.Flac)
      .speed(1.25)
      .build();

    expect(req?.intoRequest('https://api.example.com/v1')).toEqual({
      url: 'https://api.example.com/v1/audio/speech',
      method: 'POST',
      body: '{"model":"tts-1-hd","input":"Hello there","voice":"shimmer","response_format":"flac","speed":1.25}',
      headers: { 'Content-Type': 'application/json' },
    });
  });

  it('requires non-empty input of at most 4096 characters', () => {
    expect(SpeechRequest.builder().build()[0]?.paths).toEqual(['input']);
    expect(SpeechRequest.new('')[0]?.paths).toEqual(['input']);
    expect(SpeechRequest.new('a'.repeat(4096))[0]).toBeNull();
    expect(SpeechRequest.new('a'.repeat(4097))[0]?.paths).toEqual(['input']);
  });

  it('bounds speed between 0.25 and 4', () => {
    expect(SpeechRequest.builder().input('hi').speed(0.2).build()[0]?.paths).toEqual(['speed']);
    expect(SpeechRequest.builder().input('hi').speed(4.5).build()[0]?.paths).toEqual(['speed']);
    expect(SpeechRequest.builder().input('hi').speed(0.25).build()[0]).toBeNull();
  });
});
