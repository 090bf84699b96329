import { describe, expect, it } from 'vitest';
import { WhisperRequest, WhisperRequestType, WhisperResponseFormat } from './whisper.js';

const AUDIO = new Uint8Array([73, 68, 51, 4, 0]);

describe('WhisperRequest', () => {
  it('defaults model and response format', () => {
    const [err, req] = WhisperRequest.transcription(AUDIO);

    expect(err).toBeNull();
    expect(req?.requestType).toBe('transcription');
    expect(req?.responseFormat).toBe('json');
    expect(req?.params.model).toBe('whisper-1');
  });

  it('sends a transcription form with every optional field set', async () => {
    const [, req] = WhisperRequest.builder()
      .requestType(WhisperRequestType.Transcription)
      .file(AUDIO)
      .responseFormat(WhisperResponseFormat.Srt)
      .language('de')
      .prompt('Names: Ada, Grace')
      .temperature(0.2)
      .build();

    expect(req?.form().parts.map((part) => part.name)).toEqual([
      'file',
      'model',
      'response_format',
      'language',
      'prompt',
      'temperature',
    ]);

    const prepared = req?.intoRequest('https://api.example.com/v1');
    expect(prepared?.url).toBe('https://api.example.com/v1/audio/transcriptions');
    expect(prepared?.method).toBe('POST');
    expect(prepared?.headers).toEqual({});

    const body = prepared?.body;
    expect(body).toBeInstanceOf(FormData);
    if (!(body instanceof FormData)) {
      return;
    }

    expect(body.get('model')).toBe('whisper-1');
    expect(body.get('response_format')).toBe('srt');
    expect(body.get('language')).toBe('de');
    expect(body.get('prompt')).toBe('Names: Ada, Grace');
    expect(body.get('temperature')).toBe('0.2');

    const file = body.get('file');
    expect(file).toBeInstanceOf(File);
    if (!(file instanceof File)) {
      return;
    }

    expect(file.name).toBe('file.mp3');
    expect(file.type).toBe('audio/mp3');
    expect(new Uint8Array(await file.arrayBuffer())).toEqual(AUDIO);
  });

  it('drops the language from translations', () => {
    const [, req] = WhisperRequest.builder()
      .requestType(WhisperRequestType.Translation)
      .file(AUDIO)
      .language('de')
      .build();

    expect(req?.form().parts.map((part) => part.name)).toEqual(['file', 'model', 'response_format']);
    expect(req?.intoRequest('https://api.example.com/v1/').url).toBe('https://api.example.com/v1/audio/translations');
  });

  it('omits prompt and temperature when unset', () => {
    const [, req] = WhisperRequest.transcription(AUDIO);

    expect(req?.form().parts.map((part) => part.name)).toEqual(['file', 'model', 'response_format']);
  });

  it('requires the request type', () => {
    const [err, req] = WhisperRequest.builder().file(AUDIO).build();

    expect(req).toBeNull();
    expect(err?.paths).toEqual(['request_type']);
  });

  it('rejects missing or empty audio', () => {
    expect(WhisperRequest.builder().requestType(WhisperRequestType.Translation).build()[0]?.paths).toEqual(['file']);
    expect(WhisperRequest.translation(new Uint8Array())[0]?.paths).toEqual(['file']);
  });

  it('bounds temperature between 0 and 1', () => {
    const [err] = WhisperRequest.builder()
      .requestType(WhisperRequestType.Transcription)
      .file(AUDIO)
      .temperature(1.5)
      .build();

    expect(err?.paths).toEqual(['temperature']);
  });
});
