import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { ChatTool } from '../schema/tool.js';
import {
  ChatCompletionModel,
  ChatCompletionRequest,
  chatCompletionResponseSchema,
  ChatMessage,
  ChatResponseFormatType,
} from './chat.js';

describe('ChatMessage', () => {
  it('builds each role', () => {
    expect(ChatMessage.system('Be brief.')).toEqual({ role: 'system', content: 'Be brief.' });
    expect(ChatMessage.user('Hi')).toEqual({ role: 'user', content: 'Hi' });
    expect(ChatMessage.assistant('Hello!')).toEqual({ role: 'assistant', content: 'Hello!' });
    expect(ChatMessage.tool('call_1', '{"temp":21}')).toEqual({
      role: 'tool',
      content: '{"temp":21}',
      tool_call_id: 'call_1',
    });
  });

  it('keeps tool calls on assistant messages', () => {
    const call = { id: 'call_1', type: 'function' as const, function: { name: 'get_weather', arguments: '{}' } };

    expect(ChatMessage.assistant(null, [call])).toEqual({ role: 'assistant', content: null, tool_calls: [call] });
  });
});

describe('ChatCompletionRequest', () => {
  it('serializes model and messages', () => {
    const [err, req] = ChatCompletionRequest.new(ChatCompletionModel.Gpt4o, [
      ChatMessage.system('Be brief.'),
      ChatMessage.user('Hi'),
    ]);

    expect(err).toBeNull();
    expect(req?.intoRequest('https://api.example.com/v1')).toEqual({
      url: 'https://api.example.com/v1/chat/completions',
      method: 'POST',
      body: '{"model":"gpt-4o","messages":[{"role":"system","content":"Be brief."},{"role":"user","content":"Hi"}]}',
      headers: { 'Content-Type': 'application/json' },
    });
  });

  it('defaults the model and omits unset options', () => {
    const [, req] = ChatCompletionRequest.builder().message(ChatMessage.user('Hi')).build();

    expect(req?.toJSON()).toEqual({ model: 'gpt-4o-mini', messages: [{ role: 'user', content: 'Hi' }] });
    expect(req && 'temperature' in req.params).toBe(false);
    expect(req && 'stop' in req.params).toBe(false);
  });

  it('appends messages in order', () => {
    const [, req] = ChatCompletionRequest.builder()
      .messages([ChatMessage.system('Be brief.')])
      .message(ChatMessage.user('Hi'))
      .message(ChatMessage.assistant('Hello!'))
      .build();

    expect(req?.params.messages.map((message) => message.role)).toEqual(['system', 'user', 'assistant']);
  });

  it('maps sampling options to wire names', () => {
    const [, req] = ChatCompletionRequest.builder()
      .message(ChatMessage.user('Hi'))
      .temperature(0.7)
      .topP(0.9)
      .n(2)
      .maxTokens(256)
      .presencePenalty(0.5)
      .frequencyPenalty(-0.5)
      .stop(['\n\n', 'END'])
      .seed(42)
      .user('user-1')
      .build();

    expect(req?.toJSON()).toEqual({
      model: 'gpt-4o-mini',
      messages: [{ role: 'user', content: 'Hi' }],
      temperature: 0.7,
      top_p: 0.9,
      n: 2,
      max_tokens: 256,
      presence_penalty: 0.5,
      frequency_penalty: -0.5,
      stop: ['\n\n', 'END'],
      seed: 42,
      user: 'user-1',
    });
  });

  it('carries tools, tool choice and response format', () => {
    const [errTool, tool] = ChatTool.function({
      name: 'get_weather',
      description: 'Current weather for a city',
      parameters: z.object({ city: z.string() }),
    });
    if (errTool) {
      throw errTool;
    }

    const [err, req] = ChatCompletionRequest.builder()
      .message(ChatMessage.user('Weather in Oslo? Answer in JSON.'))
      .tools([tool])
      .toolChoice({ type: 'function', function: { name: 'get_weather' } })
      .responseFormat(ChatResponseFormatType.JsonObject)
      .build();

    expect(err).toBeNull();
    expect(req?.toJSON()).toMatchObject({
      tools: [{ type: 'function', function: { name: 'get_weather', description: 'Current weather for a city' } }],
      tool_choice: { type: 'function', function: { name: 'get_weather' } },
      response_format: { type: 'json_object' },
    });
  });

  it('requires at least one message', () => {
    expect(ChatCompletionRequest.builder().build()[0]?.paths).toEqual(['messages']);
    expect(ChatCompletionRequest.new(ChatCompletionModel.Gpt4, [])[0]?.paths).toEqual(['messages']);
  });

  it('validates numeric ranges', () => {
    const base = () => ChatCompletionRequest.builder().message(ChatMessage.user('Hi'));

    expect(base().temperature(2.5).build()[0]?.paths).toEqual(['temperature']);
    expect(base().topP(1.1).build()[0]?.paths).toEqual(['top_p']);
    expect(base().n(0).build()[0]?.paths).toEqual(['n']);
    expect(base().maxTokens(0).build()[0]?.paths).toEqual(['max_tokens']);
    expect(base().presencePenalty(-2.5).build()[0]?.paths).toEqual(['presence_penalty']);
    expect(base().frequencyPenalty(3).build()[0]?.paths).toEqual(['frequency_penalty']);
    expect(base().temperature(2).topP(1).build()[0]).toBeNull();
  });

  it('accepts at most four stop sequences', () => {
    const base = () => ChatCompletionRequest.builder().message(ChatMessage.user('Hi'));

    expect(base().stop('END').build()[0]).toBeNull();
    expect(base().stop(['a', 'b', 'c', 'd', 'e']).build()[0]?.paths).toEqual(['stop']);
  });

  it('rejects an assistant message without content or tool calls', () => {
    const [err] = ChatCompletionRequest.builder().message(ChatMessage.assistant(null)).build();

    expect(err?.paths).toEqual(['messages.0']);
  });
});

describe('chatCompletionResponseSchema', () => {
  it('parses a completion with a tool call and drops unknown keys', () => {
    const result = chatCompletionResponseSchema.safeParse({
      id: 'chatcmpl-1',
      object: 'chat.completion',
      created: 1700000000,
      model: 'gpt-4o-mini',
      choices: [
        {
          index: 0,
          message: {
            role: 'assistant',
            content: null,
            tool_calls: [
              { id: 'call_1', type: 'function', function: { name: 'get_weather', arguments: '{"city":"Oslo"}' } },
            ],
          },
          finish_reason: 'tool_calls',
          logprobs: null,
        },
      ],
      usage: { prompt_tokens: 12, completion_tokens: 8, total_tokens: 20 },
      system_fingerprint: null,
    });

    expect(result.success).toBe(true);
    expect(result.data?.choices[0]?.message.tool_calls?.[0]?.function.name).toBe('get_weather');
    expect(result.data?.choices[0] && 'logprobs' in result.data.choices[0]).toBe(false);
  });
});
