import { z } from 'zod';
import type { ValidationError } from '../error/validationError.js';
import { type ChatTool, chatToolSchema } from '../schema/tool.js';
import type { IntoRequest, PreparedRequest } from '../types/request.js';
import { joinUrl } from '../utils/joinUrl.js';
import type { SafeWrap } from '../utils/wrap.js';
import { jsonRequest, RequestBuilder } from './request.js';

/** Chat completion models. */
export const ChatCompletionModel = {
  Gpt35Turbo: 'gpt-3.5-turbo',
  Gpt4: 'gpt-4',
  Gpt4Turbo: 'gpt-4-turbo',
  Gpt4o: 'gpt-4o',
  Gpt4oMini: 'gpt-4o-mini',
} as const;
export type ChatCompletionModel = (typeof ChatCompletionModel)[keyof typeof ChatCompletionModel];

/** Format the model must answer in; `json_object` needs the word JSON in a message. */
export const ChatResponseFormatType = {
  Text: 'text',
  JsonObject: 'json_object',
} as const;
export type ChatResponseFormatType = (typeof ChatResponseFormatType)[keyof typeof ChatResponseFormatType];

export const chatToolCallSchema = z.object({
  id: z.string(),
  type: z.literal('function'),
  function: z.object({
    name: z.string(),
    /** JSON-encoded arguments, as generated by the model; may be invalid JSON. */
    arguments: z.string(),
  }),
});
export type ChatToolCall = z.infer<typeof chatToolCallSchema>;

const systemMessageSchema = z.object({
  role: z.literal('system'),
  content: z.string(),
  name: z.string().optional(),
});

const userMessageSchema = z.object({
  role: z.literal('user'),
  content: z.string(),
  name: z.string().optional(),
});

const assistantMessageSchema = z
  .object({
    role: z.literal('assistant'),
    content: z.string().nullable().optional(),
    name: z.string().optional(),
    tool_calls: z.array(chatToolCallSchema).optional(),
  })
  .refine((message) => message.content != null || Boolean(message.tool_calls?.length), {
    message: 'assistant message needs content or tool_calls',
  });

const toolMessageSchema = z.object({
  role: z.literal('tool'),
  content: z.string(),
  tool_call_id: z.string().min(1),
});

export const chatMessageSchema = z.discriminatedUnion('role', [
  systemMessageSchema,
  userMessageSchema,
  assistantMessageSchema,
  toolMessageSchema,
]);
export type ChatMessage = z.infer<typeof chatMessageSchema>;

/** Shorthands for each message role. */
export const ChatMessage = {
  system(content: string): ChatMessage {
    return { role: 'system', content };
  },
  user(content: string): ChatMessage {
    return { role: 'user', content };
  },
  /** Assistant turn replayed into the conversation, with the tool calls it made if any. */
  assistant(content: string | null, toolCalls?: ChatToolCall[]): ChatMessage {
    return toolCalls?.length ? { role: 'assistant', content, tool_calls: toolCalls } : { role: 'assistant', content };
  },
  /** Result of the tool call `toolCallId`. */
  tool(toolCallId: string, content: string): ChatMessage {
    return { role: 'tool', content, tool_call_id: toolCallId };
  },
};

export const chatToolChoiceSchema = z.union([
  z.enum(['none', 'auto', 'required']),
  z.object({
    type: z.literal('function'),
    function: z.object({ name: z.string().min(1) }),
  }),
]);
export type ChatToolChoice = z.infer<typeof chatToolChoiceSchema>;

export const chatCompletionRequestSchema = z.object({
  model: z.enum(ChatCompletionModel).default(ChatCompletionModel.Gpt4oMini),
  messages: z.array(chatMessageSchema).min(1),
  temperature: z.number().min(0).max(2).optional(),
  top_p: z.number().min(0).max(1).optional(),
  n: z.int().min(1).optional(),
  max_tokens: z.int().min(1).optional(),
  presence_penalty: z.number().min(-2).max(2).optional(),
  frequency_penalty: z.number().min(-2).max(2).optional(),
  stop: z.union([z.string(), z.array(z.string()).min(1).max(4)]).optional(),
  seed: z.int().optional(),
  user: z.string().optional(),
  tools: z.array(chatToolSchema).min(1).optional(),
  tool_choice: chatToolChoiceSchema.optional(),
  response_format: z.object({ type: z.enum(ChatResponseFormatType) }).optional(),
});
export type ChatCompletionParams = z.output<typeof chatCompletionRequestSchema>;

/**
 * Chat completion request. Create through {@link ChatCompletionRequest.builder} or
 * {@link ChatCompletionRequest.new}.
 */
export class ChatCompletionRequest implements IntoRequest {
  readonly params: Readonly<ChatCompletionParams>;

  private constructor(params: ChatCompletionParams) {
    this.params = Object.freeze(params);
  }

  static builder(): ChatCompletionRequestBuilder {
    return new ChatCompletionRequestBuilder((params) => new ChatCompletionRequest(params));
  }

  static new(model: ChatCompletionModel, messages: ChatMessage[]): SafeWrap<ValidationError, ChatCompletionRequest> {
    return ChatCompletionRequest.builder().model(model).messages(messages).build();
  }

  toJSON(): Readonly<ChatCompletionParams> {
    return this.params;
  }

  intoRequest(baseUrl: string): PreparedRequest {
    return jsonRequest(joinUrl(baseUrl, 'chat/completions'), this);
  }
}

type ChatCompletionInput = z.input<typeof chatCompletionRequestSchema>;

/** Builder for {@link ChatCompletionRequest}. At least one message is required. */
export class ChatCompletionRequestBuilder extends RequestBuilder<
  ChatCompletionInput,
  ChatCompletionParams,
  ChatCompletionRequest
> {
  constructor(create: (params: ChatCompletionParams) => ChatCompletionRequest) {
    super('ChatCompletionRequest', chatCompletionRequestSchema, create);
  }

  model(value: ChatCompletionModel): this {
    return this.set('model', value);
  }

  /** Replaces the conversation. */
  messages(value: ChatMessage[]): this {
    return this.set('messages', [...value]);
  }

  /** Appends one message to the conversation. */
  message(value: ChatMessage): this {
    return this.set('messages', [...(this.get('messages') ?? []), value]);
  }

  /** Sampling temperature, 0 to 2. Alter this or `topP`, not both. */
  temperature(value: number): this {
    return this.set('temperature', value);
  }

  topP(value: number): this {
    return this.set('top_p', value);
  }

  n(value: number): this {
    return this.set('n', value);
  }

  maxTokens(value: number): this {
    return this.set('max_tokens', value);
  }

  presencePenalty(value: number): this {
    return this.set('presence_penalty', value);
  }

  frequencyPenalty(value: number): this {
    return this.set('frequency_penalty', value);
  }

  /** Up to 4 sequences where generation stops. */
  stop(value: string | string[]): this {
    return this.set('stop', value);
  }

  seed(value: number): this {
    return this.set('seed', value);
  }

  user(value: string): this {
    return this.set('user', value);
  }

  tools(value: ChatTool[]): this {
    return this.set('tools', value);
  }

  toolChoice(value: ChatToolChoice): this {
    return this.set('tool_choice', value);
  }

  responseFormat(type: ChatResponseFormatType): this {
    return this.set('response_format', { type });
  }
}

export const chatCompletionChoiceSchema = z.object({
  index: z.number(),
  message: z.object({
    role: z.string(),
    content: z.string().nullable().optional(),
    refusal: z.string().nullable().optional(),
    tool_calls: z.array(chatToolCallSchema).optional(),
  }),
  finish_reason: z.string().nullable(),
});
export type ChatCompletionChoice = z.infer<typeof chatCompletionChoiceSchema>;

export const chatCompletionUsageSchema = z.object({
  prompt_tokens: z.number(),
  completion_tokens: z.number(),
  total_tokens: z.number(),
});
export type ChatCompletionUsage = z.infer<typeof chatCompletionUsageSchema>;

export const chatCompletionResponseSchema = z.object({
  id: z.string(),
  object: z.string(),
  created: z.number(),
  model: z.string(),
  choices: z.array(chatCompletionChoiceSchema),
  usage: chatCompletionUsageSchema.optional(),
  system_fingerprint: z.string().nullable().optional(),
});
export type ChatCompletionResponse = z.infer<typeof chatCompletionResponseSchema>;
