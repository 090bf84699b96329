import { z } from 'zod';
import type { SafeWrap } from '../utils/wrap.js';
import { toSchema } from './toSchema.js';

/** A function the model may call, as sent in `tools`. */
export const chatToolSchema = z.object({
  type: z.literal('function'),
  function: z.object({
    name: z
      .string()
      .min(1)
      .max(64)
      .regex(/^[a-zA-Z0-9_-]+$/),
    description: z.string().optional(),
    parameters: z.record(z.string(), z.unknown()).optional(),
  }),
});
export type ChatTool = z.infer<typeof chatToolSchema>;

export interface ChatFunctionDefinition {
  name: string;
  description?: string;
  /** Arguments the function takes; exported to JSON Schema. */
  parameters: z.ZodType;
}

export const ChatTool = {
  /**
   * Declares a callable function whose `parameters` is the JSON Schema of a zod type.
   */
  function({ name, description, parameters }: ChatFunctionDefinition): SafeWrap<Error, ChatTool> {
    const [err, schema] = toSchema(parameters);
    if (err) {
      return [new Error(`error exporting parameters of tool ${name}`, { cause: err }), null];
    }

    return [
      null,
      {
        type: 'function',
        function: {
          name,
          ...(description !== undefined && { description }),
          parameters: schema,
        },
      },
    ];
  },
};
