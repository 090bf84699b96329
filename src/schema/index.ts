/**
 * Schema entrypoint: JSON Schema export of zod types and chat tool definitions.
 * @module
 */

export { type ChatFunctionDefinition, ChatTool, chatToolSchema } from './tool.js';
export { type JsonSchema, toSchema } from './toSchema.js';
