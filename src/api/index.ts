/**
 * Request and response models for every provider operation.
 * @module
 */

export * from './chat.js';
export * from './embedding.js';
export * from './image.js';
export { jsonRequest, RequestBuilder } from './request.js';
export * from './speech.js';
export * from './whisper.js';
