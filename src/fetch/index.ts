/**
 * Fetch entrypoint: exports the default transport and header helpers.
 * @module
 */
export { FetchClient } from './client.js';
export { mergeHeaderOptions } from './utils.js';
