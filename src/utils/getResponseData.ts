import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Reads the whole response body as text.
 */
export async function getResponseText(response: Response): SafeWrapAsync<Error, string> {
  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new Error('error reading response body in getResponseText', { cause: errText }), null];
  }

  return [null, text];
}

/**
 * Reads the response body as text and parses it as JSON.
 *
 * Reading through `.text()` first keeps the raw body available for the error
 * message when parsing fails. An empty body is an error: every JSON operation
 * of the provider returns a document.
 */
export async function getResponseJson(response: Response): SafeWrapAsync<Error, unknown> {
  const [errText, text] = await getResponseText(response);
  if (errText) {
    return [errText, null];
  }

  if (!text) {
    return [new Error('error empty response body in getResponseJson'), null];
  }

  const [errJson, json] = safeWrap((): unknown => JSON.parse(text));
  if (errJson) {
    return [
      new Error(`error parsing json response body in getResponseJson: ${text.slice(0, 200)}`, { cause: errJson }),
      null,
    ];
  }

  return [null, json];
}

/**
 * Reads the response body as raw bytes, for binary media such as synthesized speech.
 */
export async function getResponseBytes(response: Response): SafeWrapAsync<Error, Uint8Array> {
  const [errBuffer, buffer] = await safeWrapAsync(() => response.arrayBuffer());
  if (errBuffer) {
    return [new Error('error reading response bytes in getResponseBytes', { cause: errBuffer }), null];
  }

  return [null, new Uint8Array(buffer)];
}
