/**
 * Joins a base URL and an operation path with exactly one `/` between them.
 *
 * @example
 * joinUrl('https://api.openai.com/v1/', '/embeddings'); // https://api.openai.com/v1/embeddings
 */
export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}
