import type { ParsedResponseData } from '../transport/http-client.js';

/**
 * Response body as text, whatever the HTTP client parsed it into.
 */
export function bodyText(res: ParsedResponseData): string {
  const body = res.body;
  if (typeof body === 'string') return body;
  if (body instanceof Uint8Array) return Buffer.from(body).toString('utf-8');
  if (body === undefined || body === null) return '';
  return JSON.stringify(body);
}

/** Append `path` to `base`, inserting the `/` separator when `base` lacks it. */
export function joinUrl(base: string, path: string): string {
  return (base.endsWith('/') ? base : base + '/') + path.replace(/^\//, '');
}
