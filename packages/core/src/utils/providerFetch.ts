import type { FetchLike } from '../interfaces/verifierConfig.js';

export const DEFAULT_USER_AGENT = 'id-token-verifier/0.1.0';

/**
 * Wrapper around an injected fetch() that adds a User-Agent header and an abort timeout
 * to requests made against the identity provider.
 *
 * @param fetchImpl - Fetch capability supplied by the caller
 * @param url - Request URL
 * @param options - Timeout in milliseconds and User-Agent value
 * @param init - Fetch options (headers, method, etc.)
 * @returns Promise resolving to Response
 */
export function providerFetch(
  fetchImpl: FetchLike,
  url: string | URL,
  options: { timeoutMs: number; userAgent?: string },
  init?: RequestInit,
): Promise<Response> {
  const headers = new Headers(init?.headers);
  // explicit headers win
  if (!headers.has('User-Agent')) {
    headers.set('User-Agent', options.userAgent ?? DEFAULT_USER_AGENT);
  }
  return fetchImpl(url, {
    ...init,
    headers,
    signal: AbortSignal.timeout(options.timeoutMs),
  });
}
