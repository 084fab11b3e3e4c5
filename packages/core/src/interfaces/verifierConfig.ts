import type { Logger } from 'pino';

/**
 * Fetch capability used to retrieve the provider's key set.
 * Always supplied by the caller; there is no implicit global client.
 */
export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

/** Key set retrieval and caching options */
export interface KeySetOptions {
  /** Cache lifetime when the response carries no Cache-Control max-age (defaults to 3600) */
  defaultTtlSeconds?: number;
  /** Abort the certificate request after this many milliseconds (defaults to 5000) */
  fetchTimeoutMs?: number;
  /** User-Agent header sent with certificate requests */
  userAgent?: string;
}

/**
 * Configuration object for initializing an IdTokenVerifier instance.
 */
export interface IdTokenVerifierConfig {
  /** OAuth2 client ID the ID tokens must be issued to (the expected `aud`) */
  audience: string;

  /** Fetch implementation used for the certificate endpoint */
  fetch: FetchLike;

  /** Provider certificate endpoint (defaults to Google's v3 JWKS endpoint) */
  certsUrl?: string;

  /** Optional pino logger */
  logger?: Logger;

  /** Key set retrieval and caching options */
  keySet?: KeySetOptions;

  /** Current time in seconds since the epoch (defaults to the system clock) */
  clock?: () => number;
}
