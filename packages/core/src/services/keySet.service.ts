import { LRUCache } from 'lru-cache';
import type { BaseLogger } from 'pino';

import { KeySetError, KeySetErrorCodes } from '../errors.js';
import type { KeySet, SigningKeyRecord } from '../interfaces/keySet.js';
import type { FetchLike, KeySetOptions } from '../interfaces/verifierConfig.js';
import { KeySetSchema } from '../schemas/index.js';
import { formatError } from '../utils/errorFormatting.js';
import { providerFetch } from '../utils/providerFetch.js';

/** Google's OAuth2 v3 certificate endpoint (JWKS format) */
export const GOOGLE_CERTS_URL = 'https://www.googleapis.com/oauth2/v3/certs';

const DEFAULT_TTL_SECONDS = 3600; // 1 hour
const MIN_TTL_SECONDS = 60;
const MAX_TTL_SECONDS = 86400; // 24 hours
const DEFAULT_TIMEOUT_MS = 5000;
// forced refreshes closer together than this reuse the current snapshot
const MIN_REFRESH_INTERVAL_SECONDS = 60;

/** Key set together with the lifetime the provider advertised for it */
export interface FetchedKeySet {
  keySet: KeySet;
  maxAgeSeconds: number | null;
}

/**
 * Parse Cache-Control header for max-age.
 *
 * @param cacheControl - Cache-Control header value
 * @returns max-age in seconds or null if not found
 */
export function parseCacheControlMaxAge(cacheControl: string | null): number | null {
  if (!cacheControl) {
    return null;
  }

  const match = cacheControl.match(/(?:^|[\s,])max-age=(\d+)/i);
  if (!match) {
    return null;
  }

  return parseInt(match[1], 10);
}

function clampTtl(seconds: number): number {
  return Math.min(MAX_TTL_SECONDS, Math.max(MIN_TTL_SECONDS, seconds));
}

function freezeKeySet(keys: SigningKeyRecord[]): KeySet {
  return Object.freeze({
    keys: Object.freeze(keys.map((key) => Object.freeze({ ...key }))),
  });
}

/**
 * Validates a certificate endpoint document and returns it as a frozen snapshot.
 *
 * @param body - Parsed JSON body of the certificate endpoint
 * @throws {KeySetError} When the document is not a `{ keys: [...] }` key set
 */
export function parseKeySet(body: unknown): KeySet {
  const parsed = KeySetSchema.safeParse(body);
  if (!parsed.success) {
    throw new KeySetError(
      KeySetErrorCodes.KEY_SET_INVALID,
      `Key set document is invalid: ${parsed.error.issues.map((issue) => issue.message).join(', ')}`,
    );
  }
  return freezeKeySet(parsed.data.keys);
}

/**
 * Retrieves and parses the provider's key set.
 *
 * @param fetchImpl - Fetch capability supplied by the caller
 * @param url - Certificate endpoint URL
 * @param options - Request timeout and User-Agent
 * @throws {KeySetError} When the request fails or the body is not a key set
 */
export async function fetchKeySet(
  fetchImpl: FetchLike,
  url: string,
  options: { timeoutMs: number; userAgent?: string },
): Promise<FetchedKeySet> {
  let response: Response;
  try {
    response = await providerFetch(fetchImpl, url, options, {
      method: 'GET',
      headers: { Accept: 'application/json' },
    });
  } catch (error) {
    throw new KeySetError(
      KeySetErrorCodes.KEY_SET_FETCH_FAILED,
      `Key set request to ${url} failed: ${formatError(error)}`,
    );
  }

  if (!response.ok) {
    throw new KeySetError(
      KeySetErrorCodes.KEY_SET_FETCH_FAILED,
      `Key set request to ${url} failed: ${response.status} ${response.statusText}`,
    );
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new KeySetError(
      KeySetErrorCodes.KEY_SET_INVALID,
      `Key set response is not JSON: ${formatError(error)}`,
    );
  }

  return {
    keySet: parseKeySet(body),
    maxAgeSeconds: parseCacheControlMaxAge(response.headers.get('Cache-Control')),
  };
}

/**
 * Keeps the provider's key set cached for the lifetime it advertises.
 *
 * Each fetch publishes a new frozen snapshot, so verifications holding an older
 * snapshot never see it change. Concurrent callers share one in-flight request,
 * and a failed fetch leaves the current snapshot in place.
 */
export class KeySetService {
  private cache: LRUCache<string, KeySet>;
  private lastFetchedAt?: number;
  private expiresAt?: number;

  /**
   * Creates a new KeySetService instance.
   *
   * @param fetchImpl - Fetch capability used for the certificate endpoint
   * @param certsUrl - Certificate endpoint URL
   * @param logger - Logger instance for debug and error logging
   * @param clock - Current time in seconds since the epoch. Both snapshot expiry and the
   *   refresh rate limit are measured on this clock.
   * @param options - TTL, timeout and User-Agent options
   */
  constructor(
    private fetchImpl: FetchLike,
    private certsUrl: string,
    private logger: BaseLogger,
    private clock: () => number,
    private options: KeySetOptions = {},
  ) {
    // expiry is tracked against `clock`, so entries carry no cache TTL of their own
    this.cache = new LRUCache<string, KeySet>({
      max: 1,
      noDeleteOnFetchRejection: true,
      fetchMethod: async (url) => {
        const { keySet, maxAgeSeconds } = await fetchKeySet(this.fetchImpl, url, {
          timeoutMs: this.options.fetchTimeoutMs ?? DEFAULT_TIMEOUT_MS,
          userAgent: this.options.userAgent,
        });
        const ttlSeconds = clampTtl(
          maxAgeSeconds ?? this.options.defaultTtlSeconds ?? DEFAULT_TTL_SECONDS,
        );
        const fetchedAt = this.clock();
        this.lastFetchedAt = fetchedAt;
        this.expiresAt = fetchedAt + ttlSeconds;
        this.logger.debug({ url, keys: keySet.keys.length, ttlSeconds }, 'key set fetched');
        return keySet;
      },
    });
  }

  /**
   * Returns the cached key set snapshot, fetching it when absent or expired.
   *
   * @throws {KeySetError} When the key set cannot be retrieved
   */
  async getKeySet(): Promise<KeySet> {
    const expired = this.expiresAt !== undefined && this.clock() >= this.expiresAt;
    return await this.load(expired);
  }

  /**
   * Fetches a new key set snapshot, bypassing the cache.
   * Returns the current snapshot unchanged when the last fetch was under a minute ago.
   *
   * @throws {KeySetError} When the key set cannot be retrieved
   */
  async refresh(): Promise<KeySet> {
    if (
      this.lastFetchedAt !== undefined &&
      this.clock() - this.lastFetchedAt < MIN_REFRESH_INTERVAL_SECONDS
    ) {
      this.logger.debug({ url: this.certsUrl }, 'key set refresh skipped, fetched recently');
      return await this.getKeySet();
    }
    return await this.load(true);
  }

  private async load(forceRefresh: boolean): Promise<KeySet> {
    try {
      const keySet = await this.cache.fetch(this.certsUrl, { forceRefresh });
      if (!keySet) {
        throw new KeySetError(
          KeySetErrorCodes.KEY_SET_FETCH_FAILED,
          `Key set request to ${this.certsUrl} returned no key set`,
        );
      }
      return keySet;
    } catch (error) {
      this.logger.error(
        { url: this.certsUrl, error: formatError(error) },
        'key set retrieval failed',
      );
      if (error instanceof KeySetError) {
        throw error;
      }
      throw new KeySetError(
        KeySetErrorCodes.KEY_SET_FETCH_FAILED,
        `Key set request to ${this.certsUrl} failed: ${formatError(error)}`,
      );
    }
  }
}
