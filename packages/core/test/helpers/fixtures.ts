import { base64url, exportJWK, generateKeyPair, type KeyLike, SignJWT } from 'jose';
import type { Logger } from 'pino';
import { vi } from 'vitest';

import type { SigningKeyRecord } from '../../src/interfaces/keySet.js';
import type { TokenClaims } from '../../src/schemas/index.js';

export interface SigningKey {
  privateKey: KeyLike;
  record: SigningKeyRecord;
}

export const createSigningKey = async (kid = 'test-key-1'): Promise<SigningKey> => {
  const { privateKey, publicKey } = await generateKeyPair('RS256');
  const jwk = await exportJWK(publicKey);
  if (!jwk.n || !jwk.e) {
    throw new Error('exported JWK has no modulus or exponent');
  }
  return {
    privateKey,
    record: { kty: 'RSA', alg: 'RS256', use: 'sig', kid, n: jwk.n, e: jwk.e },
  };
};

export const createMockClaims = (overrides: Record<string, unknown> = {}): TokenClaims =>
  ({
    iss: 'accounts.google.com',
    azp: 'client-123',
    aud: 'client-123',
    sub: '1098765432101234567890',
    email: 'jane.smith@example.com',
    email_verified: true,
    at_hash: 'test-at-hash',
    name: 'Jane Smith',
    picture: 'https://example.com/jane.png',
    given_name: 'Jane',
    family_name: 'Smith',
    locale: 'en',
    iat: 1000,
    exp: 2000,
    ...overrides,
  }) as TokenClaims;

export const signToken = async (
  payload: Record<string, unknown>,
  key: SigningKey,
  header: { kid?: string } = { kid: key.record.kid },
): Promise<string> =>
  await new SignJWT(payload)
    .setProtectedHeader({ alg: 'RS256', typ: 'JWT', ...header })
    .sign(key.privateKey);

/** Flips every bit of one signature byte */
export const tamperSignature = (token: string, byteIndex: number): string => {
  const [header, payload, signature] = token.split('.');
  const bytes = base64url.decode(signature);
  bytes[byteIndex] ^= 0xff;
  return `${header}.${payload}.${base64url.encode(bytes)}`;
};

export const encodeSegment = (value: unknown): string =>
  base64url.encode(typeof value === 'string' ? value : JSON.stringify(value));

export const createMockLogger = () =>
  ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    silent: vi.fn(),
    level: 'info',
    msgPrefix: '',
  }) as unknown as Logger;
