import type { FetchLike, IdTokenVerifierConfig, SigningKeyRecord } from '@id-token-verifier/core';
import { exportJWK, generateKeyPair, type KeyLike, SignJWT } from 'jose';
import { type Mock, vi } from 'vitest';

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

export const mockClaims = {
  iss: 'https://accounts.google.com',
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
};

export const signToken = async (
  key: SigningKey,
  overrides: Record<string, unknown> = {},
): Promise<string> =>
  await new SignJWT({ ...mockClaims, ...overrides })
    .setProtectedHeader({ alg: 'RS256', kid: key.record.kid, typ: 'JWT' })
    .sign(key.privateKey);

export const createConfig = (
  key: SigningKey,
): IdTokenVerifierConfig & { fetch: Mock<FetchLike> } => ({
  audience: 'client-123',
  certsUrl: 'https://certs.example.com/oauth2/v3/certs',
  clock: () => 1500,
  fetch: vi.fn<FetchLike>(
    async () =>
      new Response(JSON.stringify({ keys: [key.record] }), {
        status: 200,
        headers: { 'Content-Type': 'application/json' },
      }),
  ),
});
