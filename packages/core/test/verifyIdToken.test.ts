import { beforeAll, describe, expect, it } from 'vitest';

import { TokenVerificationError } from '../src/errors.js';
import type { KeySet } from '../src/interfaces/keySet.js';
import { assertValidIdToken, verifyIdToken } from '../src/verification/verifyIdToken.js';

import {
  createMockClaims,
  createSigningKey,
  encodeSegment,
  type SigningKey,
  signToken,
  tamperSignature,
} from './helpers/fixtures.js';

describe('verifyIdToken', () => {
  let key: SigningKey;
  let otherKey: SigningKey;
  let keySet: KeySet;
  let token: string;

  beforeAll(async () => {
    key = await createSigningKey('key-1');
    otherKey = await createSigningKey('key-2');
    keySet = { keys: [otherKey.record, key.record] };
    token = await signToken(createMockClaims(), key);
  });

  describe('valid tokens', () => {
    it('returns the payload claims', () => {
      const result = verifyIdToken(token, keySet, 'client-123', 1500);

      expect(result).toEqual({ valid: true, claims: createMockClaims() });
    });

    it('returns the audience it was issued to', () => {
      const result = verifyIdToken(token, keySet, 'client-123', 1500);

      expect(result.valid).toBe(true);
      if (!result.valid) return;
      expect(result.claims.aud).toBe('client-123');
    });

    it('gives identical results for identical inputs', () => {
      const first = verifyIdToken(token, keySet, 'client-123', 1500);
      const second = verifyIdToken(token, keySet, 'client-123', 1500);

      expect(second).toEqual(first);
    });

    it('drops unknown claims and defaults missing optional ones', async () => {
      const minimal = await signToken(
        {
          aud: 'client-123',
          iss: 'https://accounts.google.com',
          iat: 1000,
          exp: 2000,
          nonce: 'test-nonce',
        },
        key,
      );

      const result = verifyIdToken(minimal, keySet, 'client-123', 1500);

      expect(result).toEqual({
        valid: true,
        claims: {
          iss: 'https://accounts.google.com',
          sub: '',
          azp: '',
          aud: 'client-123',
          iat: 1000,
          exp: 2000,
          at_hash: '',
          email: '',
          email_verified: false,
          name: '',
          given_name: '',
          family_name: '',
          picture: '',
          locale: '',
        },
      });
    });

    it('reads a string email_verified claim', async () => {
      const stringVerified = await signToken(
        createMockClaims({ email_verified: 'true' }),
        key,
      );

      const result = verifyIdToken(stringVerified, keySet, 'client-123', 1500);

      expect(result.valid).toBe(true);
      if (!result.valid) return;
      expect(result.claims.email_verified).toBe(true);
    });
  });

  describe('claim failures', () => {
    it('fails with TokenExpired after exp', () => {
      const result = verifyIdToken(token, keySet, 'client-123', 2500);

      expect(result.valid).toBe(false);
      if (result.valid) return;
      expect(result.error.code).toBe('E_TOKEN_EXPIRED');
      expect(result.error.claim).toBe('exp');
    });

    it('fails with TokenExpired before iat', () => {
      const result = verifyIdToken(token, keySet, 'client-123', 500);

      expect(result.valid).toBe(false);
      if (result.valid) return;
      expect(result.error.code).toBe('E_TOKEN_EXPIRED');
      expect(result.error.claim).toBe('iat');
    });

    it('fails with AudienceMismatch for another client', () => {
      const result = verifyIdToken(token, keySet, 'other-client', 1500);

      expect(result.valid).toBe(false);
      if (result.valid) return;
      expect(result.error.code).toBe('E_AUDIENCE_MISMATCH');
    });

    it('fails with AudienceMismatch even when the signature is also broken', () => {
      const result = verifyIdToken(tamperSignature(token, 0), keySet, 'other-client', 1500);

      expect(result.valid).toBe(false);
      if (result.valid) return;
      expect(result.error.code).toBe('E_AUDIENCE_MISMATCH');
    });

    it('fails with IssuerMismatch for a foreign issuer', async () => {
      const foreign = await signToken(createMockClaims({ iss: 'https://evil.example.com' }), key);

      const result = verifyIdToken(foreign, keySet, 'client-123', 1500);

      expect(result.valid).toBe(false);
      if (result.valid) return;
      expect(result.error.code).toBe('E_ISSUER_MISMATCH');
    });

    it('fails with AudienceMismatch when aud is missing', async () => {
      const { aud: _aud, ...withoutAudience } = createMockClaims();
      const noAudience = await signToken(withoutAudience, key);

      const result = verifyIdToken(noAudience, keySet, 'client-123', 1500);

      expect(result.valid).toBe(false);
      if (result.valid) return;
      expect(result.error.code).toBe('E_AUDIENCE_MISMATCH');
    });
  });

  describe('structural failures', () => {
    it('fails with MalformedToken for two segments', () => {
      const result = verifyIdToken('abc.def', keySet, 'client-123', 1500);

      expect(result.valid).toBe(false);
      if (result.valid) return;
      expect(result.error.code).toBe('E_MALFORMED_TOKEN');
    });

    it('fails with MalformedToken when the payload is not JSON', () => {
      const header = encodeSegment({ alg: 'RS256', kid: 'key-1' });
      const result = verifyIdToken(
        `${header}.${encodeSegment('not-json')}.AQID`,
        keySet,
        'client-123',
        1500,
      );

      expect(result.valid).toBe(false);
      if (result.valid) return;
      expect(result.error.code).toBe('E_MALFORMED_TOKEN');
      expect(result.error.message).toBe('Token payload is not valid JSON');
    });

    it('fails with MalformedToken for an array audience', async () => {
      const arrayAudience = await signToken(createMockClaims({ aud: ['client-123'] }), key);

      const result = verifyIdToken(arrayAudience, keySet, 'client-123', 1500);

      expect(result.valid).toBe(false);
      if (result.valid) return;
      expect(result.error.code).toBe('E_MALFORMED_TOKEN');
    });

    it('fails with MalformedToken when the header has no kid', async () => {
      const noKid = await signToken(createMockClaims(), key, {});

      const result = verifyIdToken(noKid, keySet, 'client-123', 1500);

      expect(result.valid).toBe(false);
      if (result.valid) return;
      expect(result.error.code).toBe('E_MALFORMED_TOKEN');
      expect(result.error.message.startsWith('Token header is invalid')).toBe(true);
    });
  });

  describe('key failures', () => {
    it('fails with KeyNotFound for an empty key set', () => {
      const result = verifyIdToken(token, { keys: [] }, 'client-123', 1500);

      expect(result.valid).toBe(false);
      if (result.valid) return;
      expect(result.error.code).toBe('E_KEY_NOT_FOUND');
    });

    it('fails with KeyNotFound when only other keys are present', () => {
      const result = verifyIdToken(token, { keys: [otherKey.record] }, 'client-123', 1500);

      expect(result.valid).toBe(false);
      if (result.valid) return;
      expect(result.error.code).toBe('E_KEY_NOT_FOUND');
    });

    it('fails with InvalidKeyMaterial for an unusable exponent', () => {
      const broken: KeySet = { keys: [{ ...key.record, e: 'AQ' }] };

      const result = verifyIdToken(token, broken, 'client-123', 1500);

      expect(result.valid).toBe(false);
      if (result.valid) return;
      expect(result.error.code).toBe('E_INVALID_KEY_MATERIAL');
    });
  });

  describe('signature failures', () => {
    it.each([0, 1, 128, 255])('fails with InvalidSignature when byte %i is altered', (index) => {
      const result = verifyIdToken(tamperSignature(token, index), keySet, 'client-123', 1500);

      expect(result.valid).toBe(false);
      if (result.valid) return;
      expect(result.error.code).toBe('E_INVALID_SIGNATURE');
    });

    it('fails with InvalidSignature when a different key signed under the same kid', async () => {
      const forged = await signToken(createMockClaims(), otherKey, { kid: 'key-1' });

      const result = verifyIdToken(forged, keySet, 'client-123', 1500);

      expect(result.valid).toBe(false);
      if (result.valid) return;
      expect(result.error.code).toBe('E_INVALID_SIGNATURE');
    });

    it('fails with InvalidSignature when the payload is swapped', async () => {
      const other = await signToken(createMockClaims({ sub: 'someone-else' }), key);
      const [header, , signature] = token.split('.');
      const [, otherPayload] = other.split('.');

      const result = verifyIdToken(
        `${header}.${otherPayload}.${signature}`,
        keySet,
        'client-123',
        1500,
      );

      expect(result.valid).toBe(false);
      if (result.valid) return;
      expect(result.error.code).toBe('E_INVALID_SIGNATURE');
    });
  });
});

describe('assertValidIdToken', () => {
  let key: SigningKey;
  let token: string;

  beforeAll(async () => {
    key = await createSigningKey('key-1');
    token = await signToken(createMockClaims(), key);
  });

  it('returns the claims of a valid token', () => {
    const claims = assertValidIdToken(token, { keys: [key.record] }, 'client-123', 1500);

    expect(claims.sub).toBe('1098765432101234567890');
  });

  it('throws the verification error', () => {
    expect(() => assertValidIdToken(token, { keys: [] }, 'client-123', 1500)).toThrow(
      TokenVerificationError,
    );
    expect(() => assertValidIdToken(token, { keys: [] }, 'client-123', 1500)).toThrow(
      "No key with kid 'key-1' in key set",
    );
  });
});
