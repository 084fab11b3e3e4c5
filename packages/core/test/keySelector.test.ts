import { describe, expect, it } from 'vitest';

import type { KeySet, SigningKeyRecord } from '../src/interfaces/keySet.js';
import { selectKey } from '../src/verification/keySelector.js';

const record = (kid: string, n: string): SigningKeyRecord => ({
  kty: 'RSA',
  alg: 'RS256',
  use: 'sig',
  kid,
  n,
  e: 'AQAB',
});

describe('selectKey', () => {
  const keySet: KeySet = {
    keys: [record('key-a', 'AQID'), record('key-b', 'BAUG'), record('key-a', 'BwgJ')],
  };

  it('returns the key with the matching kid', () => {
    expect(selectKey(keySet, 'key-b')).toEqual({ ok: true, value: record('key-b', 'BAUG') });
  });

  it('returns the first match when kids repeat', () => {
    expect(selectKey(keySet, 'key-a')).toEqual({ ok: true, value: record('key-a', 'AQID') });
  });

  it('fails with KeyNotFound for an unknown kid', () => {
    const result = selectKey(keySet, 'key-c');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('E_KEY_NOT_FOUND');
    expect(result.error.message).toBe("No key with kid 'key-c' in key set");
  });

  it('fails with KeyNotFound for an empty key set', () => {
    const result = selectKey({ keys: [] }, 'key-a');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('E_KEY_NOT_FOUND');
  });
});
