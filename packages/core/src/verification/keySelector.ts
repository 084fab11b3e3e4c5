import { fail, ok, type Result, TokenErrorCodes } from '../errors.js';
import type { KeySet, SigningKeyRecord } from '../interfaces/keySet.js';

/**
 * Returns the first key whose identifier equals `kid`.
 * A miss usually means the provider rotated keys and the key set is stale.
 */
export function selectKey(keySet: KeySet, kid: string): Result<SigningKeyRecord> {
  const key = keySet.keys.find((candidate) => candidate.kid === kid);
  if (!key) {
    return fail(TokenErrorCodes.KEY_NOT_FOUND, `No key with kid '${kid}' in key set`);
  }
  return ok(key);
}
