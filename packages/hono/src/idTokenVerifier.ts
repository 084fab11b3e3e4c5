import { type IdTokenVerifierConfig, IdTokenVerifier } from '@id-token-verifier/core';

// one verifier (and key set cache) per config object
const verifiers = new WeakMap<IdTokenVerifierConfig, IdTokenVerifier>();

/**
 * Gets or creates the ID token verifier for the provided configuration.
 * @param config - The verifier configuration object
 * @returns The verifier instance
 */
export function getIdTokenVerifier(config: IdTokenVerifierConfig): IdTokenVerifier {
  let verifier = verifiers.get(config);
  if (!verifier) {
    verifier = new IdTokenVerifier(config);
    verifiers.set(config, verifier);
  }
  return verifier;
}
