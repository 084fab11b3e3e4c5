import { type Logger, pino } from 'pino';

import { TokenErrorCodes, TokenVerificationError } from './errors.js';
import type { KeySet } from './interfaces/keySet.js';
import type { IdTokenVerifierConfig } from './interfaces/verifierConfig.js';
import { IdTokenSchema, IdTokenVerifierConfigSchema, type TokenClaims } from './schemas/index.js';
import { GOOGLE_CERTS_URL, KeySetService } from './services/keySet.service.js';
import { verifyIdToken } from './verification/verifyIdToken.js';

const systemClock = (): number => Math.floor(Date.now() / 1000);

/**
 * Verifies Google ID tokens for one OAuth2 client, keeping the provider's key set cached.
 *
 * @example
 * ```typescript
 * const verifier = new IdTokenVerifier({
 *   audience: 'your-client-id.apps.googleusercontent.com',
 *   fetch,
 *   logger: pino(),
 * });
 *
 * const claims = await verifier.verify(idToken);
 * console.log('Signed in:', claims.sub, claims.email);
 * ```
 */
export class IdTokenVerifier {
  private logger: Logger;
  private clock: () => number;
  private keySetService: KeySetService;

  /**
   * Creates a new IdTokenVerifier instance.
   *
   * @param config - Audience, fetch capability and optional logger, endpoint and cache tuning
   */
  constructor(private config: IdTokenVerifierConfig) {
    IdTokenVerifierConfigSchema.parse(config);

    this.logger = config.logger ?? pino({ enabled: false });
    this.clock = config.clock ?? systemClock;
    this.keySetService = new KeySetService(
      config.fetch,
      config.certsUrl ?? GOOGLE_CERTS_URL,
      this.logger,
      this.clock,
      config.keySet,
    );
  }

  /**
   * Verifies an ID token's signature and claims against the provider's current key set.
   *
   * When the token's `kid` is missing from the cached key set, the key set is refreshed
   * once and the token verified again, since the provider may have rotated its keys.
   *
   * @param idToken - Compact ID token presented by the client
   * @returns Validated token claims
   * @throws {TokenVerificationError} When the token is malformed, mis-addressed, expired or forged
   * @throws {KeySetError} When the key set cannot be retrieved
   */
  async verify(idToken: string): Promise<TokenClaims> {
    const token = IdTokenSchema.safeParse(idToken);
    if (!token.success) {
      throw new TokenVerificationError(TokenErrorCodes.MALFORMED_TOKEN, 'idToken is required');
    }

    const keySet = await this.keySetService.getKeySet();
    let result = verifyIdToken(token.data, keySet, this.config.audience, this.clock());

    if (!result.valid && result.error.code === TokenErrorCodes.KEY_NOT_FOUND) {
      const refreshed = await this.keySetService.refresh();
      if (refreshed !== keySet) {
        this.logger.info('retrying ID token verification with refreshed key set');
        result = verifyIdToken(token.data, refreshed, this.config.audience, this.clock());
      }
    }

    if (!result.valid) {
      this.logger.warn(
        { code: result.error.code, claim: result.error.claim },
        `ID token rejected: ${result.error.message}`,
      );
      throw result.error;
    }

    this.logger.debug({ sub: result.claims.sub }, 'ID token verified');
    return result.claims;
  }

  /**
   * Returns the current key set snapshot, fetching it if needed.
   *
   * @throws {KeySetError} When the key set cannot be retrieved
   */
  async getKeySet(): Promise<KeySet> {
    return await this.keySetService.getKeySet();
  }
}
