import type { TokenResponse } from '../types/token.js';
import type { IRevocationStorage } from '../storage/interfaces/revocation-storage.js';
import { AuthError } from '../errors/auth-error.js';
import { createSigningKey, signAccessToken, verifyAccessToken, decodeJwt, jose } from '../crypto/jwt.js';
import { sha256 } from '../crypto/hash.js';
import { TOKEN_TYPE_BEARER, DEFAULT_ACCESS_TOKEN_TTL } from '../config/constants.js';

export interface TokenServiceOptions {
  /**
   * HS256 signing secret
   */
  secret: string;
  ttlSeconds?: number;
  revocations: IRevocationStorage;
  now?: () => Date;
}

const IDENTITY_ID_PATTERN = /^[1-9][0-9]*$/;

/**
 * Parse the `sub` claim back into an identity id
 */
function parseSubject(sub: unknown): number | undefined {
  if (typeof sub !== 'string' || !IDENTITY_ID_PATTERN.test(sub)) {
    return undefined;
  }
  const id = Number(sub);
  return Number.isSafeInteger(id) ? id : undefined;
}

/**
 * Issues and checks bearer tokens
 *
 * Tokens are stateless apart from the revocation set, which is keyed by
 * the SHA-256 of the token string.
 */
export class TokenService {
  private readonly key: Uint8Array;
  private readonly ttl: number;
  private readonly revocations: IRevocationStorage;
  private readonly now: () => Date;

  constructor(options: TokenServiceOptions) {
    if (!options.secret) {
      throw new Error('Token signing secret must not be empty');
    }
    this.key = createSigningKey(options.secret);
    this.ttl = options.ttlSeconds ?? DEFAULT_ACCESS_TOKEN_TTL;
    this.revocations = options.revocations;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Lifetime of issued tokens, in seconds
   */
  get ttlSeconds(): number {
    return this.ttl;
  }

  /**
   * Issue a token for an identity
   */
  async issue(identityId: number): Promise<string> {
    const iat = Math.floor(this.now().getTime() / 1000);

    return signAccessToken(
      {
        sub: String(identityId),
        iat,
        exp: iat + this.ttl,
      },
      this.key
    );
  }

  /**
   * Verify a token and return the identity id it names
   *
   * Throws `token_revoked`, `token_expired` or `token_malformed`.
   */
  async verify(token: string): Promise<number> {
    if (await this.revocations.isRevoked(sha256(token))) {
      throw AuthError.tokenRevoked();
    }

    let payload: jose.JWTPayload;
    try {
      payload = await verifyAccessToken(token, this.key, { currentDate: this.now() });
    } catch (err) {
      if (err instanceof jose.errors.JWTExpired) {
        throw AuthError.tokenExpired();
      }
      throw AuthError.tokenMalformed(undefined, err);
    }

    const identityId = parseSubject(payload.sub);
    if (identityId === undefined) {
      throw AuthError.tokenMalformed('The token subject is not a valid identity id.');
    }

    return identityId;
  }

  /**
   * Add a token to the revocation set. No validity check; idempotent.
   */
  async revoke(token: string): Promise<void> {
    await this.revocations.revoke(sha256(token), this.expiryOf(token));
  }

  /**
   * Verify a token and issue a fresh one for the same identity.
   * The presented token stays valid until it expires.
   */
  async refresh(token: string): Promise<string> {
    const identityId = await this.verify(token);
    return this.issue(identityId);
  }

  /**
   * Response body for a freshly issued token
   */
  toResponse(token: string): TokenResponse {
    return {
      access_token: token,
      token_type: TOKEN_TYPE_BEARER,
      expires_in: this.ttl,
    };
  }

  /**
   * When a revocation entry may be pruned: the token's own expiry, capped at
   * a full TTL from now since no token issued here outlives that
   */
  private expiryOf(token: string): Date {
    const latest = this.now().getTime() + this.ttl * 1000;
    const exp = decodeJwt(token)?.exp;
    if (typeof exp === 'number' && Number.isFinite(exp)) {
      const claimed = exp * 1000;
      if (Number.isFinite(claimed) && claimed < latest) {
        return new Date(claimed);
      }
    }
    return new Date(latest);
  }
}
