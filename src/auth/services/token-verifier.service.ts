import { HttpStatus, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { createPublicKey } from 'crypto';
import {
  DEFAULT_AUTH_AUDIENCE,
  DEFAULT_AUTH_DOMAIN,
  TOKEN_ALGORITHM,
  issuerFor,
} from '../auth.constants';
import {
  AuthException,
  InvalidClaimsException,
  InvalidHeaderException,
  KeyNotFoundException,
  KeySetUnavailableException,
  MalformedHeaderException,
  TokenExpiredException,
} from '../exceptions/auth.exceptions';
import type { KeySet, SigningKey, TokenClaims } from '../interfaces';
import { KeyResolverService } from './key-resolver.service';
import { isRecord } from '../../common/utils/is-record';

/** jsonwebtoken reports audience/issuer mismatches with these messages */
const CLAIM_MISMATCH = /^jwt (audience|issuer) invalid/;

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * TokenVerifierService — checks an access token against the identity
 * provider's published keys.
 *
 * Flow:
 * 1. Read the key id from the unverified token header
 * 2. Fetch the key set and pick the key with that id
 * 3. Verify signature (RS256 only), audience, issuer and expiry
 * 4. Return the decoded claims untouched
 */
@Injectable()
export class TokenVerifierService {
  private readonly logger = new Logger(TokenVerifierService.name);
  private readonly audience: string;
  private readonly issuer: string;

  constructor(
    private readonly jwtService: JwtService,
    private readonly keyResolver: KeyResolverService,
    configService: ConfigService,
  ) {
    this.audience = configService.get<string>(
      'AUTH_AUDIENCE',
      DEFAULT_AUTH_AUDIENCE,
    );
    this.issuer = issuerFor(
      configService.get<string>('AUTH_DOMAIN', DEFAULT_AUTH_DOMAIN),
    );
  }

  /**
   * @throws InvalidHeaderException (400) if the token cannot be parsed or verified
   * @throws MalformedHeaderException (401) if the token header has no key id
   * @throws KeySetUnavailableException (401) if the key set cannot be fetched
   * @throws KeyNotFoundException (400) if no published key matches the key id
   * @throws TokenExpiredException (401) if the token has expired
   * @throws InvalidClaimsException (401) on audience or issuer mismatch
   */
  async verify(token: string): Promise<TokenClaims> {
    const keyId = this.readKeyId(token);
    const key = await this.findKey(keyId);
    const publicKey = this.toPublicKey(key);

    try {
      return await this.jwtService.verifyAsync<TokenClaims>(token, {
        publicKey,
        algorithms: [TOKEN_ALGORITHM],
        audience: this.audience,
        issuer: this.issuer,
      });
    } catch (error) {
      throw this.translateVerifyError(toError(error));
    }
  }

  // ── Private helpers ───────────────────────────────────────

  private readKeyId(token: string): string {
    let decoded: unknown;
    try {
      decoded = this.jwtService.decode<unknown>(token, { complete: true });
    } catch (error) {
      throw new InvalidHeaderException(toError(error));
    }

    if (!isRecord(decoded) || !isRecord(decoded.header)) {
      throw new InvalidHeaderException();
    }

    const { kid } = decoded.header;
    if (typeof kid !== 'string' || kid === '') {
      throw new MalformedHeaderException('Authorization malformed.');
    }
    return kid;
  }

  private async findKey(keyId: string): Promise<SigningKey> {
    let keys: KeySet;
    try {
      keys = await this.keyResolver.resolve();
    } catch (error) {
      const cause = toError(error);
      this.logger.warn(`Key set unavailable: ${cause.message}`);
      throw new KeySetUnavailableException(cause);
    }

    const key = keys.get(keyId);
    if (!key) {
      throw new KeyNotFoundException(keyId);
    }
    return key;
  }

  private toPublicKey(key: SigningKey): string | Buffer {
    try {
      return createPublicKey({
        key: { kty: key.kty, n: key.n, e: key.e },
        format: 'jwk',
      }).export({ type: 'spki', format: 'pem' });
    } catch (error) {
      throw new InvalidHeaderException(toError(error));
    }
  }

  private translateVerifyError(cause: Error): AuthException {
    if (cause.name === 'TokenExpiredError') {
      return new TokenExpiredException(cause);
    }

    if (cause.name === 'JsonWebTokenError' && CLAIM_MISMATCH.test(cause.message)) {
      return new InvalidClaimsException(
        'Incorrect claims. Please, check the audience and issuer.',
        HttpStatus.UNAUTHORIZED,
        cause,
      );
    }

    return new InvalidHeaderException(cause);
  }
}
