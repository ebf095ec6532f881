import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_AUTH_DOMAIN, jwksUrlFor } from '../auth.constants';
import type { KeySet, SigningKey } from '../interfaces';

/**
 * Raised when the key set cannot be fetched or does not look like a JWKS.
 * TokenVerifierService turns it into an authentication failure.
 */
export class KeySetFetchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'KeySetFetchError';
  }
}

function readSigningKey(entry: unknown): SigningKey | null {
  if (
    typeof entry !== 'object' ||
    entry === null ||
    !('kid' in entry) ||
    !('kty' in entry) ||
    !('n' in entry) ||
    !('e' in entry)
  ) {
    return null;
  }

  const { kid, kty, n, e } = entry;
  if (
    typeof kid !== 'string' ||
    typeof kty !== 'string' ||
    typeof n !== 'string' ||
    typeof e !== 'string'
  ) {
    return null;
  }

  const use = 'use' in entry && typeof entry.use === 'string' ? entry.use : undefined;
  return { kid, kty, use, n, e };
}

/**
 * KeyResolverService — downloads the identity provider's JSON Web Key Set.
 *
 * The set is fetched again on every call: there is no cache, no retry and no
 * offline fallback, so a key rotated at the provider is picked up by the very
 * next request.
 */
@Injectable()
export class KeyResolverService {
  private readonly logger = new Logger(KeyResolverService.name);
  readonly jwksUrl: string;

  constructor(configService: ConfigService) {
    const domain = configService.get<string>('AUTH_DOMAIN', DEFAULT_AUTH_DOMAIN);
    this.jwksUrl = jwksUrlFor(domain);
  }

  /**
   * @returns the published keys indexed by key id
   * @throws KeySetFetchError on network failure, non-2xx status or a body
   *         that is not `{ keys: [...] }`
   */
  async resolve(): Promise<KeySet> {
    this.logger.debug(`Fetching key set from ${this.jwksUrl}`);

    let body: unknown;
    try {
      const response = await fetch(this.jwksUrl);
      if (!response.ok) {
        throw new KeySetFetchError(
          `Key set request failed: ${response.status} ${response.statusText}`,
        );
      }
      body = await response.json();
    } catch (error) {
      if (error instanceof KeySetFetchError) {
        throw error;
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new KeySetFetchError(
        `Unable to read key set from ${this.jwksUrl}: ${cause.message}`,
        { cause },
      );
    }

    if (
      typeof body !== 'object' ||
      body === null ||
      !('keys' in body) ||
      !Array.isArray(body.keys)
    ) {
      throw new KeySetFetchError('Key set response has no "keys" list');
    }

    const keys: KeySet = new Map();
    for (const entry of body.keys) {
      const key = readSigningKey(entry);
      if (key) {
        keys.set(key.kid, key);
      }
    }

    this.logger.debug(`Resolved ${keys.size} signing keys`);
    return keys;
  }
}
