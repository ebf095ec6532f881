/**
 * Public key published in the identity provider's key set (RSA JWK).
 */
export interface SigningKey {
  kid: string;
  kty: string;
  use?: string;
  /** RSA modulus, base64url */
  n: string;
  /** RSA exponent, base64url */
  e: string;
}

/** Key set indexed by key id */
export type KeySet = Map<string, SigningKey>;
