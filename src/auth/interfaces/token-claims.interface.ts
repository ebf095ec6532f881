/**
 * Decoded payload of a verified access token.
 *
 * Only the registered claims this service reads are typed; everything else
 * the identity provider puts in the token passes through untouched.
 */
export interface TokenClaims {
  /** Subject: the identity provider's user id */
  sub?: string;
  iss?: string;
  aud?: string | string[];
  /** Expiry, seconds since the epoch */
  exp?: number;
  iat?: number;

  /** Granted permission strings, e.g. "post:drinks" */
  permissions?: unknown;

  [claim: string]: unknown;
}
