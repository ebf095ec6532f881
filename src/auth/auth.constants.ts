/** The only signing algorithm accepted for access tokens */
export const TOKEN_ALGORITHM = 'RS256';

/** Identity provider tenant used when AUTH_DOMAIN is not configured */
export const DEFAULT_AUTH_DOMAIN = 'drinks-menu.eu.auth0.com';

/** API identifier expected in the `aud` claim when AUTH_AUDIENCE is not configured */
export const DEFAULT_AUTH_AUDIENCE = 'drinks';

export function jwksUrlFor(domain: string): string {
  return `https://${domain}/.well-known/jwks.json`;
}

export function issuerFor(domain: string): string {
  return `https://${domain}/`;
}
