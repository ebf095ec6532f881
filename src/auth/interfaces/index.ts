export type { TokenClaims } from './token-claims.interface';
export type { SigningKey, KeySet } from './signing-key.interface';
export type { AuthenticatedRequest } from './authenticated-request.interface';
