import type { Request } from 'express';
import type { TokenClaims } from './token-claims.interface';

/**
 * Express Request after a PermissionGuard let it through.
 * Use this type in handlers that sit behind @RequiresAuth().
 */
export interface AuthenticatedRequest extends Request {
  claims: TokenClaims;
}
