import { UseGuards, applyDecorators } from '@nestjs/common';
import { PermissionGuard } from '../guards/permission.guard';

/**
 * Protects a route with a bearer token that must grant `permission`.
 *
 * Usage:
 * ```ts
 * @Delete('drinks/:id')
 * @RequiresAuth('delete:drinks')
 * remove(@Claims() claims: TokenClaims) { ... }
 * ```
 */
export function RequiresAuth(permission: string) {
  return applyDecorators(UseGuards(PermissionGuard(permission)));
}
