import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Type,
  mixin,
} from '@nestjs/common';
import { AuthService } from '../auth.service';
import type { AuthenticatedRequest } from '../interfaces';

/**
 * Builds a guard class that admits a request only when its bearer token
 * grants `permission`.
 *
 * The required permission is bound when the guard class is built, not read
 * back from route metadata, so each protected route carries its own guard:
 *
 * ```ts
 * @UseGuards(PermissionGuard('post:drinks'))
 * @Post('drinks')
 * create(@Claims() claims: TokenClaims) { ... }
 * ```
 *
 * On success the verified claims are attached to the request for @Claims().
 */
export function PermissionGuard(permission: string): Type<CanActivate> {
  @Injectable()
  class RequiredPermissionGuard implements CanActivate {
    constructor(private readonly authService: AuthService) {}

    async canActivate(context: ExecutionContext): Promise<boolean> {
      const request = context.switchToHttp().getRequest<AuthenticatedRequest>();

      request.claims = await this.authService.authorize(
        permission,
        request.headers.authorization,
      );
      return true;
    }
  }

  return mixin(RequiredPermissionGuard);
}
