import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { AuthenticatedRequest, TokenClaims } from '../interfaces';

/**
 * Parameter decorator that hands the verified token claims to a handler.
 *
 * Only meaningful on routes protected by @RequiresAuth(); elsewhere it yields undefined.
 */
export const Claims = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): TokenClaims => {
    const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    return request.claims;
  },
);
