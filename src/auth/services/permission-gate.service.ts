import { HttpStatus, Injectable } from '@nestjs/common';
import {
  InvalidClaimsException,
  PermissionDeniedException,
} from '../exceptions/auth.exceptions';
import type { TokenClaims } from '../interfaces';

/**
 * Checks a required permission string against a token's `permissions` claim.
 */
@Injectable()
export class PermissionGateService {
  /**
   * @throws InvalidClaimsException (400) if the claims carry no permissions list
   * @throws PermissionDeniedException (401) if the permission is not granted
   */
  check(permission: string, claims: TokenClaims): true {
    const { permissions } = claims;

    if (permissions === undefined) {
      throw new InvalidClaimsException(
        'Permissions not included in JWT.',
        HttpStatus.BAD_REQUEST,
      );
    }

    if (!Array.isArray(permissions) || !permissions.includes(permission)) {
      throw new PermissionDeniedException();
    }

    return true;
  }
}
