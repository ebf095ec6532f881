import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import type { TokenClaims } from './interfaces';
import { PermissionGateService } from './services/permission-gate.service';
import { TokenExtractorService } from './services/token-extractor.service';
import { TokenVerifierService } from './services/token-verifier.service';

/**
 * AuthService — the authorization precondition in front of protected routes.
 *
 * Runs the three stages in order:
 *   header → token (TokenExtractorService)
 *   token  → claims (TokenVerifierService)
 *   claims → permission check (PermissionGateService)
 *
 * Failures from the first two stages are logged with their reason and
 * reported to the caller as a bare 401 Unauthorized. Permission failures keep
 * their own status (400 for a missing permissions claim, 401 for a missing
 * permission) and description.
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly tokenExtractor: TokenExtractorService,
    private readonly tokenVerifier: TokenVerifierService,
    private readonly permissionGate: PermissionGateService,
  ) {}

  /**
   * @param permission    — permission string the caller must hold, e.g. "post:drinks"
   * @param authorization — raw Authorization header value, if any
   * @returns the verified claims, for the protected operation to use
   */
  async authorize(
    permission: string,
    authorization: string | undefined,
  ): Promise<TokenClaims> {
    let claims: TokenClaims;
    try {
      const token = this.tokenExtractor.extract(authorization);
      claims = await this.tokenVerifier.verify(token);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Authentication failed for "${permission}": ${reason}`);
      throw new UnauthorizedException();
    }

    this.permissionGate.check(permission, claims);
    return claims;
  }
}
