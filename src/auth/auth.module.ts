import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { AuthService } from './auth.service';
import { KeyResolverService } from './services/key-resolver.service';
import { PermissionGateService } from './services/permission-gate.service';
import { TokenExtractorService } from './services/token-extractor.service';
import { TokenVerifierService } from './services/token-verifier.service';

/**
 * AuthModule — verifies bearer tokens issued by the external identity
 * provider and checks their permissions.
 *
 * Provides:
 * - Token extraction from the Authorization header
 * - Key set download from the provider's JWKS endpoint
 * - Signature and claim verification (RS256)
 * - Permission checks against the `permissions` claim
 *
 * This service never issues tokens: JwtModule is registered without a
 * secret, and every verification supplies the provider's public key.
 *
 * Feature modules import AuthModule and protect routes with
 * @RequiresAuth(permission) from the barrel index.ts.
 */
@Module({
  imports: [JwtModule.register({})],
  providers: [
    AuthService,
    TokenExtractorService,
    KeyResolverService,
    TokenVerifierService,
    PermissionGateService,
  ],
  exports: [AuthService],
})
export class AuthModule {}
