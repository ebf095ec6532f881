// ── Module ──────────────────────────────────────────────────
export { AuthModule } from './auth.module';

// ── Services ────────────────────────────────────────────────
export { AuthService } from './auth.service';
export { KeyResolverService } from './services/key-resolver.service';

// ── Guards (for use in other feature modules) ───────────────
export { PermissionGuard } from './guards/permission.guard';

// ── Decorators (for use in other feature modules) ───────────
export { RequiresAuth, Claims } from './decorators';

// ── Interfaces (for typing in other feature modules) ────────
export type {
  TokenClaims,
  SigningKey,
  KeySet,
  AuthenticatedRequest,
} from './interfaces';
