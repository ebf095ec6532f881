// ── Entities ────────────────────────────────────────────────
export {
  Drink,
  DRINK_ID_MAX,
  DRINK_TITLE_MAX_LENGTH,
} from './entities/drink.entity';

// ── Interfaces ──────────────────────────────────────────────
export type { Ingredient } from './interfaces/ingredient.interface';

// ── Module ──────────────────────────────────────────────────
export { DatabaseModule } from './database.module';
