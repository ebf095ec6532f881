import type { ValueTransformer } from 'typeorm';
import type { Ingredient } from '../interfaces/ingredient.interface';

/**
 * Thrown when the stored recipe column does not hold a JSON list of
 * ingredient records. Surfaces through the repository call that loaded the
 * row, so callers treat it like any other persistence fault.
 */
export class CorruptRecipeError extends Error {
  constructor(raw: string) {
    super(`Stored recipe is not a list of ingredients: ${raw.slice(0, 80)}`);
    this.name = 'CorruptRecipeError';
  }
}

export function isIngredient(value: unknown): value is Ingredient {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    'color' in value &&
    'parts' in value &&
    typeof value.name === 'string' &&
    typeof value.color === 'string' &&
    typeof value.parts === 'number'
  );
}

/**
 * Maps `Drink.recipe` between its in-memory form (a list of ingredients) and
 * the opaque JSON text stored in the `recipe` column.
 */
export const recipeTransformer: ValueTransformer = {
  to(value: Ingredient[] | undefined): string | undefined {
    return value === undefined ? undefined : JSON.stringify(value);
  },

  from(raw: string | null): Ingredient[] {
    if (raw === null) {
      throw new CorruptRecipeError('null');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new CorruptRecipeError(raw);
    }

    if (!Array.isArray(parsed) || !parsed.every(isIngredient)) {
      throw new CorruptRecipeError(raw);
    }
    return parsed;
  },
};
