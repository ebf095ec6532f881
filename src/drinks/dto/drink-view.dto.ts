import type { Drink, Ingredient } from '../../database';

/** Ingredient as shown on the public menu: no names */
export interface ShortIngredientView {
  color: string;
  parts: number;
}

/**
 * Short projection of a drink: the recipe keeps only colors and parts.
 * Served to anonymous callers of GET /drinks.
 */
export class DrinkShortView {
  id: number;
  title: string;
  recipe: ShortIngredientView[];

  private constructor(id: number, title: string, recipe: ShortIngredientView[]) {
    this.id = id;
    this.title = title;
    this.recipe = recipe;
  }

  static fromEntity(drink: Drink): DrinkShortView {
    return new DrinkShortView(
      drink.id,
      drink.title,
      drink.recipe.map(({ color, parts }) => ({ color, parts })),
    );
  }
}

/**
 * Long projection of a drink, with full ingredient detail.
 * Returned by every permission-gated endpoint.
 */
export class DrinkLongView {
  id: number;
  title: string;
  recipe: Ingredient[];

  private constructor(id: number, title: string, recipe: Ingredient[]) {
    this.id = id;
    this.title = title;
    this.recipe = recipe;
  }

  static fromEntity(drink: Drink): DrinkLongView {
    return new DrinkLongView(
      drink.id,
      drink.title,
      drink.recipe.map(({ name, color, parts }) => ({ name, color, parts })),
    );
  }
}
