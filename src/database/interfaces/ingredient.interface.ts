/**
 * One line of a drink recipe.
 *
 * `parts` is a relative quantity: a recipe of 1 part coffee and 3 parts milk
 * is rendered as a cup that is one quarter coffee.
 */
export interface Ingredient {
  name: string;
  color: string;
  parts: number;
}
