import { CorruptRecipeError, isIngredient, recipeTransformer } from './recipe.transformer';

describe('recipeTransformer', () => {
  const recipe = [
    { name: 'espresso', color: 'brown', parts: 1 },
    { name: 'steamed milk', color: 'white', parts: 2 },
  ];

  it('stores a recipe as JSON text', () => {
    expect(recipeTransformer.to(recipe)).toBe(
      '[{"name":"espresso","color":"brown","parts":1},{"name":"steamed milk","color":"white","parts":2}]',
    );
  });

  it('leaves an unset recipe unset', () => {
    expect(recipeTransformer.to(undefined)).toBeUndefined();
  });

  it('reads stored JSON text back in order', () => {
    expect(recipeTransformer.from(JSON.stringify(recipe))).toEqual(recipe);
  });

  it.each([
    ['invalid JSON', '[{"name":'],
    ['an object', '{"name":"espresso","color":"brown","parts":1}'],
    ['a list with a partial entry', '[{"name":"espresso","color":"brown"}]'],
    ['parts given as text', '[{"name":"espresso","color":"brown","parts":"1"}]'],
  ])('treats %s as a corrupt recipe', (_case, raw) => {
    expect(() => recipeTransformer.from(raw)).toThrow(CorruptRecipeError);
  });

  it('treats a NULL column as a corrupt recipe', () => {
    expect(() => recipeTransformer.from(null)).toThrow(
      'Stored recipe is not a list of ingredients: null',
    );
  });
});

describe('isIngredient', () => {
  it('accepts a full ingredient record', () => {
    expect(isIngredient({ name: 'matcha', color: 'green', parts: 1 })).toBe(true);
  });

  it('rejects values that are not records', () => {
    expect(isIngredient(null)).toBe(false);
    expect(isIngredient('matcha')).toBe(false);
  });
});
