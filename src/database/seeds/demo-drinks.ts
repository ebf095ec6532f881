import type { EntityManager } from 'typeorm';
import { Drink } from '../entities/drink.entity';
import type { Ingredient } from '../interfaces/ingredient.interface';

interface SeedDrink {
  title: string;
  recipe: Ingredient[];
}

const DEMO_DRINKS: SeedDrink[] = [
  {
    title: 'Flat White',
    recipe: [
      { name: 'espresso', color: 'brown', parts: 1 },
      { name: 'steamed milk', color: 'white', parts: 2 },
    ],
  },
  {
    title: 'Matcha Latte',
    recipe: [
      { name: 'matcha', color: 'green', parts: 1 },
      { name: 'oat milk', color: 'beige', parts: 3 },
    ],
  },
];

/**
 * Inserts the demo drinks through the given manager.
 * Expects an empty table; titles are unique.
 */
export async function insertDemoDrinks(manager: EntityManager): Promise<Drink[]> {
  const repository = manager.getRepository(Drink);
  return repository.save(DEMO_DRINKS.map((drink) => repository.create(drink)));
}
