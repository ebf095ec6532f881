import { Entity, PrimaryGeneratedColumn, Column, Unique } from 'typeorm';
import type { Ingredient } from '../interfaces/ingredient.interface';
import { recipeTransformer } from '../transformers/recipe.transformer';

/** Maximum length of a drink title, mirrored by the `drinks.title` column */
export const DRINK_TITLE_MAX_LENGTH = 80;

/** Largest id the `drinks.id` column (PostgreSQL SERIAL, int4) can hold */
export const DRINK_ID_MAX = 2147483647;

/**
 * Drink entity — one item of the menu.
 *
 * Invariants:
 * - id is assigned by the database and never changes
 * - title is unique and never blank
 * - recipe is stored as JSON text and always reads back as a list of
 *   ingredient records (see recipeTransformer)
 */
@Entity('drinks')
@Unique('UQ_drinks_title', ['title'])
export class Drink {
  @PrimaryGeneratedColumn({ primaryKeyConstraintName: 'PK_drinks' })
  id!: number;

  @Column({ type: 'varchar', length: DRINK_TITLE_MAX_LENGTH })
  title!: string;

  @Column({ type: 'text', transformer: recipeTransformer })
  recipe!: Ingredient[];
}
