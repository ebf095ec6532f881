import { HttpException, Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { DataSource, EntityManager } from 'typeorm';
import { DRINK_TITLE_MAX_LENGTH, Drink, Ingredient } from '../database';
import { isRecord } from '../common/utils/is-record';
import type { DrinkPayload } from './dto/drink-payload.dto';
import { IngredientDto } from './dto/ingredient.dto';
import {
  DrinkNotFoundException,
  DrinkQueryException,
  DrinkValidationException,
  DuplicateTitleException,
} from './exceptions/drink.exceptions';

/** Fields of a drink after validation, ready to be written */
interface DrinkFields {
  title?: string;
  recipe?: Ingredient[];
}

function isMissing(value: unknown): boolean {
  return value === undefined || value === null;
}

function isBlank(value: unknown): boolean {
  if (typeof value === 'string') {
    return value.trim() === '';
  }
  return Array.isArray(value) && value.length === 0;
}

/**
 * DrinksService — the catalog store.
 *
 * Every operation opens its own transaction on the injected DataSource.
 * Business failures (validation, duplicates, unknown ids) propagate as
 * their HttpException; any other error rolls the transaction back and is
 * reported as a DrinkQueryException (422).
 */
@Injectable()
export class DrinksService {
  private readonly logger = new Logger(DrinksService.name);

  constructor(private readonly dataSource: DataSource) {}

  /** All drinks, ordered by id. May be empty. */
  async list(): Promise<Drink[]> {
    return this.inTransaction(
      'Unexpected error accessing the database.',
      (manager) => manager.find(Drink, { order: { id: 'ASC' } }),
    );
  }

  /**
   * @throws DrinkValidationException (400) on missing, blank or malformed fields
   * @throws DuplicateTitleException (400) if the title is taken
   * @throws DrinkQueryException (422) on persistence faults
   */
  async create(payload: DrinkPayload): Promise<Drink> {
    const { title, recipe } = this.validateCreate(payload);

    return this.inTransaction(
      'Unexpected error inserting the drink into the database.',
      async (manager) => {
        await this.assertTitleFree(manager, title);

        const drink = await manager.save(
          Drink,
          manager.create(Drink, { title, recipe }),
        );
        this.logger.log(`Drink ${drink.id} created: "${drink.title}"`);
        return drink;
      },
    );
  }

  /**
   * Applies the supplied fields to an existing drink.
   *
   * @throws DrinkValidationException (400) on missing, blank or malformed fields
   * @throws DrinkNotFoundException (404) if no drink has this id
   * @throws DuplicateTitleException (400) if another drink has the new title
   * @throws DrinkQueryException (422) on persistence faults
   */
  async update(id: number, payload: DrinkPayload): Promise<Drink> {
    const fields = this.validateUpdate(payload);

    return this.inTransaction(
      'Unexpected error updating the database.',
      async (manager) => {
        const drink = await this.findOrFail(manager, id);

        if (fields.title !== undefined && fields.title !== drink.title) {
          await this.assertTitleFree(manager, fields.title);
          drink.title = fields.title;
        }
        if (fields.recipe !== undefined) {
          drink.recipe = fields.recipe;
        }

        const saved = await manager.save(Drink, drink);
        this.logger.log(`Drink ${saved.id} updated`);
        return saved;
      },
    );
  }

  /**
   * @returns the id of the deleted drink
   * @throws DrinkNotFoundException (404) if no drink has this id
   * @throws DrinkQueryException (422) on persistence faults
   */
  async remove(id: number): Promise<number> {
    return this.inTransaction(
      'Unexpected error deleting the drink from the database.',
      async (manager) => {
        const drink = await this.findOrFail(manager, id);
        await manager.remove(Drink, drink);

        this.logger.log(`Drink ${id} deleted`);
        return id;
      },
    );
  }

  // ── Private helpers ───────────────────────────────────────

  private async inTransaction<T>(
    failureMessage: string,
    work: (manager: EntityManager) => Promise<T>,
  ): Promise<T> {
    try {
      return await this.dataSource.transaction(work);
    } catch (error) {
      if (error instanceof HttpException) {
        throw error;
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`${failureMessage} ${cause.message}`, cause.stack);
      throw new DrinkQueryException(failureMessage, cause);
    }
  }

  private async findOrFail(manager: EntityManager, id: number): Promise<Drink> {
    const drink = await manager.findOneBy(Drink, { id });
    if (!drink) {
      throw new DrinkNotFoundException(id);
    }
    return drink;
  }

  private async assertTitleFree(
    manager: EntityManager,
    title: string,
  ): Promise<void> {
    if (await manager.exists(Drink, { where: { title } })) {
      throw new DuplicateTitleException(title);
    }
  }

  private validateCreate(payload: DrinkPayload): Required<DrinkFields> {
    const { title, recipe } = payload;

    if (isMissing(title) && isMissing(recipe)) {
      throw new DrinkValidationException(
        'Missing input field(s). (title and recipe must be supplied.)',
      );
    }
    if (isMissing(title)) {
      throw new DrinkValidationException(
        'Missing input field(s). (title must be supplied.)',
      );
    }
    if (isMissing(recipe)) {
      throw new DrinkValidationException(
        'Missing input field(s). (recipe must be supplied.)',
      );
    }
    if (isBlank(title)) {
      throw new DrinkValidationException(
        'None of the fields may be blank. (title must be supplied.)',
      );
    }
    if (isBlank(recipe)) {
      throw new DrinkValidationException(
        'None of the fields may be blank. (recipe must be supplied.)',
      );
    }

    return { title: this.readTitle(title), recipe: this.readRecipe(recipe) };
  }

  private validateUpdate(payload: DrinkPayload): DrinkFields {
    const { title, recipe } = payload;

    if (isMissing(title) && isMissing(recipe)) {
      throw new DrinkValidationException(
        'Missing input field(s). (title or recipe must be supplied.)',
      );
    }
    if (isBlank(title) || isBlank(recipe)) {
      throw new DrinkValidationException(
        'Bad input field(s). (title or recipe must not be blank.)',
      );
    }

    return {
      title: isMissing(title) ? undefined : this.readTitle(title),
      recipe: isMissing(recipe) ? undefined : this.readRecipe(recipe),
    };
  }

  private readTitle(value: unknown): string {
    if (typeof value !== 'string') {
      throw new DrinkValidationException('title must be a string.');
    }

    const title = value.trim();
    if (title.length > DRINK_TITLE_MAX_LENGTH) {
      throw new DrinkValidationException(
        `title must be at most ${DRINK_TITLE_MAX_LENGTH} characters.`,
      );
    }
    return title;
  }

  /** Checks every entry and keeps only name, color and parts. */
  private readRecipe(value: unknown): Ingredient[] {
    if (!Array.isArray(value)) {
      throw new DrinkValidationException('recipe must be a list of ingredients.');
    }

    return value.map((entry: unknown, index) => {
      if (!isRecord(entry)) {
        throw new DrinkValidationException(
          `recipe[${index}] must be an object with name, color and parts.`,
        );
      }

      const ingredient = plainToInstance(IngredientDto, entry);
      const errors = validateSync(ingredient);
      if (errors.length > 0) {
        const problems = errors
          .flatMap((error) => Object.values(error.constraints ?? {}))
          .join(', ');
        throw new DrinkValidationException(`recipe[${index}]: ${problems}`);
      }

      const { name, color, parts } = ingredient;
      return { name, color, parts };
    });
  }
}
