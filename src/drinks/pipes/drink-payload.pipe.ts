import { Injectable, PipeTransform } from '@nestjs/common';
import { isRecord } from '../../common/utils/is-record';
import type { DrinkPayload } from '../dto/drink-payload.dto';
import { DrinkValidationException } from '../exceptions/drink.exceptions';

const INVALID_BODY_MESSAGE =
  'Invalid input data. (the body must be a JSON object with title and/or recipe.)';

/**
 * Normalizes a drink request body into a DrinkPayload.
 *
 * Bodies arrive in one of two forms, depending on the parser that matched
 * the Content-Type (see configureApp):
 *   - urlencoded form              → object whose recipe is usually a JSON string
 *   - application/json, text/plain → raw string holding JSON
 *
 * Only parsing happens here; field rules live in DrinksService.
 */
@Injectable()
export class DrinkPayloadPipe implements PipeTransform<unknown, DrinkPayload> {
  transform(value: unknown): DrinkPayload {
    const body = typeof value === 'string' ? this.parseRawBody(value) : value;

    if (body === undefined || body === null) {
      return {};
    }
    if (!isRecord(body)) {
      throw new DrinkValidationException(INVALID_BODY_MESSAGE);
    }

    return {
      title: body.title,
      recipe: this.parseRecipe(body.recipe),
    };
  }

  private parseRawBody(raw: string): unknown {
    if (raw.trim() === '') {
      return undefined;
    }
    try {
      return JSON.parse(raw);
    } catch {
      throw new DrinkValidationException(INVALID_BODY_MESSAGE);
    }
  }

  /**
   * Form fields carry the recipe as JSON text. Anything that does not parse
   * is passed on unchanged and rejected by the recipe rules.
   */
  private parseRecipe(recipe: unknown): unknown {
    if (typeof recipe !== 'string') {
      return recipe;
    }

    const text = recipe.trim();
    if (!text.startsWith('[') && !text.startsWith('{')) {
      return recipe;
    }
    try {
      return JSON.parse(text);
    } catch {
      return recipe;
    }
  }
}
