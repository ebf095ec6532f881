import { Injectable, PipeTransform } from '@nestjs/common';
import { DRINK_ID_MAX } from '../../database';
import { DrinkNotFoundException } from '../exceptions/drink.exceptions';

const DIGITS = /^\d+$/;

/**
 * Parses the `:id` route parameter.
 *
 * Anything that cannot be a stored drink id (not a decimal integer, zero, or
 * beyond the id column's range) names no drink and is answered with 404
 * before the database is queried.
 */
@Injectable()
export class DrinkIdPipe implements PipeTransform<string, number> {
  transform(value: string): number {
    const id = Number(value);
    if (!DIGITS.test(value) || !Number.isSafeInteger(id) || id < 1 || id > DRINK_ID_MAX) {
      throw new DrinkNotFoundException(value);
    }
    return id;
  }
}
