import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Thrown when submitted drink fields are missing, blank or malformed.
 * Maps to HTTP 400 Bad Request.
 */
export class DrinkValidationException extends HttpException {
  constructor(message: string) {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        message,
      },
      HttpStatus.BAD_REQUEST,
    );
  }
}

/**
 * Thrown when a drink with the same title is already on the menu.
 * Maps to HTTP 400 Bad Request.
 */
export class DuplicateTitleException extends HttpException {
  constructor(title: string) {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        message: `A drink titled "${title}" already exists.`,
      },
      HttpStatus.BAD_REQUEST,
    );
  }
}

/**
 * Thrown when no drink has the requested id.
 * Maps to HTTP 404 Not Found.
 */
export class DrinkNotFoundException extends HttpException {
  constructor(id: number | string) {
    super(
      {
        statusCode: HttpStatus.NOT_FOUND,
        error: 'Not Found',
        message: `Drink ${id} was not found in the database.`,
      },
      HttpStatus.NOT_FOUND,
    );
  }
}

/**
 * Thrown by the list endpoints when the menu is empty.
 * Maps to HTTP 404 Not Found.
 */
export class NoDrinksFoundException extends HttpException {
  constructor() {
    super(
      {
        statusCode: HttpStatus.NOT_FOUND,
        error: 'Not Found',
        message: 'There are no drinks.',
      },
      HttpStatus.NOT_FOUND,
    );
  }
}

/**
 * Thrown when the database fails while reading or writing drinks.
 * The driver error is kept as `cause` and not sent to the client. Maps to HTTP 422.
 */
export class DrinkQueryException extends HttpException {
  constructor(message: string, cause: Error) {
    super(
      {
        statusCode: HttpStatus.UNPROCESSABLE_ENTITY,
        error: 'Unprocessable Entity',
        message,
      },
      HttpStatus.UNPROCESSABLE_ENTITY,
      { cause },
    );
  }
}
