/**
 * Drink fields as they arrive from the client, before validation.
 *
 * Values stay `unknown` until DrinksService classifies them as missing,
 * blank or malformed.
 */
export interface DrinkPayload {
  title?: unknown;
  recipe?: unknown;
}
