import { DrinkNotFoundException } from '../exceptions/drink.exceptions';
import { DrinkIdPipe } from './drink-id.pipe';

describe('DrinkIdPipe', () => {
  const pipe = new DrinkIdPipe();

  it.each([
    ['1', 1],
    ['42', 42],
    ['2147483647', 2147483647],
  ])('parses %s', (value, id) => {
    expect(pipe.transform(value)).toBe(id);
  });

  it.each(['0', '-3', '1.5', '1e3', 'latte', '', '2147483648', '99999999999999999999'])(
    'answers 404 for %p',
    (value) => {
      expect(() => pipe.transform(value)).toThrow(DrinkNotFoundException);
    },
  );

  it('echoes an out-of-range id exactly', () => {
    expect(() => pipe.transform('99999999999999999999')).toThrow(
      'Drink 99999999999999999999 was not found in the database.',
    );
  });
});
