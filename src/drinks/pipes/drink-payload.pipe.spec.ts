import { DrinkValidationException } from '../exceptions/drink.exceptions';
import { DrinkPayloadPipe } from './drink-payload.pipe';

describe('DrinkPayloadPipe', () => {
  const pipe = new DrinkPayloadPipe();
  const recipe = [{ name: 'coffee', color: 'brown', parts: 1 }];

  it('keeps a JSON body as it is', () => {
    expect(pipe.transform({ title: 'Latte', recipe })).toEqual({
      title: 'Latte',
      recipe,
    });
  });

  it('drops fields other than title and recipe', () => {
    expect(pipe.transform({ title: 'Latte', id: 99 })).toEqual({
      title: 'Latte',
      recipe: undefined,
    });
  });

  it('parses a recipe sent as JSON text in a form', () => {
    expect(
      pipe.transform({ title: 'Latte', recipe: JSON.stringify(recipe) }),
    ).toEqual({ title: 'Latte', recipe });
  });

  it('leaves a recipe string that is not JSON for validation', () => {
    expect(pipe.transform({ recipe: '[coffee' })).toEqual({
      title: undefined,
      recipe: '[coffee',
    });
    expect(pipe.transform({ recipe: 'coffee' })).toEqual({
      title: undefined,
      recipe: 'coffee',
    });
  });

  it('parses a raw text body as JSON', () => {
    expect(pipe.transform(JSON.stringify({ title: 'Latte', recipe }))).toEqual({
      title: 'Latte',
      recipe,
    });
  });

  it.each([undefined, null, '', '  '])('reads an empty body (%p) as no fields', (body) => {
    expect(pipe.transform(body)).toEqual({});
  });

  it.each([
    ['unparseable text', '{"title":'],
    ['a JSON list', '[1, 2]'],
    ['a JSON number', '42'],
    ['an array', [{ title: 'Latte' }]],
  ])('rejects %s', (_case, body) => {
    expect(() => pipe.transform(body)).toThrow(DrinkValidationException);
  });
});
