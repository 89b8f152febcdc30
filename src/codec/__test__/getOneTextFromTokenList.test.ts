import { BadRequestError } from 'helpful-errors';
import { getError, given, then, when } from 'test-fns';

import { getOneTextFromTokenList } from '../getOneTextFromTokenList';
import { getOneTokenListFromText } from '../getOneTokenListFromText';
import { genCharacterToken, genControlSequenceToken } from '../Token';

describe('getOneTextFromTokenList', () => {
  given('a list of character tokens', () => {
    when('read back as text', () => {
      then('it returns their characters in order', () => {
        const tokens = getOneTokenListFromText({ text: 'a b, é!' });
        expect(getOneTextFromTokenList({ tokens })).toEqual('a b, é!');
      });
    });

    when('the categories vary', () => {
      then('only the characters count', () => {
        const text = getOneTextFromTokenList({
          tokens: [
            genCharacterToken({ category: 'begin-group', char: '{' }),
            genCharacterToken({ category: 'letter', char: 'x' }),
            genCharacterToken({ category: 'end-group', char: '}' }),
          ],
        });
        expect(text).toEqual('{x}');
      });
    });
  });

  given('a list that holds a control sequence', () => {
    when('read back as text', () => {
      then('it throws a BadRequestError', async () => {
        const error = await getError(() =>
          getOneTextFromTokenList({
            tokens: [
              genCharacterToken({ category: 'letter', char: 'a' }),
              genControlSequenceToken({ name: 'relax' }),
            ],
          }),
        );
        expect(error).toBeInstanceOf(BadRequestError);
        expect((error as Error).message).toContain(
          'token list holds more than characters',
        );
      });
    });
  });
});
