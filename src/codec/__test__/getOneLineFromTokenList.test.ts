import { BadRequestError } from 'helpful-errors';
import { getError, given, then, when } from 'test-fns';

import { getOneLineFromTokenList } from '../getOneLineFromTokenList';
import {
  genActiveToken,
  genCharacterToken,
  genControlSequenceToken,
  TOKEN_FROZEN,
  TOKEN_NULL_NAME,
} from '../Token';

const TEST_CASES = [
  {
    description: 'a letter, an other and a space',
    given: {
      tokens: [
        genCharacterToken({ category: 'letter', char: 'a' }),
        genCharacterToken({ category: 'other', char: '1' }),
        genCharacterToken({ category: 'space', char: ' ' }),
      ],
    },
    expect: { line: 'BaC1A ' },
  },
  {
    description: 'a group around a control sequence',
    given: {
      tokens: [
        genCharacterToken({ category: 'begin-group', char: '{' }),
        genControlSequenceToken({ name: 'relax' }),
        genCharacterToken({ category: 'end-group', char: '}' }),
      ],
    },
    expect: { line: '1{\\relax 2}' },
  },
  {
    description: 'a tab character of category other',
    given: { tokens: [genCharacterToken({ category: 'other', char: '\t' })] },
    expect: { line: '^CI' },
  },
  {
    description: 'a newline character of category letter',
    given: { tokens: [genCharacterToken({ category: 'letter', char: '\n' })] },
    expect: { line: '^BJ' },
  },
  {
    description: 'active characters, printable and low',
    given: {
      tokens: [
        genActiveToken({ char: '~' }),
        genActiveToken({ char: '\u0001' }),
      ],
    },
    expect: { line: 'D~^DA' },
  },
  {
    description: 'the frozen marker and the null name',
    given: { tokens: [TOKEN_FROZEN, TOKEN_NULL_NAME] },
    expect: { line: 'R\\ ' },
  },
  {
    description: 'a control sequence whose name holds a space',
    given: { tokens: [genControlSequenceToken({ name: 'a b' })] },
    expect: { line: '*\\a `b ' },
  },
  {
    description: 'a control sequence whose name ends with code point 1',
    given: { tokens: [genControlSequenceToken({ name: 'a\u0001' })] },
    expect: { line: '*\\a A ' },
  },
  {
    description: 'parameter, superscript and subscript',
    given: {
      tokens: [
        genCharacterToken({ category: 'parameter', char: '#' }),
        genCharacterToken({ category: 'superscript', char: '^' }),
        genCharacterToken({ category: 'subscript', char: '_' }),
      ],
    },
    expect: { line: '6#7^8_' },
  },
];

describe('getOneLineFromTokenList', () => {
  given('token lists of every unit shape', () => {
    TEST_CASES.map((thisCase) =>
      when(thisCase.description, () => {
        then('it encodes the expected line', () => {
          const line = getOneLineFromTokenList({
            tokens: thisCase.given.tokens,
          });
          expect(line).toEqual(thisCase.expect.line);
        });
      }),
    );
  });

  given('characters below code point 32', () => {
    when('every one of them is encoded', () => {
      then('no code point below 32 reaches the line', () => {
        const tokens = Array.from({ length: 32 }, (_, code) =>
          genCharacterToken({
            category: 'other',
            char: String.fromCodePoint(code),
          }),
        );
        const line = getOneLineFromTokenList({ tokens });
        const lowest = Math.min(
          ...Array.from(line).map((char) => char.codePointAt(0) ?? 0),
        );
        expect(lowest).toBeGreaterThanOrEqual(32);
        expect(line.includes('\n')).toEqual(false);
      });
    });
  });

  given('a character above code point 255', () => {
    const tokens = [genCharacterToken({ category: 'letter', char: 'λ' })];

    when('encoded for a unicode engine', () => {
      then('it is written as is', () => {
        expect(getOneLineFromTokenList({ tokens, unicode: true })).toEqual(
          'Bλ',
        );
      });
    });

    when('encoded for a non-unicode engine', () => {
      then('it throws a BadRequestError', async () => {
        const error = await getError(() =>
          getOneLineFromTokenList({ tokens, unicode: false }),
        );
        expect(error).toBeInstanceOf(BadRequestError);
        expect((error as Error).message).toContain('above 255');
      });
    });
  });

  given('a character token built from two characters', () => {
    when('constructed', () => {
      then('it throws a BadRequestError', async () => {
        const error = await getError(() =>
          genCharacterToken({ category: 'letter', char: 'ab' }),
        );
        expect(error).toBeInstanceOf(BadRequestError);
      });
    });
  });
});
