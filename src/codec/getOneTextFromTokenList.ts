import { BadRequestError } from 'helpful-errors';

import type { TokenList } from './Token';

/**
 * .what = the characters of a token list that holds character tokens only
 * .why = read back text that a peer sent as tokens
 */
export const getOneTextFromTokenList = (input: { tokens: TokenList }): string =>
  input.tokens
    .map((token) => {
      if (token.type !== 'character')
        BadRequestError.throw('token list holds more than characters', {
          token,
        });
      return token.char;
    })
    .join('');
