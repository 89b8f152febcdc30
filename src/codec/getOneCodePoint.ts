import { UnexpectedCodePathError } from 'helpful-errors';

/**
 * .what = the code point of a single-character string
 */
export const getOneCodePoint = (input: { char: string }): number => {
  const code = input.char.codePointAt(0);
  if (code === undefined)
    UnexpectedCodePathError.throw('expected a non-empty character', input);
  return code;
};
