import { BadRequestError } from 'helpful-errors';

/**
 * .what = the categories a character token may carry
 */
export type CharacterCategory =
  | 'begin-group'
  | 'end-group'
  | 'math-shift'
  | 'alignment-tab'
  | 'parameter'
  | 'superscript'
  | 'subscript'
  | 'space'
  | 'letter'
  | 'other';

/**
 * .what = an atomic symbolic unit of the engine
 *
 * .note = a control-sequence with the empty name is the null-name sentinel
 */
export type Token =
  | { type: 'character'; category: CharacterCategory; char: string }
  | { type: 'control-sequence'; name: string }
  | { type: 'active'; char: string }
  | { type: 'frozen' };

/**
 * .note = insertion order is significant and survives encode/decode exactly
 */
export type TokenList = readonly Token[];

export const TOKEN_FROZEN: Token = { type: 'frozen' };
export const TOKEN_NULL_NAME: Token = { type: 'control-sequence', name: '' };

/**
 * .what = guard that a string is exactly one code point
 */
const assertOneCodePoint = (input: { char: string }): void => {
  if (Array.from(input.char).length !== 1)
    BadRequestError.throw('a character token holds exactly one code point', {
      char: input.char,
    });
};

export const genCharacterToken = (input: {
  category: CharacterCategory;
  char: string;
}): Token => {
  assertOneCodePoint(input);
  return { type: 'character', category: input.category, char: input.char };
};

export const genActiveToken = (input: { char: string }): Token => {
  assertOneCodePoint(input);
  return { type: 'active', char: input.char };
};

export const genControlSequenceToken = (input: { name: string }): Token => ({
  type: 'control-sequence',
  name: input.name,
});
