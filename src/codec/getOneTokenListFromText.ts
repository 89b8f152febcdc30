import type { CharacterCategory, Token } from './Token';

/**
 * .what = tokenize plain text the simple way: spaces as space, ascii letters as letter, the rest as other
 * .why = the common case for sending strings; no control sequences are recognized
 *
 * .note = a given category overrides the classification for every character
 */
export const getOneTokenListFromText = (input: {
  text: string;
  category?: CharacterCategory;
}): Token[] =>
  Array.from(input.text).map(
    (char): Token => ({
      type: 'character',
      category:
        input.category ??
        (char === ' ' ? 'space' : /^[A-Za-z]$/.test(char) ? 'letter' : 'other'),
      char,
    }),
  );
