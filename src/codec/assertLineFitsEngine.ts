import { BadRequestError } from 'helpful-errors';

import { getOneCodePoint } from './getOneCodePoint';

/**
 * .what = refuse a line that a bytes-only engine could not read back
 *
 * .note = such engines read one byte per character, so the channel carries them latin1 and nothing above 255 fits
 */
export const assertLineFitsEngine = (input: {
  line: string;
  unicode: boolean;
}): void => {
  if (input.unicode) return;
  for (const char of input.line)
    if (getOneCodePoint({ char }) > 0xff)
      BadRequestError.throw(
        'cannot send a code point above 255 to a non-unicode engine',
        { char },
      );
};
