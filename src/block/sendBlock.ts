import { BadRequestError } from 'helpful-errors';

import type { Session } from '../session/Session';
import { genBlockDelimiter } from './genBlockDelimiter';

/**
 * .what = the lines that carry one block on the wire: delimiter, payload, delimiter
 * .why = validated up front, so a message is never cut off halfway by a bad payload
 */
export const getOneFramedBlock = (input: {
  lines: readonly string[];
  delimiter?: string;
}): string[] => {
  const broken = input.lines.find((line) => line.includes('\n'));
  if (broken !== undefined)
    BadRequestError.throw('a block line must not contain a line break', {
      line: broken.slice(0, 100),
    });
  if (input.delimiter !== undefined) {
    if (input.delimiter.length === 0 || input.delimiter.includes('\n'))
      BadRequestError.throw('a block delimiter must be one non-empty line', {
        delimiter: input.delimiter,
      });
    if (input.lines.includes(input.delimiter))
      BadRequestError.throw('the block delimiter occurs as a payload line', {
        delimiter: input.delimiter,
      });
  }
  const delimiter =
    input.delimiter ?? genBlockDelimiter({ lines: input.lines });
  return [delimiter, ...input.lines, delimiter];
};

/**
 * .what = write a multi-line payload framed by a delimiter line
 * .why = lets an argument or return span lines verbatim, trailing whitespace and empty lines included
 *
 * .note = writes synchronously; the caller yields the turn afterwards if this was the last part of its message
 */
export const sendBlock = (
  input: { lines: readonly string[]; delimiter?: string },
  context: { session: Session },
): void => {
  for (const line of getOneFramedBlock(input)) context.session.writeLine(line);
};
