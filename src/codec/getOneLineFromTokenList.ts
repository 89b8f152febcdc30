import { assertLineFitsEngine } from './assertLineFitsEngine';
import { getOneCodePoint } from './getOneCodePoint';
import type { Token, TokenList } from './Token';
import {
  ESCAPE_BELOW_CHARACTER,
  ESCAPE_BELOW_NAME,
  ESCAPE_OFFSET,
  MARKER_BY_CATEGORY,
  MARKER_ESCAPE,
  MARKER_FROZEN,
  MARKER_NAME_ESCAPE,
  MARKER_NAME_START,
} from './TokenCategory.config';

/**
 * .what = encode one character unit, escaping low code points
 */
const getOneCharacterUnit = (input: {
  marker: string;
  char: string;
}): string => {
  const code = getOneCodePoint({ char: input.char });
  if (code < ESCAPE_BELOW_CHARACTER) {
    const shifted = String.fromCodePoint(code + ESCAPE_OFFSET);
    return `${MARKER_ESCAPE}${input.marker}${shifted}`;
  }
  return `${input.marker}${input.char}`;
};

/**
 * .what = encode one control-sequence unit
 * .why = names are variable length, so a trailing space ends them; any low
 *   character inside the name, space included, travels as ' ' + shifted char
 *   and is counted by a leading '*'
 */
const getOneControlSequenceUnit = (input: { name: string }): string => {
  let escapes = '';
  let body = '';
  for (const char of input.name) {
    const code = getOneCodePoint({ char });
    if (code < ESCAPE_BELOW_NAME) {
      escapes += MARKER_NAME_ESCAPE;
      body += ` ${String.fromCodePoint(code + ESCAPE_OFFSET)}`;
      continue;
    }
    body += char;
  }
  return `${escapes}${MARKER_NAME_START}${body} `;
};

const getOneUnit = (token: Token): string => {
  if (token.type === 'character')
    return getOneCharacterUnit({
      marker: MARKER_BY_CATEGORY[token.category],
      char: token.char,
    });
  if (token.type === 'active')
    return getOneCharacterUnit({
      marker: MARKER_BY_CATEGORY.active,
      char: token.char,
    });
  if (token.type === 'control-sequence')
    return getOneControlSequenceUnit({ name: token.name });
  return MARKER_FROZEN;
};

/**
 * .what = encode a token list as one printable, newline-free line
 * .why = the channel carries text lines only, so every token must survive as
 *   printable text
 *
 * .note = engines without unicode support read bytes, so any code point above
 *   255 is refused for them
 */
export const getOneLineFromTokenList = (input: {
  tokens: TokenList;
  unicode?: boolean;
}): string => {
  const line = input.tokens.map(getOneUnit).join('');
  assertLineFitsEngine({ line, unicode: input.unicode ?? true });
  return line;
};
