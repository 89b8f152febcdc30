import { DecodeError } from '../errors/DecodeError';
import { getOneCodePoint } from './getOneCodePoint';
import type { CharacterCategory, Token } from './Token';
import {
  CATEGORY_BY_MARKER,
  ESCAPE_BELOW_CHARACTER,
  ESCAPE_BELOW_NAME,
  ESCAPE_OFFSET,
  MARKER_ESCAPE,
  MARKER_FROZEN,
  MARKER_NAME_ESCAPE,
  MARKER_NAME_START,
} from './TokenCategory.config';

/**
 * .what = a decoded unit and the index right after it
 */
interface UnitDecoded {
  token: Token;
  next: number;
}

/**
 * .what = undo the shift applied to an escaped character
 * .note = returns null when the character is outside the shifted range
 */
const getOneUnshifted = (input: {
  char: string | undefined;
  below: number;
}): string | null => {
  if (input.char === undefined) return null;
  const code = getOneCodePoint({ char: input.char }) - ESCAPE_OFFSET;
  if (code < 0 || code >= input.below) return null;
  return String.fromCodePoint(code);
};

const genToken = (input: {
  category: CharacterCategory | 'active' | undefined;
  char: string;
}): Token | null => {
  if (input.category === undefined) return null;
  if (input.category === 'active') return { type: 'active', char: input.char };
  return { type: 'character', category: input.category, char: input.char };
};

/**
 * .what = decode a control-sequence unit that starts at `start`
 *
 * .note = shape: '*' x n, '\', then n times (plain ' ' shifted), then plain ' '
 */
const decodeControlSequence = (input: {
  chars: string[];
  start: number;
  line: string;
}): UnitDecoded => {
  const { chars, start, line } = input;

  // count the escapes announced up front
  let index = start;
  let escapes = 0;
  while (chars[index] === MARKER_NAME_ESCAPE) {
    escapes += 1;
    index += 1;
  }
  if (chars[index] !== MARKER_NAME_START)
    throw new DecodeError('BadEscape', 'escape count not followed by a name', {
      line,
      position: start,
    });
  index += 1;

  // read plain text up to the next space
  const readPlain = (): string => {
    let plain = '';
    while (index < chars.length && chars[index] !== ' ') {
      plain += chars[index] ?? '';
      index += 1;
    }
    if (index >= chars.length)
      throw new DecodeError(
        'UnterminatedName',
        'control sequence name never ended',
        { line, position: start },
      );
    index += 1; // the space
    return plain;
  };

  let name = '';
  for (let escape = 0; escape < escapes; escape += 1) {
    name += readPlain();
    const unshifted = getOneUnshifted({
      char: chars[index],
      below: ESCAPE_BELOW_NAME,
    });
    if (unshifted === null)
      throw new DecodeError(
        'BadEscape',
        'name escape lacks a shifted character',
        { line, position: index },
      );
    name += unshifted;
    index += 1;
  }
  name += readPlain();

  return { token: { type: 'control-sequence', name }, next: index };
};

/**
 * .what = decode a caret-escaped character unit that starts at `start`
 */
const decodeEscapedCharacter = (input: {
  chars: string[];
  start: number;
  line: string;
}): UnitDecoded => {
  const { chars, start, line } = input;
  const marker = chars[start + 1];
  const category =
    marker === undefined ? undefined : CATEGORY_BY_MARKER.get(marker);
  const char = getOneUnshifted({
    char: chars[start + 2],
    below: ESCAPE_BELOW_CHARACTER,
  });
  const token = char === null ? null : genToken({ category, char });
  if (token === null)
    throw new DecodeError(
      'BadEscape',
      'caret escape must be followed by a category marker and a shifted character',
      { line, position: start },
    );
  return { token, next: start + 3 };
};

/**
 * .what = decode a plain marker + character unit that starts at `start`
 */
const decodePlainCharacter = (input: {
  chars: string[];
  start: number;
  line: string;
}): UnitDecoded => {
  const { chars, start, line } = input;
  const marker = chars[start] ?? '';
  const category = CATEGORY_BY_MARKER.get(marker);
  if (category === undefined)
    throw new DecodeError(
      'UnknownCategory',
      `unknown unit marker '${marker}'`,
      { line, position: start },
    );
  const char = chars[start + 1];
  const token = char === undefined ? null : genToken({ category, char });
  if (token === null)
    throw new DecodeError('TruncatedUnit', 'category marker at end of line', {
      line,
      position: start,
    });
  return { token, next: start + 2 };
};

/**
 * .what = decode one token-list line
 * .why = reverses getOneLineFromTokenList deterministically, one self-terminating unit at a time
 *
 * .note = positions in errors count code points, not utf-16 units
 */
export const getOneTokenListFromLine = (input: { line: string }): Token[] => {
  const chars = Array.from(input.line);
  const tokens: Token[] = [];
  let index = 0;
  while (index < chars.length) {
    const head = chars[index];
    const unit: UnitDecoded =
      head === MARKER_NAME_START || head === MARKER_NAME_ESCAPE
        ? decodeControlSequence({ chars, start: index, line: input.line })
        : head === MARKER_FROZEN
          ? { token: { type: 'frozen' }, next: index + 1 }
          : head === MARKER_ESCAPE
            ? decodeEscapedCharacter({ chars, start: index, line: input.line })
            : decodePlainCharacter({ chars, start: index, line: input.line });
    tokens.push(unit.token);
    index = unit.next;
  }
  return tokens;
};
