import type { CharacterCategory } from './Token';

/**
 * .what = the one-character marker that opens each character unit on the wire
 * .why = the marker makes every unit self-describing, so units need no separator
 *
 * .note = each marker is the hex digit of the classic category code
 */
export const MARKER_BY_CATEGORY: Record<
  CharacterCategory | 'active',
  string
> = {
  'begin-group': '1',
  'end-group': '2',
  'math-shift': '3',
  'alignment-tab': '4',
  parameter: '6',
  superscript: '7',
  subscript: '8',
  space: 'A',
  letter: 'B',
  other: 'C',
  active: 'D',
};

const CATEGORIES_WITH_MARKER: readonly (CharacterCategory | 'active')[] = [
  'begin-group',
  'end-group',
  'math-shift',
  'alignment-tab',
  'parameter',
  'superscript',
  'subscript',
  'space',
  'letter',
  'other',
  'active',
];

export const CATEGORY_BY_MARKER: ReadonlyMap<
  string,
  CharacterCategory | 'active'
> = new Map(
  CATEGORIES_WITH_MARKER.map(
    (category): [string, CharacterCategory | 'active'] => [
      MARKER_BY_CATEGORY[category],
      category,
    ],
  ),
);

/**
 * .what = reserved markers outside the category alphabet
 */
export const MARKER_FROZEN = 'R';
export const MARKER_ESCAPE = '^';
export const MARKER_NAME_START = '\\';
export const MARKER_NAME_ESCAPE = '*';

/**
 * .what = shift applied to low code points so they print
 * .note = 0x01 travels as 'A', 0x0a as 'J', like the classic ^^A / ^^J notation
 */
export const ESCAPE_OFFSET = 0x40;

/**
 * characters below this travel escaped
 */
export const ESCAPE_BELOW_CHARACTER = 32;

/**
 * name characters below this travel escaped; space is included since it ends a name
 */
export const ESCAPE_BELOW_NAME = 33;
