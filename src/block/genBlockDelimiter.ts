import { randomInt } from 'crypto';

/**
 * .what = pick a delimiter that occurs nowhere inside the payload
 * .why = the receiver stops at the first line equal to the delimiter; it must never be a payload line
 *
 * .note = rejects a candidate found anywhere inside a line, not only as a whole line
 */
export const genBlockDelimiter = (input: {
  lines: readonly string[];
  genCandidate?: () => string;
}): string => {
  const genCandidate =
    input.genCandidate ?? (() => String(randomInt(0, 10 ** 12)));
  while (true) {
    const candidate = genCandidate();
    if (candidate.length === 0) continue;
    if (!input.lines.some((line) => line.includes(candidate))) return candidate;
  }
};
