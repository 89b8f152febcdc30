import { HelpfulError } from 'helpful-errors';

export type DecodeErrorKind =
  | 'UnterminatedName'
  | 'BadEscape'
  | 'UnknownCategory'
  | 'TruncatedUnit';

/**
 * .what = a token-list line that does not follow the wire encoding
 * .why = always local to the codec and always surfaced to the caller of decode
 */
export class DecodeError extends HelpfulError {
  public readonly kind: DecodeErrorKind;

  /**
   * code point index in the line where the offending unit starts
   */
  public readonly position: number;

  constructor(
    kind: DecodeErrorKind,
    message: string,
    metadata: { line: string; position: number },
  ) {
    super(`${kind}: ${message}`, { kind, ...metadata });
    this.kind = kind;
    this.position = metadata.position;
  }
}
