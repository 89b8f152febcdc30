import { HelpfulError } from 'helpful-errors';

/**
 * .what = the ways the two peers can fall out of step
 * .why = each kind means the session is desynchronized and must end; none is retried
 */
export type ProtocolErrorKind =
  | 'NoOpenFrame'
  | 'HandshakeExpected'
  | 'UnexpectedMessageKind'
  | 'Timeout'
  | 'ChannelClosed'
  | 'TurnViolation'
  | 'UnknownHandler'
  | 'NestedFailureCaught'
  | 'EngineFailed';

/**
 * .what = a session-level protocol failure
 * .why = surfaced to the dispatcher's caller, which must abandon the session
 */
export class ProtocolError extends HelpfulError {
  public readonly kind: ProtocolErrorKind;

  constructor(
    kind: ProtocolErrorKind,
    message: string,
    metadata: Record<string, unknown> = {},
  ) {
    super(`${kind}: ${message}`, { kind, ...metadata });
    this.kind = kind;
  }
}

/**
 * .what = narrow an unknown error to a ProtocolError, optionally of one kind
 */
export const isProtocolError = (
  error: unknown,
  kind?: ProtocolErrorKind,
): error is ProtocolError =>
  error instanceof ProtocolError && (kind === undefined || error.kind === kind);
