import type { Token, TokenList } from '../codec/Token';
import type { Session } from '../session/Session';
import type { CallFrame } from './CallFrame';

/**
 * .what = one argument of an invoke message
 *
 * - line: one plain text line
 * - tokens: a token list, encoded on one line
 * - block: several lines framed by a delimiter
 */
export type InvokeArgument =
  | { type: 'line'; text: string }
  | { type: 'tokens'; tokens: TokenList }
  | { type: 'block'; lines: readonly string[]; delimiter?: string };

export interface InvokeRemoteInput {
  handler: string;
  args?: readonly InvokeArgument[];
}

/**
 * .what = the shape of one argument a handler expects, in wire order
 */
export type ArgumentKind = InvokeArgument['type'];

/**
 * .what = one argument as the receiving side decoded it
 */
export type ReceivedArgument =
  | { type: 'line'; text: string }
  | { type: 'tokens'; tokens: Token[] }
  | { type: 'block'; lines: string[] };

/**
 * .what = what a handler body can do while it runs
 * .why = its arguments were already read off the wire, in declared order; it takes them in turn and may call back into the peer
 *
 * .note = a read of the wrong kind, or past the last argument, throws a BadRequestError, which fails the handler and not the session
 */
export interface HandlerContext {
  session: Session;
  frame: CallFrame;
  args: readonly ReceivedArgument[];
  readLine(): string;
  readTokens(): Token[];
  readBlock(): string[];
  invokeRemote(input: InvokeRemoteInput): Promise<string>;
}

/**
 * .what = a procedure the peer may invoke by name
 *
 * .note = the returned string travels back as the return value; nothing returned sends an empty one
 */
export interface Handler {
  /**
   * the arguments every call carries; all of them are read before run starts
   */
  args: readonly ArgumentKind[];
  run(context: HandlerContext): Promise<string | void> | string | void;
}

/**
 * .what = the fixed set of handlers one side exposes
 */
export type HandlerTable = Readonly<Record<string, Handler>>;
