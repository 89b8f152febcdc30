import { BadRequestError } from 'helpful-errors';

import { getOneFramedBlock } from '../block/sendBlock';
import { receiveBlock } from '../block/receiveBlock';
import { assertLineFitsEngine } from '../codec/assertLineFitsEngine';
import { getOneLineFromTokenList } from '../codec/getOneLineFromTokenList';
import { getOneTokenListFromLine } from '../codec/getOneTokenListFromLine';
import { DecodeError } from '../errors/DecodeError';
import { isProtocolError, ProtocolError } from '../errors/ProtocolError';
import {
  type CallSite,
  RemoteFailureError,
} from '../errors/RemoteFailureError';
import type { Session } from '../session/Session';
import type { CallDirection, CallFrame } from './CallFrame';
import {
  getOneLineFromFailurePayload,
  getOneMessageFromLine,
} from './getOneMessageFromLine';
import type {
  ArgumentKind,
  HandlerContext,
  HandlerTable,
  InvokeArgument,
  InvokeRemoteInput,
  ReceivedArgument,
} from './Handler';
import {
  type FailurePayload,
  type Message,
  MESSAGE_PREFIX_INVOKE,
  MESSAGE_PREFIX_RETURN,
} from './Message';

/**
 * .what = a frame plus what the dispatcher tracks about it
 */
interface FrameRecord {
  frame: CallFrame;
  status: 'running' | 'completed';
  /**
   * a call nested inside this frame ended in failure
   */
  failureSeen: boolean;
}

/**
 * .what = the frame stack and message plumbing both dispatchers share
 * .why = the two sides differ only in how they wait for a return; everything that touches the wire lives here
 */
export const genDispatchCore = (input: {
  session: Session;
  handlers: HandlerTable;
}) => {
  const { session, handlers } = input;
  const stack: FrameRecord[] = [];

  // who runs what, from this side's point of view
  const directionLocal: CallDirection =
    session.side === 'process' ? 'toProcess' : 'toEngine';
  const directionRemote: CallDirection =
    session.side === 'process' ? 'toEngine' : 'toProcess';

  const getOneTopRecord = (): FrameRecord | null => stack.at(-1) ?? null;

  const pushFrame = (frameInput: {
    handlerName: string;
    origin: 'local' | 'remote';
  }): FrameRecord => {
    const record: FrameRecord = {
      frame: {
        handlerName: frameInput.handlerName,
        origin: frameInput.origin,
        direction:
          frameInput.origin === 'local' ? directionLocal : directionRemote,
        callerFrame: getOneTopRecord()?.frame ?? null,
        depth: stack.length,
      },
      status: 'running',
      failureSeen: false,
    };
    stack.push(record);
    return record;
  };

  const isUnicode = (): boolean => session.identity?.profile.isUnicode ?? true;

  /**
   * .what = the wire lines of one argument
   */
  const getLinesOfArgument = (argument: InvokeArgument): string[] => {
    if (argument.type === 'line') {
      if (argument.text.includes('\n'))
        BadRequestError.throw('a line argument must not contain a line break', {
          text: argument.text.slice(0, 100),
        });
      assertLineFitsEngine({ line: argument.text, unicode: isUnicode() });
      return [argument.text];
    }
    if (argument.type === 'tokens')
      return [
        getOneLineFromTokenList({
          tokens: argument.tokens,
          unicode: isUnicode(),
        }),
      ];
    const framed = getOneFramedBlock({
      lines: argument.lines,
      delimiter: argument.delimiter,
    });
    for (const line of framed)
      assertLineFitsEngine({ line, unicode: isUnicode() });
    return framed;
  };

  /**
   * .what = write an invoke message and open a frame that waits for its return
   *
   * .note = every line is written before the first await, so a second concurrent caller meets TurnViolation
   */
  const pushRemoteFrame = (invoke: InvokeRemoteInput): void => {
    if (session.identity === null)
      throw new ProtocolError(
        'HandshakeExpected',
        'cannot invoke before the engine identified itself',
        { handler: invoke.handler },
      );
    if (invoke.handler.length === 0 || invoke.handler.includes('\n'))
      BadRequestError.throw('a handler name must be one non-empty line', {
        handler: invoke.handler,
      });

    // build the whole message before anything reaches the wire
    const lines = [
      `${MESSAGE_PREFIX_INVOKE}${invoke.handler}`,
      ...(invoke.args ?? []).flatMap(getLinesOfArgument),
    ];
    for (const line of lines) session.writeLine(line);
    session.yieldTurn();
    pushFrame({ handlerName: invoke.handler, origin: 'remote' });
  };

  /**
   * .what = read the next header line, which hands the turn to this side
   */
  const readMessage = async (): Promise<Message> => {
    const line = await session.readLine();
    session.takeTurn();
    return getOneMessageFromLine({ line });
  };

  /**
   * .what = close the innermost remote frame with the return or failure that arrived for it
   */
  const settle = (
    outcome:
      | { kind: 'return'; value: string }
      | { kind: 'failure'; failure: FailurePayload },
  ): string => {
    const top = getOneTopRecord();
    if (top === null || top.frame.origin !== 'remote')
      throw new ProtocolError(
        'NoOpenFrame',
        `received a ${outcome.kind} with no call awaiting it`,
        { top: top?.frame.handlerName ?? null },
      );
    stack.pop();
    if (outcome.kind === 'return') return outcome.value;

    // the enclosing handler, if any, may not swallow this
    const enclosing = getOneTopRecord();
    if (enclosing !== null) enclosing.failureSeen = true;
    throw new RemoteFailureError({
      message: outcome.failure.message,
      trace: outcome.failure.trace,
    });
  };

  /**
   * .what = send the return of the innermost local frame
   * .why = a frame may only return after its body completed; returns are strictly lifo
   */
  const returnToCaller = (returnInput: { value: string }): void => {
    const top = getOneTopRecord();
    if (
      top === null ||
      top.frame.origin !== 'local' ||
      top.status !== 'completed'
    )
      throw new ProtocolError(
        'NoOpenFrame',
        'no completed local frame is open to return from',
        { top: top?.frame.handlerName ?? null },
      );
    if (returnInput.value.includes('\n'))
      BadRequestError.throw('a return value must not contain a line break', {
        handler: top.frame.handlerName,
      });
    stack.pop();
    session.writeLine(`${MESSAGE_PREFIX_RETURN}${returnInput.value}`);
    session.yieldTurn();
  };

  /**
   * .what = the failure payload of an error that escaped a handler
   */
  const getOneFailurePayload = (failureInput: {
    error: unknown;
    handlerName: string;
  }): FailurePayload => {
    const { error, handlerName } = failureInput;
    if (error instanceof RemoteFailureError)
      return {
        message: error.remoteMessage,
        trace: [...error.trace, { side: session.side, handler: handlerName }],
      };
    const site: CallSite = { side: session.side, handler: handlerName };
    if (error instanceof Error) {
      if (error.stack !== undefined) site.stack = error.stack;
      return { message: error.message, trace: [site] };
    }
    return { message: String(error), trace: [site] };
  };

  /**
   * .what = read every argument a handler declared, in order
   * .why = the lines must leave the wire even when the body fails before it looks at them
   */
  const readArguments = async (
    kinds: readonly ArgumentKind[],
  ): Promise<ReceivedArgument[]> => {
    const received: ReceivedArgument[] = [];
    for (const kind of kinds) {
      if (kind === 'line')
        received.push({ type: 'line', text: await session.readLine() });
      if (kind === 'tokens')
        received.push({
          type: 'tokens',
          tokens: getOneTokenListFromLine({ line: await session.readLine() }),
        });
      if (kind === 'block')
        received.push({
          type: 'block',
          lines: await receiveBlock({ session }),
        });
    }
    return received;
  };

  /**
   * .what = hand out pre-read arguments one at a time, in declared order
   */
  const genArgumentCursor = (cursorInput: {
    handlerName: string;
    received: readonly ReceivedArgument[];
  }) => {
    let position = 0;
    return {
      take: (): ReceivedArgument => {
        const argument = cursorInput.received[position];
        if (argument === undefined)
          BadRequestError.throw(
            'the handler read past its declared arguments',
            {
              handler: cursorInput.handlerName,
              declared: cursorInput.received.length,
            },
          );
        position += 1;
        return argument;
      },
      mismatch: (expected: ArgumentKind, found: ArgumentKind): never =>
        BadRequestError.throw(
          `expected a ${expected} argument, found a ${found} one`,
          { handler: cursorInput.handlerName, position: position - 1 },
        ),
    };
  };

  /**
   * .what = run the handler a peer invoked, then send its return or failure
   */
  const runLocalHandler = async (
    runInput: { handlerName: string },
    runContext: {
      invokeRemote: (invoke: InvokeRemoteInput) => Promise<string>;
    },
  ): Promise<void> => {
    const handler = Object.prototype.hasOwnProperty.call(
      handlers,
      runInput.handlerName,
    )
      ? handlers[runInput.handlerName]
      : undefined;
    if (handler === undefined)
      throw new ProtocolError(
        'UnknownHandler',
        `no handler named '${runInput.handlerName}'`,
        { handler: runInput.handlerName },
      );

    const received = await readArguments(handler.args);
    const cursor = genArgumentCursor({
      handlerName: runInput.handlerName,
      received,
    });
    const record = pushFrame({
      handlerName: runInput.handlerName,
      origin: 'local',
    });
    const handlerContext: HandlerContext = {
      session,
      frame: record.frame,
      args: received,
      readLine: () => {
        const argument = cursor.take();
        if (argument.type !== 'line')
          return cursor.mismatch('line', argument.type);
        return argument.text;
      },
      readTokens: () => {
        const argument = cursor.take();
        if (argument.type !== 'tokens')
          return cursor.mismatch('tokens', argument.type);
        return argument.tokens;
      },
      readBlock: () => {
        const argument = cursor.take();
        if (argument.type !== 'block')
          return cursor.mismatch('block', argument.type);
        return argument.lines;
      },
      invokeRemote: runContext.invokeRemote,
    };

    let value: string;
    try {
      const result = await handler.run(handlerContext);
      value = typeof result === 'string' ? result : '';
      if (value.includes('\n'))
        BadRequestError.throw('a return value must not contain a line break', {
          handler: runInput.handlerName,
        });
    } catch (error) {
      // the peers are out of step; nothing more can be sent
      if (error instanceof ProtocolError || error instanceof DecodeError)
        throw error;

      // the body failed: the frame ends with a failure message instead of a return
      if (getOneTopRecord() !== record)
        throw new ProtocolError(
          'NoOpenFrame',
          'a handler failed while a call it issued was still open',
          { handler: runInput.handlerName },
        );
      stack.pop();
      session.log.debug(
        { handler: runInput.handlerName },
        'handler failed; forwarding failure',
      );
      session.writeLine(
        getOneLineFromFailurePayload({
          failure: getOneFailurePayload({
            error,
            handlerName: runInput.handlerName,
          }),
        }),
      );
      session.yieldTurn();
      return;
    }

    if (record.failureSeen)
      throw new ProtocolError(
        'NestedFailureCaught',
        'a handler caught the failure of a nested call and completed normally',
        { handler: runInput.handlerName },
      );
    record.status = 'completed';
    returnToCaller({ value });
  };

  /**
   * .what = run an operation; a protocol or decode error ends the session
   */
  const guard = async <T>(operation: () => Promise<T>): Promise<T> => {
    try {
      return await operation();
    } catch (error) {
      if (isProtocolError(error) || error instanceof DecodeError)
        session.fail({ error });
      throw error;
    }
  };

  const guardSync = <T>(operation: () => T): T => {
    try {
      return operation();
    } catch (error) {
      if (isProtocolError(error) || error instanceof DecodeError)
        session.fail({ error });
      throw error;
    }
  };

  return {
    session,
    getFrames: (): readonly CallFrame[] => stack.map((record) => record.frame),
    pushRemoteFrame,
    readMessage,
    settle,
    returnToCaller,
    runLocalHandler,
    guard,
    guardSync,
  };
};
