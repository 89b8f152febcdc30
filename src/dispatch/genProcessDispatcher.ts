import { BadRequestError } from 'helpful-errors';

import { isProtocolError, ProtocolError } from '../errors/ProtocolError';
import type { Session } from '../session/Session';
import type { CallFrame } from './CallFrame';
import { genDispatchCore } from './genDispatchCore';
import type { HandlerTable, InvokeRemoteInput } from './Handler';
import type { Message } from './Message';

export interface ProcessDispatcher {
  readonly session: Session;

  /**
   * call a handler on the engine and wait for its return
   *
   * .note = while waiting, runs every handler the engine calls back into, to any depth
   */
  invokeRemote(input: InvokeRemoteInput): Promise<string>;

  /**
   * send the return of the innermost completed local frame; the dispatcher does this once per handler
   */
  returnToCaller(input: { value: string }): void;

  /**
   * serve the engine's calls until it closes the channel; for sessions the engine drives
   */
  listen(): Promise<void>;

  getFrames(): readonly CallFrame[];
}

/**
 * .what = the process side of the call protocol
 * .why = a reentrant receive loop: each invokeRemote reads until its own return, serving nested calls on the way
 */
export const genProcessDispatcher = (input: {
  session: Session;
  handlers: HandlerTable;
}): ProcessDispatcher => {
  if (input.session.side !== 'process')
    BadRequestError.throw('a process dispatcher needs a process-side session', {
      side: input.session.side,
    });
  const core = genDispatchCore(input);

  const invokeRemote = (invoke: InvokeRemoteInput): Promise<string> =>
    core.guard(async () => {
      core.pushRemoteFrame(invoke);

      // serve nested calls until the return for this frame arrives
      while (true) {
        const message = await core.readMessage();
        if (message.kind !== 'invoke') return core.settle(message);
        await core.runLocalHandler(
          { handlerName: message.handler },
          { invokeRemote },
        );
      }
    });

  const listen = (): Promise<void> =>
    core.guard(async () => {
      while (true) {
        let message: Message;
        try {
          message = await core.readMessage();
        } catch (error) {
          // the engine ended the session between calls
          if (
            isProtocolError(error, 'ChannelClosed') &&
            core.getFrames().length === 0
          )
            return;
          throw error;
        }
        if (message.kind !== 'invoke')
          throw new ProtocolError(
            'UnexpectedMessageKind',
            `received a ${message.kind} with no call open`,
          );
        await core.runLocalHandler(
          { handlerName: message.handler },
          { invokeRemote },
        );
      }
    });

  return {
    session: input.session,
    invokeRemote,
    returnToCaller: (returnInput) =>
      core.guardSync(() => core.returnToCaller(returnInput)),
    listen,
    getFrames: core.getFrames,
  };
};
