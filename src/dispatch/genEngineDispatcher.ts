import { BadRequestError } from 'helpful-errors';

import { isProtocolError, ProtocolError } from '../errors/ProtocolError';
import { announceEngineIdentity } from '../session/announceEngineIdentity';
import type { EngineMark } from '../session/EngineMark.config';
import type { Session } from '../session/Session';
import type { CallFrame } from './CallFrame';
import { genDispatchCore } from './genDispatchCore';
import type { HandlerTable, InvokeRemoteInput } from './Handler';
import type { FailurePayload } from './Message';

/**
 * .what = what one runOneTriggeredCall observed
 *
 * - handled: the process invoked a handler here; it ran and its return was sent
 * - return, failure: the process answered the innermost call this side issued
 */
export type TriggerOutcome =
  | { kind: 'handled'; handler: string }
  | { kind: 'return'; value: string }
  | { kind: 'failure'; failure: FailurePayload };

export interface EngineDispatcher {
  readonly session: Session;

  /**
   * the engine's half of the handshake, on a session not yet opened
   */
  announceIdentity(input: { mark: EngineMark; trailer?: string }): void;

  /**
   * read one line and react to it
   *
   * .note = a return or failure is handed back, not settled; invokeRemote settles the frames it opened
   */
  runOneTriggeredCall(): Promise<TriggerOutcome>;

  /**
   * call a handler on the process and react to triggered calls until its return arrives
   */
  invokeRemote(input: InvokeRemoteInput): Promise<string>;

  returnToCaller(input: { value: string }): void;

  /**
   * react to the process until it closes the channel with no frame open
   */
  listen(): Promise<void>;

  getFrames(): readonly CallFrame[];
}

/**
 * .what = the engine side of the call protocol
 * .why = the engine has no listener of its own; it reacts to the process only while it runs runOneTriggeredCall
 */
export const genEngineDispatcher = (input: {
  session: Session;
  handlers: HandlerTable;
}): EngineDispatcher => {
  if (input.session.side !== 'engine')
    BadRequestError.throw('an engine dispatcher needs an engine-side session', {
      side: input.session.side,
    });
  const core = genDispatchCore(input);

  const runOneTriggeredCall = async (): Promise<TriggerOutcome> => {
    const message = await core.readMessage();
    if (message.kind !== 'invoke') return message;
    await core.runLocalHandler(
      { handlerName: message.handler },
      { invokeRemote },
    );
    return { kind: 'handled', handler: message.handler };
  };

  const invokeRemote = (invoke: InvokeRemoteInput): Promise<string> =>
    core.guard(async () => {
      core.pushRemoteFrame(invoke);
      while (true) {
        const outcome = await runOneTriggeredCall();
        if (outcome.kind !== 'handled') return core.settle(outcome);
      }
    });

  const listen = (): Promise<void> =>
    core.guard(async () => {
      while (true) {
        let outcome: TriggerOutcome;
        try {
          outcome = await runOneTriggeredCall();
        } catch (error) {
          // the process ended the session between calls
          if (
            isProtocolError(error, 'ChannelClosed') &&
            core.getFrames().length === 0
          )
            return;
          throw error;
        }
        if (outcome.kind !== 'handled')
          throw new ProtocolError(
            'UnexpectedMessageKind',
            `received a ${outcome.kind} with no call open`,
          );
      }
    });

  return {
    session: input.session,
    announceIdentity: (announceInput) =>
      core.guardSync(() =>
        announceEngineIdentity(announceInput, { session: input.session }),
      ),
    runOneTriggeredCall: () => core.guard(runOneTriggeredCall),
    invokeRemote,
    returnToCaller: (returnInput) =>
      core.guardSync(() => core.returnToCaller(returnInput)),
    listen,
    getFrames: core.getFrames,
  };
};
