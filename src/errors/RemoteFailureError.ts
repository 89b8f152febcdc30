import { HelpfulError } from 'helpful-errors';

/**
 * .what = one handler boundary a failure crossed on its way to the caller
 */
export interface CallSite {
  side: 'process' | 'engine';
  handler: string;
  stack?: string;
}

/**
 * .what = a handler body failed on one of the peers
 * .why = travels back through every enclosing invokeRemote as an ordinary rejection,
 *   so the caller can present one trace that spans both runtimes
 *
 * .note = trace[0] is where the failure originated; later entries are the handlers it escaped from
 */
export class RemoteFailureError extends HelpfulError {
  public readonly remoteMessage: string;
  public readonly trace: readonly CallSite[];

  constructor(input: { message: string; trace: readonly CallSite[] }) {
    super(`remote handler failed: ${input.message}`, {
      trace: input.trace.map((site) => `${site.side}:${site.handler}`),
    });
    this.remoteMessage = input.message;
    this.trace = input.trace;
  }
}
