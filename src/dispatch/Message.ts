import type { CallSite } from '../errors/RemoteFailureError';

/**
 * .what = the payload of a failure message
 */
export interface FailurePayload {
  message: string;
  trace: CallSite[];
}

/**
 * .what = a header line, parsed
 */
export type Message =
  | { kind: 'invoke'; handler: string }
  | { kind: 'return'; value: string }
  | { kind: 'failure'; failure: FailurePayload };

export const MESSAGE_PREFIX_INVOKE = 'i';
export const MESSAGE_PREFIX_RETURN = 'r';
export const MESSAGE_PREFIX_FAILURE = 'e';
