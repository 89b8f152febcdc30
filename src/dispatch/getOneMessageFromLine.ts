import { z } from 'zod';

import { ProtocolError } from '../errors/ProtocolError';
import {
  type FailurePayload,
  type Message,
  MESSAGE_PREFIX_FAILURE,
  MESSAGE_PREFIX_INVOKE,
  MESSAGE_PREFIX_RETURN,
} from './Message';

const FailurePayloadSchema = z.object({
  message: z.string(),
  trace: z.array(
    z.object({
      side: z.enum(['process', 'engine']),
      handler: z.string(),
      stack: z.string().optional(),
    }),
  ),
});

/**
 * .what = parse the json that follows a failure prefix
 */
const getOneFailurePayload = (input: { json: string }): FailurePayload => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(input.json);
  } catch {
    throw new ProtocolError(
      'UnexpectedMessageKind',
      'failure message does not hold json',
      { json: input.json.slice(0, 100) },
    );
  }
  const result = FailurePayloadSchema.safeParse(parsed);
  if (!result.success)
    throw new ProtocolError(
      'UnexpectedMessageKind',
      'failure message does not hold a failure payload',
      {
        issues: result.error.issues.map(
          (issue) => `${issue.path.join('.')}: ${issue.message}`,
        ),
      },
    );
  return result.data;
};

/**
 * .what = classify a header line by its first character
 * .why = the receive loops branch on this; anything unrecognized means the peers are out of step
 */
export const getOneMessageFromLine = (input: { line: string }): Message => {
  const prefix = input.line.charAt(0);
  const rest = input.line.slice(1);
  if (prefix === MESSAGE_PREFIX_INVOKE)
    return { kind: 'invoke', handler: rest };
  if (prefix === MESSAGE_PREFIX_RETURN) return { kind: 'return', value: rest };
  if (prefix === MESSAGE_PREFIX_FAILURE)
    return { kind: 'failure', failure: getOneFailurePayload({ json: rest }) };
  throw new ProtocolError(
    'UnexpectedMessageKind',
    'unrecognized header line',
    { line: input.line.slice(0, 100) },
  );
};

/**
 * .what = the one-line wire form of a failure payload
 */
export const getOneLineFromFailurePayload = (input: {
  failure: FailurePayload;
}): string => `${MESSAGE_PREFIX_FAILURE}${JSON.stringify(input.failure)}`;
