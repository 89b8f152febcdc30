import { ProtocolError } from '../errors/ProtocolError';
import { CONFIG_BY_ENGINE_MARK, isEngineMark } from './EngineMark.config';
import type { EngineIdentity } from './Session';

/**
 * .what = parse the identity line the engine sends first
 * .why = nothing else may be accepted before it; anything else means the peers are out of step
 *
 * .note = shape: one mark character, then an arbitrary trailer
 */
export const getOneEngineIdentityFromLine = (input: {
  line: string;
}): EngineIdentity => {
  const mark = input.line.charAt(0);
  if (!isEngineMark(mark))
    throw new ProtocolError(
      'HandshakeExpected',
      'expected an engine identity line first',
      { line: input.line.slice(0, 100) },
    );
  return {
    mark,
    profile: CONFIG_BY_ENGINE_MARK[mark],
    trailer: input.line.slice(1),
  };
};
