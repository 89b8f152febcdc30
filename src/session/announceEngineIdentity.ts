import { CONFIG_BY_ENGINE_MARK, type EngineMark } from './EngineMark.config';
import type { Session } from './Session';

/**
 * .what = write the engine's identity line and open the session
 * .why = the engine's half of the handshake; the identity line is the first thing on the wire
 */
export const announceEngineIdentity = (
  input: { mark: EngineMark; trailer?: string },
  context: { session: Session },
): void => {
  const trailer = input.trailer ?? '';
  context.session.writeLine(`${input.mark}${trailer}`);
  context.session.establish({
    identity: {
      mark: input.mark,
      profile: CONFIG_BY_ENGINE_MARK[input.mark],
      trailer,
    },
  });
};
