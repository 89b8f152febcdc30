import type { ChannelPair } from '../channel/Channel';
import type { Logger } from '../utils/log';
import { genSession } from './genSession';
import { getOneEngineIdentityFromLine } from './getOneEngineIdentityFromLine';
import type { Session } from './Session';
import type { SessionConfig } from './Session.config';

/**
 * .what = open the process side of a session: wait for the engine's identity line
 * .why = no call may start before the engine says what it is
 */
export const openSession = async (
  input: { channel: ChannelPair; config: SessionConfig },
  context: { log: Logger },
): Promise<Session> => {
  const session = genSession(
    { channel: input.channel, side: 'process', config: input.config },
    context,
  );

  // read exactly one line, bounded by the handshake timeout
  const line = await session.readLine();
  try {
    session.establish({ identity: getOneEngineIdentityFromLine({ line }) });
  } catch (error) {
    if (error instanceof Error) session.fail({ error });
    throw error;
  }
  return session;
};
