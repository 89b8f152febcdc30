import type { ChannelPair } from '../channel/Channel';
import type { Logger } from '../utils/log';
import { announceEngineIdentity } from './announceEngineIdentity';
import type { EngineMark } from './EngineMark.config';
import { genSession } from './genSession';
import type { Session } from './Session';
import type { SessionConfig } from './Session.config';

/**
 * .what = open the engine side of a session, identity announced
 */
export const openEngineSession = (
  input: {
    channel: ChannelPair;
    config: SessionConfig;
    mark: EngineMark;
    trailer?: string;
  },
  context: { log: Logger },
): Session => {
  const session = genSession(
    { channel: input.channel, side: 'engine', config: input.config },
    context,
  );
  announceEngineIdentity(
    { mark: input.mark, trailer: input.trailer },
    { session },
  );
  return session;
};
