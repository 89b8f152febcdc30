import { genChannelPairInMemory } from '../channel/genChannelPairInMemory';
import type { Logger } from '../utils/log';
import type { EngineMark } from './EngineMark.config';
import { openEngineSession } from './openEngineSession';
import { openSession } from './openSession';
import type { Session } from './Session';
import type { SessionConfig } from './Session.config';

/**
 * .what = open both sides of a session inside one node process, handshake included
 * .why = the in-memory transport mode; an engine written in typescript can sit right beside the process
 */
export const openSessionPairInMemory = async (
  input: { config: SessionConfig; mark: EngineMark; trailer?: string },
  context: { log: Logger },
): Promise<{ process: Session; engine: Session }> => {
  const channels = genChannelPairInMemory(
    { encoding: input.config.encoding },
    context,
  );

  // the process listens first, then the engine announces itself
  const processOpened = openSession(
    { channel: channels.process, config: input.config },
    context,
  );
  const engineSession = openEngineSession(
    {
      channel: channels.engine,
      config: input.config,
      mark: input.mark,
      trailer: input.trailer,
    },
    context,
  );
  const processSession = await processOpened;

  return { process: processSession, engine: engineSession };
};
