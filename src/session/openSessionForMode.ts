import { BadRequestError } from 'helpful-errors';
import type { Readable, Writable } from 'stream';

import { genChannelPairFromChildProcess } from '../channel/genChannelPairFromChildProcess';
import { genChannelPairFromStdio } from '../channel/genChannelPairFromStdio';
import type { Logger } from '../utils/log';
import { openSession } from './openSession';
import type { Session } from './Session';
import type { SessionConfig } from './Session.config';

/**
 * .what = open the process side of a session over the transport the config names
 * .why = the startup layer hands over a config; this picks and wires the channel pair
 *
 * .note = in-memory mode has two ends in one process, so it goes through openSessionPairInMemory instead
 */
export const openSessionForMode = async (
  input: {
    config: SessionConfig;
    stdio?: { stdin: Readable; stdout: Writable };
  },
  context: { log: Logger },
): Promise<{ session: Session; kill: () => void }> => {
  const { config } = input;

  if (config.mode === 'parent-process') {
    const channel = genChannelPairFromStdio(
      { ...input.stdio, encoding: config.encoding },
      context,
    );
    const session = await openSession({ channel, config }, context);
    return { session, kill: () => session.close({ reason: 'killed' }) };
  }

  if (config.mode === 'child-process') {
    if (config.executable === null)
      BadRequestError.throw('child-process mode needs an executable', {
        mode: config.mode,
      });
    const spawned = genChannelPairFromChildProcess(
      {
        executable: config.executable,
        args: config.args,
        cwd: config.cwd,
        encoding: config.encoding,
      },
      context,
    );

    // the engine dies with a failed handshake, so no orphan outlives the error
    const session = await openSession(
      { channel: spawned.channel, config },
      context,
    ).catch((error: unknown) => {
      spawned.kill();
      throw error;
    });
    return {
      session,
      kill: () => {
        session.close({ reason: 'killed' });
        spawned.kill();
      },
    };
  }

  return BadRequestError.throw(
    'in-memory mode connects two sessions; use openSessionPairInMemory',
    { mode: config.mode },
  );
};
