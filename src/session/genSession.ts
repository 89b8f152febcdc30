import type { ChannelPair } from '../channel/Channel';
import { isProtocolError, ProtocolError } from '../errors/ProtocolError';
import type { Logger } from '../utils/log';
import type { SessionConfig } from './Session.config';
import type {
  EngineIdentity,
  Session,
  SessionSide,
  SessionStatus,
  SessionTurn,
  TranscriptEntry,
} from './Session';

/**
 * .what = construct the session handle over an already-open channel pair
 * .why = owns the turn, status, timeout and transcript; every line of the protocol passes through here
 *
 * .note = the engine speaks first (its identity line), so it starts with the turn
 */
export const genSession = (
  input: { channel: ChannelPair; side: SessionSide; config: SessionConfig },
  context: { log: Logger },
): Session => {
  const { channel, side, config } = input;
  const log = context.log.child({ side });

  // mutable handle state
  let status: SessionStatus = 'handshake';
  let turn: SessionTurn = side === 'engine' ? 'local' : 'remote';
  let identity: EngineIdentity | null = null;
  const transcript: TranscriptEntry[] = [];

  /**
   * .what = record a line in the transcript and the trace log
   */
  const record = (entry: TranscriptEntry): void => {
    transcript.push(entry);
    if (transcript.length > config.transcriptLimit) transcript.shift();
    log.trace(
      { line: entry.line },
      entry.direction === 'inbound' ? '>' : '<',
    );
  };

  /**
   * .what = release both halves of the channel
   */
  const teardown = (): void => {
    channel.outbound.end();
    channel.inbound.detach();
  };

  const isFiller = (line: string): boolean =>
    config.fillerLine !== null && line.trimEnd() === config.fillerLine;

  /**
   * .what = the bound on the next read
   * .note = the engine side has no timeout; its reads block at a lower level
   */
  const getOneReadTimeout = (): number | null => {
    if (side === 'engine') return null;
    return status === 'handshake'
      ? config.handshakeTimeoutMs
      : config.timeoutMs;
  };

  const assertUsable = (attempt: { line: string | null }): void => {
    if (status === 'closed' || status === 'failed')
      throw new ProtocolError('ChannelClosed', `session is ${status}`, {
        side,
        line: attempt.line?.slice(0, 100) ?? null,
      });
  };

  const session: Session = {
    side,
    config,
    log,
    channel,

    get status() {
      return status;
    },
    get turn() {
      return turn;
    },
    get identity() {
      return identity;
    },
    get transcript() {
      return transcript;
    },

    readLine: async () => {
      assertUsable({ line: null });
      while (true) {
        let line: string;
        try {
          line = await channel.inbound.readLine({
            timeoutMs: getOneReadTimeout(),
          });
        } catch (error) {
          // the peer is gone, stuck or stopped on an error: tear the channel down
          if (
            isProtocolError(error, 'Timeout') ||
            isProtocolError(error, 'EngineFailed')
          )
            session.fail({ error });
          // the peer hung up
          if (isProtocolError(error, 'ChannelClosed') && status !== 'failed')
            session.close({ reason: 'peer closed the channel' });
          throw error;
        }
        if (isFiller(line)) continue;
        record({ direction: 'inbound', line });
        return line;
      }
    },

    writeLine: (line) => {
      assertUsable({ line });
      if (status === 'handshake' && side === 'process')
        throw new ProtocolError(
          'HandshakeExpected',
          'the process cannot write before the engine identified itself',
          { line: line.slice(0, 100) },
        );
      if (turn === 'remote')
        throw new ProtocolError(
          'TurnViolation',
          'cannot write while the peer holds the turn',
          { side, line: line.slice(0, 100) },
        );
      channel.outbound.writeLine(line);
      record({ direction: 'outbound', line });
    },

    yieldTurn: () => {
      turn = 'remote';
    },

    takeTurn: () => {
      turn = 'local';
    },

    establish: (establishInput) => {
      if (status !== 'handshake')
        throw new ProtocolError(
          'HandshakeExpected',
          `cannot complete a handshake on a session that is ${status}`,
        );
      identity = establishInput.identity;
      status = 'open';

      // bytes-only engines read one byte per character
      const encoding = identity.profile.isUnicode ? config.encoding : 'latin1';
      channel.inbound.setEncoding(encoding);
      channel.outbound.setEncoding(encoding);

      turn = config.driver === side ? 'local' : 'remote';
      log.debug(
        { engine: identity.profile.name, driver: config.driver, encoding },
        'session opened',
      );
    },

    close: (closeInput) => {
      if (status === 'closed' || status === 'failed') return;
      status = 'closed';
      teardown();
      log.debug({ reason: closeInput?.reason ?? 'closed' }, 'session closed');
    },

    fail: (failInput) => {
      if (status === 'failed') return;
      status = 'failed';
      teardown();
      log.warn({ error: failInput.error.message }, 'session failed');
    },
  };
  return session;
};
