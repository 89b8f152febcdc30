import type { ChannelPair } from '../channel/Channel';
import type { Logger } from '../utils/log';
import type { EngineMark, EngineProfile } from './EngineMark.config';
import type { SessionConfig } from './Session.config';

export type SessionSide = 'process' | 'engine';

/**
 * .what = lifecycle of a session
 *
 * - handshake: channel open, identity not yet exchanged; no call may start
 * - open: identity exchanged; calls may run
 * - closed: ended in order, by either peer
 * - failed: torn down after a protocol failure; the channel must not be used again
 */
export type SessionStatus = 'handshake' | 'open' | 'closed' | 'failed';

/**
 * .what = who is expected to write next
 */
export type SessionTurn = 'local' | 'remote';

/**
 * .what = the identity the engine announced in the handshake
 */
export interface EngineIdentity {
  mark: EngineMark;
  profile: EngineProfile;
  /**
   * whatever followed the mark on the identity line
   */
  trailer: string;
}

export interface TranscriptEntry {
  direction: 'inbound' | 'outbound';
  line: string;
}

/**
 * .what = the one context object every protocol operation runs against
 * .why = engine mark, channel, turn and status live here instead of in module-level state;
 *   opened at the handshake, closed once, owned by a single dispatcher
 */
export interface Session {
  readonly side: SessionSide;
  readonly config: SessionConfig;
  readonly log: Logger;
  readonly channel: ChannelPair;

  readonly status: SessionStatus;
  readonly turn: SessionTurn;
  readonly identity: EngineIdentity | null;

  /**
   * the lines read or written, in order; only the last config.transcriptLimit are kept
   */
  readonly transcript: readonly TranscriptEntry[];

  /**
   * read the next line; on the process side, bounded by the configured timeout
   */
  readLine(): Promise<string>;

  /**
   * write one line; only while this side holds the turn
   */
  writeLine(line: string): void;

  /**
   * hand the turn to the peer, after the last line of a message
   */
  yieldTurn(): void;

  /**
   * take the turn, after a header line from the peer was read
   */
  takeTurn(): void;

  /**
   * record the handshake outcome and open the session
   */
  establish(input: { identity: EngineIdentity }): void;

  /**
   * end the session in order; a no-op once ended
   */
  close(input?: { reason?: string }): void;

  /**
   * tear the session down after a protocol failure
   */
  fail(input: { error: Error }): void;
}
