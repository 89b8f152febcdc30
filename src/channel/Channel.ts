/**
 * .what = the inbound half of a channel: complete lines, in arrival order
 * .why = the only place either peer suspends is a read from this
 */
export interface LineReader {
  /**
   * resolves with the next line, without its line break
   *
   * rejects with ProtocolError 'Timeout' once timeoutMs elapses, or 'ChannelClosed' once the stream ends
   */
  readLine(input?: { timeoutMs?: number | null }): Promise<string>;

  /**
   * decode every line not yet read with this encoding from now on
   */
  setEncoding(encoding: ChannelEncoding): void;

  /**
   * stop listening and reject the pending read, and every later one, with this error
   */
  abort(input: { error: Error }): void;

  /**
   * stop listening to the stream; a pending read rejects with 'ChannelClosed'
   */
  detach(): void;

  readonly isEnded: boolean;
}

/**
 * .what = the outbound half of a channel
 */
export interface LineWriter {
  writeLine(line: string): void;
  setEncoding(encoding: ChannelEncoding): void;
  end(): void;
  readonly isEnded: boolean;
}

/**
 * .what = the two one-directional streams one peer holds
 * .why = abstracts over pipes, stdio and in-memory streams alike
 */
export interface ChannelPair {
  inbound: LineReader;
  outbound: LineWriter;
}

/**
 * .what = how characters map to bytes on the wire
 *
 * .note = latin1 is one byte per character, which is what bytes-only engines read
 */
export type ChannelEncoding = 'utf8' | 'latin1';
