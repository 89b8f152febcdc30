import { BadRequestError } from 'helpful-errors';
import type { Writable } from 'stream';

import { ProtocolError } from '../errors/ProtocolError';
import type { Logger } from '../utils/log';
import type { ChannelEncoding, LineWriter } from './Channel';

/**
 * .what = wrap a writable stream so it only ever receives whole lines
 * .why = the engine can only read whole lines, so every write must end with a line break
 */
export const genLineWriterFromStream = (
  input: { stream: Writable; encoding?: ChannelEncoding },
  context: { log: Logger },
): LineWriter => {
  let ended = false;
  let encoding: ChannelEncoding = input.encoding ?? 'utf8';

  // a peer that exits mid-session surfaces as EPIPE here; later writes report ChannelClosed
  input.stream.on('error', (error: Error) => {
    ended = true;
    context.log.warn({ error: error.message }, 'channel stream failed');
  });

  return {
    writeLine: (line) => {
      if (line.includes('\n'))
        BadRequestError.throw('a channel line must not contain a line break', {
          line: line.slice(0, 100),
        });
      if (ended)
        throw new ProtocolError(
          'ChannelClosed',
          'cannot write to a closed channel',
          { line: line.slice(0, 100) },
        );
      input.stream.write(`${line}\n`, encoding);
    },

    setEncoding: (next) => {
      encoding = next;
    },

    end: () => {
      if (ended) return;
      ended = true;
      input.stream.end();
    },

    get isEnded() {
      return ended;
    },
  };
};
