import type { Readable, Writable } from 'stream';

import type { Logger } from '../utils/log';
import type { ChannelEncoding, ChannelPair } from './Channel';
import { genLineReaderFromStream } from './genLineReaderFromStream';
import { genLineWriterFromStream } from './genLineWriterFromStream';

/**
 * .what = the channel pair of a process that the engine itself spawned
 * .why = parent-process mode: the engine writes to our stdin and reads our stdout
 */
export const genChannelPairFromStdio = (
  input: { stdin?: Readable; stdout?: Writable; encoding?: ChannelEncoding },
  context: { log: Logger },
): ChannelPair => ({
  inbound: genLineReaderFromStream(
    { stream: input.stdin ?? process.stdin, encoding: input.encoding },
    context,
  ),
  outbound: genLineWriterFromStream(
    { stream: input.stdout ?? process.stdout, encoding: input.encoding },
    context,
  ),
});
