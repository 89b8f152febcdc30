import { PassThrough } from 'stream';

import type { Logger } from '../utils/log';
import type { ChannelPair, ChannelEncoding } from './Channel';
import { genLineReaderFromStream } from './genLineReaderFromStream';
import { genLineWriterFromStream } from './genLineWriterFromStream';

/**
 * .what = connect a process-side and an engine-side channel pair inside one node process
 * .why = the in-memory transport mode; lets both dispatchers run against each other without pipes
 */
export const genChannelPairInMemory = (
  input: { encoding?: ChannelEncoding },
  context: { log: Logger },
): { process: ChannelPair; engine: ChannelPair } => {
  const towardProcess = new PassThrough();
  const towardEngine = new PassThrough();
  return {
    process: {
      inbound: genLineReaderFromStream(
        { stream: towardProcess, encoding: input.encoding },
        context,
      ),
      outbound: genLineWriterFromStream(
        { stream: towardEngine, encoding: input.encoding },
        context,
      ),
    },
    engine: {
      inbound: genLineReaderFromStream(
        { stream: towardEngine, encoding: input.encoding },
        context,
      ),
      outbound: genLineWriterFromStream(
        { stream: towardProcess, encoding: input.encoding },
        context,
      ),
    },
  };
};
