import { UnexpectedCodePathError } from 'helpful-errors';
import type { Readable } from 'stream';

import { ProtocolError } from '../errors/ProtocolError';
import type { Logger } from '../utils/log';
import type { ChannelEncoding, LineReader } from './Channel';

/**
 * .what = a read that is waiting for the next line
 */
interface PendingRead {
  onLine: (line: string) => void;
  onFail: (error: Error) => void;
  timer: NodeJS.Timeout | null;
}

/**
 * .what = wrap a readable stream as a queue of complete lines
 * .why = pipes deliver arbitrary chunks; the protocol speaks in whole lines
 *
 * .note = only one read may be pending at a time, since only one logical thread ever reads
 * .note = lines are kept as bytes until read, so an encoding switch applies to every line not yet read
 */
export const genLineReaderFromStream = (
  input: { stream: Readable; encoding?: ChannelEncoding },
  context: { log: Logger },
): LineReader => {
  const linesReady: Buffer[] = [];
  let buffer: Buffer = Buffer.alloc(0);
  let encoding: ChannelEncoding = input.encoding ?? 'utf8';
  let ended = false;
  let endCause: string | null = null;
  let failure: Error | null = null;
  let pending: PendingRead | null = null;

  /**
   * .what = settle the pending read if a line or the end is available
   */
  const flush = (): void => {
    if (!pending) return;
    if (failure) {
      const read = pending;
      pending = null;
      if (read.timer) clearTimeout(read.timer);
      read.onFail(failure);
      return;
    }
    const line = linesReady.shift();
    if (line !== undefined) {
      const read = pending;
      pending = null;
      if (read.timer) clearTimeout(read.timer);
      read.onLine(line.toString(encoding));
      return;
    }
    if (ended) {
      const read = pending;
      pending = null;
      if (read.timer) clearTimeout(read.timer);
      read.onFail(
        new ProtocolError(
          'ChannelClosed',
          'the channel closed before a line arrived',
          { cause: endCause },
        ),
      );
    }
  };

  // named handlers, so detach can remove exactly these
  const onDataHandler = (chunk: Buffer | string): void => {
    buffer = Buffer.concat([
      buffer,
      typeof chunk === 'string' ? Buffer.from(chunk, encoding) : chunk,
    ]);

    // keep the last partial line in the buffer
    let newline = buffer.indexOf(0x0a);
    while (newline !== -1) {
      linesReady.push(buffer.subarray(0, newline));
      buffer = buffer.subarray(newline + 1);
      newline = buffer.indexOf(0x0a);
    }
    flush();
  };

  const onEndHandler = (): void => {
    if (buffer.length > 0) {
      context.log.warn(
        { dropped: buffer.subarray(0, 100).toString(encoding) },
        'channel ended in the middle of a line',
      );
      buffer = Buffer.alloc(0);
    }
    ended = true;
    flush();
  };

  const onErrorHandler = (error: Error): void => {
    ended = true;
    endCause = error.message;
    context.log.warn({ error: error.message }, 'channel stream failed');
    flush();
  };

  const detachListeners = (): void => {
    input.stream.removeListener('data', onDataHandler);
    input.stream.removeListener('end', onEndHandler);
    input.stream.removeListener('error', onErrorHandler);
  };

  input.stream.on('data', onDataHandler);
  input.stream.on('end', onEndHandler);
  input.stream.on('error', onErrorHandler);

  return {
    readLine: (options) =>
      new Promise<string>((onLine, onFail) => {
        if (pending)
          UnexpectedCodePathError.throw(
            'a line read is already pending on this channel',
          );

        const timeoutMs = options?.timeoutMs ?? null;
        const read: PendingRead = { onLine, onFail, timer: null };
        if (timeoutMs !== null)
          read.timer = setTimeout(() => {
            if (pending !== read) return;
            pending = null;
            onFail(
              new ProtocolError(
                'Timeout',
                `no line arrived within ${timeoutMs}ms`,
                { timeoutMs },
              ),
            );
          }, timeoutMs);
        pending = read;
        flush();
      }),

    setEncoding: (next) => {
      encoding = next;
    },

    abort: ({ error }) => {
      if (failure) return;
      failure = error;
      detachListeners();
      ended = true;
      endCause = error.message;
      linesReady.length = 0;
      flush();
    },

    detach: () => {
      detachListeners();
      ended = true;
      endCause = endCause ?? 'detached';
      linesReady.length = 0;
      flush();
    },

    get isEnded() {
      return ended && linesReady.length === 0;
    },
  };
};
