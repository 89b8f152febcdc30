import { type ChildProcess, spawn } from 'child_process';
import type { Readable, Writable } from 'stream';

import { ProtocolError } from '../errors/ProtocolError';
import type { Logger } from '../utils/log';
import type { ChannelEncoding, ChannelPair } from './Channel';
import { genLineReaderFromStream } from './genLineReaderFromStream';
import { genLineWriterFromStream } from './genLineWriterFromStream';
import { watchEngineOutput } from './watchEngineOutput';

/**
 * .what = wire an engine's three streams as a channel pair
 * .why = stdin and stdout carry the protocol; stderr carries the engine's terminal output
 *
 * .note = once the terminal output shows the engine stopped on an error, every read fails with EngineFailed
 */
export const genChannelPairFromEngineStreams = (
  input: {
    stdin: Writable;
    stdout: Readable;
    stderr: Readable;
    encoding?: ChannelEncoding;
  },
  context: { log: Logger },
): ChannelPair => {
  const inbound = genLineReaderFromStream(
    { stream: input.stdout, encoding: input.encoding },
    context,
  );
  watchEngineOutput(
    { stream: input.stderr },
    {
      log: context.log,
      onFailure: (failure) =>
        inbound.abort({
          error: new ProtocolError(
            'EngineFailed',
            `engine stopped on an error: ${failure.message}`,
            { engineLine: failure.line },
          ),
        }),
    },
  );
  return {
    inbound,
    outbound: genLineWriterFromStream(
      { stream: input.stdin, encoding: input.encoding },
      context,
    ),
  };
};

/**
 * .what = spawn the engine and wire its stdio as a channel pair
 * .why = child-process mode: we own the engine's lifetime
 */
export const genChannelPairFromChildProcess = (
  input: {
    executable: string;
    args: string[];
    cwd: string | null;
    encoding?: ChannelEncoding;
  },
  context: { log: Logger },
): { channel: ChannelPair; child: ChildProcess; kill: () => void } => {
  // spawn with piped stdio, in its own session so ctrl-c on our terminal does not reach it
  const child = spawn(input.executable, input.args, {
    cwd: input.cwd ?? undefined,
    env: { ...process.env },
    detached: true,
  });

  child.on('exit', (code, signal) => {
    context.log.debug({ code, signal, pid: child.pid }, 'engine exited');
  });
  child.on('error', (error) => {
    context.log.warn({ error: error.message }, 'engine failed to spawn');
  });

  return {
    channel: genChannelPairFromEngineStreams(
      {
        stdin: child.stdin,
        stdout: child.stdout,
        stderr: child.stderr,
        encoding: input.encoding,
      },
      context,
    ),
    child,
    kill: () => {
      if (child.exitCode === null && child.signalCode === null)
        child.kill('SIGTERM');
    },
  };
};
