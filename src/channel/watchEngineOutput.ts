import type { Readable } from 'stream';

import type { Logger } from '../utils/log';
import {
  type EngineFailure,
  genEngineFailureScanner,
} from './genEngineFailureScanner';

/**
 * .what = relay an engine's terminal output to the log, and report the first sign that it stopped on an error
 */
export const watchEngineOutput = (
  input: { stream: Readable },
  context: { log: Logger; onFailure: (failure: EngineFailure) => void },
): void => {
  const scanner = genEngineFailureScanner();
  let reported = false;

  input.stream.on('data', (chunk: Buffer | string) => {
    const { lines, failure } = scanner.push(chunk.toString());
    for (const line of lines) context.log.debug({ line }, 'engine output');
    if (failure === null || reported) return;
    reported = true;
    context.log.warn(
      { message: failure.message, line: failure.line },
      'engine stopped on an error',
    );
    context.onFailure(failure);
  });
};
