import { destination, type Logger, pino } from 'pino';

export type { Logger };

export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent';

/**
 * .what = create a logger for a session
 * .why = one place decides where logs go
 *
 * .note = always stderr: in parent-process mode stdout is the channel to the engine
 */
export const genLog = (input: { level: LogLevel }): Logger =>
  pino(
    { name: 'macrolink', level: input.level },
    destination({ dest: 2, sync: true }),
  );
