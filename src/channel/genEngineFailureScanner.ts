/**
 * .what = the line an engine prints when it gives up on a run
 */
export const ENGINE_FATAL_LINE =
  '!  ==> Fatal error occurred, no output PDF file produced!';

/**
 * .what = the prompt an engine shows when it stops to ask about an error
 */
export const ENGINE_ERROR_PROMPT = '? ';

/**
 * .what = lines that only restate that the engine stopped
 */
const STOP_LINES = new Set([ENGINE_FATAL_LINE, '! Emergency stop.']);

export interface EngineFailure {
  /**
   * the error the engine reported, without its '!' mark
   */
  message: string;

  /**
   * the '!' line it came from, when there was one
   */
  line: string | null;
}

/**
 * .what = scan an engine's terminal output for the signs that it stopped on an error
 * .why = a stopped engine never writes to the channel again, so without this the process would wait until its timeout
 *
 * .note = two signs count: the fatal line, or an error prompt left after an input context line ('<*> ')
 */
export const genEngineFailureScanner = () => {
  let partial = '';
  let contextSeen = false;
  let errorLine: string | null = null;

  const getOneFailure = (): EngineFailure => ({
    message:
      errorLine === null
        ? 'the engine stopped on an error'
        : errorLine.slice(1).trimStart(),
    line: errorLine,
  });

  return {
    /**
     * .what = take the next chunk of output; returns the complete lines and a failure, once seen
     */
    push: (
      chunk: string,
    ): { lines: string[]; failure: EngineFailure | null } => {
      partial += chunk;
      const lines = partial.split('\n');
      partial = lines.pop() ?? '';

      let stopped = false;
      for (const line of lines) {
        if (line.startsWith('<*> ')) contextSeen = true;
        if (line.startsWith('!') && !STOP_LINES.has(line)) errorLine = line;
        if (line === ENGINE_FATAL_LINE) stopped = true;
      }

      // the prompt waits for an answer, so it never gets its line break
      if (contextSeen && partial === ENGINE_ERROR_PROMPT) stopped = true;
      return { lines, failure: stopped ? getOneFailure() : null };
    },
  };
};
