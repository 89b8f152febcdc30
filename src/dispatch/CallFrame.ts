/**
 * .what = which peer executes the handler of a call
 */
export type CallDirection = 'toEngine' | 'toProcess';

/**
 * .what = whether this side runs the handler ('local') or issued the call ('remote')
 */
export type CallOrigin = 'local' | 'remote';

/**
 * .what = one in-progress call, as seen from one side
 *
 * .note = frames form a stack per side; a frame is popped only after its handler completed, nested calls included
 */
export interface CallFrame {
  readonly handlerName: string;
  readonly direction: CallDirection;
  readonly origin: CallOrigin;
  /**
   * the frame that is suspended on this one, or null at top level
   */
  readonly callerFrame: CallFrame | null;
  /**
   * count of frames beneath this one on the stack
   */
  readonly depth: number;
}
