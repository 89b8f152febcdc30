import type { Session } from '../session/Session';

/**
 * .what = read one delimiter-framed payload
 * .why = the counterpart of sendBlock; lines come back exactly as written
 *
 * .note = a channel that closes mid-block rejects with ProtocolError 'ChannelClosed' from the read
 */
export const receiveBlock = async (context: {
  session: Session;
}): Promise<string[]> => {
  const delimiter = await context.session.readLine();
  const lines: string[] = [];
  while (true) {
    const line = await context.session.readLine();
    if (line === delimiter) return lines;
    lines.push(line);
  }
};
