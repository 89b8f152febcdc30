import { BadRequestError } from 'helpful-errors';
import { PassThrough } from 'stream';
import { getError, given, then, when } from 'test-fns';

import { genCharacterToken } from '../../codec/Token';
import { genProcessDispatcher } from '../../dispatch/genProcessDispatcher';
import { genLog } from '../../utils/log';
import { openSessionForMode } from '../openSessionForMode';
import { getOneSessionConfig } from '../Session.config';

const log = genLog({ level: 'silent' });

describe('openSessionForMode', () => {
  given('parent-process mode over injected stdio', () => {
    const config = getOneSessionConfig({
      overrides: { mode: 'parent-process', logLevel: 'silent' },
    });

    when('the engine announces itself on stdin', () => {
      then('the session opens, then closes on kill', async () => {
        const stdin = new PassThrough();
        const stdout = new PassThrough();
        const opening = openSessionForMode(
          { config, stdio: { stdin, stdout } },
          { log },
        );
        stdin.write('l lua\n');
        const { session, kill } = await opening;
        expect(session.identity?.profile.name).toEqual('luatex');
        expect(session.identity?.trailer).toEqual(' lua');
        kill();
        expect(session.status).toEqual('closed');
      });
    });
  });

  given('parent-process mode with a bytes-only engine', () => {
    const config = getOneSessionConfig({
      overrides: { mode: 'parent-process', logLevel: 'silent' },
    });

    when('a token above 127 travels each way', () => {
      then('it is one byte on the wire', async () => {
        const stdin = new PassThrough();
        const stdout = new PassThrough();
        const written: Buffer[] = [];
        stdout.on('data', (chunk: Buffer) => written.push(chunk));
        const opening = openSessionForMode(
          { config, stdio: { stdin, stdout } },
          { log },
        );
        stdin.write('p\n');
        const { session, kill } = await opening;
        const dispatcher = genProcessDispatcher({ session, handlers: {} });

        const invoking = dispatcher.invokeRemote({
          handler: 'h',
          args: [
            {
              type: 'tokens',
              tokens: [genCharacterToken({ category: 'letter', char: 'é' })],
            },
          ],
        });
        await new Promise((resolve) => setImmediate(resolve));
        expect(Buffer.concat(written).toString('hex')).toEqual('69680a42e90a');

        stdin.write(Buffer.from([0x72, 0xe9, 0x0a]));
        expect(await invoking).toEqual('é');
        kill();
        expect(session.status).toEqual('closed');
      });
    });
  });

  given('child-process mode without an executable', () => {
    const config = getOneSessionConfig({
      overrides: { mode: 'child-process', logLevel: 'silent' },
    });

    when('opened', () => {
      then('it throws a BadRequestError', async () => {
        const error = await getError(() =>
          openSessionForMode({ config }, { log }),
        );
        expect(error).toBeInstanceOf(BadRequestError);
        expect((error as Error).message).toContain('needs an executable');
      });
    });
  });

  given('in-memory mode', () => {
    const config = getOneSessionConfig({
      overrides: { mode: 'in-memory', logLevel: 'silent' },
    });

    when('opened through the mode switch', () => {
      then('it throws a BadRequestError', async () => {
        const error = await getError(() =>
          openSessionForMode({ config }, { log }),
        );
        expect(error).toBeInstanceOf(BadRequestError);
        expect((error as Error).message).toContain('openSessionPairInMemory');
      });
    });
  });
});
