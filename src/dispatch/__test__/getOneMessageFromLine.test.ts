import { getError, given, then, when } from 'test-fns';

import { ProtocolError } from '../../errors/ProtocolError';
import {
  getOneLineFromFailurePayload,
  getOneMessageFromLine,
} from '../getOneMessageFromLine';

describe('getOneMessageFromLine', () => {
  given('header lines of each kind', () => {
    when('an invoke line', () => {
      then('it names the handler', () => {
        expect(getOneMessageFromLine({ line: 'idouble' })).toEqual({
          kind: 'invoke',
          handler: 'double',
        });
      });
    });

    when('an empty return line', () => {
      then('it returns the empty string', () => {
        expect(getOneMessageFromLine({ line: 'r' })).toEqual({
          kind: 'return',
          value: '',
        });
      });
    });

    when('a failure line', () => {
      then('it holds the parsed payload', () => {
        const line = getOneLineFromFailurePayload({
          failure: {
            message: 'boom',
            trace: [{ side: 'engine', handler: 'explode' }],
          },
        });
        expect(line).toEqual(
          'e{"message":"boom","trace":[{"side":"engine","handler":"explode"}]}',
        );
        expect(getOneMessageFromLine({ line })).toEqual({
          kind: 'failure',
          failure: {
            message: 'boom',
            trace: [{ side: 'engine', handler: 'explode' }],
          },
        });
      });
    });
  });

  const FAILURE_CASES = [
    { description: 'an unknown prefix', given: { line: 'x42' } },
    { description: 'an empty line', given: { line: '' } },
    { description: 'a failure line without json', given: { line: 'e{' } },
    { description: 'a failure line with the wrong shape', given: { line: 'e[]' } },
    {
      description: 'a failure line with an unknown side',
      given: { line: 'e{"message":"m","trace":[{"side":"moon","handler":"h"}]}' },
    },
  ];

  given('lines that are not a header', () => {
    FAILURE_CASES.map((thisCase) =>
      when(thisCase.description, () => {
        then('it throws UnexpectedMessageKind', async () => {
          const error = await getError(() =>
            getOneMessageFromLine({ line: thisCase.given.line }),
          );
          expect(error).toBeInstanceOf(ProtocolError);
          expect((error as ProtocolError).kind).toEqual(
            'UnexpectedMessageKind',
          );
        });
      }),
    );
  });
});
