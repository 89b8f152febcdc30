export type {
  ChannelEncoding,
  ChannelPair,
  LineReader,
  LineWriter,
} from './channel/Channel';
export {
  genChannelPairFromChildProcess,
  genChannelPairFromEngineStreams,
} from './channel/genChannelPairFromChildProcess';
export { genChannelPairFromStdio } from './channel/genChannelPairFromStdio';
export { genChannelPairInMemory } from './channel/genChannelPairInMemory';
export {
  ENGINE_ERROR_PROMPT,
  ENGINE_FATAL_LINE,
  type EngineFailure,
  genEngineFailureScanner,
} from './channel/genEngineFailureScanner';
export { genLineReaderFromStream } from './channel/genLineReaderFromStream';
export { genLineWriterFromStream } from './channel/genLineWriterFromStream';
export { watchEngineOutput } from './channel/watchEngineOutput';

export {
  type CharacterCategory,
  genActiveToken,
  genCharacterToken,
  genControlSequenceToken,
  type Token,
  TOKEN_FROZEN,
  TOKEN_NULL_NAME,
  type TokenList,
} from './codec/Token';
export { assertLineFitsEngine } from './codec/assertLineFitsEngine';
export { getOneLineFromTokenList } from './codec/getOneLineFromTokenList';
export { getOneTextFromTokenList } from './codec/getOneTextFromTokenList';
export { getOneTokenListFromLine } from './codec/getOneTokenListFromLine';
export { getOneTokenListFromText } from './codec/getOneTokenListFromText';

export { genBlockDelimiter } from './block/genBlockDelimiter';
export { receiveBlock } from './block/receiveBlock';
export { getOneFramedBlock, sendBlock } from './block/sendBlock';

export {
  CONFIG_BY_ENGINE_MARK,
  type EngineMark,
  type EngineName,
  type EngineProfile,
} from './session/EngineMark.config';
export type {
  EngineIdentity,
  Session,
  SessionSide,
  SessionStatus,
  SessionTurn,
  TranscriptEntry,
} from './session/Session';
export {
  DEFAULT_SESSION_CONFIG,
  getOneSessionConfig,
  type SessionConfig,
} from './session/Session.config';
export { announceEngineIdentity } from './session/announceEngineIdentity';
export { genSession } from './session/genSession';
export { getOneEngineIdentityFromLine } from './session/getOneEngineIdentityFromLine';
export { openEngineSession } from './session/openEngineSession';
export { openSession } from './session/openSession';
export { openSessionForMode } from './session/openSessionForMode';
export { openSessionPairInMemory } from './session/openSessionPairInMemory';

export type { CallDirection, CallFrame, CallOrigin } from './dispatch/CallFrame';
export type {
  ArgumentKind,
  Handler,
  HandlerContext,
  HandlerTable,
  InvokeArgument,
  InvokeRemoteInput,
  ReceivedArgument,
} from './dispatch/Handler';
export type { FailurePayload, Message } from './dispatch/Message';
export {
  type EngineDispatcher,
  genEngineDispatcher,
  type TriggerOutcome,
} from './dispatch/genEngineDispatcher';
export {
  genProcessDispatcher,
  type ProcessDispatcher,
} from './dispatch/genProcessDispatcher';

export { DecodeError, type DecodeErrorKind } from './errors/DecodeError';
export {
  isProtocolError,
  ProtocolError,
  type ProtocolErrorKind,
} from './errors/ProtocolError';
export { type CallSite, RemoteFailureError } from './errors/RemoteFailureError';

export { genLog, type Logger, type LogLevel } from './utils/log';
