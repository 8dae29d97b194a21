export { StreamingEngine } from './session/streamingEngine.js';
export type { StreamingEngineOptions, StreamingStats } from './session/streamingEngine.js';
export { SessionStateMachine, isTerminalState } from './session/sessionStateMachine.js';
export { SequenceCounter } from './session/sequenceCounter.js';
export { classifyResponse, buildRecognitionResult, SUCCESS_CODES } from './session/responseClassifier.js';
export type { Classification } from './session/responseClassifier.js';
export { AudioSegmenter } from './audio/audioSegmenter.js';
export type { AudioSegmenterOptions } from './audio/audioSegmenter.js';
export { AudioQueue } from './audio/audioQueue.js';
export type { AudioQueueOptions } from './audio/audioQueue.js';
export { encodeFrame, decodeFrame } from './protocol/frameCodec.js';
export type { DecodeResult } from './protocol/frameCodec.js';
export { encodePayload, decodePayload, serialize, deserialize, compress, decompress } from './protocol/payload.js';
export type { PayloadResult, PayloadBody } from './protocol/payload.js';
export { WebSocketTransport, connectWebSocket } from './transport/websocketTransport.js';
export {
  DEFAULT_ENDPOINT,
  DEFAULT_RESOURCE_ID,
  sessionConfigSchema,
  parseSessionConfig,
  configFromEnv,
  loadConfig,
  reloadConfig,
} from './config.js';
export type { SessionConfig, SessionConfigInput } from './config.js';
export { ProtocolError, StreamingError, isStreamingError, toStreamingError } from './errors.js';
export type { ProtocolErrorCode, StreamingErrorCode } from './errors.js';
export { logger } from './logger.js';
export type {
  AudioSegment,
  CompressionKind,
  ErrorFrame,
  FailureReason,
  Frame,
  FullRequestBody,
  MessageType,
  RecognitionResult,
  RequestFrame,
  ResponseFrame,
  SerializationKind,
  SessionEvent,
  SessionOutcome,
  SessionState,
  StateTransition,
  Transport,
  TransportConnectOptions,
  TransportFactory,
  Utterance,
} from './types.js';
export { MESSAGE_TYPES, SERIALIZATION_KINDS, COMPRESSION_KINDS, SESSION_STATES } from './types.js';
