/**
 * @fileoverview Main entry point for the shared package.
 * Re-exports the protocol definitions, wire codec, errors, constants and logger.
 */

// Codec
export {
  decode,
  decodePayload,
  decodeResponse,
  decodeResponseFrame,
  decodeStepRecord,
  encode,
  encodeFrame,
  encodeMessage,
  FrameReader,
} from './codec.js';
// Constants
export {
  DEFAULT_HOST,
  DEFAULT_IDLE_TIMEOUT_SECONDS,
  DEFAULT_MAX_FRAME_BYTES,
  DEFAULT_PORT,
  DEFAULT_RESPONSE_TIMEOUT_SECONDS,
  DEFAULT_TIMEOUT_THRESHOLD_SECONDS,
  FRAME_HEADER_BYTES,
  MAX_FRAME_BYTES_LIMIT,
  MAX_TIMEOUT_SECONDS,
} from './constants.js';
// Errors
export {
  ConfigError,
  ConnectionError,
  describeError,
  FixtureError,
  FrameError,
  IdleTimeoutError,
  type RejectionError,
  type ReportedError,
  SequenceError,
  TimeoutError,
} from './errors.js';
// Protocol
export {
  AckMessage,
  formatIssues,
  isRejection,
  MalformedMessage,
  type RejectionCode,
  type RejectionMessage,
  type ResponseCode,
  ResponseMessage,
  SequenceErrorMessage,
  type StepId,
  StepIdSchema,
  StepRecord,
  StepRecordFromWire,
  TimeoutErrorMessage,
  toErrorResponse,
  toWireRecord,
  WireStepRecord,
} from './protocol.js';
// Logging
export { isLogLevel, type LogLevel, logger, setLogLevel } from './utils/logger.js';
