/**
 * @fileoverview Step relay server.
 *
 * Accepts TCP connections and validates the step records each one sends:
 * - Length-prefixed frame reassembly
 * - Strictly consecutive step ids
 * - Minimum reported wait per step
 * - Idle read timeout
 */

export {
  type ConfigSources,
  DEFAULT_SERVER_CONFIG,
  loadServerConfig,
  readConfigFile,
  type ServerConfig,
} from './config/serverConfig.js';
export { type ListeningAddress, StepServer, type StepServerOptions } from './server.js';
export {
  createValidationState,
  expectedStepId,
  type Outcome,
  type ValidationState,
  validateStep,
} from './session/SequenceValidator.js';
export {
  type SessionCloseReason,
  type SessionConnection,
  type SessionPhase,
  type SessionSummary,
  StepSession,
  type StepSessionConfig,
  type StepSessionOptions,
} from './session/StepSession.js';
export { IdleTimer, type IdleTimerConfig } from './utils/IdleTimer.js';
