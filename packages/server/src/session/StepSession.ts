/**
 * @fileoverview Per-connection step session.
 *
 * Handles:
 * - Frame reassembly from raw stream chunks
 * - Lifecycle gating (awaiting_first → validating → closed)
 * - One response per received record
 * - Idle read timeout
 * - Termination on rejection, disconnect or socket failure
 */

import {
  ConnectionError,
  decodeStepRecord,
  describeError,
  encodeMessage,
  FrameError,
  FrameReader,
  IdleTimeoutError,
  logger,
  type ReportedError,
  type ResponseMessage,
  SequenceError,
  type StepId,
  type StepRecord,
  toErrorResponse,
} from '@step-relay/shared';
import { IdleTimer } from '../utils/IdleTimer.js';
import { createValidationState, validateStep, type ValidationState } from './SequenceValidator.js';

/**
 * Socket-like interface for connection abstraction.
 * Allows testing without real TCP connections.
 */
export interface SessionConnection {
  /** Write one encoded frame */
  send(frame: Uint8Array): void;
  /** Close the connection after pending writes are flushed */
  close(): void;
  /** Whether the connection still accepts writes */
  readonly isWritable: boolean;
}

/**
 * Session lifecycle phase.
 */
export type SessionPhase = 'awaiting_first' | 'validating' | 'closed';

export type SessionCloseReason =
  | 'completed'
  | 'sequence_error'
  | 'timeout_error'
  | 'idle_timeout'
  | 'frame_error'
  | 'connection_error'
  | 'server_shutdown';

/**
 * What a session reports once it reaches the closed phase.
 */
export interface SessionSummary {
  readonly sessionId: string;
  readonly reason: SessionCloseReason;
  /** Number of records acknowledged */
  readonly acceptedCount: number;
  /** Id of the last acknowledged record */
  readonly lastStepId: StepId | null;
  readonly error: Error | null;
}

/**
 * Session configuration, shared read-only by every session of a server.
 */
export interface StepSessionConfig {
  readonly timeoutThresholdSeconds: number;
  readonly idleTimeoutMs: number;
  readonly maxFrameBytes: number;
  readonly firstStepId?: StepId | undefined;
}

export interface StepSessionOptions {
  readonly sessionId: string;
  readonly config: StepSessionConfig;
  /** Called once when the session closes */
  readonly onClose?: (summary: SessionSummary) => void;
}

/**
 * Owns one connection's validation state from accept to close.
 */
export class StepSession {
  private phase: SessionPhase = 'awaiting_first';
  private state: ValidationState;
  private acceptedCount = 0;
  private summary: SessionSummary | null = null;
  private readonly reader: FrameReader;
  private readonly idleTimer: IdleTimer;

  constructor(
    private readonly conn: SessionConnection,
    private readonly options: StepSessionOptions
  ) {
    const { config } = options;
    this.state = createValidationState(config.timeoutThresholdSeconds, config.firstStepId);
    this.reader = new FrameReader(config.maxFrameBytes);
    this.idleTimer = new IdleTimer({
      timeoutMs: config.idleTimeoutMs,
      onTimeout: () => this.handleIdleTimeout(),
    });
    this.idleTimer.start();
  }

  // ============ Connection Events ============

  /**
   * Handle a chunk of bytes read from the connection.
   */
  handleData(chunk: Uint8Array): void {
    if (this.phase === 'closed') return;

    this.reader.push(chunk);
    try {
      for (let record = this.readRecord(); record !== null; record = this.readRecord()) {
        this.idleTimer.recordActivity();
        this.handleRecord(record);
        if (this.getPhase() === 'closed') return;
      }
    } catch (error) {
      if (error instanceof FrameError) {
        this.reject(error, 'frame_error');
        return;
      }
      logger.error('Unexpected session failure', {
        sessionId: this.options.sessionId,
        error: describeError(error),
      });
      if (this.getPhase() !== 'closed') {
        this.close('connection_error', new ConnectionError(describeError(error), { cause: error }));
      }
    }
  }

  /**
   * Handle the peer ending the stream.
   */
  handleEnd(): void {
    if (this.phase === 'closed') return;

    const pending = this.reader.pendingBytes;
    if (pending > 0) {
      this.close(
        'frame_error',
        new FrameError(`connection ended inside a frame with ${pending} bytes buffered`)
      );
      return;
    }
    this.close('completed', null);
  }

  /**
   * Handle a socket failure. No response is written.
   */
  handleError(error: Error): void {
    if (this.phase === 'closed') return;
    this.close('connection_error', new ConnectionError(error.message, { cause: error }));
  }

  /**
   * Close the session because the server is stopping.
   */
  shutdown(): void {
    if (this.phase === 'closed') return;
    this.close('server_shutdown', null);
  }

  // ============ Record Handling ============

  private readRecord(): StepRecord | null {
    const payload = this.reader.next();
    return payload === null ? null : decodeStepRecord(payload);
  }

  private handleRecord(record: StepRecord): void {
    const outcome = validateStep(this.state, record);

    if (outcome.kind === 'rejected') {
      const reason = outcome.error instanceof SequenceError ? 'sequence_error' : 'timeout_error';
      this.reject(outcome.error, reason);
      return;
    }

    this.state = outcome.state;
    this.acceptedCount++;

    if (this.phase === 'awaiting_first') {
      this.phase = 'validating';
      logger.debug('Session baseline established', {
        sessionId: this.options.sessionId,
        stepId: record.stepId,
      });
    }

    this.send({ code: 'ACK', stepId: record.stepId });
  }

  private handleIdleTimeout(): void {
    if (this.phase === 'closed') return;
    this.reject(new IdleTimeoutError(this.options.config.idleTimeoutMs), 'idle_timeout');
  }

  // ============ Termination ============

  private reject(error: ReportedError, reason: SessionCloseReason): void {
    this.send(toErrorResponse(error));
    this.close(reason, error);
  }

  private send(message: ResponseMessage): void {
    if (this.conn.isWritable) {
      this.conn.send(encodeMessage(message));
    }
  }

  private close(reason: SessionCloseReason, error: Error | null): void {
    this.phase = 'closed';
    this.idleTimer.stop();
    this.conn.close();

    const summary: SessionSummary = {
      sessionId: this.options.sessionId,
      reason,
      acceptedCount: this.acceptedCount,
      lastStepId: this.state.lastStepId,
      error,
    };
    this.summary = summary;

    const data = {
      sessionId: summary.sessionId,
      reason,
      acceptedCount: summary.acceptedCount,
      lastStepId: summary.lastStepId,
      ...(error ? { error: error.message } : {}),
    };
    if (reason === 'completed' || reason === 'server_shutdown') {
      logger.info('Session closed', data);
    } else {
      logger.warn('Session terminated', data);
    }

    this.options.onClose?.(summary);
  }

  // ============ Queries ============

  /** Get current session phase */
  getPhase(): SessionPhase {
    return this.phase;
  }

  /** Get the id of the last acknowledged record */
  getLastStepId(): StepId | null {
    return this.state.lastStepId;
  }

  /** Get the close summary, null while the session is open */
  getSummary(): SessionSummary | null {
    return this.summary;
  }
}
