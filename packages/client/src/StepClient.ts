/**
 * @fileoverview Client driver that replays fixture steps over one connection.
 *
 * For every step it pauses, sends the record and waits for the server's
 * answer. The first rejection ends the run; nothing is retried and the
 * connection is never reopened.
 */

import { setTimeout as delay } from 'node:timers/promises';
import {
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_RESPONSE_TIMEOUT_SECONDS,
  decodeResponse,
  describeError,
  encode,
  FrameError,
  isRejection,
  logger,
  type RejectionCode,
  type ResponseMessage,
  type StepId,
} from '@step-relay/shared';
import type { FixtureStep } from './fixtures.js';
import { FramedConnection } from './FramedConnection.js';

/**
 * Configuration for the step client.
 */
export interface ClientConfig {
  host: string;
  port: number;
  /** How long to wait for the answer to one step */
  responseTimeoutMs: number;
  /** Pause implementation, replaceable in tests */
  sleep: (ms: number) => Promise<void>;
}

export const DEFAULT_CLIENT_CONFIG: ClientConfig = {
  host: DEFAULT_HOST,
  port: DEFAULT_PORT,
  responseTimeoutMs: DEFAULT_RESPONSE_TIMEOUT_SECONDS * 1000,
  sleep: (ms) => delay(ms),
};

export type FailureCode = RejectionCode | 'CONNECTION_ERROR' | 'RESPONSE_TIMEOUT' | 'PROTOCOL_ERROR';

/**
 * Human readable description of each failure code.
 */
export const FAILURE_DESCRIPTIONS: Record<FailureCode, string> = {
  ERR_SEQUENCE: 'Step id out of order',
  ERR_TIMEOUT: 'Client timeout exceeded',
  ERR_MALFORMED: 'Server could not decode the step',
  CONNECTION_ERROR: 'Connection to the server failed',
  RESPONSE_TIMEOUT: 'No response from the server',
  PROTOCOL_ERROR: 'Unexpected response from the server',
};

export interface ClientSuccess {
  ok: true;
  /** Ids the server acknowledged, in order */
  acknowledged: StepId[];
}

export interface ClientFailure {
  ok: false;
  acknowledged: StepId[];
  /** Index of the step the run stopped at */
  failedAt: number;
  /** Step id the failure concerns; null for an idle timeout notice */
  stepId: StepId | null;
  code: FailureCode;
  message: string;
}

export type ClientReport = ClientSuccess | ClientFailure;

/**
 * Raised inside a run to end it with a report.
 */
class RunFailure extends Error {
  constructor(
    readonly code: FailureCode,
    message: string,
    readonly stepId: StepId | null
  ) {
    super(message);
    this.name = 'RunFailure';
  }
}

/**
 * Sends fixture steps to a step server, stopping at the first rejection.
 */
export class StepClient {
  private readonly config: ClientConfig;

  constructor(config: Partial<ClientConfig> = {}) {
    this.config = { ...DEFAULT_CLIENT_CONFIG, ...config };
  }

  /**
   * Replay the steps over a single connection.
   */
  async run(steps: readonly FixtureStep[]): Promise<ClientReport> {
    const { host, port } = this.config;
    const acknowledged: StepId[] = [];

    logger.info('Client connecting', { host, port, steps: steps.length });

    let conn: FramedConnection;
    try {
      conn = await FramedConnection.connect(host, port);
    } catch (error) {
      return this.fail(acknowledged, 0, null, 'CONNECTION_ERROR', describeError(error));
    }

    let index = 0;
    try {
      for (const step of steps) {
        const stepId = await this.runStep(conn, step);
        acknowledged.push(stepId);
        logger.info(`Step ${stepId} acknowledged`);
        index++;
      }
    } catch (error) {
      if (error instanceof RunFailure) {
        return this.fail(acknowledged, index, error.stepId, error.code, error.message);
      }
      throw error;
    } finally {
      conn.close();
    }

    logger.info('All steps acknowledged', { count: acknowledged.length });
    return { ok: true, acknowledged };
  }

  private async runStep(conn: FramedConnection, step: FixtureStep): Promise<StepId> {
    const { record } = step;

    await this.config.sleep(step.thinkSeconds * 1000);

    // The server may have given up on us while we were pausing
    const unsolicited = conn.takePendingFrame();
    if (unsolicited) {
      this.handleResponse(this.decode(unsolicited, record.stepId), record.stepId);
    }
    if (conn.isClosed) {
      throw new RunFailure('CONNECTION_ERROR', 'connection closed by the server', record.stepId);
    }

    try {
      await conn.send(encode(record));
    } catch (error) {
      throw new RunFailure('CONNECTION_ERROR', describeError(error), record.stepId);
    }
    logger.debug('Step sent', { stepId: record.stepId, waitSeconds: record.waitSeconds });

    const result = await conn.recv(this.config.responseTimeoutMs);
    switch (result.kind) {
      case 'timeout':
        throw new RunFailure(
          'RESPONSE_TIMEOUT',
          `no response within ${this.config.responseTimeoutMs / 1000} seconds`,
          record.stepId
        );
      case 'closed': {
        const { error } = result;
        if (error instanceof FrameError) {
          throw new RunFailure('PROTOCOL_ERROR', error.message, record.stepId);
        }
        throw new RunFailure(
          'CONNECTION_ERROR',
          error ? error.message : 'connection closed before a response arrived',
          record.stepId
        );
      }
      case 'frame':
        return this.handleResponse(this.decode(result.frame, record.stepId), record.stepId);
    }
  }

  private decode(frame: Uint8Array, stepId: StepId): ResponseMessage {
    try {
      return decodeResponse(frame);
    } catch (error) {
      throw new RunFailure('PROTOCOL_ERROR', describeError(error), stepId);
    }
  }

  private handleResponse(response: ResponseMessage, stepId: StepId): StepId {
    if (isRejection(response)) {
      const reportedId = response.code === 'ERR_MALFORMED' ? stepId : response.stepId;
      throw new RunFailure(response.code, response.message, reportedId);
    }

    if (response.stepId !== stepId) {
      throw new RunFailure(
        'PROTOCOL_ERROR',
        `acknowledgement for step ${response.stepId} while step ${stepId} was pending`,
        stepId
      );
    }
    return response.stepId;
  }

  private fail(
    acknowledged: StepId[],
    failedAt: number,
    stepId: StepId | null,
    code: FailureCode,
    message: string
  ): ClientFailure {
    logger.error(`Step ${stepId ?? '?'} failed: ${FAILURE_DESCRIPTIONS[code]}`, { code, message });
    return { ok: false, acknowledged, failedAt, stepId, code, message };
  }
}
