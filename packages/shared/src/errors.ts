/**
 * @fileoverview Error taxonomy for step sessions.
 *
 * Protocol errors carry the response code the server reports for them.
 * Every error is local to the session that raised it.
 */

import type { StepId } from './protocol.js';

/**
 * Malformed or truncated wire data.
 */
export class FrameError extends Error {
  readonly code = 'ERR_MALFORMED' as const;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'FrameError';
  }
}

/**
 * A step id that does not follow the last accepted one.
 */
export class SequenceError extends Error {
  readonly code = 'ERR_SEQUENCE' as const;

  constructor(
    readonly stepId: StepId,
    readonly expectedStepId: StepId
  ) {
    super(`Step ${stepId} is out of order, expected step ${expectedStepId}`);
    this.name = 'SequenceError';
  }
}

/**
 * A step whose reported wait is below the server threshold.
 */
export class TimeoutError extends Error {
  readonly code = 'ERR_TIMEOUT' as const;

  constructor(
    readonly stepId: StepId,
    readonly waitSeconds: number,
    readonly thresholdSeconds: number
  ) {
    super(`Step ${stepId} waited ${waitSeconds}s, below the ${thresholdSeconds}s threshold`);
    this.name = 'TimeoutError';
  }
}

/**
 * No complete frame arrived within the read timeout.
 */
export class IdleTimeoutError extends Error {
  readonly code = 'ERR_TIMEOUT' as const;

  constructor(readonly idleTimeoutMs: number) {
    super(`No step received within ${idleTimeoutMs / 1000} seconds`);
    this.name = 'IdleTimeoutError';
  }
}

/**
 * Unexpected disconnect or socket failure.
 */
export class ConnectionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

/**
 * A fixture document that is missing or does not describe a list of steps.
 */
export class FixtureError extends Error {
  constructor(
    readonly source: string,
    detail: string,
    options?: ErrorOptions
  ) {
    super(`Invalid fixture ${source}: ${detail}`, options);
    this.name = 'FixtureError';
  }
}

/**
 * Invalid server or client configuration.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Errors the sequence validator rejects a step with.
 */
export type RejectionError = SequenceError | TimeoutError;

/**
 * Errors that end a session with a response to the client.
 */
export type ReportedError = RejectionError | IdleTimeoutError | FrameError;

/**
 * Render an unknown thrown value as a log-friendly message.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
