/**
 * @fileoverview Step relay protocol message definitions.
 * Uses Zod for runtime validation of every decoded frame.
 */

import { z } from 'zod';
import { IdleTimeoutError, type ReportedError, SequenceError, TimeoutError } from './errors.js';

// ============ Step Records (client -> server) ============

/**
 * Schema for a step identifier. Capped at the largest safe integer so that
 * `id + 1` is always a distinct id.
 */
export const StepIdSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);
export type StepId = z.infer<typeof StepIdSchema>;

/**
 * One unit of client-submitted data.
 * `payload` is opaque to the server and passed through untouched.
 */
export const StepRecord = z.object({
  stepId: StepIdSchema,
  waitSeconds: z.number().finite().nonnegative(),
  payload: z.unknown().optional(),
});

export type StepRecord = z.infer<typeof StepRecord>;

/**
 * A step record as it travels on the wire and sits in fixture files.
 */
export const WireStepRecord = z.object({
  step_id: StepIdSchema,
  wait_seconds: z.number().finite().nonnegative(),
  payload: z.unknown().optional(),
});

export type WireStepRecord = z.infer<typeof WireStepRecord>;

/**
 * Wire schema that yields a {@link StepRecord}.
 */
export const StepRecordFromWire = WireStepRecord.transform(
  ({ step_id, wait_seconds, payload }): StepRecord =>
    payload === undefined
      ? { stepId: step_id, waitSeconds: wait_seconds }
      : { stepId: step_id, waitSeconds: wait_seconds, payload }
);

export function toWireRecord({ stepId, waitSeconds, payload }: StepRecord): WireStepRecord {
  return payload === undefined
    ? { step_id: stepId, wait_seconds: waitSeconds }
    : { step_id: stepId, wait_seconds: waitSeconds, payload };
}

// ============ Responses (server -> client) ============

/**
 * Step accepted.
 */
export const AckMessage = z.object({
  code: z.literal('ACK'),
  stepId: StepIdSchema,
});

/**
 * Step id did not follow the last accepted one.
 */
export const SequenceErrorMessage = z.object({
  code: z.literal('ERR_SEQUENCE'),
  stepId: StepIdSchema,
  expectedStepId: StepIdSchema,
  message: z.string(),
});

/**
 * Either the reported wait was below the threshold (`threshold`)
 * or the session went quiet for longer than the read timeout (`idle`).
 */
export const TimeoutErrorMessage = z.object({
  code: z.literal('ERR_TIMEOUT'),
  kind: z.enum(['threshold', 'idle']),
  stepId: StepIdSchema.nullable(),
  message: z.string(),
});

/**
 * Sent before the server drops a session whose bytes could not be decoded.
 */
export const MalformedMessage = z.object({
  code: z.literal('ERR_MALFORMED'),
  message: z.string(),
});

/**
 * Union of all valid server-to-client messages.
 */
export const ResponseMessage = z.discriminatedUnion('code', [
  AckMessage,
  SequenceErrorMessage,
  TimeoutErrorMessage,
  MalformedMessage,
]);

export type ResponseMessage = z.infer<typeof ResponseMessage>;
export type ResponseCode = ResponseMessage['code'];
export type RejectionMessage = Exclude<ResponseMessage, { code: 'ACK' }>;
export type RejectionCode = RejectionMessage['code'];

// ============ Utilities ============

/**
 * Check whether a response ends the session.
 */
export function isRejection(message: ResponseMessage): message is RejectionMessage {
  return message.code !== 'ACK';
}

/**
 * Build the response the server sends for an error that ends a session.
 */
export function toErrorResponse(error: ReportedError): RejectionMessage {
  if (error instanceof SequenceError) {
    return {
      code: 'ERR_SEQUENCE',
      stepId: error.stepId,
      expectedStepId: error.expectedStepId,
      message: error.message,
    };
  }
  if (error instanceof TimeoutError) {
    return { code: 'ERR_TIMEOUT', kind: 'threshold', stepId: error.stepId, message: error.message };
  }
  if (error instanceof IdleTimeoutError) {
    return { code: 'ERR_TIMEOUT', kind: 'idle', stepId: null, message: error.message };
  }
  return { code: 'ERR_MALFORMED', message: error.message };
}

/**
 * Render Zod issues as `path: message` pairs.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
