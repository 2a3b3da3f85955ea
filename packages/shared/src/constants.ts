/**
 * @fileoverview Shared constants used by the server, the client driver and tests.
 */

// ============ Network Defaults ============

/** Host the server binds to and the client connects to by default. */
export const DEFAULT_HOST = 'localhost';

/** TCP port used when none is configured. */
export const DEFAULT_PORT = 8080;

// ============ Validation Defaults ============

/**
 * Minimum `waitSeconds` a step must report to be accepted.
 */
export const DEFAULT_TIMEOUT_THRESHOLD_SECONDS = 5;

/**
 * Seconds a session may go without a complete frame before the server closes it.
 */
export const DEFAULT_IDLE_TIMEOUT_SECONDS = 30;

/**
 * Seconds the client driver waits for the answer to one step.
 */
export const DEFAULT_RESPONSE_TIMEOUT_SECONDS = 30;

/**
 * Longest configurable timeout. Timer delays above 2^31 - 1 ms overflow and fire at once.
 */
export const MAX_TIMEOUT_SECONDS = 2_147_483;

// ============ Framing ============

/**
 * Size of the little-endian u32 length prefix in front of every frame.
 */
export const FRAME_HEADER_BYTES = 4;

/** Largest payload accepted by a frame reader unless configured otherwise. */
export const DEFAULT_MAX_FRAME_BYTES = 64 * 1024;

/** Hard upper bound imposed by the u32 length prefix. */
export const MAX_FRAME_BYTES_LIMIT = 0xffff_ffff;
