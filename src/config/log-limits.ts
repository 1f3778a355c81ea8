/**
 * @fileoverview Limits for reading the managed server's log file.
 *
 * The warden polls the log every tick, so reads are bounded to keep a tick
 * short even when the server dumps a large burst (world generation, stack
 * traces) between two polls.
 *
 * @module config/log-limits
 */

/**
 * Maximum bytes read from the log in one tick.
 * Anything beyond is picked up on the following ticks.
 */
export const MAX_READ_BYTES_PER_TICK = 1024 * 1024; // 1MB

/**
 * Bytes read from the end of the file when collecting the startup tail.
 */
export const TAIL_READ_BYTES = 256 * 1024; // 256KB

/**
 * Longest line kept in the pending partial-line buffer.
 * A line that never terminates is dropped past this size.
 */
export const MAX_PENDING_LINE_LENGTH = 64 * 1024; // 64KB

/**
 * Longest line handed to the parser; longer lines are truncated.
 */
export const MAX_PARSED_LINE_LENGTH = 4 * 1024;
