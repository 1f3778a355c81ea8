/**
 * @fileoverview Orchestrator timing constants.
 *
 * Warning tiers, grace windows and timeouts shared by the scheduling
 * components and the orchestration loop.
 *
 * @module config/orchestrator-timing
 */

// ============================================================================
// Tiered Warnings
// ============================================================================

/** Warning tiers for admin-scheduled actions with a long original delay (minutes) */
export const SCHEDULED_WARNING_TIERS_LONG = [10, 5, 1] as const;

/** Warning tiers when the original delay is over MEDIUM but not LONG (minutes) */
export const SCHEDULED_WARNING_TIERS_MEDIUM = [5, 1] as const;

/** Warning tiers for short delays (minutes) */
export const SCHEDULED_WARNING_TIERS_SHORT = [1] as const;

/** Original delay above which all three scheduled tiers apply (minutes) */
export const LONG_DELAY_THRESHOLD_MINUTES = 14;

/** Original delay above which the 5-minute tier applies (minutes) */
export const MEDIUM_DELAY_THRESHOLD_MINUTES = 5;

/** Fixed warning tiers for the periodic restart (minutes) */
export const PERIODIC_WARNING_TIERS = [15, 5, 1] as const;

/** Width of the window in which a tier may still fire (minutes) */
export const WARNING_WINDOW_MINUTES = 2;

// ============================================================================
// Status Machine
// ============================================================================

/** After startup, an already-running server reaching online is not announced (ms) */
export const FIRST_RUN_GRACE_MS = 2 * 60 * 1000;

/** Lines read from the end of the server log when reconciling at startup */
export const RECONCILE_TAIL_LINES = 400;

// ============================================================================
// Loop & External Calls
// ============================================================================

/** Default timeout for controller and command-source calls (ms) */
export const DEFAULT_EXTERNAL_CALL_TIMEOUT_MS = 15_000;

/** Lower bound for the loop sleep so a zero config cannot spin (ms) */
export const MIN_LOOP_SLEEP_MS = 100;

/** Timeout for a single systemctl / sc.exe invocation (ms) */
export const SERVICE_EXEC_TIMEOUT_MS = 30_000;

/** Timeout for one version check, which talks to the update servers (ms) */
export const VERSION_CHECK_TIMEOUT_MS = 2 * 60 * 1000;

/** Timeout for a webhook POST (ms) */
export const WEBHOOK_TIMEOUT_MS = 10_000;

// ============================================================================
// Process Error Recovery
// ============================================================================

/** Max consecutive unhandled process errors before exiting for the supervisor */
export const MAX_CONSECUTIVE_ERRORS = 5;

/** Error counter reset interval (ms) */
export const ERROR_RESET_MS = 60_000;

/** Audit log trim check interval (ms) */
export const LIFECYCLE_TRIM_INTERVAL_MS = 6 * 60 * 60 * 1000;
