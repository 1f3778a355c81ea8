/**
 * @fileoverview Utility module exports.
 *
 * @module utils
 */

export { CleanupManager, type TimerOptions } from './cleanup-manager.js';
export { ExpiringCounter, type ExpiringCounterOptions } from './expiring-counter.js';
export { withTimeout, TimeoutError } from './async-timeout.js';
