/**
 * @fileoverview Once-per-threshold countdown warnings.
 *
 * Shared by the admin action registry and the periodic scheduler. Each
 * threshold (in minutes before the target) fires at most once, and only while
 * the remaining time is inside its window `(T - window, T]`. A threshold whose
 * window passed without a poll is marked sent and stays silent.
 *
 * @module tiered-warning-timer
 */

import {
  LONG_DELAY_THRESHOLD_MINUTES,
  MEDIUM_DELAY_THRESHOLD_MINUTES,
  SCHEDULED_WARNING_TIERS_LONG,
  SCHEDULED_WARNING_TIERS_MEDIUM,
  SCHEDULED_WARNING_TIERS_SHORT,
  WARNING_WINDOW_MINUTES,
} from './config/orchestrator-timing.js';

const MINUTE_MS = 60_000;

export interface WarningPoll {
  /** Threshold (minutes) to announce this poll, if any */
  warning: number | null;
  /** Target reached; no warning is reported in the same poll */
  due: boolean;
}

/**
 * Thresholds for an admin-scheduled action, chosen from its original delay.
 */
export function selectWarningThresholds(originalDelayMs: number): number[] {
  const minutes = originalDelayMs / MINUTE_MS;
  if (minutes > LONG_DELAY_THRESHOLD_MINUTES) return [...SCHEDULED_WARNING_TIERS_LONG];
  if (minutes > MEDIUM_DELAY_THRESHOLD_MINUTES) return [...SCHEDULED_WARNING_TIERS_MEDIUM];
  return [...SCHEDULED_WARNING_TIERS_SHORT];
}

export class TieredWarningTimer {
  /** Descending */
  readonly thresholds: readonly number[];
  private readonly windowMs: number;
  private readonly sentSet = new Set<number>();

  constructor(thresholds: readonly number[], windowMinutes: number = WARNING_WINDOW_MINUTES) {
    this.thresholds = [...new Set(thresholds)].sort((a, b) => b - a);
    this.windowMs = windowMinutes * MINUTE_MS;
  }

  get sent(): ReadonlySet<number> {
    return this.sentSet;
  }

  /**
   * Check the countdown against `targetAt`.
   * When several windows overlap, the smallest threshold wins and the larger
   * ones are marked sent.
   */
  poll(targetAt: number, now: number): WarningPoll {
    const remaining = targetAt - now;
    if (remaining <= 0) {
      return { warning: null, due: true };
    }

    let warning: number | null = null;
    for (const threshold of this.thresholds) {
      if (this.sentSet.has(threshold)) continue;
      const thresholdMs = threshold * MINUTE_MS;
      if (remaining > thresholdMs) continue;

      this.sentSet.add(threshold);
      if (remaining > thresholdMs - this.windowMs) {
        warning = threshold;
      }
    }
    return { warning, due: false };
  }

  reset(): void {
    this.sentSet.clear();
  }
}
