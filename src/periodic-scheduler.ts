/**
 * @fileoverview Fixed-clock maintenance: daily restart times, backup and
 * update-check intervals.
 *
 * The restart times are local `HH:mm` values. After each occurrence (executed
 * or skipped) the scheduler rolls forward to the next one and starts a fresh
 * warning countdown.
 *
 * @module periodic-scheduler
 */

import { PERIODIC_WARNING_TIERS } from './config/orchestrator-timing.js';
import { TIME_OF_DAY_PATTERN } from './config/warden-config.js';
import { TieredWarningTimer } from './tiered-warning-timer.js';
import type { PeriodicScheduleState } from './types.js';

const MINUTE_MS = 60_000;

export interface TimeOfDay {
  hours: number;
  minutes: number;
}

export type PeriodicTickOutcome =
  | { type: 'idle' }
  | { type: 'warning'; minutes: number; restartAt: number }
  | { type: 'execute'; restartAt: number }
  | { type: 'skipped'; restartAt: number };

export interface PeriodicSchedulerOptions {
  restartTimes: readonly string[];
  backupIntervalMinutes: number;
  updateCheckIntervalMinutes: number;
  startedAt: number;
}

export function parseTimeOfDay(value: string): TimeOfDay | null {
  const match = TIME_OF_DAY_PATTERN.exec(value);
  if (!match) return null;
  return { hours: Number(match[1]), minutes: Number(match[2]) };
}

/**
 * Earliest configured time strictly after `now` today, else the first
 * configured time tomorrow.
 *
 * @returns Epoch ms, or null when no valid time is configured
 */
export function nextOccurrence(timesOfDay: readonly string[], now: number): number | null {
  const parsed = timesOfDay
    .map(parseTimeOfDay)
    .filter((t): t is TimeOfDay => t !== null)
    .sort((a, b) => a.hours * 60 + a.minutes - (b.hours * 60 + b.minutes));
  if (parsed.length === 0) return null;

  const today = new Date(now);
  for (const time of parsed) {
    const candidate = new Date(today.getFullYear(), today.getMonth(), today.getDate(), time.hours, time.minutes);
    if (candidate.getTime() > now) return candidate.getTime();
  }

  const first = parsed[0];
  return new Date(today.getFullYear(), today.getMonth(), today.getDate() + 1, first.hours, first.minutes).getTime();
}

export class PeriodicScheduler {
  private readonly restartTimes: string[];
  private readonly backupIntervalMs: number;
  private readonly updateCheckIntervalMs: number;
  private readonly startedAt: number;
  private readonly timer = new TieredWarningTimer(PERIODIC_WARNING_TIERS);

  private nextRestartAt: number | null;
  private lastPerformedAt: number | null = null;
  private skipArmed = false;
  private lastBackupAt: number | null = null;
  private lastUpdateCheckAt: number | null = null;

  constructor(options: PeriodicSchedulerOptions) {
    this.restartTimes = [...options.restartTimes];
    this.backupIntervalMs = options.backupIntervalMinutes * MINUTE_MS;
    this.updateCheckIntervalMs = options.updateCheckIntervalMinutes * MINUTE_MS;
    this.startedAt = options.startedAt;
    this.nextRestartAt = nextOccurrence(this.restartTimes, options.startedAt);
  }

  get enabled(): boolean {
    return this.nextRestartAt !== null;
  }

  get nextRestart(): number | null {
    return this.nextRestartAt;
  }

  get skipArmedForNext(): boolean {
    return this.skipArmed;
  }

  tick(now: number): PeriodicTickOutcome {
    const restartAt = this.nextRestartAt;
    if (restartAt === null) return { type: 'idle' };

    if (this.skipArmed) {
      if (now < restartAt) return { type: 'idle' };
      this.skipArmed = false;
      this.advance(now);
      return { type: 'skipped', restartAt };
    }

    const poll = this.timer.poll(restartAt, now);
    if (poll.due) {
      this.lastPerformedAt = now;
      this.advance(now);
      return { type: 'execute', restartAt };
    }
    if (poll.warning !== null) {
      return { type: 'warning', minutes: poll.warning, restartAt };
    }
    return { type: 'idle' };
  }

  /**
   * Arm the one-shot skip for the next occurrence.
   * @returns false when no periodic restart is configured
   */
  skipNext(): boolean {
    if (this.nextRestartAt === null) return false;
    this.skipArmed = true;
    return true;
  }

  isBackupDue(now: number): boolean {
    if (this.backupIntervalMs <= 0) return false;
    return now - (this.lastBackupAt ?? this.startedAt) >= this.backupIntervalMs;
  }

  markBackupPerformed(now: number): void {
    this.lastBackupAt = now;
  }

  isUpdateCheckDue(now: number): boolean {
    if (this.updateCheckIntervalMs <= 0) return false;
    if (this.lastUpdateCheckAt === null) return true;
    return now - this.lastUpdateCheckAt >= this.updateCheckIntervalMs;
  }

  markUpdateChecked(now: number): void {
    this.lastUpdateCheckAt = now;
  }

  getState(): PeriodicScheduleState {
    return {
      restartTimesOfDay: [...this.restartTimes],
      nextRestartAt: this.nextRestartAt,
      warningsSent: [...this.timer.sent].sort((a, b) => b - a),
      lastPerformedAt: this.lastPerformedAt,
      skipNext: this.skipArmed,
      lastBackupAt: this.lastBackupAt,
      lastUpdateCheckAt: this.lastUpdateCheckAt,
    };
  }

  private advance(now: number): void {
    this.nextRestartAt = nextOccurrence(this.restartTimes, now);
    this.timer.reset();
  }
}
