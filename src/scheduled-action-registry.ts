/**
 * @fileoverview Pending admin actions (restart, stop, update).
 *
 * Holds at most one live action per kind. Scheduling a kind that is already
 * pending replaces it, and the replacement starts with a fresh warning
 * schedule derived from its own delay.
 *
 * @module scheduled-action-registry
 */

import { v4 as uuidv4 } from 'uuid';
import { TieredWarningTimer, selectWarningThresholds } from './tiered-warning-timer.js';
import type { ScheduledAction, ScheduledActionKind, ScheduledActionView } from './types.js';

/** Execution order when several actions fall due in the same tick */
export const ACTION_PRIORITY: Record<ScheduledActionKind, number> = {
  stop: 0,
  update: 1,
  restart: 2,
};

export interface ActionWarning {
  action: ScheduledAction;
  minutes: number;
}

export interface RegistryTick {
  warnings: ActionWarning[];
  /** Removed from the registry, highest priority first */
  due: ScheduledAction[];
}

interface Entry {
  action: ScheduledAction;
  timer: TieredWarningTimer;
}

export class ScheduledActionRegistry {
  private entries = new Map<ScheduledActionKind, Entry>();

  /**
   * Schedule `kind` to run `delayMinutes` from `now`, replacing any pending
   * action of the same kind.
   *
   * @throws RangeError when the delay is negative or not finite
   */
  schedule(
    kind: ScheduledActionKind,
    delayMinutes: number,
    now: number,
    requestedBy: string,
    reason?: string
  ): ScheduledAction {
    if (!Number.isFinite(delayMinutes) || delayMinutes < 0) {
      throw new RangeError(`Invalid delay for ${kind}: ${delayMinutes}`);
    }

    const scheduledAt = now + Math.round(delayMinutes * 60_000);
    const timer = new TieredWarningTimer(selectWarningThresholds(scheduledAt - now));
    const action: ScheduledAction = {
      id: uuidv4(),
      kind,
      createdAt: now,
      scheduledAt,
      warningsSent: timer.sent,
      requestedBy,
      ...(reason ? { reason } : {}),
    };
    this.entries.set(kind, { action, timer });
    return action;
  }

  /**
   * Remove the pending action of `kind`.
   * @returns The cancelled action, or null when none was pending
   */
  cancel(kind: ScheduledActionKind): ScheduledAction | null {
    const entry = this.entries.get(kind);
    if (!entry) return null;
    this.entries.delete(kind);
    return entry.action;
  }

  get(kind: ScheduledActionKind): ScheduledAction | null {
    return this.entries.get(kind)?.action ?? null;
  }

  has(kind: ScheduledActionKind): boolean {
    return this.entries.has(kind);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Pending actions, soonest first */
  list(): ScheduledAction[] {
    return Array.from(this.entries.values(), (e) => e.action).sort((a, b) => a.scheduledAt - b.scheduledAt);
  }

  view(): ScheduledActionView[] {
    return Array.from(this.entries.values())
      .sort((a, b) => a.action.scheduledAt - b.action.scheduledAt)
      .map(({ action, timer }) => ({
        id: action.id,
        kind: action.kind,
        createdAt: action.createdAt,
        scheduledAt: action.scheduledAt,
        warningsSent: [...action.warningsSent].sort((a, b) => b - a),
        thresholds: [...timer.thresholds],
        requestedBy: action.requestedBy,
        ...(action.reason ? { reason: action.reason } : {}),
      }));
  }

  /** Earliest scheduledAt among pending actions */
  nextDueAt(): number | null {
    let next: number | null = null;
    for (const { action } of this.entries.values()) {
      if (next === null || action.scheduledAt < next) next = action.scheduledAt;
    }
    return next;
  }

  /**
   * Advance every pending action: collect warnings to send and remove the
   * actions that are due.
   */
  tick(now: number): RegistryTick {
    const warnings: ActionWarning[] = [];
    const due: ScheduledAction[] = [];

    for (const [kind, entry] of this.entries) {
      const poll = entry.timer.poll(entry.action.scheduledAt, now);
      if (poll.due) {
        due.push(entry.action);
        this.entries.delete(kind);
      } else if (poll.warning !== null) {
        warnings.push({ action: entry.action, minutes: poll.warning });
      }
    }

    due.sort((a, b) => ACTION_PRIORITY[a.kind] - ACTION_PRIORITY[b.kind]);
    return { warnings, due };
  }

  clear(): void {
    this.entries.clear();
  }
}
