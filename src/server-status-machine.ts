/**
 * @fileoverview ServerStatusMachine - canonical server status from log events
 *
 * Folds parsed log events into a single ServerStatus while protecting against
 * stale or out-of-order evidence: a candidate status is only accepted when it
 * ranks at or above the highest status reached so far, except for shutdown and
 * offline, which always win. The high-water mark only drops on an explicit
 * reset (the warden starting the process, or a new process instance appearing).
 *
 * Events emitted:
 * - `statusChanged` - an accepted transition that should be announced
 * - `reconciled` - startup reconciliation finished
 *
 * @module server-status-machine
 */

import { EventEmitter } from 'node:events';
import { FIRST_RUN_GRACE_MS } from './config/orchestrator-timing.js';
import { classifyPerformance, parseLogLines } from './log-event-parser.js';
import type { LogEvent, PerformanceThresholds, ServerStatus, ServerStatusKind } from './types.js';

/** Ranks of the ordered kinds; `shutting_down` is deliberately absent */
export const STATUS_PRIORITY: Record<Exclude<ServerStatusKind, 'shutting_down'>, number> = {
  unknown: 0,
  offline: 1,
  starting: 2,
  loading: 3,
  online: 4,
};

/** Kinds accepted regardless of the high-water mark */
const OVERRIDE_KINDS: ReadonlySet<ServerStatusKind> = new Set<ServerStatusKind>(['shutting_down', 'offline']);

const STATUS_TEXT: Record<ServerStatusKind, { phase: string; message: string }> = {
  unknown: { phase: 'Unknown', message: 'No lifecycle activity observed yet' },
  offline: { phase: 'Offline', message: 'Server is offline' },
  starting: { phase: 'Starting', message: 'Server process is starting' },
  loading: { phase: 'Loading', message: 'Loading world' },
  online: { phase: 'Online', message: 'Server is online' },
  shutting_down: { phase: 'Shutting down', message: 'Server is shutting down' },
};

/**
 * Outcome of applying one event.
 * `changed` reports a kind change; `notify` whether it should be announced.
 */
export interface StatusTransition {
  previous: ServerStatus;
  current: ServerStatus;
  changed: boolean;
  notify: boolean;
  accepted: boolean;
}

export interface ServerStatusMachineOptions {
  thresholds: PerformanceThresholds;
  /** When the warden started (grace window origin) */
  startedAt: number;
  firstRunGraceMs?: number;
}

export interface ServerStatusMachineEvents {
  statusChanged: (transition: StatusTransition) => void;
  reconciled: (status: ServerStatus) => void;
  highWaterReset: (reason: string) => void;
}

/**
 * Rank used by the acceptance rule.
 * `shutting_down` never becomes the high-water mark, so it ranks like offline.
 */
export function statusPriority(kind: ServerStatusKind): number {
  return kind === 'shutting_down' ? STATUS_PRIORITY.offline : STATUS_PRIORITY[kind];
}

export function createInitialStatus(): ServerStatus {
  return {
    kind: 'unknown',
    phase: STATUS_TEXT.unknown.phase,
    lastActivityAt: null,
    isOnline: false,
    message: STATUS_TEXT.unknown.message,
    performance: null,
    playerCount: 0,
    highestKindReached: 'unknown',
  };
}

function copyStatus(status: ServerStatus): ServerStatus {
  return {
    ...status,
    performance: status.performance
      ? { ...status.performance, entityCounts: { ...status.performance.entityCounts } }
      : null,
  };
}

export class ServerStatusMachine extends EventEmitter {
  private status: ServerStatus = createInitialStatus();
  private readonly thresholds: PerformanceThresholds;
  private readonly startedAt: number;
  private readonly firstRunGraceMs: number;

  /** Server was already running when the warden started; its first online is not announced */
  private serverPredatesWarden = false;

  constructor(options: ServerStatusMachineOptions) {
    super();
    this.thresholds = options.thresholds;
    this.startedAt = options.startedAt;
    this.firstRunGraceMs = options.firstRunGraceMs ?? FIRST_RUN_GRACE_MS;
  }

  /** Snapshot of the current status */
  get current(): ServerStatus {
    return copyStatus(this.status);
  }

  get kind(): ServerStatusKind {
    return this.status.kind;
  }

  /**
   * Fold one event into the status.
   *
   * @param event - Parsed log event
   * @param now - Wall clock, used for the first-run grace window
   */
  apply(event: LogEvent, now: number = Date.now()): StatusTransition {
    const transition = this.fold(event, now);
    if (transition.notify) {
      this.emit('statusChanged', transition);
    }
    return transition;
  }

  private fold(event: LogEvent, now: number): StatusTransition {
    const previous = copyStatus(this.status);
    const candidate = event.kind;

    if (candidate === 'unknown' || !this.accepts(candidate)) {
      return { previous, current: copyStatus(this.status), changed: false, notify: false, accepted: false };
    }

    this.status.lastActivityAt = event.timestamp;
    this.setKind(candidate);
    if (!OVERRIDE_KINDS.has(candidate) && statusPriority(candidate) > statusPriority(this.status.highestKindReached)) {
      this.status.highestKindReached = candidate;
    }

    if (candidate === 'online' && event.performance) {
      this.status.performance = {
        ...event.performance,
        entityCounts: { ...event.performance.entityCounts },
        status: classifyPerformance(event.performance.avgFps, this.thresholds),
        sampledAt: event.timestamp,
      };
      this.status.playerCount = event.performance.playerCount;
      this.status.message = `Server is online (${event.performance.playerCount} players, ${event.performance.avgFps} fps)`;
    }

    const changed = candidate !== previous.kind;
    let notify = changed;
    if (changed && candidate === 'online' && this.serverPredatesWarden) {
      if (now - this.startedAt < this.firstRunGraceMs) {
        notify = false;
      }
      this.serverPredatesWarden = false;
    } else if (changed && OVERRIDE_KINDS.has(candidate)) {
      this.serverPredatesWarden = false;
    }

    return { previous, current: copyStatus(this.status), changed, notify, accepted: true };
  }

  /**
   * Seed the status at startup from the recent log tail and the controller.
   *
   * A process the controller reports as not running is offline whatever the
   * log says. For a running process only the tail from its most recent start
   * marker is replayed, silently.
   */
  reconcile(recentLogTail: readonly string[], controllerIsRunning: boolean, now: number = Date.now()): StatusTransition {
    const previous = copyStatus(this.status);

    if (!controllerIsRunning) {
      this.status = createInitialStatus();
      this.status.lastActivityAt = now;
      this.status.highestKindReached = 'offline';
      this.setKind('offline');
      this.serverPredatesWarden = false;
    } else {
      const events = parseLogLines(recentLogTail, now);
      let lastStart = -1;
      for (let i = events.length - 1; i >= 0; i--) {
        if (events[i].kind === 'starting') {
          lastStart = i;
          break;
        }
      }

      this.status = createInitialStatus();
      this.serverPredatesWarden = false;
      for (const event of events.slice(Math.max(lastStart, 0))) {
        this.fold(event, event.timestamp);
      }
      this.serverPredatesWarden = true;
    }

    const current = copyStatus(this.status);
    this.emit('reconciled', current);
    return { previous, current, changed: previous.kind !== current.kind, notify: false, accepted: true };
  }

  /**
   * Explicit reset of the high-water mark, for a new process lifecycle.
   */
  resetHighWater(reason: string): void {
    this.status.highestKindReached = this.status.kind === 'unknown' ? 'unknown' : 'offline';
    this.emit('highWaterReset', reason);
  }

  /**
   * The controller reports the process gone: apply an offline override.
   */
  markOfflineFromController(now: number = Date.now()): StatusTransition {
    return this.apply({ timestamp: now, kind: 'offline', line: 'service reported not running' }, now);
  }

  private accepts(candidate: ServerStatusKind): boolean {
    if (OVERRIDE_KINDS.has(candidate)) return true;
    return statusPriority(candidate) >= statusPriority(this.status.highestKindReached);
  }

  private setKind(kind: ServerStatusKind): void {
    this.status.kind = kind;
    this.status.phase = STATUS_TEXT[kind].phase;
    this.status.message = STATUS_TEXT[kind].message;
    this.status.isOnline = kind === 'online';
    if (kind === 'offline') {
      this.status.performance = null;
      this.status.playerCount = 0;
    }
  }
}
