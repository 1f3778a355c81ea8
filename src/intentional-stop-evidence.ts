/**
 * @fileoverview Explicit evidence that a service stop was deliberate.
 *
 * A stop counts as intentional when, inside the look-back window:
 * - the audit log records an admin stop, or
 * - the last lifecycle marker in the server log (ignoring exit lines) is a
 *   timestamped clean shutdown, and the warden itself did not restart or
 *   update the server in that window.
 *
 * @module intentional-stop-evidence
 */

import { RECONCILE_TAIL_LINES } from './config/orchestrator-timing.js';
import { extractTimestamp, parseLogLines } from './log-event-parser.js';
import type { IntentionalStopEvidence, LogSource } from './types.js';
import type { LifecycleEntry, LifecycleEventType } from './types/lifecycle.js';

/** Read side of the audit log */
export interface AuditLogReader {
  query(opts?: { event?: LifecycleEventType; since?: number; limit?: number }): Promise<LifecycleEntry[]>;
}

/** Warden-initiated operations that explain a shutdown in the server log */
const WARDEN_OPERATIONS: ReadonlySet<LifecycleEventType> = new Set<LifecycleEventType>([
  'action_executed',
  'recovery_attempt',
]);

export class AuditLogStopEvidence implements IntentionalStopEvidence {
  private readonly auditLog: AuditLogReader;
  private readonly serverLog: Pick<LogSource, 'readTail'>;
  private readonly clock: () => number;

  constructor(auditLog: AuditLogReader, serverLog: Pick<LogSource, 'readTail'>, clock: () => number = Date.now) {
    this.auditLog = auditLog;
    this.serverLog = serverLog;
    this.clock = clock;
  }

  async assess(serviceName: string, windowMinutes: number): Promise<boolean> {
    const now = this.clock();
    const since = now - windowMinutes * 60_000;

    const recent = (await this.auditLog.query({ since, limit: 500 })).filter((e) => e.serviceName === serviceName);
    if (recent.some((e) => e.event === 'admin_stop')) {
      console.log(`[StopEvidence] Admin stop of ${serviceName} found in the audit log`);
      return true;
    }
    if (recent.some((e) => WARDEN_OPERATIONS.has(e.event))) {
      return false;
    }

    const events = parseLogLines(await this.serverLog.readTail(RECONCILE_TAIL_LINES), now);
    let last = events.length - 1;
    while (last >= 0 && events[last].kind === 'offline') last--;
    if (last < 0 || events[last].kind !== 'shutting_down') {
      return false;
    }

    // Only the line's own timestamp places it inside the window
    const stampedAt = extractTimestamp(events[last].line);
    if (stampedAt !== null && stampedAt >= since) {
      console.log(`[StopEvidence] Clean shutdown marker found in the server log`);
      return true;
    }
    return false;
  }
}
