/**
 * @fileoverview In-process CommandSource fed by the admin API.
 *
 * Each submitted command gets the next sequence number. The loop polls with
 * the highest sequence it has handled, so a command is delivered again only
 * if the loop never consumed it. Old commands are dropped past a bounded
 * retention.
 *
 * @module command-inbox
 */

import type { AdminCommand, CommandSource, ScheduledActionKind } from './types.js';

/** Commands retained for polling */
const MAX_RETAINED_COMMANDS = 200;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** An AdminCommand before the inbox assigns its sequence number */
export type AdminCommandInput = DistributiveOmit<AdminCommand, 'seq'>;

export class CommandInbox implements CommandSource {
  private commands: AdminCommand[] = [];
  private lastSeq = 0;

  submit(input: AdminCommandInput): AdminCommand {
    const command: AdminCommand = { ...input, seq: ++this.lastSeq };
    this.commands.push(command);
    if (this.commands.length > MAX_RETAINED_COMMANDS) {
      this.commands.splice(0, this.commands.length - MAX_RETAINED_COMMANDS);
    }
    return command;
  }

  schedule(kind: ScheduledActionKind, delayMinutes: number, requestedBy: string, reason?: string): AdminCommand {
    return this.submit({ op: 'schedule', kind, delayMinutes, requestedBy, ...(reason ? { reason } : {}) });
  }

  cancel(kind: ScheduledActionKind, requestedBy: string): AdminCommand {
    return this.submit({ op: 'cancel', kind, requestedBy });
  }

  skipPeriodic(requestedBy: string): AdminCommand {
    return this.submit({ op: 'skip_periodic', requestedBy });
  }

  async poll(afterSeq: number): Promise<AdminCommand[]> {
    return this.commands.filter((c) => c.seq > afterSeq);
  }

  get latestSeq(): number {
    return this.lastSeq;
  }
}
