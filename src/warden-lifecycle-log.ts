/**
 * @fileoverview Append-only JSONL audit log of warden activity.
 *
 * Records warden start/stop, accepted status transitions, scheduled action
 * requests and executions, admin stops, recovery attempts and backups to
 * ~/.warden/lifecycle.jsonl. Intentional-stop detection reads it back.
 *
 * @module warden-lifecycle-log
 */

import { appendFile, readFile, writeFile } from 'node:fs/promises';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import type { AuditLogReader } from './intentional-stop-evidence.js';
import { LIFECYCLE_EVENT_TYPES } from './types/lifecycle.js';
import type { LifecycleEventType, LifecycleEntry } from './types/lifecycle.js';

/** Write side used by the orchestration loop */
export interface AuditLogWriter {
  log(entry: Omit<LifecycleEntry, 'ts'> & { ts?: number }): void;
}

export interface LifecycleQuery {
  event?: LifecycleEventType;
  since?: number;
  limit?: number;
}

export interface WardenLifecycleLogOptions {
  /** Entry count that triggers a trim */
  maxEntries?: number;
  /** Newest entries kept by a trim */
  keepEntries?: number;
  clock?: () => number;
}

const DEFAULT_QUERY_LIMIT = 200;

export class WardenLifecycleLog implements AuditLogWriter, AuditLogReader {
  readonly filePath: string;
  private readonly maxEntries: number;
  private readonly keepEntries: number;
  private readonly clock: () => number;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(filePath?: string, options: WardenLifecycleLogOptions = {}) {
    this.filePath = filePath || join(homedir(), '.warden', 'lifecycle.jsonl');
    this.maxEntries = options.maxEntries ?? 10_000;
    this.keepEntries = Math.min(options.keepEntries ?? 8_000, this.maxEntries);
    this.clock = options.clock ?? Date.now;

    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
  }

  /**
   * Queue an entry for appending. Never throws; write failures are logged.
   */
  log(entry: Omit<LifecycleEntry, 'ts'> & { ts?: number }): void {
    const line = JSON.stringify({ ts: this.clock(), ...entry }) + '\n';
    this.enqueue(() => appendFile(this.filePath, line, 'utf-8'));
  }

  /** Resolves once pending writes are on disk */
  flush(): Promise<void> {
    return this.writeQueue;
  }

  /**
   * Newest entries first. Malformed lines are skipped.
   */
  async query(opts: LifecycleQuery = {}): Promise<LifecycleEntry[]> {
    const limit = opts.limit ?? DEFAULT_QUERY_LIMIT;
    await this.writeQueue;
    const lines = await this.readLines();
    const matches: LifecycleEntry[] = [];

    for (let i = lines.length - 1; i >= 0 && matches.length < limit; i--) {
      const entry = parseEntry(lines[i]);
      if (!entry) continue;
      if (opts.event && entry.event !== opts.event) continue;
      if (opts.since !== undefined && entry.ts < opts.since) continue;
      matches.push(entry);
    }
    return matches;
  }

  /**
   * Drop the oldest entries once the file passes `maxEntries`.
   * Runs on the write queue so it never races an append.
   */
  trimIfNeeded(): Promise<void> {
    return this.enqueue(async () => {
      const lines = await this.readLines();
      if (lines.length <= this.maxEntries) return;

      const kept = lines.slice(-this.keepEntries);
      await writeFile(this.filePath, kept.join('\n') + '\n', 'utf-8');
      console.log(`[LifecycleLog] Trimmed from ${lines.length} to ${kept.length} entries`);
    });
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    this.writeQueue = this.writeQueue.then(task).catch((err) => {
      console.error('[LifecycleLog] Write failed:', err);
    });
    return this.writeQueue;
  }

  private async readLines(): Promise<string[]> {
    try {
      const raw = await readFile(this.filePath, 'utf-8');
      return raw.split('\n').filter((line) => line.trim().length > 0);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') return [];
      throw err;
    }
  }
}

const LifecycleEntrySchema = z.object({
  ts: z.number(),
  event: z.enum(LIFECYCLE_EVENT_TYPES),
  serviceName: z.string(),
  kind: z.string().optional(),
  reason: z.string().optional(),
  outcome: z.enum(['success', 'failure', 'skipped']).optional(),
  extra: z.record(z.unknown()).optional(),
});

/** A parsed line, or null for malformed or foreign lines */
function parseEntry(line: string): LifecycleEntry | null {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return null;
  }
  const result = LifecycleEntrySchema.safeParse(value);
  return result.success ? result.data : null;
}
