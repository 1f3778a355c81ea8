/**
 * @fileoverview Per-key counters that reset after a fixed window.
 *
 * Used to rate-limit failed API authentication per client IP: the first hit
 * opens a window, further hits inside it increment the count, and the whole
 * entry expires when the window closes. A background sweep drops expired
 * entries so idle keys do not accumulate.
 *
 * @module utils/expiring-counter
 */

import type { Disposable } from '../types.js';

interface CounterEntry {
  count: number;
  expiresAt: number;
}

export interface ExpiringCounterOptions {
  /** Window length in milliseconds, measured from the first hit */
  windowMs: number;
  /** Sweep period (default: windowMs / 2) */
  sweepIntervalMs?: number;
  /** Upper bound on tracked keys; the oldest is evicted past it */
  maxKeys?: number;
  clock?: () => number;
}

export class ExpiringCounter<K> implements Disposable {
  private entries = new Map<K, CounterEntry>();
  private sweepTimer: NodeJS.Timeout | null = null;
  private _isDisposed = false;

  private readonly windowMs: number;
  private readonly maxKeys: number;
  private readonly clock: () => number;

  constructor(options: ExpiringCounterOptions) {
    this.windowMs = options.windowMs;
    this.maxKeys = options.maxKeys ?? 10_000;
    this.clock = options.clock ?? Date.now;

    this.sweepTimer = setInterval(() => {
      if (!this._isDisposed) this.sweep();
    }, options.sweepIntervalMs ?? Math.max(1, Math.floor(options.windowMs / 2)));
    // Don't prevent process exit
    this.sweepTimer.unref();
  }

  get isDisposed(): boolean {
    return this._isDisposed;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Current count for `key`, 0 when absent or expired */
  get(key: K): number {
    const entry = this.entries.get(key);
    if (!entry) return 0;
    if (entry.expiresAt <= this.clock()) {
      this.entries.delete(key);
      return 0;
    }
    return entry.count;
  }

  /**
   * Record one hit.
   * @returns The count after this hit
   */
  increment(key: K): number {
    if (this._isDisposed) return 0;
    const now = this.clock();
    const entry = this.entries.get(key);
    if (entry && entry.expiresAt > now) {
      entry.count++;
      return entry.count;
    }

    if (!entry && this.entries.size >= this.maxKeys) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(key, { count: 1, expiresAt: now + this.windowMs });
    return 1;
  }

  reset(key: K): boolean {
    return this.entries.delete(key);
  }

  /**
   * Drop expired entries now.
   * @returns Number of entries removed
   */
  sweep(): number {
    const now = this.clock();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  dispose(): void {
    if (this._isDisposed) return;
    this._isDisposed = true;
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.entries.clear();
  }
}
