/**
 * @fileoverview Owns the timers and signal listeners of a long-running warden
 * component and releases them together on dispose().
 *
 * @module utils/cleanup-manager
 */

import type { Disposable } from '../types.js';

export interface TimerOptions {
  /** Shown in debug output */
  description?: string;
}

/** Anything listeners can be detached from, such as `process` or an EventEmitter */
export interface ListenerTarget<L> {
  removeListener(event: string, listener: L): unknown;
}

/**
 * @example
 * ```typescript
 * const cleanup = new CleanupManager();
 * cleanup.setInterval(() => void log.trimIfNeeded(), 60_000, { description: 'audit trim' });
 * process.once('SIGTERM', () => cleanup.dispose());
 * ```
 */
export class CleanupManager implements Disposable {
  private readonly releases = new Map<() => void, string>();
  private stopped = false;
  private readonly debugMode: boolean;

  constructor(debug = false) {
    this.debugMode = debug;
  }

  get isDisposed(): boolean {
    return this.stopped;
  }

  /** Read by loops before each iteration */
  get isStopped(): boolean {
    return this.stopped;
  }

  /** Live timers and listeners */
  get pending(): number {
    return this.releases.size;
  }

  /**
   * One-shot timer. Never fires after dispose; forgotten once it has run.
   */
  setTimeout(callback: () => void, delayMs: number, options?: TimerOptions): void {
    const release = (): void => clearTimeout(handle);
    const handle = setTimeout(() => {
      this.releases.delete(release);
      if (!this.stopped) callback();
    }, delayMs);
    this.track(release, options?.description ?? `timeout ${delayMs}ms`);
  }

  setInterval(callback: () => void, delayMs: number, options?: TimerOptions): void {
    const handle = setInterval(() => {
      if (!this.stopped) callback();
    }, delayMs);
    this.track(() => clearInterval(handle), options?.description ?? `interval ${delayMs}ms`);
  }

  /**
   * Detach `listener` from `target` on dispose. The caller attaches it.
   */
  registerListener<L>(target: ListenerTarget<L>, event: string, listener: L, description: string): void {
    this.track(() => {
      target.removeListener(event, listener);
    }, description);
  }

  /**
   * Release everything. Idempotent; a failing release does not stop the rest.
   */
  dispose(): void {
    if (this.stopped) return;
    this.stopped = true;

    const failed: string[] = [];
    for (const [release, description] of this.releases) {
      try {
        release();
        this.debug(`Released ${description}`);
      } catch (err) {
        failed.push(description);
        this.debug(`Releasing ${description} failed: ${err}`);
      }
    }
    this.releases.clear();

    if (failed.length > 0) {
      console.error(`[CleanupManager] ${failed.length} errors during disposal:`, failed.join(', '));
    }
  }

  private track(release: () => void, description: string): void {
    if (this.stopped) {
      release();
      return;
    }
    this.releases.set(release, description);
    this.debug(`Tracking ${description}`);
  }

  private debug(message: string): void {
    if (this.debugMode) {
      console.log(`[CleanupManager] ${message}`);
    }
  }
}
