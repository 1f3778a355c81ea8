/**
 * @fileoverview AutoRecoveryController - restarts a server that should be up
 * but is not.
 *
 * Attempts are bounded by a cooldown between tries and a maximum number of
 * consecutive tries; the count only resets once the server is confirmed
 * online. A stop judged deliberate (admin stop, or explicit evidence from the
 * audit log or the server log) suspends recovery until the next start.
 *
 * @module auto-recovery-controller
 */

import { withTimeout } from './utils/async-timeout.js';
import { getErrorMessage } from './types.js';
import type { IntentionalStopEvidence, RecoveryState, ServerStatus } from './types.js';

export type RecoveryReason =
  | 'running'
  | 'intentional_stop'
  | 'intentional_stop_detected'
  | 'blocked'
  | 'cooldown'
  | 'exhausted'
  | 'crash';

export interface RecoveryDecision {
  action: 'none' | 'restart';
  reason: RecoveryReason;
  /** Set the first time attempts run out, so the caller alerts once */
  alert: boolean;
}

export interface AutoRecoveryOptions {
  serviceName: string;
  cooldownMinutes: number;
  maxAttempts: number;
  intentionalStopWindowMinutes: number;
  evidence: IntentionalStopEvidence;
  /** Bound on the evidence lookup (ms) */
  evidenceTimeoutMs: number;
}

export class AutoRecoveryController {
  private readonly options: AutoRecoveryOptions;
  private consecutiveAttempts = 0;
  private lastAttemptAt: number | null = null;
  private intentionallyStopped = false;
  private blockedReason: string | null = null;
  private exhaustionAlerted = false;

  constructor(options: AutoRecoveryOptions) {
    this.options = options;
  }

  async tick(now: number, controllerIsRunning: boolean, status: ServerStatus): Promise<RecoveryDecision> {
    if (controllerIsRunning) {
      if (status.kind === 'online') this.onOnline();
      return { action: 'none', reason: 'running', alert: false };
    }
    if (this.intentionallyStopped) {
      return { action: 'none', reason: 'intentional_stop', alert: false };
    }
    if (this.blockedReason !== null) {
      return { action: 'none', reason: 'blocked', alert: false };
    }

    if (this.consecutiveAttempts >= this.options.maxAttempts) {
      const alert = !this.exhaustionAlerted;
      this.exhaustionAlerted = true;
      return { action: 'none', reason: 'exhausted', alert };
    }
    const cooldownMs = this.options.cooldownMinutes * 60_000;
    if (this.lastAttemptAt !== null && now - this.lastAttemptAt < cooldownMs) {
      return { action: 'none', reason: 'cooldown', alert: false };
    }

    if (await this.stopLooksIntentional()) {
      this.intentionallyStopped = true;
      this.resetCounters();
      return { action: 'none', reason: 'intentional_stop_detected', alert: false };
    }

    this.consecutiveAttempts++;
    this.lastAttemptAt = now;
    return { action: 'restart', reason: 'crash', alert: false };
  }

  /** Status entered online: the lifecycle recovered */
  onOnline(): void {
    this.resetCounters();
    this.intentionallyStopped = false;
    this.blockedReason = null;
  }

  /** An admin stop executed */
  markIntentionalStop(): void {
    this.intentionallyStopped = true;
  }

  /** A restart or update executed */
  clearIntentionalStop(): void {
    this.intentionallyStopped = false;
    this.blockedReason = null;
  }

  /** A fatal service-control error: no further attempts until reset */
  block(reason: string): void {
    this.blockedReason = reason;
  }

  getState(): RecoveryState {
    return {
      consecutiveAttempts: this.consecutiveAttempts,
      lastAttemptAt: this.lastAttemptAt,
      cooldownMinutes: this.options.cooldownMinutes,
      maxAttempts: this.options.maxAttempts,
      intentionallyStopped: this.intentionallyStopped,
      blockedReason: this.blockedReason,
    };
  }

  private resetCounters(): void {
    this.consecutiveAttempts = 0;
    this.lastAttemptAt = null;
    this.exhaustionAlerted = false;
  }

  private async stopLooksIntentional(): Promise<boolean> {
    const { evidence, serviceName, intentionalStopWindowMinutes, evidenceTimeoutMs } = this.options;
    try {
      return await withTimeout(
        evidence.assess(serviceName, intentionalStopWindowMinutes),
        evidenceTimeoutMs,
        'intentional stop evidence'
      );
    } catch (err) {
      console.warn(`[AutoRecovery] Stop evidence unavailable, treating stop as a crash: ${getErrorMessage(err)}`);
      return false;
    }
  }
}
